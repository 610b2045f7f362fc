import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['src/**/*.test.ts'],
        exclude: ['**/node_modules/**', '**/dist/**'],
        environment: 'node',
        env: {
            LOG_TO_FILE: 'false',
            LOG_SILENT: 'true'
        }
    }
});
