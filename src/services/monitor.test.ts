import {describe, it, expect} from 'vitest';
import {Monitor} from './monitor';

describe('Monitor', () => {
    it('sweeps the cache on demand', () => {
        let sweeps = 0;
        const monitor = new Monitor({stats: '0 * * * * *', cacheSweep: '0 */10 * * * *'}, {
            sweepExpired: () => {
                sweeps++;
                return 4;
            }
        }, () => ({}));

        expect(monitor.sweep()).toBe(4);
        expect(sweeps).toBe(1);
    });

    it('survives a failing stats collector', () => {
        const monitor = new Monitor({stats: '0 * * * * *', cacheSweep: '0 */10 * * * *'}, {sweepExpired: () => 0}, () => {
            throw new Error('component not ready');
        });

        expect(() => monitor.logStats()).not.toThrow();
    });

    it('refuses an invalid schedule and leaves nothing running', () => {
        const monitor = new Monitor({stats: '0 * * * * *', cacheSweep: 'every ten minutes'}, {sweepExpired: () => 0}, () => ({}));

        expect(() => monitor.start()).toThrow();
        monitor.stop();
    });
});
