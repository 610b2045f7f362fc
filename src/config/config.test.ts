import {describe, it, expect} from 'vitest';
import path from 'path';
import {loadConfig, systemEnvPrefix} from './config';
import {ConfigurationError} from '../utils/errors';

describe('loadConfig', () => {
    it('applies defaults for an empty environment', () => {
        const config = loadConfig({});

        expect(config.camunda.baseUrl).toBe('http://localhost:8080/engine-rest');
        expect(config.camunda.lockDuration).toBe(31536000000);
        expect(config.camunda.unlockOnDispatchFailure).toBe(false);
        expect(config.camunda.topics).toEqual([]);
        expect(config.camunda.auth).toBeUndefined();
        expect(config.rabbitmq.tasksExchange).toBe('camunda.external.tasks');
        expect(config.rabbitmq.unroutedExchange).toBe('camunda.unrouted.tasks');
        expect(config.rabbitmq.errorsQueue).toBe('errors.queue');
        expect(config.cache).toEqual({ttlHours: 24, maxSize: 150, sweepSchedule: '0 */10 * * * *'});
        expect(config.retry).toEqual({attempts: 5, baseDelayMs: 1000, jitterRatio: 0.5});
        expect(config.routingConfigPath).toBe(path.join(process.cwd(), 'config', 'routing.json'));
        expect(config.statusPort).toBe(0);
    });

    it('reads overrides and lists', () => {
        const config = loadConfig({
            CAMUNDA_TOPICS: 'send_email, bitrix_create_task ,',
            CAMUNDA_AUTH_USERNAME: 'demo',
            CAMUNDA_AUTH_PASSWORD: 'test-secret',
            CAMUNDA_VERIFY_TLS: 'no',
            UNLOCK_ON_DISPATCH_FAILURE: 'true',
            FETCH_WORKERS: '3',
            METADATA_CACHE_MAX_SIZE: '20',
            RETRY_JITTER_RATIO: '0.25'
        });

        expect(config.camunda.topics).toEqual(['send_email', 'bitrix_create_task']);
        expect(config.camunda.auth).toEqual({username: 'demo', password: 'test-secret'});
        expect(config.camunda.verifyTls).toBe(false);
        expect(config.camunda.unlockOnDispatchFailure).toBe(true);
        expect(config.camunda.fetchWorkers).toBe(3);
        expect(config.cache.maxSize).toBe(20);
        expect(config.retry.jitterRatio).toBe(0.25);
    });

    it('reads the tenant filter', () => {
        expect(loadConfig({}).camunda.tenantId).toBeUndefined();
        expect(loadConfig({CAMUNDA_TENANT_ID: ' acme '}).camunda.tenantId).toBe('acme');
    });

    it('collects webhook settings of consumer systems only', () => {
        const config = loadConfig({
            CONSUMER_SYSTEMS: 'notifications,python-services',
            NOTIFICATIONS_WEBHOOK_URL: 'http://notify.test/hook',
            NOTIFICATIONS_WEBHOOK_SECRET: 'test-secret',
            PYTHON_SERVICES_WEBHOOK_URL: 'http://py.test/tasks',
            PYTHON_SERVICES_STATUS_URL: 'http://py.test/status',
            BITRIX24_WEBHOOK_URL: 'http://bitrix.test/hook'
        });

        expect(config.consumers.systems).toEqual(['notifications', 'python-services']);
        expect(config.consumers.webhooks).toEqual({
            'notifications': {url: 'http://notify.test/hook', secret: 'test-secret', statusUrl: undefined},
            'python-services': {url: 'http://py.test/tasks', secret: undefined, statusUrl: 'http://py.test/status'}
        });
    });

    it('rejects malformed numbers and booleans', () => {
        expect(() => loadConfig({CAMUNDA_MAX_TASKS: 'ten'})).toThrow(ConfigurationError);
        expect(() => loadConfig({CAMUNDA_MAX_TASKS: '0'})).toThrow('CAMUNDA_MAX_TASKS must be an integer >= 1, got "0"');
        expect(() => loadConfig({CAMUNDA_VERIFY_TLS: 'maybe'})).toThrow('CAMUNDA_VERIFY_TLS must be a boolean, got "maybe"');
        expect(() => loadConfig({RETRY_JITTER_RATIO: '1'})).toThrow('RETRY_JITTER_RATIO must be below 1, got 1');
    });

    it('rejects zero backoff delays and polling intervals', () => {
        expect(() => loadConfig({RETRY_BASE_DELAY_MS: '0'})).toThrow('RETRY_BASE_DELAY_MS must be an integer >= 1, got "0"');
        expect(() => loadConfig({RECONCILE_INTERVAL_SECONDS: '0'})).toThrow('RECONCILE_INTERVAL_SECONDS must be a number >= 1, got "0"');
        expect(() => loadConfig({TRACKER_INTERVAL_SECONDS: '0'})).toThrow('TRACKER_INTERVAL_SECONDS must be a number >= 1, got "0"');
        expect(loadConfig({RETRY_BASE_DELAY_MS: '1', RECONCILE_INTERVAL_SECONDS: '1'}).retry.baseDelayMs).toBe(1);
    });
});

describe('systemEnvPrefix', () => {
    it('turns system names into environment prefixes', () => {
        expect(systemEnvPrefix('python-services')).toBe('PYTHON_SERVICES');
        expect(systemEnvPrefix('1c')).toBe('1C');
    });
});
