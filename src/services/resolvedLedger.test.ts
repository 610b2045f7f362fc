import {describe, it, expect} from 'vitest';
import {ResolvedTaskLedger} from './resolvedLedger';

describe('ResolvedTaskLedger', () => {
    it('remembers ids until they expire', () => {
        const clock = {current: 0, now() { return this.current; }};
        const ledger = new ResolvedTaskLedger(10, 1000, clock);

        ledger.add('t-1');
        clock.current = 1000;
        expect(ledger.has('t-1')).toBe(true);

        clock.current = 1001;
        expect(ledger.has('t-1')).toBe(false);
        expect(ledger.size).toBe(0);
    });

    it('drops the oldest id when full', () => {
        const ledger = new ResolvedTaskLedger(2, 60000);

        ledger.add('t-1');
        ledger.add('t-2');
        ledger.add('t-1');
        ledger.add('t-3');

        expect(ledger.has('t-2')).toBe(false);
        expect(ledger.has('t-1')).toBe(true);
        expect(ledger.has('t-3')).toBe(true);
        expect(ledger.size).toBe(2);
    });
});
