import {Clock, systemClock} from './metadataCache';

/**
 * Task ids the reconciler already resolved, so a duplicate response is acked
 * without a second orchestrator call. Bounded by size and age; the oldest
 * entry goes first.
 */
export class ResolvedTaskLedger {
    private readonly resolvedAt = new Map<string, number>();

    constructor(private readonly maxSize: number, private readonly ttlMs: number, private readonly clock: Clock = systemClock) {
    }

    has(taskId: string): boolean {
        const at = this.resolvedAt.get(taskId);
        if (at === undefined) return false;
        if (this.clock.now() - at > this.ttlMs) {
            this.resolvedAt.delete(taskId);
            return false;
        }
        return true;
    }

    add(taskId: string): void {
        this.resolvedAt.delete(taskId);
        this.resolvedAt.set(taskId, this.clock.now());
        while (this.resolvedAt.size > this.maxSize) {
            const oldest = this.resolvedAt.keys().next();
            if (oldest.done) break;
            this.resolvedAt.delete(oldest.value);
        }
    }

    get size(): number {
        return this.resolvedAt.size;
    }
}
