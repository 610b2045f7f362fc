import logger from '../utils/logger';
import {BpmnMetadata, emptyMetadata} from '../types/bpmn_metadata';
import {errorMessage} from '../utils/errors';
import {parseBpmnMetadata} from './bpmnParser';

export interface Clock {
    now(): number;
}

export const systemClock: Clock = {now: () => Date.now()};

/** Anything that can hand out the BPMN XML of a process definition. */
export interface ProcessDefinitionSource {
    getProcessDefinitionXml(processDefinitionId: string): Promise<string>;
}

export interface MetadataCacheOptions {
    ttlMs: number;
    maxSize: number;
    clock?: Clock;
}

interface CacheEntry {
    processDefinitionId: string;
    value: BpmnMetadata;
    createdAt: number;
    lastAccessedAt: number;
    sizeBytes: number;
}

export interface MetadataCacheStats {
    hits: number;
    misses: number;
    size: number;
    maxSize: number;
    estimatedBytes: number;
    evictions: number;
    expirations: number;
    fetches: number;
    fetchFailures: number;
    hitRatePercent: number;
}

/**
 * Bounded, time-expiring cache of activity metadata.
 *
 * A miss fetches the whole process definition once and caches every activity
 * found in it. Map iteration order doubles as recency order: a hit moves the
 * entry to the back, so the first key is always the least recently used.
 * All mutations run synchronously between awaits, which keeps a single writer
 * on the event loop; concurrent misses for one definition share a fetch.
 */
export class MetadataCache {
    private readonly entries = new Map<string, CacheEntry>();
    private readonly inFlight = new Map<string, Promise<Map<string, BpmnMetadata> | null>>();
    private readonly clock: Clock;
    private readonly ttlMs: number;
    private readonly maxSize: number;
    private counters = {
        hits: 0,
        misses: 0,
        evictions: 0,
        expirations: 0,
        fetches: 0,
        fetchFailures: 0
    };

    constructor(private readonly source: ProcessDefinitionSource, options: MetadataCacheOptions) {
        this.ttlMs = options.ttlMs;
        this.maxSize = Math.max(1, options.maxSize);
        this.clock = options.clock ?? systemClock;
        logger.info(`Metadata cache initialized (maxSize=${this.maxSize}, ttl=${this.ttlMs}ms)`);
    }

    /**
     * Metadata of one activity. Never rejects: a failed fetch or parse yields
     * empty metadata and is retried on the next call.
     */
    async get(processDefinitionId: string, activityId: string): Promise<BpmnMetadata> {
        const key = cacheKey(processDefinitionId, activityId);
        const cached = this.lookup(key);
        if (cached) {
            this.counters.hits++;
            logger.debug(`Cache HIT: ${processDefinitionId}/${activityId}`);
            return cached;
        }

        this.counters.misses++;
        logger.debug(`Cache MISS: ${processDefinitionId}/${activityId}`);

        const activities = await this.loadDocument(processDefinitionId);
        if (!activities) {
            return emptyMetadata();
        }

        const value = activities.get(activityId) ?? emptyMetadata();
        if (this.entries.has(key)) {
            this.touch(key);
        } else {
            // Either evicted while the document was inserted, or absent from it
            this.insert(processDefinitionId, key, value);
        }
        return value;
    }

    /** Remove entries older than the TTL. Returns how many were removed. */
    sweepExpired(): number {
        const now = this.clock.now();
        let removed = 0;
        for (const [key, entry] of this.entries) {
            if (this.isExpired(entry, now)) {
                this.entries.delete(key);
                removed++;
            }
        }
        this.counters.expirations += removed;
        return removed;
    }

    /** Drop every cached activity of one process definition. */
    invalidate(processDefinitionId: string): number {
        let removed = 0;
        for (const [key, entry] of this.entries) {
            if (entry.processDefinitionId === processDefinitionId) {
                this.entries.delete(key);
                removed++;
            }
        }
        if (removed > 0) {
            logger.info(`Removed ${removed} cached activities of ${processDefinitionId}`);
        }
        return removed;
    }

    clear(): void {
        const cleared = this.entries.size;
        this.entries.clear();
        logger.info(`Metadata cache cleared: ${cleared} entries removed`);
    }

    get size(): number {
        return this.entries.size;
    }

    stats(): MetadataCacheStats {
        let estimatedBytes = 0;
        for (const entry of this.entries.values()) {
            estimatedBytes += entry.sizeBytes;
        }
        const total = this.counters.hits + this.counters.misses;
        return {
            ...this.counters,
            size: this.entries.size,
            maxSize: this.maxSize,
            estimatedBytes,
            hitRatePercent: total > 0 ? Math.round((this.counters.hits / total) * 10000) / 100 : 0
        };
    }

    private lookup(key: string): BpmnMetadata | undefined {
        const entry = this.entries.get(key);
        if (!entry) return undefined;

        const now = this.clock.now();
        if (this.isExpired(entry, now)) {
            this.entries.delete(key);
            this.counters.expirations++;
            logger.debug(`Cache entry expired: ${key}`);
            return undefined;
        }

        entry.lastAccessedAt = now;
        this.touch(key);
        return entry.value;
    }

    private touch(key: string): void {
        const entry = this.entries.get(key);
        if (!entry) return;
        this.entries.delete(key);
        this.entries.set(key, entry);
    }

    private isExpired(entry: CacheEntry, now: number): boolean {
        return now - entry.createdAt > this.ttlMs;
    }

    private loadDocument(processDefinitionId: string): Promise<Map<string, BpmnMetadata> | null> {
        const pending = this.inFlight.get(processDefinitionId);
        if (pending) return pending;

        const request = this.fetchAndParse(processDefinitionId).finally(() => {
            this.inFlight.delete(processDefinitionId);
        });
        this.inFlight.set(processDefinitionId, request);
        return request;
    }

    private async fetchAndParse(processDefinitionId: string): Promise<Map<string, BpmnMetadata> | null> {
        try {
            this.counters.fetches++;
            logger.info(`Loading BPMN XML for process definition ${processDefinitionId}`);
            const xml = await this.source.getProcessDefinitionXml(processDefinitionId);
            const activities = parseBpmnMetadata(xml);

            for (const [activityId, metadata] of activities) {
                this.insert(processDefinitionId, cacheKey(processDefinitionId, activityId), metadata);
            }

            logger.info(`Cached metadata of ${activities.size} activities for ${processDefinitionId}`);
            return activities;
        } catch (error) {
            this.counters.fetchFailures++;
            logger.error(`Failed to load BPMN metadata for ${processDefinitionId}, continuing without it`, {
                processDefinitionId,
                error: errorMessage(error)
            });
            return null;
        }
    }

    private insert(processDefinitionId: string, key: string, value: BpmnMetadata): void {
        this.entries.delete(key);
        this.makeRoom();

        const now = this.clock.now();
        this.entries.set(key, {
            processDefinitionId,
            value,
            createdAt: now,
            lastAccessedAt: now,
            sizeBytes: Buffer.byteLength(key) + Buffer.byteLength(JSON.stringify(value))
        });
    }

    private makeRoom(): void {
        while (this.entries.size >= this.maxSize) {
            if (this.sweepExpired() > 0) continue;

            const oldest = this.entries.keys().next();
            if (oldest.done) return;
            this.entries.delete(oldest.value);
            this.counters.evictions++;
            logger.debug(`Evicted from cache (LRU): ${oldest.value}`);
        }
    }
}

function cacheKey(processDefinitionId: string, activityId: string): string {
    return `${processDefinitionId}#${activityId}`;
}
