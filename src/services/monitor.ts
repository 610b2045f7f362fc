import {CronJob} from 'cron';
import logger from '../utils/logger';
import {errorMessage} from '../utils/errors';
import type {MetadataCache} from './metadataCache';

export interface MonitorSchedules {
    stats: string;
    cacheSweep: string;
}

/**
 * Scheduled housekeeping: periodic stats logging and the sweep of expired
 * metadata cache entries.
 */
export class Monitor {
    private jobs: CronJob[] = [];

    constructor(
        private readonly schedules: MonitorSchedules,
        private readonly cache: Pick<MetadataCache, 'sweepExpired'>,
        private readonly collectStats: () => Record<string, unknown>
    ) {
    }

    start(): void {
        if (this.jobs.length > 0) return;
        try {
            this.jobs.push(new CronJob(this.schedules.stats, () => this.logStats(), null, true));
            this.jobs.push(new CronJob(this.schedules.cacheSweep, () => { this.sweep(); }, null, true));
            logger.info(`Monitor scheduled (stats: ${this.schedules.stats}, cache sweep: ${this.schedules.cacheSweep})`);
        } catch (error) {
            this.stop();
            logger.error('Error scheduling monitor jobs:', {error: errorMessage(error)});
            throw error;
        }
    }

    stop(): void {
        for (const job of this.jobs) job.stop();
        this.jobs = [];
    }

    logStats(): void {
        try {
            logger.info('📊 Bridge stats', this.collectStats());
        } catch (error) {
            logger.error(`Stats collection failed: ${errorMessage(error)}`);
        }
    }

    sweep(): number {
        const removed = this.cache.sweepExpired();
        if (removed > 0) {
            logger.info(`Metadata cache sweep removed ${removed} expired entries`);
        }
        return removed;
    }
}
