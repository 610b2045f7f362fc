import logger from './logger';
import {errorMessage} from './errors';

/**
 * Runs an async job every `intervalMs`, never overlapping with itself.
 * `stop()` cancels the next run and waits for the current one.
 */
export class PeriodicTask {
    private timer: NodeJS.Timeout | null = null;
    private running: Promise<void> | null = null;
    private active = false;

    constructor(
        private readonly name: string,
        private readonly intervalMs: number,
        private readonly job: () => Promise<unknown>
    ) {
    }

    start(): void {
        if (this.active) return;
        this.active = true;
        this.schedule(0);
        logger.info(`${this.name} started (every ${this.intervalMs}ms)`);
    }

    async stop(): Promise<void> {
        this.active = false;
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
        if (this.running) await this.running;
        logger.info(`${this.name} stopped`);
    }

    get isActive(): boolean {
        return this.active;
    }

    private schedule(delay: number): void {
        this.timer = setTimeout(() => {
            this.timer = null;
            this.running = this.tick();
        }, delay);
    }

    private async tick(): Promise<void> {
        try {
            await this.job();
        } catch (error) {
            logger.error(`${this.name} run failed: ${errorMessage(error)}`);
        } finally {
            this.running = null;
            if (this.active) this.schedule(this.intervalMs);
        }
    }
}
