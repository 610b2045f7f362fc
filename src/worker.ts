import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

import logger from './utils/logger';
import {errorMessage} from './utils/errors';
import {BridgeConfig, loadConfig} from './config/config';
import {AmqpResources, closeRabbit, connectRabbit, openConsumerChannel} from './rabbitmq/connection';
import {setupTopology} from './rabbitmq/topology';
import {DispatchPublisher} from './rabbitmq/publisher';
import {QueueConsumer} from './rabbitmq/consumer';
import {CamundaClient} from './providers/camunda';
import {MetadataCache} from './services/metadataCache';
import {TopicRouter, loadRoutingTable} from './services/topicRouter';
import {TaskDispatcher} from './services/taskDispatcher';
import {ResponseReconciler} from './services/responseReconciler';
import {Monitor} from './services/monitor';
import {buildHandlerRegistry} from './consumers/registry';
import {TrackerRunner} from './consumers/trackerRunner';
import {setupGlobalErrorHandlers} from './middleware/errorHandler';
import {StatusServer, createStatusApp} from './server';

/**
 * The bridge process: fetch loop(s) towards the broker, reply reconciliation
 * back to the orchestrator, and the downstream consumers configured for this
 * instance.
 */
class TaskBridgeWorker {
    private readonly config: BridgeConfig;
    private readonly router: TopicRouter;
    private rabbit: AmqpResources | null = null;
    private publisher: DispatchPublisher | null = null;
    private cache: MetadataCache | null = null;
    private dispatcher: TaskDispatcher | null = null;
    private reconciler: ResponseReconciler | null = null;
    private consumers: QueueConsumer[] = [];
    private trackers: TrackerRunner[] = [];
    private monitor: Monitor | null = null;
    private statusServer: StatusServer | null = null;
    private shuttingDown = false;

    constructor(config: BridgeConfig = loadConfig()) {
        this.config = config;
        this.router = new TopicRouter(loadRoutingTable(config.routingConfigPath));
        logger.info(`🛣️ Routing table loaded from ${config.routingConfigPath} (${this.router.systems().length} systems)`);
    }

    async start(): Promise<void> {
        const {camunda, rabbitmq, consumers} = this.config;

        this.rabbit = await connectRabbit(rabbitmq.url, rabbitmq.connectRetryMs, rabbitmq.connectAttempts);
        const publisher = new DispatchPublisher(this.rabbit.ch, {
            tasksExchange: rabbitmq.tasksExchange,
            responsesExchange: rabbitmq.responsesExchange,
            responsesQueue: rabbitmq.responsesQueue,
            errorsQueue: rabbitmq.errorsQueue,
            retry: this.config.retry,
            taskPublishAttempts: this.config.taskPublishAttempts,
        });
        this.publisher = publisher;

        const registry = buildHandlerRegistry(consumers.systems, publisher, consumers.webhooks);
        for (const handler of registry.allHandlers()) {
            this.consumers.push(new QueueConsumer(await openConsumerChannel(this.rabbit.conn, 1), handler, publisher));
        }
        const systems = [...new Set([...this.router.systems(), ...consumers.systems])];
        await setupTopology(this.rabbit.ch, rabbitmq, systems, registry.trackedSystems(), this.router.defaultSystem);

        const client = new CamundaClient(camunda);
        this.cache = new MetadataCache(client, {
            ttlMs: this.config.cache.ttlHours * 3600 * 1000,
            maxSize: this.config.cache.maxSize,
        });

        this.reconciler = new ResponseReconciler(await openConsumerChannel(this.rabbit.conn), client, publisher, {
            responsesQueue: rabbitmq.responsesQueue,
            batchSize: this.config.reconcile.batchSize,
            intervalMs: this.config.reconcile.intervalSeconds * 1000,
            retry: this.config.retry,
            ledgerSize: this.config.reconcile.ledgerSize,
            ledgerTtlMs: this.config.reconcile.ledgerTtlMs,
            failureRetries: camunda.failureRetries,
            failureRetryTimeout: camunda.failureRetryTimeout,
        });
        this.reconciler.start();

        for (const consumer of this.consumers) {
            await consumer.start();
        }
        for (const tracker of registry.allTrackers()) {
            const runner = new TrackerRunner(
                await openConsumerChannel(this.rabbit.conn),
                tracker,
                publisher,
                consumers.trackerIntervalSeconds * 1000
            );
            runner.start();
            this.trackers.push(runner);
        }

        this.dispatcher = new TaskDispatcher(client, this.cache, this.router, publisher, {
            workerId: camunda.workerId,
            topics: camunda.topics,
            maxTasks: camunda.maxTasks,
            lockDuration: camunda.lockDuration,
            asyncResponseTimeout: camunda.asyncResponseTimeout,
            workers: camunda.fetchWorkers,
            unlockOnDispatchFailure: camunda.unlockOnDispatchFailure,
            tenantId: camunda.tenantId,
        });
        this.dispatcher.start();

        this.monitor = new Monitor(
            {stats: this.config.monitorSchedule, cacheSweep: this.config.cache.sweepSchedule},
            this.cache,
            () => this.status()
        );
        this.monitor.start();

        if (this.config.statusPort > 0) {
            this.statusServer = new StatusServer(createStatusApp(() => this.status()));
            await this.statusServer.start(this.config.statusPort);
        }

        logger.info(`✅ Task bridge running (worker ${camunda.workerId}, tenant ${camunda.tenantId ?? 'any'}, consumers: ${consumers.systems.join(', ') || 'none'})`);
    }

    status(): Record<string, unknown> {
        return {
            routingGeneration: this.router.generation,
            dispatcher: this.dispatcher?.stats() ?? null,
            cache: this.cache?.stats() ?? null,
            publisher: this.publisher?.stats() ?? null,
            reconciler: this.reconciler?.stats() ?? null,
            consumers: this.consumers.map(consumer => consumer.stats()),
            handlers: this.consumers.map(consumer => consumer.handlerStats()),
            trackers: this.trackers.map(tracker => tracker.stats()),
        };
    }

    reloadRouting(): void {
        try {
            this.router.reload(loadRoutingTable(this.config.routingConfigPath));
        } catch (error) {
            logger.error(`Routing table reload failed, keeping generation ${this.router.generation}: ${errorMessage(error)}`);
        }
    }

    async shutdown(): Promise<void> {
        if (this.shuttingDown) return;
        this.shuttingDown = true;
        logger.info('Starting graceful shutdown...');

        const steps: Array<[string, () => Promise<void> | void]> = [
            ['dispatcher', () => this.dispatcher?.stop()],
            ['consumers', async () => {
                await Promise.all(this.consumers.map(consumer => consumer.stop()));
            }],
            ['trackers', async () => {
                await Promise.all(this.trackers.map(tracker => tracker.stop()));
            }],
            ['reconciler', () => this.reconciler?.stop()],
            ['monitor', () => this.monitor?.stop()],
            ['status server', () => this.statusServer?.stop()],
            ['rabbitmq', () => (this.rabbit ? closeRabbit(this.rabbit) : undefined)],
        ];

        let failed = false;
        for (const [name, step] of steps) {
            try {
                await step();
            } catch (error) {
                failed = true;
                logger.error(`Error stopping ${name}: ${errorMessage(error)}`);
            }
        }
        logger.info('Shutdown completed');
        process.exitCode = failed ? 1 : 0;
    }
}

async function main(): Promise<void> {
    setupGlobalErrorHandlers();
    let worker: TaskBridgeWorker;
    try {
        worker = new TaskBridgeWorker();
    } catch (error) {
        logger.error(`Invalid configuration: ${errorMessage(error)}`);
        process.exitCode = 1;
        return;
    }

    process.on('SIGTERM', () => void worker.shutdown());
    process.on('SIGINT', () => void worker.shutdown());
    process.on('SIGHUP', () => worker.reloadRouting());

    try {
        await worker.start();
    } catch (error) {
        logger.error(`Error initializing task bridge: ${errorMessage(error)}`);
        await worker.shutdown();
        process.exitCode = 1;
    }
}

if (require.main === module) {
    void main();
}

export {TaskBridgeWorker};
