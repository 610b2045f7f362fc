import logger from "../utils/logger";
import {errorMessage} from "../utils/errors";
import {interruptibleSleep} from "../utils/retry";
import {TaskFetchClient} from "../providers/camunda";
import type {DispatchPublisher} from "../rabbitmq/publisher";
import {ExternalTask, FetchAndLockRequest} from "../types/camunda";
import {BpmnMetadata, emptyMetadata} from "../types/bpmn_metadata";
import {TaskMessage, WireBpmnMetadata} from "../types/task_message";
import type {MetadataCache} from "./metadataCache";
import {RouteResolution, TopicRouter} from "./topicRouter";

export interface DispatcherSettings {
    workerId: string;
    /** Topics to subscribe to; empty means every exact topic of the router. */
    topics: string[];
    maxTasks: number;
    lockDuration: number;
    asyncResponseTimeout: number;
    workers: number;
    unlockOnDispatchFailure: boolean;
    /** Only tasks of this tenant are fetched when set. */
    tenantId?: string;
    /** Pause after an empty fetch when long polling is disabled. */
    idleDelayMs?: number;
}

export interface DispatcherOptions {
    sleep?: (ms: number) => Promise<void>;
}

export type DispatchOutcome = "dispatched" | "skipped" | "failed";

const MAX_ERROR_BACKOFF_MS = 30000;
const ERROR_BACKOFF_STEP_MS = 5000;

export function toWireMetadata(metadata: BpmnMetadata): WireBpmnMetadata {
    return {
        extension_properties: {...metadata.extensionProperties},
        field_injections: {...metadata.fieldInjections},
        input_parameters: {...metadata.inputParameters},
        output_parameters: {...metadata.outputParameters},
    };
}

export function buildTaskMessage(task: ExternalTask, metadata: BpmnMetadata, route: RouteResolution, workerId: string): TaskMessage {
    return {
        task_id: task.id,
        process_instance_id: task.processInstanceId,
        process_definition_id: task.processDefinitionId,
        process_definition_key: task.processDefinitionKey,
        tenant_id: task.tenantId ?? null,
        topic_name: task.topicName,
        worker_id: task.workerId || workerId,
        variables: task.variables ?? {},
        bpmn_metadata: toWireMetadata(metadata),
        activity_id: task.activityId,
        activity_instance_id: task.activityInstanceId ?? null,
        business_key: task.businessKey ?? null,
        retries: task.retries ?? null,
        priority: task.priority ?? 0,
        system: route.system,
        routing_key: route.routingKey,
        lock_expiration_time: task.lockExpirationTime ?? null,
        dispatched_at: new Date().toISOString(),
    };
}

/**
 * Fetch-and-lock loop: pulls external tasks, enriches them with BPMN
 * metadata and publishes each to the queue its topic routes to.
 *
 * A task whose publish fails stays locked (and is dead-lettered) unless
 * `unlockOnDispatchFailure` hands it back to the orchestrator.
 */
export class TaskDispatcher {
    private readonly inFlight = new Set<string>();
    private readonly abort = new AbortController();
    private loops: Promise<void>[] = [];
    private stopping = false;
    private counters = {
        fetches: 0,
        fetchErrors: 0,
        fetched: 0,
        dispatched: 0,
        skipped: 0,
        failed: 0,
        unlocked: 0,
    };

    constructor(
        private readonly client: TaskFetchClient,
        private readonly cache: Pick<MetadataCache, "get">,
        private readonly router: TopicRouter,
        private readonly publisher: Pick<DispatchPublisher, "publishTask" | "deadLetter">,
        private readonly settings: DispatcherSettings,
        private readonly options: DispatcherOptions = {}
    ) {
    }

    start(): void {
        if (this.loops.length > 0) return;
        const workers = Math.max(1, this.settings.workers);
        this.loops = Array.from({length: workers}, (_, index) => this.runLoop(index + 1));
        logger.info(`🚀 Task dispatcher started with ${workers} fetch worker(s)`);
    }

    async stop(): Promise<void> {
        this.stopping = true;
        this.abort.abort();
        await Promise.all(this.loops);
        this.loops = [];
        logger.info("Task dispatcher stopped");
    }

    stats() {
        return {...this.counters, inFlight: this.inFlight.size, workers: this.loops.length};
    }

    fetchRequest(): FetchAndLockRequest {
        const topics = this.settings.topics.length > 0 ? this.settings.topics : this.router.exactTopics();
        const tenant = this.settings.tenantId ? {tenantIdIn: [this.settings.tenantId]} : {};
        return {
            workerId: this.settings.workerId,
            maxTasks: this.settings.maxTasks,
            usePriority: true,
            asyncResponseTimeout: this.settings.asyncResponseTimeout,
            topics: topics.map(topicName => ({
                topicName,
                lockDuration: this.settings.lockDuration,
                deserializeValues: true,
                ...tenant,
            })),
        };
    }

    /** One fetch-and-dispatch round. Rejects only when the fetch itself fails. */
    async fetchOnce(): Promise<DispatchOutcome[]> {
        this.counters.fetches++;
        const tasks = await this.client.fetchAndLock(this.fetchRequest(), this.abort.signal);
        this.counters.fetched += tasks.length;
        if (tasks.length > 0) {
            logger.info(`Fetched ${tasks.length} external task(s)`);
        }
        const outcomes: DispatchOutcome[] = [];
        for (const task of tasks) {
            outcomes.push(await this.dispatchTask(task));
        }
        return outcomes;
    }

    async dispatchTask(task: ExternalTask): Promise<DispatchOutcome> {
        if (this.inFlight.has(task.id)) {
            this.counters.skipped++;
            logger.warn(`Task ${task.id} is already being dispatched, skipping`, {taskId: task.id});
            return "skipped";
        }

        this.inFlight.add(task.id);
        try {
            const metadata = task.processDefinitionId && task.activityId
                ? await this.cache.get(task.processDefinitionId, task.activityId)
                : emptyMetadata();
            const route = this.router.route(task.topicName);
            const message = buildTaskMessage(task, metadata, route, this.settings.workerId);

            const published = await this.publisher.publishTask(message, route.routingKey);
            if (published.ok) {
                this.counters.dispatched++;
                return "dispatched";
            }

            this.counters.failed++;
            logger.error(`Dispatch of task ${task.id} failed: ${published.error.message}`, {
                taskId: task.id,
                topic: task.topicName,
            });
            await this.publisher.deadLetter("dispatch", published.error.message, message, {
                taskId: task.id,
                attempts: published.error.attempts,
            });
            await this.releaseLock(task.id);
            return "failed";
        } catch (error) {
            this.counters.failed++;
            logger.error(`Unexpected error dispatching task ${task.id}: ${errorMessage(error)}`, {taskId: task.id});
            await this.releaseLock(task.id);
            return "failed";
        } finally {
            this.inFlight.delete(task.id);
        }
    }

    private async releaseLock(taskId: string): Promise<void> {
        if (!this.settings.unlockOnDispatchFailure) return;
        try {
            await this.client.unlock(taskId);
            this.counters.unlocked++;
        } catch (error) {
            logger.error(`Unlock of task ${taskId} failed: ${errorMessage(error)}`, {taskId});
        }
    }

    private async runLoop(worker: number): Promise<void> {
        let consecutiveErrors = 0;
        while (!this.stopping) {
            try {
                const outcomes = await this.fetchOnce();
                consecutiveErrors = 0;
                if (outcomes.length === 0 && this.settings.asyncResponseTimeout === 0) {
                    await this.pause(this.settings.idleDelayMs ?? 1000);
                }
            } catch (error) {
                if (this.stopping) break;
                consecutiveErrors++;
                this.counters.fetchErrors++;
                const delay = Math.min(MAX_ERROR_BACKOFF_MS, ERROR_BACKOFF_STEP_MS * consecutiveErrors);
                logger.error(`Fetch worker ${worker}: fetch failed (${consecutiveErrors} in a row), retrying in ${delay}ms: ${errorMessage(error)}`);
                await this.pause(delay);
            }
        }
    }

    private pause(ms: number): Promise<void> {
        return this.options.sleep ? this.options.sleep(ms) : interruptibleSleep(ms, this.abort.signal);
    }
}
