import logger from "../utils/logger";
import {Result, ok, err, errorMessage} from "../utils/errors";
import {TaskMessage} from "../types/task_message";
import {ResponseMessage} from "../types/response_message";
import {queueForSystem, trackingQueueForSystem} from "../services/topicRouter";
import {HandlerResult, HandlerStats, MessageHandler, ResponseSink} from "./types";

/**
 * Shared half of every handler: statistics, the ack decision, and reporting
 * the result to the reply queue (or to the tracking queue for work that
 * finishes later). Subclasses implement `doWork`.
 */
export abstract class BaseMessageHandler implements MessageHandler {
    private counters = {
        seen: 0,
        succeeded: 0,
        failed: 0,
        responsesPublished: 0,
        responsesDeadLettered: 0,
        trackedParked: 0,
    };
    private lastMessageAt: Date | null = null;

    protected constructor(readonly system: string, protected readonly sink: ResponseSink) {
        logger.info(`${system} handler initialized`);
    }

    abstract doWork(message: TaskMessage): Promise<HandlerResult | null>;

    async processMessage(message: TaskMessage): Promise<boolean> {
        this.counters.seen++;
        this.lastMessageAt = new Date();
        const context = {taskId: message.task_id, topic: message.topic_name, queue: this.originalQueueName()};

        try {
            logger.info(`${this.system} handler: processing task ${message.task_id}`, context);

            const outcome = await this.runWork(message);
            if (!outcome.ok) {
                this.counters.failed++;
                logger.warn(`${this.system} handler: task ${message.task_id} failed, requeueing: ${outcome.error.message}`, context);
                return false;
            }

            await this.report(message, outcome.value);
            this.counters.succeeded++;
            return true;
        } catch (error) {
            this.counters.failed++;
            logger.error(`${this.system} handler: unexpected error on task ${message.task_id}: ${errorMessage(error)}`, context);
            return false;
        }
    }

    originalQueueName(): string {
        return queueForSystem(this.system);
    }

    stats(): HandlerStats {
        const {seen, succeeded} = this.counters;
        return {
            system: this.system,
            queue: this.originalQueueName(),
            ...this.counters,
            lastMessageAt: this.lastMessageAt ? this.lastMessageAt.toISOString() : null,
            successRatePercent: seen > 0 ? Math.round((succeeded / seen) * 10000) / 100 : 0,
        };
    }

    async cleanup(): Promise<void> {
        logger.info(`${this.system} handler cleaned up`);
    }

    protected buildResponse(message: TaskMessage, result: HandlerResult): ResponseMessage {
        const variables = result.externalId
            ? {external_id: result.externalId, ...result.variables}
            : result.variables;
        return {
            task_id: message.task_id,
            process_instance_id: message.process_instance_id,
            worker_id: message.worker_id,
            status: "complete",
            variables,
            source_queue: this.originalQueueName(),
        };
    }

    private async runWork(message: TaskMessage): Promise<Result<HandlerResult, Error>> {
        try {
            const result = await this.doWork(message);
            return result ? ok(result) : err(new Error("no result from downstream"));
        } catch (error) {
            return err(error instanceof Error ? error : new Error(String(error)));
        }
    }

    /**
     * The message is acked even when the report is dead-lettered: the result
     * is preserved there, and redelivery would repeat the downstream side effect.
     */
    private async report(message: TaskMessage, result: HandlerResult): Promise<void> {
        if (result.awaitCompletion && result.externalId) {
            const outcome = await this.sink.publishTracked({
                ...message,
                external_id: result.externalId,
                tracked_since: new Date().toISOString(),
            }, trackingQueueForSystem(this.system));
            if (outcome.delivered) this.counters.trackedParked++;
            else this.counters.responsesDeadLettered++;
            return;
        }

        const outcome = await this.sink.publishResponse(this.buildResponse(message, result));
        if (outcome.delivered) this.counters.responsesPublished++;
        else this.counters.responsesDeadLettered++;
    }
}
