// src/rabbitmq/publisher.ts
import type {ConfirmChannel, Options} from "amqplib";
import logger from "../utils/logger";
import {DispatchError, Result, ok, err, errorMessage} from "../utils/errors";
import {RetryOptions, RetryPolicy, withRetry} from "../utils/retry";
import {encodeMessage} from "../utils/messageCodec";
import {TaskMessage, TrackedTask} from "../types/task_message";
import {DeadLetterClass, DeadLetterEnvelope, ResponseMessage} from "../types/response_message";

export type PublishChannel = Pick<ConfirmChannel, "publish">;

export interface PublisherSettings {
    tasksExchange: string;
    responsesExchange: string;
    responsesQueue: string;
    errorsQueue: string;
    retry: RetryPolicy;
    taskPublishAttempts: number;
}

export interface PublishOutcome {
    delivered: boolean;
    deadLettered: boolean;
    attempts: number;
}

export interface DeadLetterContext {
    taskId?: string;
    attempts?: number;
}

/**
 * Publishes to the broker with publisher confirms. Task publishing surfaces
 * exhaustion to the caller; response publishing never throws and falls back to
 * the dead-letter queue.
 */
export class DispatchPublisher {
    private counters = {
        tasksPublished: 0,
        taskPublishFailures: 0,
        responsesPublished: 0,
        responsesDeadLettered: 0,
        trackedPublished: 0,
        deadLetters: 0,
        deadLetterFailures: 0,
    };

    constructor(
        private readonly channel: PublishChannel,
        private readonly settings: PublisherSettings,
        private readonly retryOptions: Pick<RetryOptions, "sleep" | "random"> = {}
    ) {
    }

    async publishTask(message: TaskMessage, routingKey: string): Promise<Result<void, DispatchError>> {
        const policy: RetryPolicy = {...this.settings.retry, attempts: this.settings.taskPublishAttempts};
        const content = encodeMessage(message);

        const result = await withRetry(
            () => this.confirmPublish(this.settings.tasksExchange, routingKey, content, {
                headers: {
                    task_id: message.task_id,
                    topic: message.topic_name,
                    target_system: message.system ?? "",
                    process_instance_id: message.process_instance_id,
                },
            }),
            policy,
            {
                ...this.retryOptions,
                onRetry: (error, attempt, delay) => logger.warn(
                    `Publish of task ${message.task_id} failed (attempt ${attempt}/${policy.attempts}), retrying in ${delay}ms`,
                    {taskId: message.task_id, topic: message.topic_name, error: errorMessage(error)}
                ),
            }
        );

        if (!result.ok) {
            this.counters.taskPublishFailures++;
            return err(new DispatchError(
                `Task ${message.task_id} could not be published after ${result.error.attempts} attempts`,
                result.error.attempts,
                result.error.error
            ));
        }

        this.counters.tasksPublished++;
        logger.info(`📨 Task published: ${message.topic_name} -> ${routingKey}`, {taskId: message.task_id});
        return ok(undefined);
    }

    /** Report a downstream result to the reply queue. Never throws. */
    async publishResponse(response: ResponseMessage): Promise<PublishOutcome> {
        const message: ResponseMessage = {...response, responded_at: response.responded_at ?? new Date().toISOString()};
        const outcome = await this.publishWithFallback(
            this.settings.responsesExchange,
            this.settings.responsesQueue,
            message,
            "response-publish",
            response.task_id
        );
        if (outcome.delivered) {
            this.counters.responsesPublished++;
            logger.info(`Response for task ${response.task_id} published (${response.status})`, {taskId: response.task_id});
        } else {
            this.counters.responsesDeadLettered++;
        }
        return outcome;
    }

    /** Park a task accepted downstream until its tracker sees completion. Never throws. */
    async publishTracked(tracked: TrackedTask, queue: string): Promise<PublishOutcome> {
        const outcome = await this.publishWithFallback("", queue, tracked, "tracked-publish", tracked.task_id);
        if (outcome.delivered) {
            this.counters.trackedPublished++;
            logger.info(`Task ${tracked.task_id} parked on ${queue} (external id ${tracked.external_id})`, {taskId: tracked.task_id});
        }
        return outcome;
    }

    /** Send an envelope to the dead-letter queue. Returns false if even that failed. */
    async deadLetter(errorClass: DeadLetterClass, reason: string, payload: unknown, context: DeadLetterContext = {}): Promise<boolean> {
        const envelope: DeadLetterEnvelope = {
            error_class: errorClass,
            reason,
            task_id: context.taskId,
            attempts: context.attempts ?? 0,
            failed_at: new Date().toISOString(),
            payload,
        };
        try {
            await this.confirmPublish("", this.settings.errorsQueue, encodeMessage(envelope), {
                headers: context.taskId
                    ? {"x-error-class": errorClass, task_id: context.taskId}
                    : {"x-error-class": errorClass},
            });
            this.counters.deadLetters++;
            logger.error(`Dead-lettered (${errorClass}): ${reason}`, {taskId: context.taskId, queue: this.settings.errorsQueue});
            return true;
        } catch (error) {
            this.counters.deadLetterFailures++;
            logger.error(`Dead-letter publish failed (${errorClass}): ${reason}`, {
                taskId: context.taskId,
                error: errorMessage(error),
            });
            return false;
        }
    }

    stats() {
        return {...this.counters};
    }

    private async publishWithFallback(
        exchange: string,
        routingKey: string,
        message: object,
        errorClass: DeadLetterClass,
        taskId: string
    ): Promise<PublishOutcome> {
        const policy = this.settings.retry;
        const content = encodeMessage(message);
        let attempts = 0;
        const result = await withRetry(
            () => {
                attempts++;
                return this.confirmPublish(exchange, routingKey, content, {headers: {task_id: taskId}});
            },
            policy,
            {
                ...this.retryOptions,
                onRetry: (error, attempt, delay) => logger.warn(
                    `Publish to ${routingKey} failed (attempt ${attempt}/${policy.attempts}), retrying in ${delay}ms`,
                    {taskId, error: errorMessage(error)}
                ),
            }
        );

        if (result.ok) {
            return {delivered: true, deadLettered: false, attempts};
        }

        logger.error(`All ${result.error.attempts} publish attempts to ${routingKey} failed`, {
            taskId,
            error: errorMessage(result.error.error),
        });
        const deadLettered = await this.deadLetter(errorClass, errorMessage(result.error.error), message, {
            taskId,
            attempts: result.error.attempts,
        });
        return {delivered: false, deadLettered, attempts: result.error.attempts};
    }

    private confirmPublish(exchange: string, routingKey: string, content: Buffer, options: Options.Publish): Promise<void> {
        return new Promise<void>((resolve, reject) => {
            this.channel.publish(exchange, routingKey, content, {
                persistent: true,
                contentType: "application/json",
                timestamp: Math.floor(Date.now() / 1000),
                ...options,
            }, (error: unknown) => {
                if (error) {
                    reject(error instanceof Error ? error : new Error(String(error)));
                } else {
                    resolve();
                }
            });
        });
    }
}
