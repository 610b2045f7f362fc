import type {Channel, ConsumeMessage} from "amqplib";
import logger from "../utils/logger";
import {errorMessage} from "../utils/errors";
import {decodeJson, extractTaskId, parseTaskMessage} from "../utils/messageCodec";
import {HandlerStats, MessageHandler} from "../consumers/types";
import type {DispatchPublisher} from "./publisher";

export type ConsumeChannel = Pick<Channel, "consume" | "cancel" | "ack" | "nack">;

export interface ConsumerStats {
    queue: string;
    received: number;
    acked: number;
    requeued: number;
    malformed: number;
}

/**
 * Binds one handler to its downstream queue. The handler's verdict drives
 * the acknowledgement: true acks, false requeues. Messages that are not a
 * task at all are dead-lettered and acked.
 */
export class QueueConsumer {
    private consumerTag: string | null = null;
    private readonly inFlight = new Set<Promise<void>>();
    private counters = {received: 0, acked: 0, requeued: 0, malformed: 0};
    private released = false;

    constructor(
        private readonly channel: ConsumeChannel,
        private readonly handler: MessageHandler,
        private readonly deadLetters: Pick<DispatchPublisher, "deadLetter">
    ) {
    }

    get queue(): string {
        return this.handler.originalQueueName();
    }

    async start(): Promise<void> {
        try {
            const {consumerTag} = await this.channel.consume(this.queue, (msg) => {
                if (!msg) {
                    logger.warn(`Consumer of ${this.queue} cancelled by the broker`);
                    return;
                }
                this.track(this.handle(msg));
            }, {noAck: false});
            this.consumerTag = consumerTag;
            logger.info(`👀 Consumer running on ${this.queue}`);
        } catch (error) {
            await this.release();
            throw error;
        }
    }

    /** Stop taking deliveries, let in-flight messages finish, then release the handler. */
    async stop(): Promise<void> {
        try {
            if (this.consumerTag) {
                const tag = this.consumerTag;
                this.consumerTag = null;
                await this.channel.cancel(tag);
            }
            await Promise.all([...this.inFlight]);
        } catch (error) {
            logger.warn(`Error stopping consumer of ${this.queue}: ${errorMessage(error)}`);
        } finally {
            await this.release();
        }
    }

    stats(): ConsumerStats {
        return {queue: this.queue, ...this.counters};
    }

    handlerStats(): HandlerStats {
        return this.handler.stats();
    }

    /** Resolves once the delivery has been settled. Never rejects. */
    async handle(msg: ConsumeMessage): Promise<void> {
        this.counters.received++;
        const decoded = decodeJson(msg.content);
        const parsed = decoded.ok ? parseTaskMessage(decoded.value) : decoded;

        if (!parsed.ok) {
            this.counters.malformed++;
            const payload = decoded.ok ? decoded.value : msg.content.toString("utf-8");
            const stored = await this.deadLetters.deadLetter("malformed-task", parsed.error.message, payload, {
                taskId: decoded.ok ? extractTaskId(decoded.value) : undefined,
            });
            this.settle(msg, stored);
            return;
        }

        if (msg.fields.redelivered) {
            logger.info(`Redelivered task ${parsed.value.task_id} on ${this.queue}`);
        }

        let acked = false;
        try {
            acked = await this.handler.processMessage(parsed.value);
        } catch (error) {
            logger.error(`Handler for ${this.queue} threw: ${errorMessage(error)}`, {taskId: parsed.value.task_id});
        }
        this.settle(msg, acked);
    }

    private settle(msg: ConsumeMessage, ack: boolean): void {
        try {
            if (ack) {
                this.channel.ack(msg);
                this.counters.acked++;
            } else {
                this.channel.nack(msg, false, true);
                this.counters.requeued++;
            }
        } catch (error) {
            logger.error(`Could not settle delivery ${msg.fields.deliveryTag} on ${this.queue}: ${errorMessage(error)}`);
        }
    }

    private async release(): Promise<void> {
        if (this.released) return;
        this.released = true;
        await this.handler.cleanup();
    }

    private track(work: Promise<void>): void {
        this.inFlight.add(work);
        void work.finally(() => this.inFlight.delete(work));
    }
}
