import type {Channel, GetMessage} from "amqplib";
import logger from "../utils/logger";
import {errorMessage} from "../utils/errors";

export type PullChannel = Pick<Channel, "get" | "ack" | "nack">;

/**
 * Pull up to `max` messages without acknowledging them. The whole batch is
 * collected before any is settled, so a requeued message is not fetched
 * again within the same cycle.
 */
export async function drainQueue(channel: PullChannel, queue: string, max: number): Promise<GetMessage[]> {
    const messages: GetMessage[] = [];
    while (messages.length < max) {
        const message = await channel.get(queue, {noAck: false});
        if (message === false) break;
        messages.push(message);
    }
    return messages;
}

export function ackSafely(channel: PullChannel, message: GetMessage): void {
    try {
        channel.ack(message);
    } catch (error) {
        logger.error(`Ack of delivery ${message.fields.deliveryTag} failed: ${errorMessage(error)}`);
    }
}

export function requeueSafely(channel: PullChannel, message: GetMessage): void {
    try {
        channel.nack(message, false, true);
    } catch (error) {
        logger.error(`Requeue of delivery ${message.fields.deliveryTag} failed: ${errorMessage(error)}`);
    }
}
