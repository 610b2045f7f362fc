// src/rabbitmq/connection.ts
import * as amqp from "amqplib";
import logger from "../utils/logger";
import {errorMessage} from "../utils/errors";
import {sleep} from "../utils/retry";

export type AmqpConnection = Awaited<ReturnType<typeof amqp.connect>>;

export type AmqpResources = {
    conn: AmqpConnection;
    /** Confirm channel shared by every publisher in the process. */
    ch: amqp.ConfirmChannel;
};

export async function connectRabbit(url: string, retryMs = 2000, maxAttempts = 5): Promise<AmqpResources> {
    let attempt = 0;
    while (true) {
        try {
            const conn = await amqp.connect(url);
            const ch = await conn.createConfirmChannel();
            // handle connection closed/error
            conn.on("error", (err: unknown) => {
                logger.error("AMQP connection error", {error: errorMessage(err)});
            });
            conn.on("close", () => {
                logger.warn("AMQP connection closed");
            });
            ch.on("error", (err: unknown) => {
                logger.error("AMQP channel error", {error: errorMessage(err)});
            });
            logger.info("🐰 RabbitMQ connected!");
            return {conn, ch};
        } catch (err) {
            attempt++;
            logger.error(`AMQP connect attempt ${attempt} failed: ${errorMessage(err)}`);
            if (attempt >= maxAttempts) throw err;
            await sleep(retryMs);
        }
    }
}

/** A dedicated channel for one consumer, so prefetch and cancellation stay per queue. */
export async function openConsumerChannel(conn: AmqpConnection, prefetch = 1): Promise<amqp.Channel> {
    const channel = await conn.createChannel();
    await channel.prefetch(prefetch);
    channel.on("error", (err: unknown) => {
        logger.error("AMQP consumer channel error", {error: errorMessage(err)});
    });
    return channel;
}

export async function closeRabbit(resources: AmqpResources): Promise<void> {
    try {
        await resources.ch.close();
    } catch (err) {
        logger.warn(`Error closing RabbitMQ channel: ${errorMessage(err)}`);
    }
    try {
        await resources.conn.close();
        logger.info("RabbitMQ connection closed");
    } catch (err) {
        logger.warn(`Error closing RabbitMQ connection: ${errorMessage(err)}`);
    }
}
