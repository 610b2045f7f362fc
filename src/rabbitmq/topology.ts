import type {Channel, Options} from "amqplib";
import logger from "../utils/logger";
import {RabbitSettings} from "../config/config";
import {queueForSystem, trackingQueueForSystem} from "../services/topicRouter";

export type TopologyChannel = Pick<Channel, "assertExchange" | "assertQueue" | "bindQueue">;

/**
 * Downstream queues are quorum queues so the broker counts redeliveries and
 * dead-letters a message that keeps getting NACKed.
 */
export function downstreamQueueOptions(settings: RabbitSettings): Options.AssertQueue {
    return {
        durable: true,
        arguments: {
            "x-queue-type": "quorum",
            "x-delivery-limit": settings.deliveryLimit,
            "x-dead-letter-exchange": "",
            "x-dead-letter-routing-key": settings.errorsQueue,
        },
    };
}

/**
 * Declare exchanges, queues and bindings. Idempotent: safe to run on every start.
 *
 * - tasks exchange (topic) -> `{system}.queue` via `{system}.#`
 * - unrouted messages -> alternate exchange (fanout) -> default queue
 * - responses exchange (direct) -> responses queue
 * - `{system}.sent.queue` for systems whose completion is tracked
 */
export async function setupTopology(
    channel: TopologyChannel,
    settings: RabbitSettings,
    systems: string[],
    trackedSystems: string[] = [],
    defaultSystem = "default"
): Promise<void> {
    await channel.assertExchange(settings.unroutedExchange, "fanout", {durable: true});
    await channel.assertExchange(settings.tasksExchange, "topic", {
        durable: true,
        alternateExchange: settings.unroutedExchange,
    });
    await channel.assertExchange(settings.responsesExchange, "direct", {durable: true});
    logger.info(`Exchanges declared: ${settings.tasksExchange}, ${settings.unroutedExchange}, ${settings.responsesExchange}`);

    await channel.assertQueue(settings.errorsQueue, {durable: true});

    await channel.assertQueue(settings.responsesQueue, {durable: true});
    await channel.bindQueue(settings.responsesQueue, settings.responsesExchange, settings.responsesQueue);

    for (const system of systems) {
        if (system === defaultSystem) continue;
        const queue = queueForSystem(system);
        await channel.assertQueue(queue, downstreamQueueOptions(settings));
        await channel.bindQueue(queue, settings.tasksExchange, `${system}.#`);
        logger.info(`Queue ${queue} bound to ${settings.tasksExchange} with ${system}.#`);
    }

    await channel.assertQueue(settings.defaultQueue, downstreamQueueOptions(settings));
    await channel.bindQueue(settings.defaultQueue, settings.tasksExchange, `${defaultSystem}.#`);
    await channel.bindQueue(settings.defaultQueue, settings.unroutedExchange, "");

    for (const system of trackedSystems) {
        await channel.assertQueue(trackingQueueForSystem(system), {durable: true});
    }

    logger.info(`RabbitMQ topology ready (${systems.length} systems, ${trackedSystems.length} tracked)`);
}
