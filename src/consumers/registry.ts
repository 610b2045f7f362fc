import logger from "../utils/logger";
import {ConfigurationError} from "../utils/errors";
import {WebhookSettings} from "../config/config";
import {MessageHandler, ResponseSink, TaskTracker} from "./types";
import {StubHandler} from "./stubHandler";
import {WebhookHandler} from "./webhook/handler";
import {HttpStatusTracker} from "./webhook/tracker";

export interface ConsumerContext {
    system: string;
    sink: ResponseSink;
    webhook?: WebhookSettings;
}

export interface ConsumerBinding {
    handler: MessageHandler;
    tracker?: TaskTracker;
}

export type ConsumerFactory = (context: ConsumerContext) => ConsumerBinding;

const stubConsumer: ConsumerFactory = ({system, sink}) => ({handler: new StubHandler(system, sink)});

/** Webhook delivery when the system has an endpoint configured, the stub otherwise. */
const webhookConsumer: ConsumerFactory = (context) => {
    const {system, sink, webhook} = context;
    if (!webhook) {
        logger.warn(`No webhook configured for ${system}, falling back to the stub handler`);
        return stubConsumer(context);
    }
    return {
        handler: new WebhookHandler(system, sink, webhook),
        tracker: webhook.statusUrl ? new HttpStatusTracker(system, webhook.statusUrl) : undefined,
    };
};

export const CONSUMER_FACTORIES: Readonly<Record<string, ConsumerFactory>> = {
    "bitrix24": webhookConsumer,
    "openproject": webhookConsumer,
    "1c": webhookConsumer,
    "notifications": webhookConsumer,
    "python-services": webhookConsumer,
    "default": stubConsumer,
};

/** Handlers and trackers of the systems this process consumes for. */
export class HandlerRegistry {
    private readonly handlers = new Map<string, MessageHandler>();
    private readonly trackers = new Map<string, TaskTracker>();

    register(binding: ConsumerBinding): void {
        const queue = binding.handler.originalQueueName();
        if (this.handlers.has(queue)) {
            throw new ConfigurationError(`A handler for ${queue} is already registered`);
        }
        this.handlers.set(queue, binding.handler);
        if (binding.tracker) this.trackers.set(binding.tracker.sourceQueueName(), binding.tracker);
    }

    handlerFor(queue: string): MessageHandler | undefined {
        return this.handlers.get(queue);
    }

    allHandlers(): MessageHandler[] {
        return [...this.handlers.values()];
    }

    allTrackers(): TaskTracker[] {
        return [...this.trackers.values()];
    }

    trackedSystems(): string[] {
        return this.allTrackers().map(tracker => tracker.system);
    }
}

/**
 * Resolve consumer implementations for the configured systems at startup.
 * An unknown system name is a configuration error, not a runtime surprise.
 */
export function buildHandlerRegistry(
    systems: string[],
    sink: ResponseSink,
    webhooks: Record<string, WebhookSettings>,
    factories: Readonly<Record<string, ConsumerFactory>> = CONSUMER_FACTORIES
): HandlerRegistry {
    const registry = new HandlerRegistry();
    for (const system of systems) {
        const factory = Object.hasOwn(factories, system) ? factories[system] : undefined;
        if (!factory) {
            throw new ConfigurationError(`No consumer implementation for system "${system}"`, {
                known: Object.keys(factories),
            });
        }
        registry.register(factory({system, sink, webhook: webhooks[system]}));
    }
    logger.info(`Consumer registry built: ${systems.join(", ") || "no systems"}`);
    return registry;
}
