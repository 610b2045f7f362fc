import logger from "../utils/logger";
import {TaskMessage} from "../types/task_message";
import {BaseMessageHandler} from "./baseHandler";
import {HandlerResult, ResponseSink} from "./types";

/**
 * Placeholder for systems without a real integration yet: acknowledges every
 * task with a synthetic external id.
 */
export class StubHandler extends BaseMessageHandler {
    constructor(system: string, sink: ResponseSink) {
        super(system, sink);
    }

    async doWork(message: TaskMessage): Promise<HandlerResult | null> {
        logger.debug(`Stub ${this.system} handler accepted task ${message.task_id}`);
        return {
            externalId: `stub-${this.system}-${message.task_id}`,
            variables: {
                external_status: "processed",
                processed_by: this.system,
            },
        };
    }
}
