import axios, {AxiosInstance} from "axios";
import logger from "../../utils/logger";
import {MessageFormatError, errorMessage} from "../../utils/errors";
import {isRecord} from "../../utils/messageCodec";
import {TrackedTask} from "../../types/task_message";
import {trackingQueueForSystem} from "../../services/topicRouter";
import {TaskTracker, TrackingStatus} from "../types";

/**
 * Polls `{statusUrl}/{external_id}` for the outcome of work a webhook
 * endpoint accepted earlier. The endpoint answers
 * `{state, variables?, error_message?, error_code?, retries?}`.
 */
export class HttpStatusTracker implements TaskTracker {
    private readonly http: AxiosInstance;

    constructor(readonly system: string, private readonly statusUrl: string, http?: AxiosInstance) {
        this.http = http ?? axios.create({timeout: 10000});
    }

    sourceQueueName(): string {
        return trackingQueueForSystem(this.system);
    }

    async checkStatus(task: TrackedTask): Promise<TrackingStatus> {
        const url = `${this.statusUrl.replace(/\/+$/, "")}/${encodeURIComponent(task.external_id)}`;
        const response = await this.http.get(url);
        return parseTrackingStatus(response.data);
    }

    async cleanup(): Promise<void> {
        logger.info(`${this.system} tracker cleaned up`);
    }
}

export function parseTrackingStatus(data: unknown): TrackingStatus {
    if (!isRecord(data)) {
        throw new MessageFormatError("Status response must be a JSON object");
    }
    const variables = isRecord(data.variables) ? data.variables : {};
    const message = typeof data.error_message === "string" ? data.error_message : undefined;

    switch (data.state) {
        case "pending":
        case "processing":
            return {state: "pending"};
        case "completed":
            return {state: "completed", variables};
        case "failed":
            return {
                state: "failed",
                errorMessage: message ?? "Downstream reported failure",
                retries: typeof data.retries === "number" ? data.retries : undefined,
                retryTimeout: typeof data.retry_timeout === "number" ? data.retry_timeout : undefined,
            };
        case "bpmn_error":
            if (typeof data.error_code !== "string" || data.error_code === "") {
                throw new MessageFormatError("bpmn_error status without error_code");
            }
            return {state: "bpmn_error", errorCode: data.error_code, errorMessage: message, variables};
        default:
            throw new MessageFormatError(`Unknown tracking state: ${errorMessage(data.state)}`);
    }
}
