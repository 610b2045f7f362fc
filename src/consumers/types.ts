import {TaskMessage, TrackedTask} from "../types/task_message";
import {ResponseMessage} from "../types/response_message";
import type {PublishOutcome} from "../rabbitmq/publisher";

export interface HandlerResult {
    /** Result variables handed back to the process. */
    variables: Record<string, unknown>;
    /** Identifier of the work item in the downstream system. */
    externalId?: string;
    /** Downstream accepted the task but has not finished it; a tracker reports completion. */
    awaitCompletion?: boolean;
}

export interface HandlerStats {
    system: string;
    queue: string;
    seen: number;
    succeeded: number;
    failed: number;
    responsesPublished: number;
    responsesDeadLettered: number;
    trackedParked: number;
    lastMessageAt: string | null;
    successRatePercent: number;
}

/**
 * Contract of every downstream-specific handler. The consumer runner acks
 * when `processMessage` resolves to true and requeues on false.
 */
export interface MessageHandler {
    readonly system: string;

    /** Never rejects. */
    processMessage(message: TaskMessage): Promise<boolean>;

    /** Downstream business logic; null signals a failure to be requeued. */
    doWork(message: TaskMessage): Promise<HandlerResult | null>;

    originalQueueName(): string;

    stats(): HandlerStats;

    cleanup(): Promise<void>;
}

export type TrackingStatus =
    | { state: "pending" }
    | { state: "completed"; variables: Record<string, unknown> }
    | { state: "failed"; errorMessage: string; retries?: number; retryTimeout?: number }
    | { state: "bpmn_error"; errorCode: string; errorMessage?: string; variables?: Record<string, unknown> };

/** Watches a downstream system for completion of tasks it accepted earlier. */
export interface TaskTracker {
    readonly system: string;

    sourceQueueName(): string;

    checkStatus(task: TrackedTask): Promise<TrackingStatus>;

    cleanup(): Promise<void>;
}

/** Where handlers and trackers send their results. */
export interface ResponseSink {
    publishResponse(response: ResponseMessage): Promise<PublishOutcome>;

    publishTracked(tracked: TrackedTask, queue: string): Promise<PublishOutcome>;
}
