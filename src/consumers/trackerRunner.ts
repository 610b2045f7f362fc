import logger from "../utils/logger";
import {errorMessage} from "../utils/errors";
import {decodeJson, extractTaskId, parseTrackedTask} from "../utils/messageCodec";
import {PeriodicTask} from "../utils/periodicTask";
import {PullChannel, ackSafely, drainQueue, requeueSafely} from "../rabbitmq/drain";
import type {DispatchPublisher} from "../rabbitmq/publisher";
import {trackingQueueForSystem} from "../services/topicRouter";
import {TrackedTask} from "../types/task_message";
import {ResponseMessage} from "../types/response_message";
import {TaskTracker, TrackingStatus} from "./types";

export interface TrackerCycleReport {
    checked: number;
    resolved: number;
    pending: number;
    errors: number;
    malformed: number;
}

export type TrackerSink = Pick<DispatchPublisher, "publishResponse" | "deadLetter">;

export function trackingResponse(task: TrackedTask, status: Exclude<TrackingStatus, { state: "pending" }>): ResponseMessage {
    const base = {
        task_id: task.task_id,
        process_instance_id: task.process_instance_id,
        worker_id: task.worker_id,
        source_queue: task.system ? trackingQueueForSystem(task.system) : undefined,
    };
    switch (status.state) {
        case "completed":
            return {...base, status: "complete", variables: {external_id: task.external_id, ...status.variables}};
        case "failed":
            return {
                ...base,
                status: "failure",
                variables: {},
                error_message: status.errorMessage,
                retries: status.retries,
                retry_timeout: status.retryTimeout,
            };
        case "bpmn_error":
            return {
                ...base,
                status: "bpmn_error",
                variables: status.variables ?? {},
                error_code: status.errorCode,
                error_message: status.errorMessage,
            };
    }
}

/**
 * Periodically drains a `{system}.sent.queue`, asks the tracker for each
 * parked task and moves finished ones to the reply queue. Pending tasks go
 * back to the queue for the next cycle.
 */
export class TrackerRunner {
    private readonly loop: PeriodicTask;
    private totals: TrackerCycleReport = {checked: 0, resolved: 0, pending: 0, errors: 0, malformed: 0};

    constructor(
        private readonly channel: PullChannel,
        private readonly tracker: TaskTracker,
        private readonly sink: TrackerSink,
        intervalMs: number,
        private readonly batchSize = 50
    ) {
        this.loop = new PeriodicTask(`${tracker.system} tracker`, intervalMs, () => this.runCycle());
    }

    start(): void {
        this.loop.start();
    }

    async stop(): Promise<void> {
        try {
            await this.loop.stop();
        } finally {
            await this.tracker.cleanup();
        }
    }

    stats(): TrackerCycleReport & { system: string; queue: string } {
        return {system: this.tracker.system, queue: this.tracker.sourceQueueName(), ...this.totals};
    }

    async runCycle(): Promise<TrackerCycleReport> {
        const report: TrackerCycleReport = {checked: 0, resolved: 0, pending: 0, errors: 0, malformed: 0};
        const queue = this.tracker.sourceQueueName();
        const messages = await drainQueue(this.channel, queue, this.batchSize);

        for (const message of messages) {
            report.checked++;
            const decoded = decodeJson(message.content);
            const parsed = decoded.ok ? parseTrackedTask(decoded.value) : decoded;
            if (!parsed.ok) {
                report.malformed++;
                const payload = decoded.ok ? decoded.value : message.content.toString("utf-8");
                const stored = await this.sink.deadLetter("malformed-task", parsed.error.message, payload, {
                    taskId: decoded.ok ? extractTaskId(decoded.value) : undefined,
                });
                if (stored) ackSafely(this.channel, message);
                else requeueSafely(this.channel, message);
                continue;
            }

            const task = parsed.value;
            let status: TrackingStatus;
            try {
                status = await this.tracker.checkStatus(task);
            } catch (error) {
                report.errors++;
                logger.warn(`Status check of task ${task.task_id} (${task.external_id}) failed: ${errorMessage(error)}`, {
                    taskId: task.task_id,
                    queue,
                });
                requeueSafely(this.channel, message);
                continue;
            }

            if (status.state === "pending") {
                report.pending++;
                requeueSafely(this.channel, message);
                continue;
            }

            const outcome = await this.sink.publishResponse(trackingResponse(task, status));
            if (outcome.delivered || outcome.deadLettered) {
                report.resolved++;
                ackSafely(this.channel, message);
            } else {
                report.errors++;
                requeueSafely(this.channel, message);
            }
        }

        this.totals = {
            checked: this.totals.checked + report.checked,
            resolved: this.totals.resolved + report.resolved,
            pending: this.totals.pending + report.pending,
            errors: this.totals.errors + report.errors,
            malformed: this.totals.malformed + report.malformed,
        };
        if (report.checked > 0) {
            logger.info(`${this.tracker.system} tracker: ${report.resolved} resolved, ${report.pending} pending of ${report.checked}`);
        }
        return report;
    }
}
