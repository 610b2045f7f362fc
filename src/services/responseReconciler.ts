import type {GetMessage} from "amqplib";
import logger from "../utils/logger";
import {BridgeError, OrchestratorError, errorMessage} from "../utils/errors";
import {RetryPolicy, interruptibleSleep, withRetry} from "../utils/retry";
import {decodeJson, extractTaskId, parseResponseMessage} from "../utils/messageCodec";
import {PeriodicTask} from "../utils/periodicTask";
import {PullChannel, ackSafely, drainQueue, requeueSafely} from "../rabbitmq/drain";
import type {DispatchPublisher} from "../rabbitmq/publisher";
import {TaskCompletionClient, formatVariables} from "../providers/camunda";
import {ResponseMessage} from "../types/response_message";
import {Clock, systemClock} from "./metadataCache";
import {ResolvedTaskLedger} from "./resolvedLedger";

export interface ReconcilerSettings {
    responsesQueue: string;
    batchSize: number;
    intervalMs: number;
    retry: RetryPolicy;
    ledgerSize: number;
    ledgerTtlMs: number;
    /** Defaults for failure responses that do not carry their own. */
    failureRetries: number;
    failureRetryTimeout: number;
}

export interface ReconcilerOptions {
    sleep?: (ms: number) => Promise<void>;
    random?: () => number;
    clock?: Clock;
}

/**
 * Per task id: completed (orchestrator accepted, or already had it),
 * duplicate (ledger hit), requeued (transient failure at shutdown or a lost
 * dead letter) or dead-lettered (terminal failure).
 */
export type ReconcileOutcome = "completed" | "duplicate" | "requeued" | "dead-lettered";

export interface ReconcileReport {
    received: number;
    completed: number;
    duplicates: number;
    requeued: number;
    deadLettered: number;
    invalid: number;
}

interface ResponseGroup {
    response: ResponseMessage;
    deliveries: GetMessage[];
}

function emptyReport(): ReconcileReport {
    return {received: 0, completed: 0, duplicates: 0, requeued: 0, deadLettered: 0, invalid: 0};
}

class ShutdownError extends BridgeError {
    constructor() {
        super("Reconciler is stopping", "SHUTDOWN");
        this.name = "ShutdownError";
    }
}

function isTerminal(error: unknown): boolean {
    return error instanceof OrchestratorError && !error.retriable;
}

/**
 * Drains the reply queue and applies each response to the orchestrator
 * exactly once per task id. Duplicates inside a batch collapse to one call;
 * duplicates across batches hit the resolved-task ledger.
 */
export class ResponseReconciler {
    private readonly ledger: ResolvedTaskLedger;
    private readonly loop: PeriodicTask;
    private readonly abort = new AbortController();
    private stopping = false;
    private totals = emptyReport();

    constructor(
        private readonly channel: PullChannel,
        private readonly orchestrator: TaskCompletionClient,
        private readonly deadLetters: Pick<DispatchPublisher, "deadLetter">,
        private readonly settings: ReconcilerSettings,
        private readonly options: ReconcilerOptions = {}
    ) {
        this.ledger = new ResolvedTaskLedger(settings.ledgerSize, settings.ledgerTtlMs, options.clock ?? systemClock);
        this.loop = new PeriodicTask("Response reconciler", settings.intervalMs, () => this.runCycle());
    }

    start(): void {
        this.loop.start();
    }

    async stop(): Promise<void> {
        this.stopping = true;
        this.abort.abort();
        await this.loop.stop();
    }

    stats(): ReconcileReport & { ledgerSize: number } {
        return {...this.totals, ledgerSize: this.ledger.size};
    }

    async runCycle(): Promise<ReconcileReport> {
        const report = emptyReport();
        const deliveries = await drainQueue(this.channel, this.settings.responsesQueue, this.settings.batchSize);
        report.received = deliveries.length;

        const groups = new Map<string, ResponseGroup>();
        for (const delivery of deliveries) {
            const decoded = decodeJson(delivery.content);
            const parsed = decoded.ok ? parseResponseMessage(decoded.value) : decoded;
            if (!parsed.ok) {
                report.invalid++;
                await this.rejectInvalid(delivery, parsed.error.message, decoded.ok ? decoded.value : undefined);
                continue;
            }
            const group = groups.get(parsed.value.task_id);
            if (group) group.deliveries.push(delivery);
            else groups.set(parsed.value.task_id, {response: parsed.value, deliveries: [delivery]});
        }

        for (const group of groups.values()) {
            const outcome = await this.resolve(group);
            const extra = group.deliveries.length - 1;
            switch (outcome) {
                case "completed":
                    report.completed++;
                    report.duplicates += extra;
                    break;
                case "duplicate":
                    report.duplicates += group.deliveries.length;
                    break;
                case "requeued":
                    report.requeued += group.deliveries.length;
                    break;
                case "dead-lettered":
                    report.deadLettered++;
                    report.duplicates += extra;
                    break;
            }
        }

        this.accumulate(report);
        if (report.received > 0) {
            logger.info(`Reconciled ${report.received} responses: ${report.completed} completed, ${report.duplicates} duplicates, ` +
                `${report.requeued} requeued, ${report.deadLettered} dead-lettered, ${report.invalid} invalid`);
        }
        return report;
    }

    private async resolve(group: ResponseGroup): Promise<ReconcileOutcome> {
        const {response, deliveries} = group;
        const taskId = response.task_id;

        if (this.ledger.has(taskId)) {
            logger.info(`Duplicate response for already resolved task ${taskId} dropped`, {taskId});
            this.settleAll(deliveries, true);
            return "duplicate";
        }

        const result = await withRetry(
            () => {
                if (this.stopping) throw new ShutdownError();
                return this.apply(response);
            },
            this.settings.retry,
            {
                sleep: this.options.sleep ?? ((ms) => interruptibleSleep(ms, this.abort.signal)),
                random: this.options.random,
                shouldRetry: (error) => !this.stopping && !isTerminal(error),
                onRetry: (error, attempt, delay) => logger.warn(
                    `Applying ${response.status} for task ${taskId} failed (attempt ${attempt}/${this.settings.retry.attempts}), retrying in ${delay}ms`,
                    {taskId, error: errorMessage(error)}
                ),
            }
        );

        if (result.ok) {
            if (this.resolvesTask(response)) this.ledger.add(taskId);
            this.settleAll(deliveries, true);
            return "completed";
        }

        const {error, attempts} = result.error;
        if (error instanceof OrchestratorError && error.isTaskGone) {
            logger.warn(`Task ${taskId} no longer exists in the orchestrator; treating response as applied`, {taskId});
            this.ledger.add(taskId);
            this.settleAll(deliveries, true);
            return "completed";
        }

        if (this.stopping && !isTerminal(error)) {
            logger.info(`Shutdown during reconciliation of task ${taskId}; response requeued`, {taskId});
            this.settleAll(deliveries, false);
            return "requeued";
        }

        const stored = await this.deadLetters.deadLetter("reconciliation", errorMessage(error), response, {taskId, attempts});
        if (!stored) {
            this.settleAll(deliveries, false);
            return "requeued";
        }
        this.settleAll(deliveries, true);
        return "dead-lettered";
    }

    /** A failure that leaves retries hands the task back to the orchestrator, which will offer it again. */
    private resolvesTask(response: ResponseMessage): boolean {
        if (response.status !== "failure") return true;
        return (response.retries ?? this.settings.failureRetries) <= 0;
    }

    private apply(response: ResponseMessage): Promise<void> {
        const {task_id: taskId, worker_id: workerId} = response;
        switch (response.status) {
            case "complete":
                return this.orchestrator.complete(taskId, workerId, formatVariables(response.variables));
            case "failure":
                return this.orchestrator.handleFailure(taskId, workerId, {
                    errorMessage: response.error_message ?? "Downstream processing failed",
                    retries: response.retries ?? this.settings.failureRetries,
                    retryTimeout: response.retry_timeout ?? this.settings.failureRetryTimeout,
                });
            case "bpmn_error":
                return this.orchestrator.handleBpmnError(taskId, workerId, {
                    errorCode: response.error_code ?? "DOWNSTREAM_ERROR",
                    errorMessage: response.error_message,
                    variables: formatVariables(response.variables),
                });
        }
    }

    private async rejectInvalid(delivery: GetMessage, reason: string, payload: unknown): Promise<void> {
        const stored = await this.deadLetters.deadLetter(
            "unresolvable-response",
            reason,
            payload ?? delivery.content.toString("utf-8"),
            {taskId: extractTaskId(payload)}
        );
        if (stored) ackSafely(this.channel, delivery);
        else requeueSafely(this.channel, delivery);
    }

    private settleAll(deliveries: GetMessage[], ack: boolean): void {
        for (const delivery of deliveries) {
            if (ack) ackSafely(this.channel, delivery);
            else requeueSafely(this.channel, delivery);
        }
    }

    private accumulate(report: ReconcileReport): void {
        this.totals = {
            received: this.totals.received + report.received,
            completed: this.totals.completed + report.completed,
            duplicates: this.totals.duplicates + report.duplicates,
            requeued: this.totals.requeued + report.requeued,
            deadLettered: this.totals.deadLettered + report.deadLettered,
            invalid: this.totals.invalid + report.invalid,
        };
    }
}
