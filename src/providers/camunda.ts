import axios, {AxiosInstance} from "axios";
import https from "https";
import logger from "../utils/logger";
import {OrchestratorError, MetadataError} from "../utils/errors";
import {isCamundaVariable, isRecord} from "../utils/messageCodec";
import {
    BpmnErrorReport,
    ExternalTask,
    FailureReport,
    FetchAndLockRequest,
    VariableMap
} from "../types/camunda";
import {ProcessDefinitionSource} from "../services/metadataCache";

export interface CamundaClientOptions {
    baseUrl: string;
    httpTimeout: number;
    verifyTls: boolean;
    auth?: { username: string; password: string };
    /** Pre-built HTTP client, used instead of one derived from the options. */
    http?: AxiosInstance;
}

/** The slice of the orchestrator the reconciler depends on. */
export interface TaskCompletionClient {
    complete(taskId: string, workerId: string, variables?: VariableMap): Promise<void>;
    handleFailure(taskId: string, workerId: string, report: FailureReport): Promise<void>;
    handleBpmnError(taskId: string, workerId: string, report: BpmnErrorReport): Promise<void>;
}

/** The slice of the orchestrator the dispatcher depends on. */
export interface TaskFetchClient {
    fetchAndLock(request: FetchAndLockRequest, signal?: AbortSignal): Promise<ExternalTask[]>;
    unlock(taskId: string): Promise<void>;
}

export function normalizeBaseUrl(url: string): string {
    const trimmed = url.replace(/\/+$/, '');
    return trimmed.endsWith('/engine-rest') ? trimmed : `${trimmed}/engine-rest`;
}

/**
 * HTTP client for the orchestrator. TLS verification is an explicit option
 * of the agent built here, never a process-wide override.
 */
export function createCamundaHttp(options: CamundaClientOptions): AxiosInstance {
    return axios.create({
        baseURL: normalizeBaseUrl(options.baseUrl),
        timeout: options.httpTimeout,
        auth: options.auth,
        httpsAgent: new https.Agent({rejectUnauthorized: options.verifyTls}),
        headers: {
            "Content-Type": "application/json",
        },
    });
}

/**
 * Converts plain values to typed orchestrator variables. Values that already
 * look like `{value, type}` pass through unchanged.
 */
export function formatVariables(values: Record<string, unknown>): VariableMap {
    const formatted: VariableMap = {};
    for (const [name, value] of Object.entries(values)) {
        if (value === null || value === undefined) {
            formatted[name] = {value: null, type: "Null"};
        } else if (isCamundaVariable(value)) {
            formatted[name] = value;
        } else if (typeof value === "string") {
            formatted[name] = {value, type: "String"};
        } else if (typeof value === "boolean") {
            formatted[name] = {value, type: "Boolean"};
        } else if (typeof value === "number") {
            formatted[name] = Number.isSafeInteger(value) ? {value, type: "Long"} : {value, type: "Double"};
        } else {
            formatted[name] = {value: JSON.stringify(value), type: "Json"};
        }
    }
    return formatted;
}

function describeFailure(action: string, error: unknown): OrchestratorError {
    if (error instanceof OrchestratorError) return error;
    if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        const body: unknown = error.response?.data;
        const reason = isRecord(body) && typeof body.message === "string" ? body.message : error.message;
        return new OrchestratorError(
            status ? `${action} failed: HTTP ${status} - ${reason}` : `${action} failed: ${reason}`,
            status,
            body ?? null
        );
    }
    return new OrchestratorError(`${action} failed: ${error instanceof Error ? error.message : String(error)}`);
}

function parseExternalTasks(data: unknown): ExternalTask[] {
    if (!Array.isArray(data)) {
        throw new OrchestratorError("fetchAndLock returned a non-array body", undefined, data);
    }
    const tasks: ExternalTask[] = [];
    for (const item of data) {
        if (!isRecord(item) || typeof item.id !== "string" || typeof item.topicName !== "string") {
            logger.warn("Skipping malformed external task in fetchAndLock response", {item});
            continue;
        }
        tasks.push({
            id: item.id,
            topicName: item.topicName,
            workerId: typeof item.workerId === "string" ? item.workerId : "",
            processInstanceId: typeof item.processInstanceId === "string" ? item.processInstanceId : "",
            processDefinitionId: typeof item.processDefinitionId === "string" ? item.processDefinitionId : "",
            processDefinitionKey: typeof item.processDefinitionKey === "string" ? item.processDefinitionKey : "",
            activityId: typeof item.activityId === "string" ? item.activityId : "",
            activityInstanceId: typeof item.activityInstanceId === "string" ? item.activityInstanceId : null,
            tenantId: typeof item.tenantId === "string" ? item.tenantId : null,
            businessKey: typeof item.businessKey === "string" ? item.businessKey : null,
            retries: typeof item.retries === "number" ? item.retries : null,
            priority: typeof item.priority === "number" ? item.priority : 0,
            createTime: typeof item.createTime === "string" ? item.createTime : null,
            lockExpirationTime: typeof item.lockExpirationTime === "string" ? item.lockExpirationTime : null,
            variables: isRecord(item.variables) ? formatVariables(item.variables) : {},
        });
    }
    return tasks;
}

export class CamundaClient implements ProcessDefinitionSource, TaskCompletionClient, TaskFetchClient {
    private readonly http: AxiosInstance;

    constructor(options: CamundaClientOptions) {
        this.http = options.http ?? createCamundaHttp(options);
    }

    async fetchAndLock(request: FetchAndLockRequest, signal?: AbortSignal): Promise<ExternalTask[]> {
        try {
            const resp = await this.http.post("/external-task/fetchAndLock", request, {
                signal,
                // Long polling: the request may legitimately stay open for asyncResponseTimeout
                timeout: (this.http.defaults.timeout ?? 0) + (request.asyncResponseTimeout ?? 0),
            });
            return parseExternalTasks(resp.data);
        } catch (error) {
            throw describeFailure("fetchAndLock", error);
        }
    }

    async getProcessDefinitionXml(processDefinitionId: string): Promise<string> {
        let data: unknown;
        try {
            const resp = await this.http.get(`/process-definition/${encodeURIComponent(processDefinitionId)}/xml`);
            data = resp.data;
        } catch (error) {
            throw describeFailure(`Fetch of process definition ${processDefinitionId}`, error);
        }
        if (!isRecord(data) || typeof data.bpmn20Xml !== "string" || data.bpmn20Xml === "") {
            throw new MetadataError(`Empty BPMN XML for process definition ${processDefinitionId}`);
        }
        return data.bpmn20Xml;
    }

    async complete(taskId: string, workerId: string, variables?: VariableMap): Promise<void> {
        const payload: { workerId: string; variables?: VariableMap } = {workerId};
        if (variables && Object.keys(variables).length > 0) payload.variables = variables;
        await this.postTaskAction(taskId, "complete", payload);
        logger.info(`Task ${taskId} completed in Camunda`);
    }

    async handleFailure(taskId: string, workerId: string, report: FailureReport): Promise<void> {
        await this.postTaskAction(taskId, "failure", {workerId, ...report});
        logger.warn(`Task ${taskId} reported as failed (retries: ${report.retries})`);
    }

    async handleBpmnError(taskId: string, workerId: string, report: BpmnErrorReport): Promise<void> {
        await this.postTaskAction(taskId, "bpmnError", {workerId, ...report});
        logger.info(`BPMN error ${report.errorCode} raised for task ${taskId}`);
    }

    async unlock(taskId: string): Promise<void> {
        await this.postTaskAction(taskId, "unlock", {});
        logger.info(`Task ${taskId} unlocked`);
    }

    private async postTaskAction(taskId: string, action: string, payload: object): Promise<void> {
        try {
            await this.http.post(`/external-task/${encodeURIComponent(taskId)}/${action}`, payload);
        } catch (error) {
            throw describeFailure(`${action} of task ${taskId}`, error);
        }
    }
}
