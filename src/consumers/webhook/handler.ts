import axios, {AxiosInstance} from "axios";
import http from "http";
import https from "https";
import logger from "../../utils/logger";
import {errorMessage} from "../../utils/errors";
import {isRecord} from "../../utils/messageCodec";
import {WebhookSettings} from "../../config/config";
import {TaskMessage} from "../../types/task_message";
import {BaseMessageHandler} from "../baseHandler";
import {HandlerResult, ResponseSink} from "../types";
import {SIGNATURE_HEADER, generateSignature} from "./signature";

export interface WebhookHandlerOptions {
    timeoutMs?: number;
    /** Pre-built HTTP client; when absent the handler owns its keep-alive agents. */
    http?: AxiosInstance;
}

/**
 * Delivers each task to a downstream HTTP endpoint. The endpoint answers
 * `{external_id?, variables?, await_completion?}`; with `await_completion`
 * the task is parked for the status tracker instead of completed.
 */
export class WebhookHandler extends BaseMessageHandler {
    private readonly http: AxiosInstance;
    private readonly agents: Array<http.Agent | https.Agent> = [];

    constructor(system: string, sink: ResponseSink, private readonly webhook: WebhookSettings, options: WebhookHandlerOptions = {}) {
        super(system, sink);
        if (options.http) {
            this.http = options.http;
        } else {
            const httpAgent = new http.Agent({keepAlive: true});
            const httpsAgent = new https.Agent({keepAlive: true});
            this.agents.push(httpAgent, httpsAgent);
            this.http = axios.create({timeout: options.timeoutMs ?? 10000, httpAgent, httpsAgent});
        }
    }

    async doWork(message: TaskMessage): Promise<HandlerResult | null> {
        const body = JSON.stringify({task: message, timestamp: new Date().toISOString()});
        const headers: Record<string, string> = {
            "Content-Type": "application/json",
            "User-Agent": "Task-Bridge-Webhook/1.0",
        };
        if (this.webhook.secret) {
            headers[SIGNATURE_HEADER] = generateSignature(body, this.webhook.secret);
        }

        let data: unknown;
        try {
            const response = await this.http.post(this.webhook.url, body, {
                headers,
                validateStatus: (status: number) => status >= 200 && status < 300,
            });
            data = response.data;
            logger.debug(`Webhook for task ${message.task_id} delivered: ${response.status}`);
        } catch (error) {
            logger.warn(`Webhook for task ${message.task_id} failed: ${errorMessage(error)}`, {
                taskId: message.task_id,
                url: this.webhook.url,
            });
            return null;
        }

        return this.toResult(message, data);
    }

    async cleanup(): Promise<void> {
        for (const agent of this.agents) agent.destroy();
        await super.cleanup();
    }

    private toResult(message: TaskMessage, data: unknown): HandlerResult {
        const body: Record<string, unknown> = isRecord(data) ? data : {};
        const externalId = typeof body.external_id === "string" && body.external_id !== "" ? body.external_id : undefined;
        const variables = isRecord(body.variables) ? body.variables : {};

        let awaitCompletion = body.await_completion === true;
        if (awaitCompletion && (!externalId || !this.webhook.statusUrl)) {
            logger.warn(`Task ${message.task_id} asked to await completion but ${this.system} has no status tracking; completing now`);
            awaitCompletion = false;
        }

        return {variables, externalId, awaitCompletion};
    }
}
