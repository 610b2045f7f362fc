/**
 * In-process stand-ins for the broker channel and the HTTP transport.
 */
import axios, {AxiosError, AxiosInstance, AxiosResponse} from 'axios';
import type {ConsumeMessage, GetMessage, Message, MessageProperties, Options, Replies} from 'amqplib';
import type {PublishChannel} from '../../src/rabbitmq/publisher';
import type {PullChannel} from '../../src/rabbitmq/drain';
import type {ConsumeChannel} from '../../src/rabbitmq/consumer';
import type {TopologyChannel} from '../../src/rabbitmq/topology';

function emptyProperties(): MessageProperties {
    return {
        contentType: undefined,
        contentEncoding: undefined,
        headers: undefined,
        deliveryMode: undefined,
        priority: undefined,
        correlationId: undefined,
        replyTo: undefined,
        expiration: undefined,
        messageId: undefined,
        timestamp: undefined,
        type: undefined,
        userId: undefined,
        appId: undefined,
        clusterId: undefined,
    };
}

function toContent(body: unknown): Buffer {
    return Buffer.from(typeof body === 'string' ? body : JSON.stringify(body));
}

/** Parsed JSON body, or the raw text for deliveries that are not JSON. */
function readBody(content: Buffer): unknown {
    const text = content.toString('utf-8');
    try {
        return JSON.parse(text);
    } catch {
        return text;
    }
}

export interface PublishedMessage {
    exchange: string;
    routingKey: string;
    options: Options.Publish;
    body: unknown;
}

/** Confirm channel whose broker acks every publish unless told to fail. */
export class FakePublishChannel implements PublishChannel {
    readonly published: PublishedMessage[] = [];
    attempts = 0;
    /** The next N publishes are nacked. */
    failuresLeft = 0;
    /** Publishes to these routing keys are always nacked. */
    readonly rejectedRoutingKeys = new Set<string>();

    publish(
        exchange: string,
        routingKey: string,
        content: Buffer,
        options: Options.Publish = {},
        callback?: (err: unknown, ok: Replies.Empty) => void
    ): boolean {
        this.attempts++;
        let failed = this.rejectedRoutingKeys.has(routingKey);
        if (!failed && this.failuresLeft > 0) {
            this.failuresLeft--;
            failed = true;
        }
        if (!failed) {
            this.published.push({exchange, routingKey, options, body: JSON.parse(content.toString('utf-8'))});
        }
        queueMicrotask(() => callback?.(failed ? new Error('message nacked') : null, {}));
        return true;
    }

    to(routingKey: string): PublishedMessage[] {
        return this.published.filter(message => message.routingKey === routingKey);
    }
}

/** Queues addressed by name; `get` pulls, `nack` with requeue puts the message back at the tail. */
export class FakeQueueChannel implements PullChannel {
    private readonly queues = new Map<string, GetMessage[]>();
    private readonly outstanding = new Map<number, { queue: string; message: GetMessage }>();
    private nextTag = 1;
    readonly acked: unknown[] = [];
    readonly requeued: unknown[] = [];
    readonly dropped: unknown[] = [];

    push(queue: string, body: unknown): void {
        const message: GetMessage = {
            content: toContent(body),
            fields: {deliveryTag: 0, redelivered: false, exchange: '', routingKey: queue, messageCount: 0},
            properties: emptyProperties(),
        };
        this.queueFor(queue).push(message);
    }

    depth(queue: string): number {
        return this.queueFor(queue).length;
    }

    bodies(queue: string): unknown[] {
        return this.queueFor(queue).map(message => readBody(message.content));
    }

    async get(queue: string, _options?: Options.Get): Promise<GetMessage | false> {
        const pending = this.queueFor(queue);
        const next = pending.shift();
        if (!next) return false;
        const tag = this.nextTag++;
        const delivered: GetMessage = {
            ...next,
            fields: {...next.fields, deliveryTag: tag, messageCount: pending.length},
        };
        this.outstanding.set(tag, {queue, message: delivered});
        return delivered;
    }

    ack(message: Message, _allUpTo?: boolean): void {
        this.settle(message).forEach(body => this.acked.push(body));
    }

    nack(message: Message, _allUpTo?: boolean, requeue = true): void {
        const tag = message.fields.deliveryTag;
        const entry = this.outstanding.get(tag);
        const [body] = this.settle(message);
        if (requeue && entry) {
            this.requeued.push(body);
            this.queueFor(entry.queue).push({
                ...entry.message,
                fields: {...entry.message.fields, redelivered: true},
            });
        } else {
            this.dropped.push(body);
        }
    }

    private settle(message: Message): unknown[] {
        const tag = message.fields.deliveryTag;
        if (!this.outstanding.delete(tag)) {
            throw new Error(`Unknown delivery tag ${tag}`);
        }
        return [readBody(message.content)];
    }

    private queueFor(queue: string): GetMessage[] {
        let pending = this.queues.get(queue);
        if (!pending) {
            pending = [];
            this.queues.set(queue, pending);
        }
        return pending;
    }
}

/** Push-style channel: `deliver` hands a message to the registered consumer. */
export class FakeConsumeChannel implements ConsumeChannel {
    private onMessage: ((msg: ConsumeMessage | null) => void) | null = null;
    private nextTag = 1;
    consumedQueue: string | null = null;
    cancelled: string[] = [];
    readonly acked: number[] = [];
    readonly requeued: number[] = [];

    async consume(queue: string, onMessage: (msg: ConsumeMessage | null) => void, _options?: Options.Consume): Promise<Replies.Consume> {
        this.consumedQueue = queue;
        this.onMessage = onMessage;
        return {consumerTag: 'ctag-1'};
    }

    async cancel(consumerTag: string): Promise<Replies.Empty> {
        this.cancelled.push(consumerTag);
        this.onMessage = null;
        return {};
    }

    deliver(body: unknown, redelivered = false): number {
        const tag = this.nextTag++;
        this.onMessage?.({
            content: toContent(body),
            fields: {deliveryTag: tag, redelivered, exchange: '', routingKey: this.consumedQueue ?? '', consumerTag: 'ctag-1'},
            properties: emptyProperties(),
        });
        return tag;
    }

    ack(message: Message, _allUpTo?: boolean): void {
        this.acked.push(message.fields.deliveryTag);
    }

    nack(message: Message, _allUpTo?: boolean, _requeue?: boolean): void {
        this.requeued.push(message.fields.deliveryTag);
    }
}

/** Records declarations as readable strings. */
export class FakeTopologyChannel implements TopologyChannel {
    readonly calls: string[] = [];
    readonly queueOptions = new Map<string, Options.AssertQueue | undefined>();
    readonly exchangeOptions = new Map<string, Options.AssertExchange | undefined>();

    async assertExchange(exchange: string, type: string, options?: Options.AssertExchange): Promise<Replies.AssertExchange> {
        this.calls.push(`exchange ${exchange} ${type}`);
        this.exchangeOptions.set(exchange, options);
        return {exchange};
    }

    async assertQueue(queue: string, options?: Options.AssertQueue): Promise<Replies.AssertQueue> {
        this.calls.push(`queue ${queue}`);
        this.queueOptions.set(queue, options);
        return {queue, messageCount: 0, consumerCount: 0};
    }

    async bindQueue(queue: string, source: string, pattern: string): Promise<Replies.Empty> {
        this.calls.push(`bind ${queue} <- ${source} ${pattern}`);
        return {};
    }
}

export interface RecordedRequest {
    method: string;
    url: string;
    body: unknown;
    headers: Record<string, string>;
}

export type FakeReply = { status: number; data?: unknown } | { networkError: string };

/**
 * Axios instance backed by a handler instead of the network. Non-2xx replies
 * reject the way axios itself does.
 */
export function fakeHttp(
    handler: (request: RecordedRequest) => FakeReply | Promise<FakeReply>,
    baseURL?: string
): { http: AxiosInstance; requests: RecordedRequest[] } {
    const requests: RecordedRequest[] = [];
    const http = axios.create({
        baseURL,
        adapter: async (config) => {
            const headers: Record<string, string> = {};
            for (const [name, value] of Object.entries(config.headers.toJSON(true))) {
                if (typeof value === 'string') headers[name.toLowerCase()] = value;
            }
            const request: RecordedRequest = {
                method: (config.method ?? 'get').toUpperCase(),
                url: config.url ?? '',
                body: typeof config.data === 'string' && config.data !== '' ? JSON.parse(config.data) : config.data,
                headers,
            };
            requests.push(request);

            const reply = await handler(request);
            if ('networkError' in reply) {
                throw new AxiosError(reply.networkError, 'ECONNREFUSED', config);
            }
            const response: AxiosResponse = {
                data: reply.data ?? '',
                status: reply.status,
                statusText: String(reply.status),
                headers: {},
                config,
                request: {},
            };
            if (!config.validateStatus || config.validateStatus(reply.status)) {
                return response;
            }
            throw new AxiosError(`Request failed with status code ${reply.status}`, AxiosError.ERR_BAD_RESPONSE, config, null, response);
        },
    });
    return {http, requests};
}
