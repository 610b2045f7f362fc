import {Result, ok, err, MessageFormatError, errorMessage} from './errors';
import {TaskMessage, TrackedTask, WireBpmnMetadata} from '../types/task_message';
import {ResponseMessage, RESPONSE_STATUSES, ResponseStatus} from '../types/response_message';
import {CamundaVariable, VariableMap} from '../types/camunda';

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function encodeMessage(message: object): Buffer {
    return Buffer.from(JSON.stringify(message));
}

export function decodeJson(content: Buffer): Result<unknown, MessageFormatError> {
    try {
        return ok(JSON.parse(content.toString('utf-8')));
    } catch (error) {
        return err(new MessageFormatError('Invalid JSON payload', errorMessage(error)));
    }
}

function optionalString(value: unknown): string | null {
    return typeof value === 'string' ? value : null;
}

function stringMap(value: unknown): Record<string, string> {
    const result: Record<string, string> = {};
    if (!isRecord(value)) return result;
    for (const [key, entry] of Object.entries(value)) {
        if (typeof entry === 'string') result[key] = entry;
    }
    return result;
}

export function isCamundaVariable(value: unknown): value is CamundaVariable {
    return isRecord(value) && 'value' in value && typeof value.type === 'string';
}

function variableMap(value: unknown): VariableMap {
    const result: VariableMap = {};
    if (!isRecord(value)) return result;
    for (const [name, entry] of Object.entries(value)) {
        if (isCamundaVariable(entry)) result[name] = entry;
    }
    return result;
}

function wireMetadata(value: unknown): WireBpmnMetadata {
    const source: Record<string, unknown> = isRecord(value) ? value : {};
    return {
        extension_properties: stringMap(source.extension_properties),
        field_injections: stringMap(source.field_injections),
        input_parameters: stringMap(source.input_parameters),
        output_parameters: stringMap(source.output_parameters)
    };
}

const REQUIRED_TASK_FIELDS = ['task_id', 'process_instance_id', 'topic_name', 'worker_id'] as const;

export function parseTaskMessage(payload: unknown): Result<TaskMessage, MessageFormatError> {
    if (!isRecord(payload)) {
        return err(new MessageFormatError('Task message must be a JSON object'));
    }
    for (const field of REQUIRED_TASK_FIELDS) {
        if (typeof payload[field] !== 'string' || payload[field] === '') {
            return err(new MessageFormatError(`Task message is missing ${field}`, {task_id: payload.task_id}));
        }
    }

    const message: TaskMessage = {
        task_id: String(payload.task_id),
        process_instance_id: String(payload.process_instance_id),
        process_definition_id: optionalString(payload.process_definition_id) ?? '',
        process_definition_key: optionalString(payload.process_definition_key) ?? '',
        tenant_id: optionalString(payload.tenant_id),
        topic_name: String(payload.topic_name),
        worker_id: String(payload.worker_id),
        variables: variableMap(payload.variables),
        bpmn_metadata: wireMetadata(payload.bpmn_metadata)
    };

    if (typeof payload.activity_id === 'string') message.activity_id = payload.activity_id;
    if (typeof payload.activity_instance_id === 'string') message.activity_instance_id = payload.activity_instance_id;
    if (typeof payload.business_key === 'string') message.business_key = payload.business_key;
    if (typeof payload.retries === 'number') message.retries = payload.retries;
    if (typeof payload.priority === 'number') message.priority = payload.priority;
    if (typeof payload.system === 'string') message.system = payload.system;
    if (typeof payload.routing_key === 'string') message.routing_key = payload.routing_key;
    if (typeof payload.lock_expiration_time === 'string') message.lock_expiration_time = payload.lock_expiration_time;
    if (typeof payload.dispatched_at === 'string') message.dispatched_at = payload.dispatched_at;

    return ok(message);
}

export function parseTrackedTask(payload: unknown): Result<TrackedTask, MessageFormatError> {
    const parsed = parseTaskMessage(payload);
    if (!parsed.ok) return parsed;
    if (!isRecord(payload) || typeof payload.external_id !== 'string' || payload.external_id === '') {
        return err(new MessageFormatError('Tracked task is missing external_id', {task_id: parsed.value.task_id}));
    }
    return ok({
        ...parsed.value,
        external_id: payload.external_id,
        tracked_since: optionalString(payload.tracked_since) ?? new Date().toISOString()
    });
}

function isResponseStatus(value: unknown): value is ResponseStatus {
    return typeof value === 'string' && RESPONSE_STATUSES.some(status => status === value);
}

/** Task id of a payload, if it carries a usable one; used to label dead letters. */
export function extractTaskId(payload: unknown): string | undefined {
    if (!isRecord(payload)) return undefined;
    return typeof payload.task_id === 'string' && payload.task_id !== '' ? payload.task_id : undefined;
}

export function parseResponseMessage(payload: unknown): Result<ResponseMessage, MessageFormatError> {
    if (!isRecord(payload)) {
        return err(new MessageFormatError('Response message must be a JSON object'));
    }
    const taskId = extractTaskId(payload);
    if (!taskId) {
        return err(new MessageFormatError('Response message has no resolvable task_id'));
    }
    if (!isResponseStatus(payload.status)) {
        return err(new MessageFormatError(`Unknown response status: ${String(payload.status)}`, {task_id: taskId}));
    }
    if (typeof payload.worker_id !== 'string' || payload.worker_id === '') {
        return err(new MessageFormatError('Response message is missing worker_id', {task_id: taskId}));
    }

    const message: ResponseMessage = {
        task_id: taskId,
        process_instance_id: optionalString(payload.process_instance_id) ?? '',
        worker_id: payload.worker_id,
        status: payload.status,
        variables: isRecord(payload.variables) ? payload.variables : {}
    };

    if (typeof payload.error_message === 'string') message.error_message = payload.error_message;
    if (typeof payload.error_code === 'string') message.error_code = payload.error_code;
    if (typeof payload.retries === 'number') message.retries = payload.retries;
    if (typeof payload.retry_timeout === 'number') message.retry_timeout = payload.retry_timeout;
    if (typeof payload.source_queue === 'string') message.source_queue = payload.source_queue;
    if (typeof payload.responded_at === 'string') message.responded_at = payload.responded_at;

    return ok(message);
}
