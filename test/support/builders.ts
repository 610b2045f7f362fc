import type {TaskMessage, TrackedTask} from '../../src/types/task_message';
import type {DeadLetterClass, ResponseMessage} from '../../src/types/response_message';
import type {ResponseSink} from '../../src/consumers/types';
import type {DeadLetterContext, PublishOutcome} from '../../src/rabbitmq/publisher';

export function sampleTask(overrides: Partial<TaskMessage> = {}): TaskMessage {
    return {
        task_id: 't-1',
        process_instance_id: 'pi-1',
        process_definition_id: 'order:1',
        process_definition_key: 'order',
        tenant_id: null,
        topic_name: 'send_email',
        worker_id: 'task-bridge',
        variables: {email: {value: 'a@example.com', type: 'String'}},
        bpmn_metadata: {extension_properties: {}, field_injections: {}, input_parameters: {}, output_parameters: {}},
        system: 'notifications',
        ...overrides
    };
}

export function trackedTask(overrides: Partial<TrackedTask> = {}): TrackedTask {
    return {
        ...sampleTask(),
        external_id: 'ext-1',
        tracked_since: '2024-05-01T10:00:00.000Z',
        ...overrides
    };
}

/** Response sink that stores everything and can be told to fail deliveries. */
export class RecordingSink implements ResponseSink {
    readonly responses: ResponseMessage[] = [];
    readonly tracked: Array<{ task: TrackedTask; queue: string }> = [];
    deliver = true;

    async publishResponse(response: ResponseMessage): Promise<PublishOutcome> {
        if (!this.deliver) return {delivered: false, deadLettered: true, attempts: 5};
        this.responses.push(response);
        return {delivered: true, deadLettered: false, attempts: 1};
    }

    async publishTracked(task: TrackedTask, queue: string): Promise<PublishOutcome> {
        if (!this.deliver) return {delivered: false, deadLettered: true, attempts: 5};
        this.tracked.push({task, queue});
        return {delivered: true, deadLettered: false, attempts: 1};
    }
}

export interface RecordedDeadLetter {
    errorClass: DeadLetterClass;
    reason: string;
    payload: unknown;
    context: DeadLetterContext;
}

export class RecordingDeadLetters {
    readonly letters: RecordedDeadLetter[] = [];
    store = true;

    async deadLetter(errorClass: DeadLetterClass, reason: string, payload: unknown, context: DeadLetterContext = {}): Promise<boolean> {
        this.letters.push({errorClass, reason, payload, context});
        return this.store;
    }
}
