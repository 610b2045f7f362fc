export type ResponseStatus = 'complete' | 'failure' | 'bpmn_error';

export const RESPONSE_STATUSES: readonly ResponseStatus[] = ['complete', 'failure', 'bpmn_error'];

/** Downstream signal back to the orchestrator side. */
export interface ResponseMessage {
    task_id: string;
    process_instance_id: string;
    worker_id: string;
    status: ResponseStatus;
    variables: Record<string, unknown>;
    error_message?: string;
    error_code?: string;
    retries?: number;
    retry_timeout?: number;
    source_queue?: string;
    responded_at?: string;
}

export type DeadLetterClass =
    | 'dispatch'
    | 'response-publish'
    | 'tracked-publish'
    | 'unresolvable-response'
    | 'reconciliation'
    | 'malformed-task';

export interface DeadLetterEnvelope {
    error_class: DeadLetterClass;
    reason: string;
    task_id?: string;
    attempts: number;
    failed_at: string;
    payload: unknown;
}
