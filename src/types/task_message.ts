import {VariableMap} from "./camunda";

export interface WireBpmnMetadata {
    extension_properties: Record<string, string>;
    field_injections: Record<string, string>;
    input_parameters: Record<string, string>;
    output_parameters: Record<string, string>;
}

/** Payload published to a downstream queue, one per external task. */
export interface TaskMessage {
    task_id: string;
    process_instance_id: string;
    process_definition_id: string;
    process_definition_key: string;
    tenant_id: string | null;
    topic_name: string;
    worker_id: string;
    variables: VariableMap;
    bpmn_metadata: WireBpmnMetadata;
    activity_id?: string;
    activity_instance_id?: string | null;
    business_key?: string | null;
    retries?: number | null;
    priority?: number;
    system?: string;
    routing_key?: string;
    lock_expiration_time?: string | null;
    dispatched_at?: string;
}

/** A task accepted downstream, parked until the downstream system reports completion. */
export interface TrackedTask extends TaskMessage {
    external_id: string;
    tracked_since: string;
}
