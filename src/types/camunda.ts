/**
 * Shapes of the Camunda 7 REST API as consumed by the bridge.
 */

export interface CamundaVariable {
    value: unknown;
    type: string;
    valueInfo?: Record<string, unknown>;
}

export type VariableMap = Record<string, CamundaVariable>;

export interface ExternalTask {
    id: string;
    topicName: string;
    workerId: string;
    processInstanceId: string;
    processDefinitionId: string;
    processDefinitionKey: string;
    activityId: string;
    activityInstanceId?: string | null;
    tenantId?: string | null;
    businessKey?: string | null;
    retries?: number | null;
    priority?: number;
    createTime?: string | null;
    lockExpirationTime?: string | null;
    variables?: VariableMap;
}

export interface FetchTopic {
    topicName: string;
    lockDuration: number;
    deserializeValues?: boolean;
    tenantIdIn?: string[];
    includeExtensionProperties?: boolean;
}

export interface FetchAndLockRequest {
    workerId: string;
    maxTasks: number;
    usePriority?: boolean;
    asyncResponseTimeout?: number;
    topics: FetchTopic[];
}

export interface FailureReport {
    errorMessage: string;
    errorDetails?: string;
    retries: number;
    retryTimeout: number;
}

export interface BpmnErrorReport {
    errorCode: string;
    errorMessage?: string;
    variables?: VariableMap;
}
