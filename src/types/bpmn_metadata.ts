export type StringMap = Readonly<Record<string, string>>;

export interface BpmnMetadata {
    readonly extensionProperties: StringMap;
    readonly fieldInjections: StringMap;
    readonly inputParameters: StringMap;
    readonly outputParameters: StringMap;
}

export function emptyMetadata(): BpmnMetadata {
    return Object.freeze({
        extensionProperties: Object.freeze({}),
        fieldInjections: Object.freeze({}),
        inputParameters: Object.freeze({}),
        outputParameters: Object.freeze({})
    });
}
