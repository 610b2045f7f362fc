import {XMLParser, XMLValidator} from 'fast-xml-parser';
import {BpmnMetadata} from '../types/bpmn_metadata';
import {MetadataError} from '../utils/errors';
import {isRecord} from '../utils/messageCodec';

// Flow nodes that can carry extension elements. Sub-processes are walked, not collected.
const ACTIVITY_TAGS = new Set([
    'serviceTask',
    'sendTask',
    'businessRuleTask',
    'scriptTask',
    'userTask',
    'receiveTask',
    'manualTask',
    'task',
    'callActivity'
]);

const REPEATED_TAGS = new Set([
    ...ACTIVITY_TAGS,
    'property',
    'field',
    'inputParameter',
    'outputParameter'
]);

const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    removeNSPrefix: true,
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: true,
    isArray: (tagName: string) => REPEATED_TAGS.has(tagName)
});

function asArray(value: unknown): unknown[] {
    if (value === undefined || value === null) return [];
    return Array.isArray(value) ? value : [value];
}

function firstRecord(value: unknown): Record<string, unknown> | undefined {
    return asArray(value).find(isRecord);
}

function textOf(node: unknown): string | undefined {
    if (typeof node === 'string') return node;
    if (isRecord(node) && typeof node['#text'] === 'string') return node['#text'];
    return undefined;
}

function attribute(node: Record<string, unknown>, name: string): string | undefined {
    const value = node[`@_${name}`];
    return typeof value === 'string' ? value : undefined;
}

function collectPairs(nodes: unknown, valueOf: (node: Record<string, unknown>) => string | undefined): Record<string, string> {
    const pairs: Record<string, string> = {};
    for (const node of asArray(nodes)) {
        if (!isRecord(node)) continue;
        const name = attribute(node, 'name');
        const value = valueOf(node);
        if (name && value) pairs[name] = value;
    }
    return Object.freeze(pairs);
}

function extractMetadata(activity: Record<string, unknown>): BpmnMetadata {
    const extensions = firstRecord(activity.extensionElements);
    const properties = extensions ? asArray(extensions.properties).filter(isRecord).flatMap(group => asArray(group.property)) : [];
    const inputOutput = extensions ? firstRecord(extensions.inputOutput) : undefined;

    return Object.freeze({
        extensionProperties: collectPairs(properties, node => attribute(node, 'value')),
        fieldInjections: collectPairs(extensions?.field, node =>
            attribute(node, 'stringValue')
            ?? attribute(node, 'expression')
            ?? textOf(firstOf(node.string))
            ?? textOf(firstOf(node.expression))),
        inputParameters: collectPairs(inputOutput?.inputParameter, textOf),
        outputParameters: collectPairs(inputOutput?.outputParameter, textOf)
    });
}

function firstOf(value: unknown): unknown {
    return asArray(value)[0];
}

function collectActivities(node: unknown, activities: Map<string, BpmnMetadata>): void {
    if (Array.isArray(node)) {
        for (const child of node) collectActivities(child, activities);
        return;
    }
    if (!isRecord(node)) return;

    for (const [tag, child] of Object.entries(node)) {
        if (tag.startsWith('@_') || tag === '#text') continue;
        if (ACTIVITY_TAGS.has(tag)) {
            for (const element of asArray(child)) {
                if (!isRecord(element)) continue;
                const id = attribute(element, 'id');
                if (id) activities.set(id, extractMetadata(element));
            }
        }
        collectActivities(child, activities);
    }
}

/**
 * Parse a BPMN 2.0 document and extract Camunda extension metadata for every
 * activity, keyed by activity id.
 */
export function parseBpmnMetadata(xml: string): Map<string, BpmnMetadata> {
    if (xml.trim() === '') {
        throw new MetadataError('Empty BPMN document');
    }
    const validation = XMLValidator.validate(xml);
    if (validation !== true) {
        throw new MetadataError(`Malformed BPMN document: ${validation.err.msg}`, {
            line: validation.err.line,
            code: validation.err.code
        });
    }

    const activities = new Map<string, BpmnMetadata>();
    collectActivities(parser.parse(xml), activities);
    return activities;
}
