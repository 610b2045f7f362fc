import fs from 'fs';
import logger from '../utils/logger';
import {ConfigurationError, errorMessage} from '../utils/errors';
import {isRecord} from '../utils/messageCodec';

export type MatchKind = 'exact' | 'prefix' | 'substring';

export interface TopicRule {
    pattern: string;
    match: MatchKind;
    system: string;
}

export interface RoutingTable {
    defaultSystem: string;
    rules: TopicRule[];
}

export interface RouteResolution {
    system: string;
    queue: string;
    routingKey: string;
}

interface CompiledTable {
    defaultSystem: string;
    exact: ReadonlyMap<string, string>;
    prefixes: ReadonlyArray<readonly [string, string]>;
    substrings: ReadonlyArray<readonly [string, string]>;
    systems: readonly string[];
}

const SYSTEM_NAME = /^[A-Za-z0-9_-]+$/;
const MATCH_KINDS: readonly MatchKind[] = ['exact', 'prefix', 'substring'];

export function queueForSystem(system: string): string {
    return `${system}.queue`;
}

export function trackingQueueForSystem(system: string): string {
    return `${system}.sent.queue`;
}

function isMatchKind(value: unknown): value is MatchKind {
    return typeof value === 'string' && MATCH_KINDS.some(kind => kind === value);
}

/** Validate an untrusted routing table (e.g. parsed JSON). */
export function validateRoutingTable(value: unknown): RoutingTable {
    if (!isRecord(value)) {
        throw new ConfigurationError('Routing table must be an object');
    }
    const defaultSystem = value.defaultSystem;
    if (typeof defaultSystem !== 'string' || !SYSTEM_NAME.test(defaultSystem)) {
        throw new ConfigurationError('Routing table needs a valid defaultSystem');
    }
    if (!Array.isArray(value.rules)) {
        throw new ConfigurationError('Routing table rules must be an array');
    }

    const rules: TopicRule[] = value.rules.map((rule: unknown, index: number) => {
        if (!isRecord(rule) || typeof rule.pattern !== 'string' || rule.pattern === '') {
            throw new ConfigurationError(`Routing rule #${index} needs a non-empty pattern`);
        }
        if (!isMatchKind(rule.match)) {
            throw new ConfigurationError(`Routing rule #${index} has unknown match "${String(rule.match)}"`);
        }
        if (typeof rule.system !== 'string' || !SYSTEM_NAME.test(rule.system)) {
            throw new ConfigurationError(`Routing rule #${index} has an invalid system name`);
        }
        return {pattern: rule.pattern, match: rule.match, system: rule.system};
    });

    return {defaultSystem, rules};
}

export function loadRoutingTable(filePath: string): RoutingTable {
    let raw: string;
    try {
        raw = fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
        throw new ConfigurationError(`Cannot read routing table ${filePath}: ${errorMessage(error)}`);
    }
    try {
        return validateRoutingTable(JSON.parse(raw));
    } catch (error) {
        if (error instanceof ConfigurationError) throw error;
        throw new ConfigurationError(`Routing table ${filePath} is not valid JSON: ${errorMessage(error)}`);
    }
}

function compile(table: RoutingTable): CompiledTable {
    const validated = validateRoutingTable(table);
    const exact = new Map<string, string>();
    const prefixes: Array<readonly [string, string]> = [];
    const substrings: Array<readonly [string, string]> = [];
    const systems = new Set<string>([validated.defaultSystem]);

    for (const rule of validated.rules) {
        systems.add(rule.system);
        switch (rule.match) {
            case 'exact': {
                const existing = exact.get(rule.pattern);
                if (existing && existing !== rule.system) {
                    throw new ConfigurationError(`Topic "${rule.pattern}" is mapped to both ${existing} and ${rule.system}`);
                }
                exact.set(rule.pattern, rule.system);
                break;
            }
            case 'prefix':
                prefixes.push([rule.pattern.toLowerCase(), rule.system]);
                break;
            case 'substring':
                substrings.push([rule.pattern.toLowerCase(), rule.system]);
                break;
        }
    }

    // Longest pattern wins; the sort is stable so table order breaks ties
    const byLength = (a: readonly [string, string], b: readonly [string, string]) => b[0].length - a[0].length;
    prefixes.sort(byLength);
    substrings.sort(byLength);

    return {
        defaultSystem: validated.defaultSystem,
        exact,
        prefixes,
        substrings,
        systems: [...systems]
    };
}

/**
 * Maps a topic name to the downstream queue that handles it.
 * Resolution order: exact topic, longest prefix, longest substring, default.
 */
export class TopicRouter {
    private table: CompiledTable;
    private generationCounter = 1;

    constructor(table: RoutingTable) {
        this.table = compile(table);
    }

    resolve(topicName: string): string {
        return this.route(topicName).queue;
    }

    route(topicName: string): RouteResolution {
        const table = this.table;
        const system = this.systemFor(table, topicName);
        return {
            system,
            queue: queueForSystem(system),
            routingKey: `${system}.${topicName}`
        };
    }

    /** Replace the table in one step; an invalid table leaves the current one in place. */
    reload(table: RoutingTable): void {
        const compiled = compile(table);
        this.table = compiled;
        this.generationCounter++;
        logger.info(`Routing table reloaded (generation ${this.generationCounter}, ${compiled.systems.length} systems)`);
    }

    get generation(): number {
        return this.generationCounter;
    }

    get defaultSystem(): string {
        return this.table.defaultSystem;
    }

    systems(): string[] {
        return [...this.table.systems];
    }

    exactTopics(): string[] {
        return [...this.table.exact.keys()];
    }

    private systemFor(table: CompiledTable, topicName: string): string {
        const exact = table.exact.get(topicName);
        if (exact) return exact;

        const lowered = topicName.toLowerCase();
        for (const [prefix, system] of table.prefixes) {
            if (lowered.startsWith(prefix)) return system;
        }
        for (const [fragment, system] of table.substrings) {
            if (lowered.includes(fragment)) return system;
        }
        return table.defaultSystem;
    }
}
