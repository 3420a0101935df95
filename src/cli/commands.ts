import type { ChildKind, MutationAction, MutationRequest, ResourceType } from '../nifi/remote.js';

export type ConsoleCommand =
    | { name: 'list'; kind: ChildKind; rootGroupId: string; maxDepth?: number }
    | { name: 'more' }
    | { name: 'mutate'; request: MutationRequest }
    | { name: 'purge'; connectionId: string }
    | { name: 'queue'; connectionId: string }
    | { name: 'provenance'; componentId: string; maxResults: number }
    | { name: 'help' }
    | { name: 'exit' }
    | { name: 'empty' }
    | { name: 'invalid'; message: string };

export const helpText = [
    'list <processors|connections|ports|groups> [groupId] [maxDepth]   list across a group tree',
    'more                                                             continue the last incomplete list',
    'delete|stop|start <processor|connection|port|group> <id>         change a component',
    'purge <connectionId>                                             drop all queued FlowFiles',
    'queue <connectionId>                                             show queued FlowFiles',
    'provenance <componentId> [maxResults]                            show recent provenance events',
    'help, exit',
];

const childKinds: Record<string, ChildKind> = {
    processor: 'processors',
    processors: 'processors',
    connection: 'connections',
    connections: 'connections',
    port: 'ports',
    ports: 'ports',
    group: 'groups',
    groups: 'groups',
};

const resourceTypes: Record<string, ResourceType> = {
    processor: 'processor',
    connection: 'connection',
    port: 'port',
    group: 'group',
    'process-group': 'group',
};

const mutationActions: Record<string, MutationAction> = {
    delete: 'delete',
    stop: 'stop',
    start: 'start',
};

function lookup<T>(table: Record<string, T>, key: string | undefined): T | undefined {
    return key !== undefined && Object.hasOwn(table, key) ? table[key] : undefined;
}

function parseCount(raw: string | undefined, label: string, allowZero: boolean): number | string | undefined {
    if (raw === undefined) {
        return undefined;
    }
    const value = /^\d+$/.test(raw) ? Number.parseInt(raw, 10) : Number.NaN;
    if (Number.isNaN(value) || (!allowZero && value === 0)) {
        return `${label} must be a ${allowZero ? 'non-negative' : 'positive'} integer`;
    }
    return value;
}

export function parseCommand(line: string): ConsoleCommand {
    const [word, ...args] = line.trim().split(/\s+/).filter((part) => part.length > 0);
    if (word === undefined) {
        return { name: 'empty' };
    }
    const verb = word.toLowerCase();

    switch (verb) {
        case 'list': {
            const kind = lookup(childKinds, args[0]?.toLowerCase());
            if (!kind) {
                return { name: 'invalid', message: 'Usage: list <processors|connections|ports|groups> [groupId] [maxDepth]' };
            }
            const maxDepth = parseCount(args[2], 'maxDepth', true);
            if (typeof maxDepth === 'string') {
                return { name: 'invalid', message: maxDepth };
            }
            return { name: 'list', kind, rootGroupId: args[1] ?? 'root', ...(maxDepth !== undefined ? { maxDepth } : {}) };
        }
        case 'more':
            return { name: 'more' };
        case 'delete':
        case 'stop':
        case 'start': {
            const type = lookup(resourceTypes, args[0]?.toLowerCase());
            const action = lookup(mutationActions, verb);
            if (!type || !action || !args[1]) {
                return { name: 'invalid', message: `Usage: ${verb} <processor|connection|port|group> <id>` };
            }
            return { name: 'mutate', request: { type, id: args[1], action } };
        }
        case 'purge':
        case 'queue': {
            if (!args[0]) {
                return { name: 'invalid', message: `Usage: ${verb} <connectionId>` };
            }
            return verb === 'purge' ? { name: 'purge', connectionId: args[0] } : { name: 'queue', connectionId: args[0] };
        }
        case 'provenance': {
            if (!args[0]) {
                return { name: 'invalid', message: 'Usage: provenance <componentId> [maxResults]' };
            }
            const maxResults = parseCount(args[1], 'maxResults', false);
            if (typeof maxResults === 'string') {
                return { name: 'invalid', message: maxResults };
            }
            return { name: 'provenance', componentId: args[0], maxResults: maxResults ?? 100 };
        }
        case 'help':
        case '?':
            return { name: 'help' };
        case 'exit':
        case 'quit':
            return { name: 'exit' };
        default:
            return { name: 'invalid', message: `Unknown command "${word}". Type "help" for a list of commands.` };
    }
}
