import { InvalidTokenError } from '../errors.js';

export interface FrontierEntry {
    groupId: string;
    depth: number;
}

/** The resumable part of a traversal: where it is anchored and what is left to expand. */
export interface TraversalCursor {
    anchorGroupId: string;
    frontier: FrontierEntry[];
}

export interface TraversalState extends TraversalCursor {
    visitedCount: number;
    deadline: number;
    maxDepth: number;
}

// Token grammar:
//   <anchor>:<depth>                       frontier is the anchor itself at <depth>
//   <anchor>:<depth>:<id>,<id>,...         frontier ids at <depth>
//   <anchor>:<depth>:<id>,...,,<id>,...    ids after the empty element sit at <depth + 1>
const idPattern = /^[\w.-]+$/;

export function encodeToken(cursor: Pick<TraversalState, 'anchorGroupId' | 'frontier'>): string {
    const { anchorGroupId, frontier } = cursor;
    if (frontier.length === 0) {
        throw new RangeError('Cannot encode an empty frontier');
    }
    const depth = frontier[0].depth;
    const current: string[] = [];
    const next: string[] = [];
    for (const entry of frontier) {
        if (entry.depth === depth && next.length === 0) {
            current.push(entry.groupId);
        } else if (entry.depth === depth + 1) {
            next.push(entry.groupId);
        } else {
            throw new RangeError(`Frontier entry ${entry.groupId} at depth ${entry.depth} breaks level order after depth ${depth}`);
        }
    }

    if (next.length === 0 && current.length === 1 && current[0] === anchorGroupId) {
        return `${anchorGroupId}:${depth}`;
    }
    const ids = next.length > 0 ? `${current.join(',')},,${next.join(',')}` : current.join(',');
    return `${anchorGroupId}:${depth}:${ids}`;
}

export function decodeToken(token: string): TraversalCursor {
    const parts = token.split(':');
    if (parts.length < 2 || parts.length > 3) {
        throw new InvalidTokenError(token, 'expected <groupId>:<depth>[:<childIds>]');
    }
    const [anchorGroupId, rawDepth, rawIds] = parts;
    if (!idPattern.test(anchorGroupId)) {
        throw new InvalidTokenError(token, 'group id is malformed');
    }
    if (!/^\d+$/.test(rawDepth)) {
        throw new InvalidTokenError(token, 'depth must be a non-negative integer');
    }
    const depth = Number.parseInt(rawDepth, 10);

    if (rawIds === undefined) {
        return { anchorGroupId, frontier: [{ groupId: anchorGroupId, depth }] };
    }

    const segments = rawIds.split(',');
    const boundary = segments.indexOf('');
    if (boundary !== -1 && (boundary === 0 || boundary === segments.length - 1 || segments.indexOf('', boundary + 1) !== -1)) {
        throw new InvalidTokenError(token, 'child id list is malformed');
    }
    const frontier: FrontierEntry[] = [];
    segments.forEach((groupId, index) => {
        if (index === boundary) {
            return;
        }
        if (!idPattern.test(groupId)) {
            throw new InvalidTokenError(token, `child id "${groupId}" is malformed`);
        }
        frontier.push({ groupId, depth: boundary !== -1 && index > boundary ? depth + 1 : depth });
    });
    return { anchorGroupId, frontier };
}
