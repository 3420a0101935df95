import { describeBody } from '../errors.js';
import type { ConflictCategory } from './types.js';

interface ConflictPattern {
    category: ConflictCategory;
    patterns: RegExp[];
}

// Checked in order: a stale-revision message can mention the component being
// running, and a queue message names the connection it belongs to.
const conflictPatterns: ConflictPattern[] = [
    {
        category: 'REVISION_CONFLICT',
        patterns: [/revision mismatch/i, /most up-to-date revision/i, /conflicting revision/i, /revision .*conflict/i],
    },
    {
        category: 'NON_EMPTY_QUEUE_CONFLICT',
        patterns: [
            /active flowfile queue/i,
            /active queue/i,
            /queue (is )?not empty/i,
            /has data/i,
            /flowfiles? (are )?queued/i,
        ],
    },
    {
        category: 'DEPENDENT_EDGES_CONFLICT',
        patterns: [
            /active connections?/i,
            /\b(incoming|outgoing|inbound|outbound) connections?/i,
            /is the (source|destination) of (a |an |one or more )?connections?/i,
        ],
    },
    {
        category: 'RUNNING_CONFLICT',
        patterns: [/is currently running/i, /\brunning components?\b/i, /\bis running\b/i],
    },
];

/**
 * Maps a failed NiFi mutation to the conflict it reports.
 *
 * Only 409 responses are matched against message text; an unrecognised 409
 * is UNCLASSIFIED and must be surfaced without remediation.
 */
export function classify(httpStatus: number, responseBody: unknown): ConflictCategory {
    if (httpStatus === 404) {
        return 'NOT_FOUND';
    }
    if (httpStatus === 401 || httpStatus === 403) {
        return 'PERMISSION_DENIED';
    }
    if (httpStatus !== 409) {
        return 'UNCLASSIFIED';
    }

    const message = describeBody(responseBody);
    for (const { category, patterns } of conflictPatterns) {
        if (patterns.some((pattern) => pattern.test(message))) {
            return category;
        }
    }
    return 'UNCLASSIFIED';
}
