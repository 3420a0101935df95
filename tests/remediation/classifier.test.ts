import { describe, expect, it } from 'vitest';
import { classify } from '../../src/remediation/classifier.js';

describe('classify', () => {
    it('maps non-conflict statuses without reading the body', () => {
        expect(classify(404, 'Processor is currently RUNNING')).toBe('NOT_FOUND');
        expect(classify(401, '')).toBe('PERMISSION_DENIED');
        expect(classify(403, { message: 'forbidden' })).toBe('PERMISSION_DENIED');
        expect(classify(400, 'is currently running')).toBe('UNCLASSIFIED');
        expect(classify(500, 'active connections')).toBe('UNCLASSIFIED');
    });

    it('recognises NiFi conflict messages', () => {
        expect(classify(409, 'Processor abc is currently RUNNING')).toBe('RUNNING_CONFLICT');
        expect(classify(409, 'Cannot delete group because it has running components')).toBe('RUNNING_CONFLICT');
        expect(classify(409, 'Cannot delete abc because it has active connections')).toBe('DEPENDENT_EDGES_CONFLICT');
        expect(classify(409, 'abc has incoming connections')).toBe('DEPENDENT_EDGES_CONFLICT');
        expect(classify(409, 'Cannot delete connection because it has an active FlowFile queue')).toBe(
            'NON_EMPTY_QUEUE_CONFLICT'
        );
        expect(classify(409, 'Cannot delete process group pg because it has data queued')).toBe('NON_EMPTY_QUEUE_CONFLICT');
        expect(
            classify(409, '[3, null, abc] is not the most up-to-date revision. This component appears to have been modified')
        ).toBe('REVISION_CONFLICT');
    });

    it('reads the message field of a JSON body', () => {
        expect(classify(409, { message: 'Revision mismatch for component abc' })).toBe('REVISION_CONFLICT');
    });

    it('prefers the revision category when a message also mentions running', () => {
        expect(classify(409, 'Revision mismatch: abc is currently RUNNING')).toBe('REVISION_CONFLICT');
    });

    it('prefers the queue category over dependent connections', () => {
        expect(classify(409, 'Connection c1 cannot be removed: active FlowFile queue on active connections')).toBe(
            'NON_EMPTY_QUEUE_CONFLICT'
        );
    });

    it('recognises the queue wording NiFi uses when a connection still holds data', () => {
        expect(classify(409, 'Queue not empty for 0191a3c2-1234')).toBe('NON_EMPTY_QUEUE_CONFLICT');
        expect(classify(409, 'Connection c1 has data in its active queue')).toBe('NON_EMPTY_QUEUE_CONFLICT');
        expect(classify(409, 'Cannot remove c1 because it has data')).toBe('NON_EMPTY_QUEUE_CONFLICT');
    });

    it('leaves unknown conflicts unclassified', () => {
        expect(classify(409, 'Something unexpected happened')).toBe('UNCLASSIFIED');
        expect(classify(409, undefined)).toBe('UNCLASSIFIED');
    });
});
