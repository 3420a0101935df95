import { describe, expect, it, vi } from 'vitest';
import { RemediationController } from '../../src/remediation/controller.js';
import { FlowOperations } from '../../src/tools/operations.js';
import { HierarchyTraversalEngine } from '../../src/traversal/engine.js';
import { FakeFlow } from '../helpers/fake-flow.js';

function setup() {
    const flow = new FakeFlow().addGroup('root').addGroup('child', 'root').addProcessor('p', 'child');
    const engine = new HierarchyTraversalEngine(flow);
    const operations = new FlowOperations({
        client: flow,
        controller: new RemediationController(flow),
        engine,
        jobs: { pollIntervalMs: 1, timeoutMs: 1_000 },
        traversal: { maxDepth: 0, timeoutSeconds: 5 },
    });
    return { flow, engine, operations };
}

describe('FlowOperations.listHierarchy', () => {
    it('fills in the configured depth and converts the timeout to milliseconds', async () => {
        const { engine, operations } = setup();
        const traverse = vi.spyOn(engine, 'traverse');

        const result = await operations.listHierarchy({ rootGroupId: 'root', kind: 'processors' });

        expect(traverse).toHaveBeenCalledWith({
            rootGroupId: 'root',
            kind: 'processors',
            maxDepth: 0,
            timeoutMs: 5_000,
            continuationToken: undefined,
        });
        expect(result.terminalState).toBe('DEPTH_EXHAUSTED');
        expect(result.continuationToken).toBe('root:1:child');
    });

    it('rejects a negative depth and a non-positive timeout', () => {
        const { operations } = setup();

        expect(() => operations.listHierarchy({ rootGroupId: 'root', kind: 'groups', maxDepth: -1 })).toThrow(RangeError);
        expect(() => operations.listHierarchy({ rootGroupId: 'root', kind: 'groups', timeoutSeconds: 0 })).toThrow(RangeError);
    });

    it('resumes a depth-exhausted listing with a larger depth', async () => {
        const { operations } = setup();
        const first = await operations.listHierarchy({ rootGroupId: 'root', kind: 'processors' });

        const second = await operations.listHierarchy({
            rootGroupId: 'root',
            kind: 'processors',
            maxDepth: 1,
            continuationToken: first.continuationToken,
        });

        expect(second.completed).toBe(true);
        expect(second.results.map((entry) => `${entry.groupId}:${entry.objects.map((node) => node.id).join(',')}`)).toEqual(['child:p']);
    });
});
