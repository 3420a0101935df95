import type { ChatCompletionMessageToolCall, ChatCompletionToolMessageParam } from 'openai/resources/chat/completions';
import { describe, expect, it } from 'vitest';
import { RemediationController } from '../../src/remediation/controller.js';
import { allTools, readOnlyTools, ToolDispatcher, ToolName } from '../../src/tools/dispatcher.js';
import { FlowOperations } from '../../src/tools/operations.js';
import { HierarchyTraversalEngine } from '../../src/traversal/engine.js';
import { FakeFlow } from '../helpers/fake-flow.js';

function setup(capabilities: ReadonlySet<ToolName>) {
    const flow = new FakeFlow()
        .addGroup('root')
        .addProcessor('P', 'root', 'RUNNING')
        .addProcessor('Q', 'root')
        .addConnection('C', 'root', 'P', 'Q', 3);
    const operations = new FlowOperations({
        client: flow,
        controller: new RemediationController(flow, {
            settings: { stopPollIntervalMs: 1, jobPollIntervalMs: 1 },
        }),
        engine: new HierarchyTraversalEngine(flow),
        jobs: { pollIntervalMs: 1, timeoutMs: 1_000 },
        traversal: { maxDepth: 3, timeoutSeconds: 30 },
    });
    return { flow, dispatcher: new ToolDispatcher({ operations, capabilities }) };
}

function toolCall(name: string, args: unknown): ChatCompletionMessageToolCall {
    return {
        id: 'call-1',
        type: 'function',
        function: { name, arguments: typeof args === 'string' ? args : JSON.stringify(args) },
    };
}

function contentOf(message: ChatCompletionToolMessageParam): unknown {
    if (typeof message.content !== 'string') {
        throw new Error('expected text content');
    }
    return JSON.parse(message.content);
}

describe('ToolDispatcher', () => {
    it('offers only the enabled tools', () => {
        const { dispatcher } = setup(readOnlyTools);

        expect(dispatcher.definitions().map((tool) => tool.function.name)).toEqual([
            'list_hierarchy',
            'list_queue',
            'query_provenance',
        ]);
    });

    it('answers a listing call with a tool message', async () => {
        const { dispatcher } = setup(readOnlyTools);

        const message = await dispatcher.dispatch(toolCall('list_hierarchy', { root_group_id: 'root', kind: 'processors' }));

        expect(message.role).toBe('tool');
        expect(message.tool_call_id).toBe('call-1');
        expect(contentOf(message)).toMatchObject({
            completed: true,
            continuationToken: null,
            results: [{ groupId: 'root', depth: 0, objects: [{ id: 'P' }, { id: 'Q' }] }],
        });
    });

    it('refuses a tool outside the capability set', async () => {
        const { dispatcher, flow } = setup(readOnlyTools);

        const message = await dispatcher.dispatch(toolCall('mutate_component', { type: 'processor', id: 'P', action: 'delete' }));

        expect(contentOf(message)).toEqual({ error: 'Tool mutate_component is not enabled' });
        expect(flow.mutations).toEqual([]);
    });

    it('reports unknown tools and malformed arguments as errors', async () => {
        const { dispatcher } = setup(allTools);

        const unknown = await dispatcher.dispatch(toolCall('toString', {}));
        const notJson = await dispatcher.dispatch(toolCall('purge_queue', '{connection_id:'));
        const invalid = await dispatcher.dispatch(toolCall('list_hierarchy', { kind: 'processors' }));

        expect(contentOf(unknown)).toEqual({ error: 'Unknown tool: toString' });
        expect(contentOf(notJson)).toEqual({ error: expect.stringContaining('Tool arguments are not valid JSON') });
        expect(contentOf(invalid)).toEqual({ error: expect.stringContaining('root_group_id') });
    });

    it('runs a remediated deletion and returns its log', async () => {
        const { dispatcher, flow } = setup(allTools);

        const message = await dispatcher.dispatch(toolCall('mutate_component', { type: 'processor', id: 'P', action: 'delete' }));

        expect(contentOf(message)).toMatchObject({
            status: 'SUCCEEDED',
            remediationLog: [
                { action: 'stop-component', targetId: 'P' },
                { action: 'drain-queue', targetId: 'C' },
                { action: 'delete-connection', targetId: 'C' },
            ],
        });
        expect(flow.has('P')).toBe(false);
    });

    it('purges a queue', async () => {
        const { dispatcher, flow } = setup(allTools);

        const message = await dispatcher.dispatch(toolCall('purge_queue', { connection_id: 'C' }));

        expect(contentOf(message)).toEqual({ originalCount: 3, droppedCount: 3, currentCount: 0, state: 'Completed successfully' });
        expect(flow.component('C').queued).toBe(0);
    });
});
