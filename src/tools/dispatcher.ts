import type { ChatCompletionMessageToolCall, ChatCompletionTool, ChatCompletionToolMessageParam } from 'openai/resources/chat/completions';
import { z } from 'zod';
import { errorMessage } from '../errors.js';
import { Logger, silentLogger } from '../logging/logger.js';
import { stewardTools } from '../openai/functions.js';
import { FlowOperations } from './operations.js';

const toolArguments = {
    mutate_component: z.object({
        type: z.enum(['group', 'processor', 'connection', 'port']),
        id: z.string().min(1),
        action: z.enum(['update', 'delete', 'start', 'stop']),
        revision: z.number().int().min(0).optional(),
        payload: z.record(z.unknown()).optional(),
    }),
    list_hierarchy: z.object({
        root_group_id: z.string().min(1),
        kind: z.enum(['processors', 'connections', 'ports', 'groups']),
        max_depth: z.number().int().min(0).optional(),
        timeout_seconds: z.number().positive().optional(),
        continuation_token: z.string().min(1).optional(),
    }),
    purge_queue: z.object({ connection_id: z.string().min(1) }),
    list_queue: z.object({ connection_id: z.string().min(1) }),
    query_provenance: z.object({
        component_id: z.string().min(1),
        max_results: z.number().int().positive().default(100),
    }),
};

export type ToolName = keyof typeof toolArguments;

export const readOnlyTools: ReadonlySet<ToolName> = new Set<ToolName>(['list_hierarchy', 'list_queue', 'query_provenance']);

export const allTools: ReadonlySet<ToolName> = new Set<ToolName>([...readOnlyTools, 'mutate_component', 'purge_queue']);

function isToolName(name: string): name is ToolName {
    return Object.hasOwn(toolArguments, name);
}

function parseArguments(raw: string): unknown {
    try {
        return JSON.parse(raw);
    } catch (error) {
        throw new Error(`Tool arguments are not valid JSON: ${errorMessage(error)}`);
    }
}

export interface ToolDispatcherOptions {
    operations: FlowOperations;
    /** Tools the caller may run; anything else is refused. */
    capabilities: ReadonlySet<ToolName>;
    logger?: Logger;
}

/**
 * Turns model tool calls into flow operations. Failures become tool
 * messages so the conversation can carry on.
 */
export class ToolDispatcher {
    private operations: FlowOperations;
    private capabilities: ReadonlySet<ToolName>;
    private logger: Logger;

    constructor(options: ToolDispatcherOptions) {
        this.operations = options.operations;
        this.capabilities = options.capabilities;
        this.logger = (options.logger ?? silentLogger).child({ component: 'tools' });
    }

    /** Tool definitions to offer the model, limited to the enabled capabilities. */
    definitions(): ChatCompletionTool[] {
        return stewardTools.filter((tool) => isToolName(tool.function.name) && this.capabilities.has(tool.function.name));
    }

    async dispatch(toolCall: ChatCompletionMessageToolCall): Promise<ChatCompletionToolMessageParam> {
        const name = toolCall.function.name;
        let content: unknown;
        try {
            if (!isToolName(name)) {
                throw new Error(`Unknown tool: ${name}`);
            }
            if (!this.capabilities.has(name)) {
                throw new Error(`Tool ${name} is not enabled`);
            }
            this.logger.debug(`Running tool ${name}`, { callId: toolCall.id });
            content = await this.run(name, parseArguments(toolCall.function.arguments));
        } catch (error) {
            this.logger.warn(`Tool ${name} failed`, { error: errorMessage(error) });
            content = { error: errorMessage(error) };
        }
        return {
            role: 'tool',
            tool_call_id: toolCall.id,
            content: JSON.stringify(content),
        };
    }

    private async run(name: ToolName, args: unknown): Promise<unknown> {
        switch (name) {
            case 'mutate_component': {
                const request = toolArguments.mutate_component.parse(args);
                const { status, remediationLog, attempt, result, error, reason } = await this.operations.mutateWithRemediation(request);
                return { status, remediationLog, attempt, result, error, reason };
            }
            case 'list_hierarchy': {
                const parsed = toolArguments.list_hierarchy.parse(args);
                return this.operations.listHierarchy({
                    rootGroupId: parsed.root_group_id,
                    kind: parsed.kind,
                    maxDepth: parsed.max_depth,
                    timeoutSeconds: parsed.timeout_seconds,
                    continuationToken: parsed.continuation_token,
                });
            }
            case 'purge_queue':
                return this.operations.purgeQueue(toolArguments.purge_queue.parse(args).connection_id);
            case 'list_queue':
                return this.operations.listQueue(toolArguments.list_queue.parse(args).connection_id);
            case 'query_provenance': {
                const parsed = toolArguments.query_provenance.parse(args);
                return this.operations.queryProvenance(parsed.component_id, parsed.max_results);
            }
        }
    }
}
