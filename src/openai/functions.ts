import { ChatCompletionTool } from 'openai/resources/chat/completions';

// Function definitions for the flow maintenance tools

export const stewardTools: ChatCompletionTool[] = [
    {
        type: 'function',
        function: {
            name: 'mutate_component',
            description: 'Update, delete, start or stop a NiFi component. Conflicts such as a running component, dependent connections, a non-empty queue or a stale revision are cleared automatically and the actions taken are reported.',
            parameters: {
                type: 'object',
                properties: {
                    type: {
                        type: 'string',
                        enum: ['group', 'processor', 'connection', 'port'],
                        description: 'The kind of component to change',
                    },
                    id: {
                        type: 'string',
                        description: 'Component UUID',
                    },
                    action: {
                        type: 'string',
                        enum: ['update', 'delete', 'start', 'stop'],
                        description: 'What to do with the component',
                    },
                    revision: {
                        type: 'integer',
                        description: 'Revision version the change is based on. Omit to use the current one.',
                    },
                    payload: {
                        type: 'object',
                        description: 'Component fields to set for an update (e.g., name, config)',
                    },
                },
                required: ['type', 'id', 'action'],
            },
        },
    },
    {
        type: 'function',
        function: {
            name: 'list_hierarchy',
            description: 'List processors, connections, ports or child groups across a process group tree. When the result is not complete, call again with the returned continuation_token to continue where it stopped.',
            parameters: {
                type: 'object',
                properties: {
                    root_group_id: {
                        type: 'string',
                        description: 'Process group to start from ("root" for the top-level group)',
                    },
                    kind: {
                        type: 'string',
                        enum: ['processors', 'connections', 'ports', 'groups'],
                        description: 'What to list in each group',
                    },
                    max_depth: {
                        type: 'integer',
                        description: 'How many levels below the root group to descend (default 3)',
                    },
                    timeout_seconds: {
                        type: 'number',
                        description: 'Time budget for this call in seconds',
                    },
                    continuation_token: {
                        type: 'string',
                        description: 'Token from a previous incomplete call',
                    },
                },
                required: ['root_group_id', 'kind'],
            },
        },
    },
    {
        type: 'function',
        function: {
            name: 'purge_queue',
            description: 'Drop every FlowFile queued on a connection and report how many were removed.',
            parameters: {
                type: 'object',
                properties: {
                    connection_id: { type: 'string', description: 'Connection UUID' },
                },
                required: ['connection_id'],
            },
        },
    },
    {
        type: 'function',
        function: {
            name: 'list_queue',
            description: 'List the FlowFiles waiting in a connection queue.',
            parameters: {
                type: 'object',
                properties: {
                    connection_id: { type: 'string', description: 'Connection UUID' },
                },
                required: ['connection_id'],
            },
        },
    },
    {
        type: 'function',
        function: {
            name: 'query_provenance',
            description: 'Fetch recent provenance events recorded for a component.',
            parameters: {
                type: 'object',
                properties: {
                    component_id: { type: 'string', description: 'Processor or port UUID' },
                    max_results: { type: 'integer', description: 'Maximum number of events (default 100)' },
                },
                required: ['component_id'],
            },
        },
    },
];
