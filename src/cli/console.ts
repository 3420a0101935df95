import readlineSync from 'readline-sync';
import chalk from 'chalk';
import { errorMessage } from '../errors.js';
import type { MutationResult } from '../remediation/types.js';
import { ListHierarchyRequest, FlowOperations } from '../tools/operations.js';
import type { TraversalResult } from '../traversal/engine.js';
import { ConsoleCommand, helpText, parseCommand } from './commands.js';

export class OperatorConsole {
    private operations: FlowOperations;
    private lastListing: ListHierarchyRequest | null = null;

    constructor(operations: FlowOperations) {
        this.operations = operations;
    }

    async start(banner: string): Promise<void> {
        console.log(chalk.cyan('═'.repeat(60)));
        console.log(chalk.cyan.bold(`  ${banner}`));
        console.log(chalk.cyan('═'.repeat(60)));
        console.log(chalk.gray('\nType "help" for commands, "exit" to quit.\n'));

        while (true) {
            const command = parseCommand(readlineSync.question(chalk.yellow('steward> ')));
            if (command.name === 'exit') {
                console.log(chalk.gray('\nGoodbye!'));
                break;
            }
            try {
                await this.execute(command);
            } catch (error) {
                console.log(chalk.red(`\nError: ${errorMessage(error)}\n`));
            }
        }
    }

    async execute(command: ConsoleCommand): Promise<void> {
        switch (command.name) {
            case 'empty':
            case 'exit':
                return;
            case 'help':
                for (const line of helpText) {
                    console.log(chalk.gray(`  ${line}`));
                }
                return;
            case 'invalid':
                console.log(chalk.yellow(command.message));
                return;
            case 'list':
                await this.list({ rootGroupId: command.rootGroupId, kind: command.kind, maxDepth: command.maxDepth });
                return;
            case 'more':
                if (!this.lastListing?.continuationToken) {
                    console.log(chalk.yellow('Nothing to continue. Run "list" first.'));
                    return;
                }
                await this.list(this.lastListing);
                return;
            case 'mutate':
                this.printMutation(await this.operations.mutateWithRemediation(command.request));
                return;
            case 'purge': {
                const summary = await this.operations.purgeQueue(command.connectionId);
                console.log(chalk.green(`✓ Dropped ${summary.droppedCount} of ${summary.originalCount} FlowFiles (${summary.state})`));
                return;
            }
            case 'queue': {
                const flowFiles = await this.operations.listQueue(command.connectionId);
                console.log(chalk.white(`\n${flowFiles.length} FlowFile(s) queued:`));
                for (const flowFile of flowFiles) {
                    console.log(chalk.gray(`  • ${flowFile.uuid} ${flowFile.filename ?? ''} ${flowFile.size ?? '?'} bytes`));
                }
                return;
            }
            case 'provenance': {
                const events = await this.operations.queryProvenance(command.componentId, command.maxResults);
                console.log(chalk.white(`\n${events.length} provenance event(s):`));
                for (const event of events) {
                    console.log(chalk.gray(`  • ${event.eventTime ?? ''} ${event.eventType ?? ''} ${event.flowFileUuid ?? ''}`));
                }
                return;
            }
        }
    }

    private async list(request: ListHierarchyRequest): Promise<void> {
        const result = await this.operations.listHierarchy(request);
        const resumable = result.terminalState === 'TIMED_OUT' || result.terminalState === 'INCOMPLETE';
        this.lastListing = { ...request, continuationToken: resumable ? result.continuationToken : null };
        this.printListing(result);
    }

    private printListing(result: TraversalResult): void {
        for (const listing of result.results) {
            const indent = '  '.repeat(listing.depth);
            const label = listing.groupName ? `${listing.groupName} (${listing.groupId})` : listing.groupId;
            if (listing.incomplete) {
                console.log(chalk.red(`${indent}✗ ${label}: ${listing.error}`));
                continue;
            }
            console.log(chalk.white(`${indent}▸ ${label}`));
            for (const node of listing.objects) {
                console.log(chalk.gray(`${indent}  • ${node.name ?? node.id} [${node.state}]`));
            }
        }

        const summary = `${result.processedCount} group(s) listed, ${result.terminalState}`;
        if (result.completed) {
            console.log(chalk.green(`\n✓ ${summary}\n`));
        } else if (result.terminalState === 'DEPTH_EXHAUSTED') {
            console.log(chalk.yellow(`\n… ${summary}. Deeper groups were not listed; raise maxDepth to include them.\n`));
        } else if (result.continuationToken) {
            console.log(chalk.yellow(`\n… ${summary}. Type "more" to continue.\n`));
        } else {
            console.log(chalk.yellow(`\n… ${summary}\n`));
        }
    }

    private printMutation(result: MutationResult): void {
        for (const action of result.remediationLog) {
            const mark = action.outcome === 'succeeded' ? chalk.green('✓') : chalk.red('✗');
            console.log(`  ${mark} ${action.action} ${action.targetId}${action.detail ? chalk.gray(` (${action.detail})`) : ''}`);
        }
        const { type, id, action } = result.request;
        if (result.status === 'SUCCEEDED') {
            console.log(chalk.green(`✓ ${action} ${type} ${id} succeeded\n`));
        } else {
            console.log(chalk.red(`✗ ${action} ${type} ${id}: ${result.status}${result.reason ? ` (${result.reason})` : ''}`));
            if (result.error) {
                console.log(chalk.gray(`  ${result.error.status} ${result.error.message}\n`));
            }
        }
    }
}
