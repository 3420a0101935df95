#!/usr/bin/env node

import chalk from 'chalk';
import { OperatorConsole } from './cli/console.js';
import { config, validateConfig } from './config/environment.js';
import { errorMessage } from './errors.js';
import { createConsoleLogger } from './logging/logger.js';
import { NiFiClient } from './nifi/client.js';
import { RemediationController } from './remediation/controller.js';
import { FlowOperations } from './tools/operations.js';
import { HierarchyTraversalEngine } from './traversal/engine.js';

async function main(): Promise<void> {
    console.log(chalk.gray('\n🔧 NiFi Steward starting...\n'));

    validateConfig();

    const logger = createConsoleLogger({ level: config.logLevel });
    const client = new NiFiClient({ ...config.nifi, logger });
    const controller = new RemediationController(client, {
        settings: {
            ...config.remediation,
            jobPollIntervalMs: config.jobs.pollIntervalMs,
            jobTimeoutMs: config.jobs.timeoutMs,
        },
        logger,
    });
    const engine = new HierarchyTraversalEngine(client, { concurrency: config.traversal.concurrency, logger });
    const operations = new FlowOperations({
        client,
        controller,
        engine,
        jobs: config.jobs,
        traversal: { maxDepth: config.traversal.maxDepth, timeoutSeconds: config.traversal.timeoutSeconds },
        logger,
    });

    try {
        console.log(chalk.blue('🔌 Connecting to NiFi...'));
        await client.authenticate();
        const about = await client.getAbout();
        console.log(chalk.green(`✓ Connected to ${about.title} v${about.version}\n`));

        await new OperatorConsole(operations).start('NiFi Steward - Flow Maintenance Console');
    } catch (error) {
        console.error(chalk.red(`\n❌ Fatal error: ${errorMessage(error)}\n`));
        process.exit(1);
    }
}

void main();
