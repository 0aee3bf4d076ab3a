#!/usr/bin/env node
/**
 * CLI Entry Point for matrix-runner
 */

import * as path from 'path';
import { CACHE } from './config';
import { createLogger } from './logger';
import { CacheStore } from './cache_store';
import { CacheKeyResolver, GitRemoteLookup } from './cache_key_resolver';
import { ShellCommandRunner } from './command_runner';
import {
    AptSystemPackageInstaller,
    CondaPackageManager,
    EnvironmentProvisioner,
} from './environment_provisioner';
import { JobRunner } from './job_runner';
import { MatrixScheduler, expandMatrix } from './matrix_scheduler';
import { buildReport, exitCodeFor, renderSummary, writeReport } from './run_report';
import { StepPipeline } from './step_pipeline';
import { ConfigurationError, errorMessage } from './structured_error';
import { PytestRunner } from './test_runner';
import { loadWorkflow } from './workflow_config';

const log = createLogger('cli');

/** Value following `flag`; null when the flag is absent, '' when it has no value. */
function flagValue(args: string[], flag: string): string | null {
    const i = args.indexOf(flag);
    if (i === -1) return null;
    const value = args[i + 1];
    return value === undefined || value.startsWith('--') ? '' : value;
}

function positiveInt(raw: string, flag: string): number {
    const n = Number(raw);
    if (!Number.isInteger(n) || n <= 0) {
        throw new ConfigurationError(`${flag} expects a positive integer, got "${raw}"`);
    }
    return n;
}

class MatrixRunnerCLI {
    async run(args: string[]): Promise<void> {
        const command = args[2] || 'help';
        const rest = args.slice(3);

        switch (command) {
            case 'run':
                await this.runWorkflow(rest);
                break;
            case 'expand':
                this.runExpand(rest);
                break;
            case 'cache':
                this.runCache(rest);
                break;
            case 'help':
            case '--help':
                this.showHelp();
                break;
            default:
                console.error(`Error: Unknown command: ${command}`);
                this.showHelp();
                process.exitCode = 2;
        }
    }

    private workflowPath(args: string[], usage: string): string | null {
        const file = args[0];
        if (!file || file.startsWith('--')) {
            console.error('Error: workflow file required');
            console.error(`Usage: ${usage}`);
            process.exitCode = 2;
            return null;
        }
        return file;
    }

    private async runWorkflow(args: string[]): Promise<void> {
        const file = this.workflowPath(args, 'matrix-runner run <workflow.json> [--concurrency N] [--no-fail-fast] [--report file] [--cache-db file] [--json]');
        if (!file) return;

        const workflow = loadWorkflow(file);

        const concurrencyRaw = flagValue(args, '--concurrency');
        const concurrency = concurrencyRaw === null ? workflow.concurrency : positiveInt(concurrencyRaw, '--concurrency');
        const failFast = args.includes('--no-fail-fast') ? false : workflow.failFast;
        const reportPath = flagValue(args, '--report');
        const cacheDb = flagValue(args, '--cache-db') || CACHE.DB_PATH;
        const asJson = args.includes('--json');

        if (reportPath === '') {
            throw new ConfigurationError('--report requires a file path');
        }

        const shell = new ShellCommandRunner();
        const cacheStore = new CacheStore(cacheDb);

        try {
            const runner = new JobRunner({
                resolver: new CacheKeyResolver(new GitRemoteLookup()),
                cacheStore,
                provisioner: new EnvironmentProvisioner({
                    packageManager: new CondaPackageManager(shell),
                    systemPackages: new AptSystemPackageInstaller(shell),
                    runtime: workflow.runtime,
                    workDir: workflow.workDir,
                }),
                pipeline: new StepPipeline({ commandRunner: shell, testRunner: new PytestRunner(shell) }),
                template: workflow.template,
            });

            const scheduler = new MatrixScheduler(runner, {
                concurrency,
                failFast,
                labelTemplate: workflow.labelTemplate,
                name: workflow.name,
            });

            const result = await scheduler.run(workflow.axes);

            if (reportPath) {
                writeReport(path.resolve(reportPath), result);
            }
            console.log(asJson ? JSON.stringify(buildReport(result), null, 2) : renderSummary(result));
            process.exitCode = exitCodeFor(result);
        } finally {
            cacheStore.close();
        }
    }

    private runExpand(args: string[]): void {
        const file = this.workflowPath(args, 'matrix-runner expand <workflow.json> [--json]');
        if (!file) return;

        const workflow = loadWorkflow(file);
        const jobs = expandMatrix(workflow.axes, workflow.labelTemplate);

        if (args.includes('--json')) {
            console.log(JSON.stringify(jobs, null, 2));
            return;
        }
        for (const job of jobs) {
            console.log(`${job.id.padEnd(8)} ${job.label}`);
        }
        console.log(`${jobs.length} jobs`);
    }

    private runCache(args: string[]): void {
        const sub = args[0];
        const cacheDb = flagValue(args, '--cache-db') || CACHE.DB_PATH;

        if (sub !== 'list' && sub !== 'prune') {
            console.error('Usage: matrix-runner cache list|prune [--days N] [--cache-db file]');
            process.exitCode = 2;
            return;
        }

        const store = new CacheStore(cacheDb);
        if (!store.available) {
            console.error(`Error: cache store unavailable: ${cacheDb}`);
            process.exitCode = 1;
            return;
        }

        try {
            if (sub === 'list') {
                const entries = store.list(flagValue(args, '--namespace') || undefined);
                for (const e of entries) {
                    const restored = e.lastRestoredAt ? e.lastRestoredAt.toISOString() : 'never';
                    console.log(`${e.key}  files=${e.fileCount} bytes=${e.sizeBytes} created=${e.createdAt.toISOString()} restored=${restored}`);
                }
                console.log(`${entries.length} entries`);
                return;
            }

            const daysRaw = flagValue(args, '--days');
            const days = daysRaw === null ? CACHE.PRUNE_DAYS : positiveInt(daysRaw, '--days');
            const removed = store.prune(days);
            console.log(`Pruned ${removed} entries older than ${days} days`);
        } finally {
            store.close();
        }
    }

    private showHelp(): void {
        console.log(`
matrix-runner - run a test pipeline across a matrix of runtime and dependency versions

USAGE:
  matrix-runner <command> [options]

COMMANDS:
  run <workflow.json>      Expand the matrix and run every job
      --concurrency N      Jobs in parallel (default: workflow value, else all)
      --no-fail-fast       Keep running the other jobs after a failure
      --report <file>      Write the JSON run report
      --cache-db <file>    Cache database (default: ${CACHE.DB_PATH})
      --json               Print the JSON report instead of the summary
  expand <workflow.json>   List the jobs the matrix expands to
  cache list               List cache entries [--namespace P]
  cache prune              Delete entries unused for N days [--days N]
  help                     Show this help

ENVIRONMENT:
  MATRIX_LOG_LEVEL, MATRIX_LOG_JSON, MATRIX_LOG_FILE, MATRIX_DEBUG,
  MATRIX_CACHE_DB, MATRIX_SANDBOX_ROOT, MATRIX_STEP_TIMEOUT, MATRIX_PROVISION_TIMEOUT

EXAMPLES:
  matrix-runner expand workflows/weekly-io-matrix.json
  matrix-runner run workflows/weekly-io-matrix.json --concurrency 2 --report out/report.json
  matrix-runner cache prune --days 14
`);
    }
}

// Run CLI
if (require.main === module) {
    const cli = new MatrixRunnerCLI();
    cli.run(process.argv).catch((err: unknown) => {
        if (err instanceof ConfigurationError) {
            console.error(`Error: ${err.message}`);
            process.exitCode = 2;
            return;
        }
        log.error(`Fatal error: ${errorMessage(err)}`);
        process.exitCode = 1;
    });
}

export { MatrixRunnerCLI };
