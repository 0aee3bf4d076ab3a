/**
 * Run Report — structured JSON, a text summary, and the process exit code.
 */

import { atomicWriteJsonSync } from './atomic_write';
import { createLogger } from './logger';
import type { CoverageSummary, JobResult, RunResult, StepStatus } from './matrix_types';
import type { StructuredError } from './structured_error';

const log = createLogger('report');

export const REPORT_SCHEMA_VERSION = 'matrix-run-report-v1';

export interface StepReport {
    name: string;
    status: StepStatus;
    exit_code: number | null;
    duration_ms: number;
    coverage_percent?: number;
    error?: StructuredError;
}

export interface JobReport {
    id: string;
    label: string;
    values: Record<string, string>;
    status: JobResult['status'];
    duration_ms: number;
    cache: {
        key: string | null;
        hit: 'exact' | 'prefix' | 'miss' | 'disabled';
        restored_key?: string;
        stale: boolean;
        save?: string;
    };
    steps: StepReport[];
    coverage_percent?: number;
    error?: StructuredError;
}

export interface RunReport {
    schema_version: typeof REPORT_SCHEMA_VERSION;
    run_id: string;
    name: string;
    status: RunResult['status'];
    exit_code: number;
    started_at: string;
    finished_at: string;
    duration_ms: number;
    totals: { jobs: number; success: number; failed: number; cancelled: number };
    coverage?: CoverageSummary;
    jobs: JobReport[];
}

export function exitCodeFor(run: RunResult): number {
    return run.status === 'success' ? 0 : 1;
}

function jobReport(job: JobResult): JobReport {
    const cache: JobReport['cache'] = job.cache
        ? {
            key: job.cache.key?.key ?? null,
            hit: job.cache.restore.hit,
            restored_key: job.cache.restore.key,
            stale: job.cache.restore.stale,
            save: job.cache.save
                ? job.cache.save.outcome + (job.cache.save.reason ? `:${job.cache.save.reason}` : '')
                : undefined,
        }
        : { key: null, hit: 'disabled', stale: false };

    return {
        id: job.job.id,
        label: job.job.label,
        values: { ...job.job.values },
        status: job.status,
        duration_ms: job.durationMs,
        cache,
        steps: job.steps.map((s) => ({
            name: s.name,
            status: s.status,
            exit_code: s.exitCode,
            duration_ms: s.durationMs,
            coverage_percent: s.coverage?.percent,
            error: s.error,
        })),
        coverage_percent: job.coverage?.percent,
        error: job.error,
    };
}

export function buildReport(run: RunResult): RunReport {
    return {
        schema_version: REPORT_SCHEMA_VERSION,
        run_id: run.runId,
        name: run.name,
        status: run.status,
        exit_code: exitCodeFor(run),
        started_at: run.startedAt,
        finished_at: run.finishedAt,
        duration_ms: run.durationMs,
        totals: {
            jobs: run.jobs.length,
            success: run.jobs.filter((j) => j.status === 'success').length,
            failed: run.jobs.filter((j) => j.status === 'failed').length,
            cancelled: run.jobs.filter((j) => j.status === 'cancelled').length,
        },
        coverage: run.coverage,
        jobs: run.jobs.map(jobReport),
    };
}

const STATUS_MARK: Record<JobResult['status'], string> = {
    success: 'PASS',
    failed: 'FAIL',
    cancelled: 'CANC',
};

/**
 * Human summary: one line per job, failed jobs name the failing step and
 * reason, then a totals line.
 */
export function renderSummary(run: RunResult): string {
    const lines: string[] = [`${run.name}: ${run.status.toUpperCase()}`];

    for (const job of run.jobs) {
        const secs = (job.durationMs / 1000).toFixed(1);
        const hit = job.cache ? ` cache=${job.cache.restore.hit}` : '';
        lines.push(`  [${STATUS_MARK[job.status]}] ${job.job.label} (${secs}s)${hit}`);

        if (job.status === 'failed') {
            const failed = job.steps.find((s) => s.status === 'failed');
            const where = failed ? `step "${failed.name}"` : 'setup';
            lines.push(`         ${where}: ${job.error?.message ?? 'unknown error'}`);
        }
    }

    const report = buildReport(run);
    const { totals } = report;
    let totalsLine = `  ${totals.jobs} jobs: ${totals.success} passed, ${totals.failed} failed, ${totals.cancelled} cancelled`;
    if (run.coverage) totalsLine += `; coverage ${run.coverage.percent}%`;
    lines.push(totalsLine);

    return lines.join('\n');
}

export function writeReport(filePath: string, run: RunResult): void {
    const warnings: string[] = [];
    atomicWriteJsonSync({
        filePath,
        data: buildReport(run),
        mode: 0o644,
        fsyncMode: 'BEST_EFFORT',
        warnings,
    });
    for (const w of warnings) log.warn(w);
    log.info(`Report written to ${filePath}`);
}
