/**
 * Matrix Scheduler
 *
 * Expands an AxisSet into JobSpecs and runs them through a bounded pool.
 * Under fail-fast, the first failed job aborts a shared signal: jobs in
 * flight stop at their next step boundary, jobs not yet started are
 * recorded as cancelled without being provisioned, finished jobs keep
 * their result.
 */

import * as crypto from 'crypto';
import { createLogger, setRunCorrelation, clearRunCorrelation } from './logger';
import { cancelledResult, type JobExecutor } from './job_runner';
import { averageCoverage } from './test_runner';
import { ConfigurationError, toStructuredError } from './structured_error';
import type { AxisSet, JobResult, JobSpec, RunResult } from './matrix_types';

const log = createLogger('scheduler');

/* -------------------------------------------------------------------------- */
/* Expansion                                                                  */
/* -------------------------------------------------------------------------- */

function compareValues(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

export function validateAxes(axes: AxisSet): void {
    if (axes.length === 0) {
        throw new ConfigurationError('Matrix declares no axes');
    }
    const seen = new Set<string>();
    for (const axis of axes) {
        if (!axis.name || axis.name.trim() === '') {
            throw new ConfigurationError('Axis with empty name');
        }
        if (seen.has(axis.name)) {
            throw new ConfigurationError(`Duplicate axis name: ${axis.name}`, { axis: axis.name });
        }
        seen.add(axis.name);
        if (axis.values.length === 0) {
            throw new ConfigurationError(`Axis "${axis.name}" has no values`, { axis: axis.name });
        }
        if (new Set(axis.values).size !== axis.values.length) {
            throw new ConfigurationError(`Axis "${axis.name}" repeats a value`, { axis: axis.name });
        }
    }
}

/**
 * `{axis}` placeholders are replaced by the job's value. Without a
 * template, the label is the values in axis order: "(a) (b) (c)".
 */
export function renderLabel(values: Readonly<Record<string, string>>, axes: AxisSet, template?: string): string {
    if (!template) {
        return axes.map((a) => `(${values[a.name]})`).join(' ');
    }
    return template.replace(/\{([^{}]+)\}/g, (match: string, name: string) => values[name] ?? match);
}

/**
 * Cartesian product in axis declaration order; within an axis, values in
 * lexicographic order. The last axis varies fastest.
 */
export function expandMatrix(axes: AxisSet, labelTemplate?: string): JobSpec[] {
    validateAxes(axes);

    const sortedAxes = axes.map((a) => ({ name: a.name, values: [...a.values].sort(compareValues) }));

    let combos: Array<Record<string, string>> = [{}];
    for (const axis of sortedAxes) {
        const next: Array<Record<string, string>> = [];
        for (const combo of combos) {
            for (const value of axis.values) {
                next.push({ ...combo, [axis.name]: value });
            }
        }
        combos = next;
    }

    return combos.map((values, index) =>
        Object.freeze({
            id: `job-${index}`,
            index,
            values: Object.freeze(values),
            label: renderLabel(values, axes, labelTemplate),
        })
    );
}

/* -------------------------------------------------------------------------- */
/* Scheduling                                                                 */
/* -------------------------------------------------------------------------- */

export interface SchedulerOptions {
    /** Parallel jobs; undefined or <= 0 means unbounded */
    concurrency?: number;
    failFast?: boolean;
    labelTemplate?: string;
    name?: string;
}

export class MatrixScheduler {
    constructor(private readonly executor: JobExecutor, private readonly opts: SchedulerOptions = {}) { }

    /** Throws ConfigurationError before any job starts when the axes are unusable. */
    async run(axes: AxisSet): Promise<RunResult> {
        const jobs = expandMatrix(axes, this.opts.labelTemplate);
        const failFast = this.opts.failFast ?? true;
        const limit = this.opts.concurrency && this.opts.concurrency > 0
            ? Math.min(this.opts.concurrency, jobs.length)
            : jobs.length;

        const runId = crypto.randomUUID();
        const startedAt = new Date();
        setRunCorrelation(runId);

        log.info(`Matrix: ${jobs.length} jobs across ${axes.length} axes (concurrency ${limit}, fail-fast ${failFast ? 'on' : 'off'})`);

        const controller = new AbortController();
        const results: Array<JobResult | undefined> = new Array(jobs.length);
        let nextIndex = 0;

        const worker = async (): Promise<void> => {
            while (nextIndex < jobs.length) {
                const job = jobs[nextIndex++];

                if (controller.signal.aborted) {
                    results[job.index] = cancelledResult(job, 'not started: another job failed');
                    continue;
                }

                const result = await this.runOne(job, controller.signal);
                results[job.index] = result;

                if (result.status === 'failed' && failFast && !controller.signal.aborted) {
                    log.warn(`Fail-fast: ${job.label} failed, cancelling remaining jobs`);
                    controller.abort(new Error(`fail-fast after ${job.label} failed`));
                }
            }
        };

        try {
            await Promise.all(Array.from({ length: limit }, () => worker()));
        } finally {
            clearRunCorrelation();
        }

        const jobResults = results.map((r, i) => r ?? cancelledResult(jobs[i], 'not scheduled'));
        const finishedAt = new Date();
        const status = jobResults.some((r) => r.status === 'failed') ? 'failed' : 'success';

        const summary = {
            success: jobResults.filter((r) => r.status === 'success').length,
            failed: jobResults.filter((r) => r.status === 'failed').length,
            cancelled: jobResults.filter((r) => r.status === 'cancelled').length,
        };
        log.info(`Run ${status}`, summary);

        return {
            runId,
            name: this.opts.name ?? 'matrix',
            status,
            jobs: jobResults,
            startedAt: startedAt.toISOString(),
            finishedAt: finishedAt.toISOString(),
            durationMs: finishedAt.getTime() - startedAt.getTime(),
            coverage: averageCoverage(jobResults.map((r) => r.coverage)),
        };
    }

    /** An executor that throws must not take the other jobs down with it. */
    private async runOne(job: JobSpec, signal: AbortSignal): Promise<JobResult> {
        const started = Date.now();
        try {
            return await this.executor.run(job, signal);
        } catch (e) {
            log.error(`Job crashed: ${job.label}`, { error: String(e) });
            return {
                job,
                status: 'failed',
                steps: [],
                cache: null,
                error: toStructuredError(e),
                durationMs: Date.now() - started,
            };
        }
    }
}
