/**
 * Step Pipeline — strictly sequential execution of one job's steps.
 *
 * Per step, in order: cancellation check, skip predicate, execution inside
 * the job's Environment, fatal/non-fatal failure policy. A fatal failure
 * stops the pipeline before the next step; a non-fatal failure is recorded
 * and the pipeline carries on, ending `failed` overall.
 */

import * as path from 'path';
import { createLogger, type Logger } from './logger';
import { TIMEOUTS } from './config';
import { commandSucceeded, describeCommandFailure, type CommandRunner } from './command_runner';
import type { TestRunner } from './test_runner';
import {
    StepExecutionError,
    TimeoutError,
    createStructuredError,
    errorMessage,
    toStructuredError,
    type StructuredError,
} from './structured_error';
import type {
    Environment,
    JobCacheState,
    JobSpec,
    PipelineResult,
    PipelineState,
    Step,
    StepResult,
} from './matrix_types';

export interface StepPipelineDeps {
    commandRunner: CommandRunner;
    testRunner: TestRunner;
    defaultTimeoutMs?: number;
}

export interface PipelineContext {
    job: JobSpec;
    cache: JobCacheState;
    /** Aborted by the scheduler under fail-fast; checked at step boundaries */
    signal?: AbortSignal;
    logger?: Logger;
}

function outputTail(text: string, lines = 20): string | undefined {
    const trimmed = text.trimEnd();
    if (!trimmed) return undefined;
    return trimmed.split('\n').slice(-lines).join('\n');
}

export class StepPipeline {
    private readonly defaultTimeoutMs: number;

    constructor(private readonly deps: StepPipelineDeps) {
        this.defaultTimeoutMs = deps.defaultTimeoutMs ?? TIMEOUTS.STEP_MS;
    }

    async run(steps: readonly Step[], env: Environment, ctx: PipelineContext): Promise<PipelineResult> {
        const log = (ctx.logger ?? createLogger('pipeline')).withContext({ job: ctx.job.label });
        const results: StepResult[] = [];
        let anyFailed = false;

        for (let i = 0; i < steps.length; i++) {
            const step = steps[i];
            const stepLog = log.withContext({ step: step.name });

            if (ctx.signal?.aborted) {
                stepLog.info(`Cancelled before step ${i + 1}/${steps.length}`);
                // a step that already failed outranks the cancellation
                return { status: anyFailed ? 'failed' : 'cancelled', results };
            }

            const state: PipelineState = { job: ctx.job, environment: env, cache: ctx.cache, results: [...results] };

            let skip = false;
            try {
                skip = step.skipIf ? step.skipIf(state) : false;
            } catch (e) {
                const result: StepResult = {
                    name: step.name,
                    status: 'failed',
                    exitCode: null,
                    durationMs: 0,
                    error: createStructuredError('INTERNAL_ERROR', `skipIf threw: ${errorMessage(e)}`, { step: step.name }),
                };
                results.push(result);
                anyFailed = true;
                if (!step.continueOnFailure) {
                    stepLog.error('Skip condition failed; stopping pipeline');
                    return { status: 'failed', results };
                }
                continue;
            }

            if (skip) {
                stepLog.info(`[${i + 1}/${steps.length}] skipped`);
                results.push({ name: step.name, status: 'skipped', exitCode: null, durationMs: 0 });
                continue;
            }

            stepLog.info(`[${i + 1}/${steps.length}] running`);
            const result = await this.execute(step, env);
            results.push(result);

            if (result.status === 'failed') {
                anyFailed = true;
                if (!step.continueOnFailure) {
                    stepLog.error(`Step failed; stopping pipeline: ${result.error?.message ?? 'unknown error'}`);
                    return { status: 'failed', results };
                }
                stepLog.warn(`Step failed (continueOnFailure): ${result.error?.message ?? 'unknown error'}`);
            } else {
                stepLog.info(`Step succeeded in ${result.durationMs}ms`);
            }
        }

        return { status: anyFailed ? 'failed' : 'success', results };
    }

    private async execute(step: Step, env: Environment): Promise<StepResult> {
        const started = Date.now();
        const timeoutMs = step.timeoutMs ?? this.defaultTimeoutMs;
        const cwd = step.kind === 'command' && step.workingDir ? path.resolve(env.workDir, step.workingDir) : env.workDir;

        try {
            if (step.kind === 'test') {
                const res = await this.deps.testRunner.run(step.paths, env, {
                    coverageTarget: step.coverageTarget,
                    env: step.env ?? {},
                    cwd,
                    timeoutMs,
                });
                const durationMs = Date.now() - started;
                return {
                    name: step.name,
                    status: res.passed ? 'success' : 'failed',
                    exitCode: res.exitCode,
                    durationMs,
                    coverage: res.coverage,
                    output: outputTail(res.output),
                    error: res.passed
                        ? undefined
                        : toStructuredError(new StepExecutionError(`Tests failed: ${res.failure ?? 'unknown'}`, step.name, res.exitCode ?? -1)),
                };
            }

            const res = await this.deps.commandRunner.run(step.command, {
                cwd,
                env: { ...env.vars, ...(step.env ?? {}) },
                timeoutMs,
            });
            const durationMs = Date.now() - started;
            const ok = commandSucceeded(res);
            let error: StructuredError | undefined;
            if (!ok) {
                error = res.timedOut
                    ? toStructuredError(new TimeoutError(`Step "${step.name}"`, timeoutMs))
                    : toStructuredError(new StepExecutionError(
                        `Step "${step.name}" failed: ${describeCommandFailure(res)}`,
                        step.name,
                        res.exitCode ?? -1
                    ));
            }
            return {
                name: step.name,
                status: ok ? 'success' : 'failed',
                exitCode: res.exitCode,
                durationMs,
                output: outputTail(`${res.stdout}${res.stderr}`),
                error,
            };
        } catch (e) {
            return {
                name: step.name,
                status: 'failed',
                exitCode: null,
                durationMs: Date.now() - started,
                error: toStructuredError(new StepExecutionError(`Step "${step.name}" errored: ${errorMessage(e)}`, step.name, -1, e)),
            };
        }
    }
}
