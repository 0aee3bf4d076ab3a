/**
 * Job Runner — one matrix combination, start to finish:
 *
 *   resolve corpus key -> restore cache -> provision -> pipeline -> save cache
 *
 * Cache trouble never fails a job. Provisioning and fatal step failures do.
 * Cancellation is honoured before provisioning and at every step boundary.
 */

import * as os from 'os';
import * as path from 'path';
import { createLogger, type Logger } from './logger';
import { RETRIES } from './config';
import type { CacheKeyResolver } from './cache_key_resolver';
import type { CacheStore } from './cache_store';
import type { EnvironmentProvisioner } from './environment_provisioner';
import type { StepPipeline } from './step_pipeline';
import { mergeCoverage } from './test_runner';
import {
    CancelledError,
    RemoteLookupError,
    errorMessage,
    toStructuredError,
} from './structured_error';
import type {
    CacheKey,
    DependencyPolicy,
    Environment,
    JobCacheState,
    JobResult,
    JobSpec,
    PipelineResult,
    RestoreResult,
    Step,
} from './matrix_types';

/* -------------------------------------------------------------------------- */
/* Job template                                                               */
/* -------------------------------------------------------------------------- */

export type CacheSavePolicy = 'success' | 'always' | 'never';

export interface CorpusCacheConfig {
    /** Corpus repository whose head reference keys the cache */
    url: string;
    /** Local directory; `{job}` and `{<axis>}` tokens are substituted, `~` is expanded */
    path: string;
    purpose: string;
    /** Axis holding the platform identifier; falls back to the host platform */
    platformAxis?: string;
    save: CacheSavePolicy;
}

export interface ProvisionTemplate {
    runtimeAxis: string;
    /** package name -> axis supplying its version */
    packageAxes: Record<string, string>;
    /** Fixed pins applied to every job; empty version means "any" */
    packages: Record<string, string>;
    systemPackages: string[];
    policy: DependencyPolicy;
}

export interface JobTemplate {
    corpus?: CorpusCacheConfig;
    provision: ProvisionTemplate;
    steps: Step[];
}

/** What the scheduler needs from a job executor. */
export interface JobExecutor {
    run(job: JobSpec, signal: AbortSignal): Promise<JobResult>;
}

export interface JobRunnerDeps {
    resolver: CacheKeyResolver;
    cacheStore: CacheStore;
    provisioner: EnvironmentProvisioner;
    pipeline: StepPipeline;
    template: JobTemplate;
    lookupAttempts?: number;
    lookupBackoffMs?: number;
    logger?: Logger;
}

/* -------------------------------------------------------------------------- */
/* Helpers                                                                    */
/* -------------------------------------------------------------------------- */

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function resolveCorpusPath(template: string, job: JobSpec): string {
    let out = template.replace(/\{job\}/g, job.id);
    for (const [axis, value] of Object.entries(job.values)) {
        out = out.split(`{${axis}}`).join(value);
    }
    if (out === '~') return os.homedir();
    if (out.startsWith('~/')) return path.join(os.homedir(), out.slice(2));
    return path.resolve(out);
}

export function cancelledResult(job: JobSpec, reason: string, cache: JobCacheState | null = null, steps: JobResult['steps'] = [], durationMs = 0): JobResult {
    return {
        job,
        status: 'cancelled',
        steps,
        cache,
        error: toStructuredError(new CancelledError(reason)),
        durationMs,
    };
}

function abortReason(signal: AbortSignal): string {
    const reason: unknown = signal.reason;
    if (reason instanceof Error) return reason.message;
    return typeof reason === 'string' ? reason : 'run cancelled';
}

/* -------------------------------------------------------------------------- */
/* Runner                                                                     */
/* -------------------------------------------------------------------------- */

export class JobRunner implements JobExecutor {
    private readonly log: Logger;
    private readonly lookupAttempts: number;
    private readonly lookupBackoffMs: number;

    constructor(private readonly deps: JobRunnerDeps) {
        this.log = deps.logger ?? createLogger('job');
        this.lookupAttempts = Math.max(1, deps.lookupAttempts ?? RETRIES.REMOTE_LOOKUP_ATTEMPTS);
        this.lookupBackoffMs = deps.lookupBackoffMs ?? RETRIES.REMOTE_LOOKUP_BACKOFF_MS;
    }

    async run(job: JobSpec, signal: AbortSignal): Promise<JobResult> {
        const started = Date.now();
        const log = this.log.withContext({ job: job.label });
        const elapsed = () => Date.now() - started;

        if (signal.aborted) {
            return cancelledResult(job, abortReason(signal));
        }

        const { template } = this.deps;

        // ---- Cache restore (never fatal) ----
        const cache = await this.restoreCorpus(job, log);

        if (signal.aborted) {
            return cancelledResult(job, abortReason(signal), cache, [], elapsed());
        }

        // ---- Provision (fatal) ----
        let env: Environment;
        try {
            env = await this.deps.provisioner.provision({
                jobId: job.id,
                runtimeVersion: this.axisValue(job, template.provision.runtimeAxis),
                packages: this.packagesFor(job),
                systemPackages: template.provision.systemPackages,
                policy: template.provision.policy,
            });
        } catch (e) {
            log.error(`Provisioning failed: ${errorMessage(e)}`);
            return {
                job,
                status: 'failed',
                steps: [],
                cache,
                error: toStructuredError(e),
                durationMs: elapsed(),
            };
        }

        // ---- Pipeline ----
        let pipeline: PipelineResult;
        try {
            const jobEnv: Environment = {
                ...env,
                vars: {
                    ...env.vars,
                    MATRIX_JOB: job.label,
                    ...(cache ? { MATRIX_CORPUS_PATH: cache.restore.localPath, MATRIX_CACHE_HIT: cache.restore.hit } : {}),
                },
            };
            pipeline = await this.deps.pipeline.run(template.steps, jobEnv, {
                job,
                cache: cache ?? { key: null, restore: { hit: 'miss', localPath: '', stale: false } },
                signal,
                logger: log,
            });
        } finally {
            this.deps.provisioner.release(env);
        }

        // ---- Cache save (never fatal) ----
        if (cache && template.corpus) {
            cache.save = await this.saveCorpus(cache, template.corpus.save, pipeline, log);
        }

        const coverage = mergeCoverage(pipeline.results.map((r) => r.coverage));

        if (pipeline.status === 'cancelled') {
            return { ...cancelledResult(job, abortReason(signal), cache, pipeline.results, elapsed()), coverage };
        }

        const firstFailure = pipeline.results.find((r) => r.status === 'failed');
        return {
            job,
            status: pipeline.status,
            steps: pipeline.results,
            cache,
            error: firstFailure?.error,
            coverage,
            durationMs: elapsed(),
        };
    }

    private axisValue(job: JobSpec, axis: string): string {
        const value = job.values[axis];
        if (value === undefined) {
            throw new Error(`Job ${job.id} has no value for axis "${axis}"`);
        }
        return value;
    }

    private packagesFor(job: JobSpec): Record<string, string> {
        const { provision } = this.deps.template;
        const packages: Record<string, string> = { ...provision.packages };
        for (const [name, axis] of Object.entries(provision.packageAxes)) {
            packages[name] = this.axisValue(job, axis);
        }
        return packages;
    }

    private async restoreCorpus(job: JobSpec, log: Logger): Promise<JobCacheState | null> {
        const corpus = this.deps.template.corpus;
        if (!corpus) return null;

        const localPath = resolveCorpusPath(corpus.path, job);
        const platform = (corpus.platformAxis && job.values[corpus.platformAxis]) || process.platform;

        const key = await this.resolveKey(corpus.url, platform, corpus.purpose, log);
        if (!key) {
            return { key: null, restore: { hit: 'miss', localPath, stale: false } };
        }

        const restore: RestoreResult = await this.deps.cacheStore.restore(key, [key.prefix], localPath);
        return { key, restore };
    }

    /** Retries belong here, not in the resolver. Exhausted retries degrade to "no cache". */
    private async resolveKey(url: string, platform: string, purpose: string, log: Logger): Promise<CacheKey | null> {
        for (let attempt = 1; attempt <= this.lookupAttempts; attempt++) {
            try {
                return await this.deps.resolver.resolve(url, platform, purpose);
            } catch (e) {
                if (!(e instanceof RemoteLookupError)) throw e;
                log.warn(`Corpus lookup failed (attempt ${attempt}/${this.lookupAttempts}): ${e.message}`);
                if (attempt < this.lookupAttempts) {
                    await sleep(this.lookupBackoffMs * attempt);
                }
            }
        }
        log.warn('Corpus head unknown; continuing without cache');
        return null;
    }

    /**
     * Populate once per content identifier: an exact hit never re-saves, and
     * the store itself skips keys that already exist.
     */
    private async saveCorpus(
        cache: JobCacheState,
        policy: CacheSavePolicy,
        pipeline: PipelineResult,
        log: Logger
    ): Promise<JobCacheState['save']> {
        if (!cache.key || policy === 'never') return undefined;
        if (cache.restore.hit === 'exact') return { outcome: 'skipped', reason: 'exists' };
        if (policy === 'success' && pipeline.status !== 'success') {
            log.info('Pipeline did not succeed; cache not populated');
            return undefined;
        }
        if (pipeline.status === 'cancelled') return undefined;
        return this.deps.cacheStore.save(cache.key, cache.restore.localPath);
    }
}
