/**
 * Matrix runner data model.
 */

import type { StructuredError } from './structured_error';

/* -------------------------------------------------------------------------- */
/* Matrix                                                                     */
/* -------------------------------------------------------------------------- */

export interface Axis {
    name: string;
    values: string[];
}

/** Ordered axes. Every axis has at least one value; names are unique. */
export type AxisSet = Axis[];

export interface JobSpec {
    /** Stable within a run: `job-<index>` */
    readonly id: string;
    /** Zero-based position in the expanded matrix */
    readonly index: number;
    readonly values: Readonly<Record<string, string>>;
    readonly label: string;
}

/* -------------------------------------------------------------------------- */
/* Cache                                                                      */
/* -------------------------------------------------------------------------- */

export interface CacheKey {
    platform: string;
    purpose: string;
    /** Remote head reference, verbatim */
    identifier: string;
    /** `{platform}-{purpose}-{identifier}` */
    key: string;
    /** `{platform}-{purpose}-` */
    prefix: string;
}

export type CacheHitKind = 'exact' | 'prefix' | 'miss';

export interface RestoreResult {
    hit: CacheHitKind;
    /** The stored key that was restored, if any */
    key?: string;
    localPath: string;
    /** True for prefix hits: data may belong to a different content identifier */
    stale: boolean;
}

export interface SaveResult {
    outcome: 'stored' | 'skipped';
    reason?: 'exists' | 'unavailable' | 'empty';
}

export interface CacheEntry {
    key: string;
    namespace: string;
    contentHash: string;
    fileCount: number;
    sizeBytes: number;
    createdAt: Date;
    lastRestoredAt: Date | null;
}

/** What a job learned about the cache, carried into skip predicates and the report */
export interface JobCacheState {
    key: CacheKey | null;
    restore: RestoreResult;
    save?: SaveResult;
}

/* -------------------------------------------------------------------------- */
/* Environment                                                                */
/* -------------------------------------------------------------------------- */

export interface DependencyPolicy {
    /** Permit system package managers to move an installed package to an older version */
    allowVersionDowngrade: boolean;
    /** Extra package channels, in priority order */
    channels: string[];
    timeoutMs: number;
}

export interface ProvisionRequest {
    jobId: string;
    runtimeVersion: string;
    packages: Record<string, string>;
    systemPackages?: string[];
    policy: DependencyPolicy;
}

/** Isolated per-job environment handed to every step explicitly. */
export interface Environment {
    readonly id: string;
    readonly name: string;
    /** Sandbox directory owned by this environment alone */
    readonly root: string;
    readonly runtimeVersion: string;
    readonly packages: Readonly<Record<string, string>>;
    /** Variables every command in this environment sees */
    readonly vars: Readonly<Record<string, string>>;
    /** Working directory for steps that do not set their own */
    readonly workDir: string;
}

/* -------------------------------------------------------------------------- */
/* Steps                                                                      */
/* -------------------------------------------------------------------------- */

export type StepStatus = 'success' | 'failed' | 'skipped';

export interface CoverageSummary {
    /** Percentage 0..100 */
    percent: number;
    statements?: number;
    missed?: number;
}

export interface StepResult {
    name: string;
    status: StepStatus;
    exitCode: number | null;
    durationMs: number;
    error?: StructuredError;
    coverage?: CoverageSummary;
    /** Tail of combined stdout/stderr */
    output?: string;
}

export interface PipelineState {
    job: JobSpec;
    environment: Environment;
    cache: JobCacheState;
    results: readonly StepResult[];
}

export type SkipPredicate = (state: PipelineState) => boolean;

interface StepBase {
    name: string;
    /** Default false: a failure ends the pipeline */
    continueOnFailure?: boolean;
    skipIf?: SkipPredicate;
    /** Passed through opaquely to the executed command */
    env?: Record<string, string>;
    timeoutMs?: number;
}

export interface CommandStep extends StepBase {
    kind: 'command';
    command: string;
    workingDir?: string;
}

export interface TestStep extends StepBase {
    kind: 'test';
    paths: string[];
    /** Package measured for coverage */
    coverageTarget?: string;
}

export type Step = CommandStep | TestStep;

export type PipelineStatus = 'success' | 'failed' | 'cancelled';

export interface PipelineResult {
    status: PipelineStatus;
    results: StepResult[];
}

/* -------------------------------------------------------------------------- */
/* Jobs and runs                                                              */
/* -------------------------------------------------------------------------- */

export type JobStatus = 'success' | 'failed' | 'cancelled';

export interface JobResult {
    job: JobSpec;
    status: JobStatus;
    steps: StepResult[];
    cache: JobCacheState | null;
    error?: StructuredError;
    coverage?: CoverageSummary;
    durationMs: number;
}

export type RunStatus = 'success' | 'failed';

export interface RunResult {
    runId: string;
    name: string;
    status: RunStatus;
    jobs: JobResult[];
    startedAt: string;
    finishedAt: string;
    durationMs: number;
    coverage?: CoverageSummary;
}
