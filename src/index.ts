/**
 * Main entry point - exports all public APIs
 */

export type {
    Axis,
    AxisSet,
    JobSpec,
    CacheKey,
    CacheHitKind,
    RestoreResult,
    SaveResult,
    CacheEntry,
    JobCacheState,
    DependencyPolicy,
    ProvisionRequest,
    Environment,
    StepStatus,
    CoverageSummary,
    StepResult,
    PipelineState,
    SkipPredicate,
    CommandStep,
    TestStep,
    Step,
    PipelineStatus,
    PipelineResult,
    JobStatus,
    JobResult,
    RunStatus,
    RunResult,
} from './matrix_types';
export { MatrixScheduler, type SchedulerOptions, expandMatrix, validateAxes, renderLabel } from './matrix_scheduler';
export {
    JobRunner,
    type JobRunnerDeps,
    type JobExecutor,
    type JobTemplate,
    type ProvisionTemplate,
    type CorpusCacheConfig,
    type CacheSavePolicy,
    cancelledResult,
    resolveCorpusPath,
} from './job_runner';
export { StepPipeline, type StepPipelineDeps, type PipelineContext } from './step_pipeline';
export { CacheKeyResolver, type RemoteLookup, GitRemoteLookup, buildCacheKey, parseLsRemote } from './cache_key_resolver';
export { CacheStore, type CacheStoreOptions } from './cache_store';
export {
    EnvironmentProvisioner,
    type EnvironmentProvisionerOptions,
    type PackageManager,
    type SystemPackageInstaller,
    type RuntimeTarget,
    CondaPackageManager,
    AptSystemPackageInstaller,
} from './environment_provisioner';
export { type CommandRunner, type CommandOptions, type CommandResult, ShellCommandRunner } from './command_runner';
export { type TestRunner, type TestRunOptions, type TestRunResult, PytestRunner, parseCoverageTotal, mergeCoverage, averageCoverage } from './test_runner';
export { type WorkflowDefinition, type WorkflowTriggers, type SkipCondition, type SkipScope, compileWorkflow, compileSkipIf, loadWorkflow, parseMatrix } from './workflow_config';
export { type RunReport, type JobReport, type StepReport, REPORT_SCHEMA_VERSION, buildReport, renderSummary, writeReport, exitCodeFor } from './run_report';
export { SchemaValidator, type ValidationResult, type JsonSchema } from './schema_validator';
export {
    MatrixError,
    ConfigurationError,
    RemoteLookupError,
    CacheUnavailableError,
    ProvisionError,
    StepExecutionError,
    CancelledError,
    TimeoutError,
    type StructuredError,
    type ErrorCode,
    toStructuredError,
} from './structured_error';
export { createLogger, type Logger } from './logger';
