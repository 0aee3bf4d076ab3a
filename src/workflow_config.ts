/**
 * Workflow Config
 *
 * Loads a workflow file (JSON), validates it, and compiles it into the
 * pieces the scheduler and job runner consume: an AxisSet, a JobTemplate
 * and run options. Declarative `skipIf` conditions become SkipPredicates.
 */

import * as fs from 'fs';
import * as path from 'path';
import { CACHE, TIMEOUTS } from './config';
import { validateAxes } from './matrix_scheduler';
import { SchemaValidator, type JsonSchema } from './schema_validator';
import { ConfigurationError, errorMessage } from './structured_error';
import type { CacheSavePolicy, JobTemplate } from './job_runner';
import type { AxisSet, SkipPredicate, Step } from './matrix_types';

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export interface ScheduleTrigger {
    cron: string;
}

export interface WorkflowTriggers {
    manual: boolean;
    schedule: ScheduleTrigger[];
}

export interface WorkflowDefinition {
    name: string;
    labelTemplate?: string;
    triggers: WorkflowTriggers;
    axes: AxisSet;
    failFast: boolean;
    concurrency?: number;
    /** Runtime package the provisioner installs at the runtime axis version */
    runtime: string;
    workDir: string;
    template: JobTemplate;
}

/** One declarative skip condition; exactly one key is set. */
export type SkipCondition =
    | { disabled: true }
    | { cacheHit: 'exact' | 'prefix' | 'miss' | 'any' }
    | { stepFailed: string }
    | { axis: { name: string; equals: string } }
    | { env: string };

/* -------------------------------------------------------------------------- */
/* Schema                                                                     */
/* -------------------------------------------------------------------------- */

const WORKFLOW_SCHEMA_ID = 'workflow-v1';
const SKIP_CONDITION_SCHEMA_ID = 'skip-condition-v1';

const STRING_MAP: JsonSchema = { type: 'object', additionalProperties: { type: 'string' } };

const SKIP_CONDITION: JsonSchema = {
    type: 'object',
    additionalProperties: false,
    properties: {
        disabled: { type: 'boolean', enum: [true] },
        cacheHit: { type: 'string', enum: ['exact', 'prefix', 'miss', 'any'] },
        stepFailed: { type: 'string', minLength: 1 },
        axis: {
            type: 'object',
            required: ['name', 'equals'],
            additionalProperties: false,
            properties: { name: { type: 'string', minLength: 1 }, equals: { type: 'string' } },
        },
        env: { type: 'string', minLength: 1 },
    },
};

const STEP: JsonSchema = {
    type: 'object',
    required: ['name'],
    additionalProperties: false,
    properties: {
        name: { type: 'string', minLength: 1 },
        run: { type: 'string', minLength: 1 },
        tests: { type: 'array', minItems: 1, items: { type: 'string', minLength: 1 } },
        coverage: { type: 'string', minLength: 1 },
        workingDir: { type: 'string' },
        continueOnFailure: { type: 'boolean' },
        env: STRING_MAP,
        timeoutMs: { type: 'number', integer: true, minimum: 1 },
        skipIf: { type: ['object', 'array'] },
    },
};

const WORKFLOW_SCHEMA: JsonSchema = {
    type: 'object',
    required: ['name', 'matrix', 'provision', 'steps'],
    additionalProperties: false,
    properties: {
        name: { type: 'string', minLength: 1 },
        nameTemplate: { type: 'string', minLength: 1 },
        triggers: {
            type: 'object',
            additionalProperties: false,
            properties: {
                manual: { type: 'boolean' },
                schedule: {
                    type: 'array',
                    items: {
                        type: 'object',
                        required: ['cron'],
                        additionalProperties: false,
                        properties: { cron: { type: 'string', minLength: 1 } },
                    },
                },
            },
        },
        matrix: { type: ['object', 'array'] },
        failFast: { type: 'boolean' },
        concurrency: { type: 'number', integer: true, minimum: 1 },
        workDir: { type: 'string', minLength: 1 },
        corpus: {
            type: 'object',
            required: ['url', 'path'],
            additionalProperties: false,
            properties: {
                url: { type: 'string', minLength: 1 },
                path: { type: 'string', minLength: 1 },
                purpose: { type: 'string', minLength: 1, pattern: '^[A-Za-z0-9_.]+$' },
            },
        },
        cache: {
            type: 'object',
            additionalProperties: false,
            properties: {
                platformAxis: { type: 'string', minLength: 1 },
                save: { type: 'string', enum: ['success', 'always', 'never'] },
            },
        },
        provision: {
            type: 'object',
            required: ['runtimeAxis'],
            additionalProperties: false,
            properties: {
                runtime: { type: 'string', minLength: 1 },
                runtimeAxis: { type: 'string', minLength: 1 },
                packageAxes: STRING_MAP,
                packages: STRING_MAP,
                systemPackages: { type: 'array', items: { type: 'string', minLength: 1 } },
                allowVersionDowngrade: { type: 'boolean' },
                channels: { type: 'array', items: { type: 'string', minLength: 1 } },
                timeoutMs: { type: 'number', integer: true, minimum: 1 },
            },
        },
        steps: { type: 'array', minItems: 1, items: STEP },
    },
};

const validator = new SchemaValidator();
validator.registerSchema(WORKFLOW_SCHEMA_ID, WORKFLOW_SCHEMA);
validator.registerSchema(SKIP_CONDITION_SCHEMA_ID, SKIP_CONDITION);

/* -------------------------------------------------------------------------- */
/* Narrowing helpers                                                          */
/* -------------------------------------------------------------------------- */

type Json = Record<string, unknown>;

function isRecord(value: unknown): value is Json {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function str(obj: Json, key: string): string | undefined {
    const v = obj[key];
    return typeof v === 'string' ? v : undefined;
}

function bool(obj: Json, key: string): boolean | undefined {
    const v = obj[key];
    return typeof v === 'boolean' ? v : undefined;
}

function num(obj: Json, key: string): number | undefined {
    const v = obj[key];
    return typeof v === 'number' ? v : undefined;
}

function record(obj: Json, key: string): Json {
    const v = obj[key];
    return isRecord(v) ? v : {};
}

function stringMap(obj: Json, key: string): Record<string, string> {
    const out: Record<string, string> = {};
    for (const [k, v] of Object.entries(record(obj, key))) {
        if (typeof v === 'string') out[k] = v;
    }
    return out;
}

function stringList(obj: Json, key: string): string[] {
    const v = obj[key];
    return Array.isArray(v) ? v.filter((x): x is string => typeof x === 'string') : [];
}

/** Axis values may be written as numbers ("3.12" vs 3.12); both become strings. */
function axisValue(raw: unknown, axis: string): string {
    if (typeof raw === 'string') return raw;
    if (typeof raw === 'number' || typeof raw === 'boolean') return String(raw);
    throw new ConfigurationError(`Axis "${axis}" has a non-scalar value`, { axis });
}

/* -------------------------------------------------------------------------- */
/* Compilation                                                                */
/* -------------------------------------------------------------------------- */

/**
 * `matrix` is either `{ axis: [values] }` (declaration order preserved) or
 * `[{ name, values }]`.
 */
export function parseMatrix(raw: unknown): AxisSet {
    const axes: AxisSet = [];

    if (Array.isArray(raw)) {
        raw.forEach((entry: unknown, i) => {
            const name = isRecord(entry) ? entry.name : undefined;
            const values = isRecord(entry) ? entry.values : undefined;
            if (typeof name !== 'string' || !Array.isArray(values)) {
                throw new ConfigurationError(`matrix[${i}] must be { name, values[] }`);
            }
            axes.push({ name, values: values.map((v: unknown) => axisValue(v, name)) });
        });
    } else if (isRecord(raw)) {
        for (const [name, values] of Object.entries(raw)) {
            if (!Array.isArray(values)) {
                throw new ConfigurationError(`matrix.${name} must be a list of values`, { axis: name });
            }
            axes.push({ name, values: values.map((v: unknown) => axisValue(v, name)) });
        }
    } else {
        throw new ConfigurationError('matrix must be an object or a list of axes');
    }

    validateAxes(axes);
    return axes;
}

function parseSkipCondition(raw: unknown, where: string): SkipCondition {
    if (!isRecord(raw)) {
        throw new ConfigurationError(`${where}: skip condition must be an object`);
    }
    const keys = Object.keys(raw);
    if (keys.length !== 1) {
        throw new ConfigurationError(`${where}: skip condition needs exactly one key, got ${keys.length}`);
    }
    const checked = validator.validate(raw, SKIP_CONDITION_SCHEMA_ID);
    if (!checked.valid) {
        const detail = checked.errors.map((e) => `skipIf${e.path}: ${e.message}`).join('; ');
        throw new ConfigurationError(`${where}: ${detail}`);
    }

    const { disabled, cacheHit, stepFailed, env, axis } = raw;
    if (disabled === true) return { disabled: true };
    if (cacheHit === 'exact' || cacheHit === 'prefix' || cacheHit === 'miss' || cacheHit === 'any') {
        return { cacheHit };
    }
    if (typeof stepFailed === 'string') return { stepFailed };
    if (typeof env === 'string') return { env };
    if (isRecord(axis)) {
        const name = str(axis, 'name');
        const equals = str(axis, 'equals');
        if (name !== undefined && equals !== undefined) return { axis: { name, equals } };
    }
    throw new ConfigurationError(`${where}: unrecognised skip condition "${keys[0]}"`);
}

function compileCondition(cond: SkipCondition, stepEnv?: Record<string, string>): SkipPredicate {
    if ('disabled' in cond) {
        return () => true;
    }
    if ('cacheHit' in cond) {
        const want = cond.cacheHit;
        return (state) => want === 'any'
            ? state.cache.restore.hit !== 'miss'
            : state.cache.restore.hit === want;
    }
    if ('stepFailed' in cond) {
        const target = cond.stepFailed;
        return (state) => state.results.some((r) => r.name === target && r.status === 'failed');
    }
    if ('axis' in cond) {
        const { name, equals } = cond.axis;
        return (state) => state.job.values[name] === equals;
    }
    // skip unless the variable is set where the step's command would see it
    const variable = cond.env;
    return (state) => !(stepEnv?.[variable] ?? state.environment.vars[variable] ?? process.env[variable]);
}

/** What a skip condition may refer to besides the pipeline state. */
export interface SkipScope {
    /** When given, `axis` conditions must name one of these */
    axes?: AxisSet;
    /** The step's own env, layered over the job environment */
    env?: Record<string, string>;
}

/**
 * A single condition or a list; a list skips when any condition holds.
 */
export function compileSkipIf(raw: unknown, where: string, scope: SkipScope = {}): SkipPredicate {
    const conditions = (Array.isArray(raw) ? raw : [raw]).map((c) => parseSkipCondition(c, where));
    if (conditions.length === 0) {
        throw new ConfigurationError(`${where}: skipIf list is empty`);
    }
    const { axes } = scope;
    if (axes !== undefined) {
        for (const cond of conditions) {
            if ('axis' in cond) requireAxis(axes, cond.axis.name, `${where} skipIf.axis`);
        }
    }
    const predicates = conditions.map((c) => compileCondition(c, scope.env));
    return (state) => predicates.some((p) => p(state));
}

function compileStep(raw: Json, index: number, axes: AxisSet): Step {
    const name = str(raw, 'name') ?? `step-${index}`;
    const where = `steps[${index}] "${name}"`;
    const command = str(raw, 'run');
    const tests = stringList(raw, 'tests');

    if (command !== undefined && tests.length > 0) {
        throw new ConfigurationError(`${where}: set either "run" or "tests", not both`);
    }
    if (command === undefined && tests.length === 0) {
        throw new ConfigurationError(`${where}: needs "run" or "tests"`);
    }

    const env = raw.env === undefined ? undefined : stringMap(raw, 'env');
    const common = {
        name,
        continueOnFailure: bool(raw, 'continueOnFailure'),
        env,
        timeoutMs: num(raw, 'timeoutMs'),
        skipIf: raw.skipIf === undefined ? undefined : compileSkipIf(raw.skipIf, where, { axes, env }),
    };

    if (command !== undefined) {
        if (raw.coverage !== undefined) {
            throw new ConfigurationError(`${where}: "coverage" only applies to test steps`);
        }
        return { kind: 'command', command, workingDir: str(raw, 'workingDir'), ...common };
    }
    if (raw.workingDir !== undefined) {
        throw new ConfigurationError(`${where}: "workingDir" only applies to command steps`);
    }
    return { kind: 'test', paths: tests, coverageTarget: str(raw, 'coverage'), ...common };
}

const CRON_FIELDS = 5;

function parseTriggers(raw: Json): WorkflowTriggers {
    const schedule: ScheduleTrigger[] = [];
    const entries = raw.schedule;
    if (Array.isArray(entries)) {
        for (const entry of entries) {
            const cron = isRecord(entry) ? str(entry, 'cron') : undefined;
            if (cron === undefined) continue;
            const fields = cron.trim().split(/\s+/);
            if (fields.length !== CRON_FIELDS) {
                throw new ConfigurationError(`Cron expression needs ${CRON_FIELDS} fields: "${cron}"`);
            }
            schedule.push({ cron: fields.join(' ') });
        }
    }
    return { manual: bool(raw, 'manual') ?? true, schedule };
}

function requireAxis(axes: AxisSet, name: string, where: string): void {
    if (!axes.some((a) => a.name === name)) {
        throw new ConfigurationError(`${where} names unknown axis "${name}"`, { axis: name });
    }
}

/**
 * Validate and compile a parsed workflow document. `baseDir` anchors a
 * relative `workDir`.
 */
export function compileWorkflow(doc: unknown, baseDir: string = process.cwd()): WorkflowDefinition {
    const result = validator.validate(doc, WORKFLOW_SCHEMA_ID);
    if (!result.valid || !isRecord(doc)) {
        const detail = result.errors.map((e) => `${e.path || '(root)'}: ${e.message}`).join('; ');
        throw new ConfigurationError(`Invalid workflow: ${detail}`, { errors: result.errors });
    }

    const axes = parseMatrix(doc.matrix);
    const provision = record(doc, 'provision');
    const runtimeAxis = str(provision, 'runtimeAxis') ?? '';
    const packageAxes = stringMap(provision, 'packageAxes');
    requireAxis(axes, runtimeAxis, 'provision.runtimeAxis');
    for (const [pkg, axis] of Object.entries(packageAxes)) {
        requireAxis(axes, axis, `provision.packageAxes.${pkg}`);
    }

    const cacheCfg = record(doc, 'cache');
    const platformAxis = str(cacheCfg, 'platformAxis');
    if (platformAxis !== undefined) requireAxis(axes, platformAxis, 'cache.platformAxis');
    const saveRaw = str(cacheCfg, 'save');
    const save: CacheSavePolicy = saveRaw === 'always' || saveRaw === 'never' ? saveRaw : 'success';

    const corpusRaw = doc.corpus;
    const corpus = isRecord(corpusRaw)
        ? {
            url: str(corpusRaw, 'url') ?? '',
            path: str(corpusRaw, 'path') ?? '',
            purpose: str(corpusRaw, 'purpose') ?? CACHE.DEFAULT_PURPOSE,
            platformAxis,
            save,
        }
        : undefined;

    const rawSteps = Array.isArray(doc.steps) ? doc.steps : [];
    const steps = rawSteps.map((s: unknown, i) => compileStep(isRecord(s) ? s : {}, i, axes));
    const seen = new Set<string>();
    for (const step of steps) {
        if (seen.has(step.name)) {
            throw new ConfigurationError(`Duplicate step name: ${step.name}`, { step: step.name });
        }
        seen.add(step.name);
    }

    return {
        name: str(doc, 'name') ?? 'matrix',
        labelTemplate: str(doc, 'nameTemplate'),
        triggers: parseTriggers(record(doc, 'triggers')),
        axes,
        failFast: bool(doc, 'failFast') ?? true,
        concurrency: num(doc, 'concurrency'),
        runtime: str(provision, 'runtime') ?? 'python',
        workDir: path.resolve(baseDir, str(doc, 'workDir') ?? '.'),
        template: {
            corpus,
            provision: {
                runtimeAxis,
                packageAxes,
                packages: stringMap(provision, 'packages'),
                systemPackages: stringList(provision, 'systemPackages'),
                policy: {
                    allowVersionDowngrade: bool(provision, 'allowVersionDowngrade') ?? false,
                    channels: stringList(provision, 'channels'),
                    timeoutMs: num(provision, 'timeoutMs') ?? TIMEOUTS.PROVISION_MS,
                },
            },
            steps,
        },
    };
}

/** Read, parse and compile a workflow file. A relative workDir resolves against the file's directory. */
export function loadWorkflow(filePath: string): WorkflowDefinition {
    let text: string;
    try {
        text = fs.readFileSync(filePath, 'utf8');
    } catch (e) {
        throw new ConfigurationError(`Cannot read workflow ${filePath}: ${errorMessage(e)}`, { file: filePath });
    }

    let doc: unknown;
    try {
        doc = JSON.parse(text);
    } catch (e) {
        throw new ConfigurationError(`Workflow ${filePath} is not valid JSON: ${errorMessage(e)}`, { file: filePath });
    }

    return compileWorkflow(doc, path.dirname(path.resolve(filePath)));
}
