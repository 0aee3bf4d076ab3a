/**
 * Structured Logger
 *
 * - Log levels: DEBUG, INFO, WARN, ERROR
 * - ISO timestamps on every entry
 * - Structured JSON output (JSONL) when MATRIX_LOG_JSON=1
 * - Optional file output via MATRIX_LOG_FILE
 * - Component name on every line
 * - Run correlation (run id, job label, step name) carried on every entry
 *
 * Environment:
 *   MATRIX_LOG_LEVEL  = debug|info|warn|error (default: info)
 *   MATRIX_LOG_JSON   = 1 (default: text)
 *   MATRIX_LOG_FILE   = path (optional, appends)
 *   MATRIX_DEBUG      = 1 (sets level to debug)
 */

import * as fs from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function parseLevel(raw: string | undefined): LogLevel {
    const value = (raw || 'info').toLowerCase();
    return value === 'debug' || value === 'warn' || value === 'error' ? value : 'info';
}

const MIN_LEVEL: number = LEVEL_ORDER[parseLevel(process.env.MATRIX_LOG_LEVEL)];
const DEBUG_OVERRIDE = process.env.MATRIX_DEBUG === '1' || process.env.MATRIX_DEBUG === 'true';
const EFFECTIVE_MIN = DEBUG_OVERRIDE ? 0 : MIN_LEVEL;

const JSON_MODE = process.env.MATRIX_LOG_JSON === '1';
const LOG_FILE = process.env.MATRIX_LOG_FILE || '';
let LOG_FILE_FAILURES = 0;

/* -------------------------------------------------------------------------- */
/* Correlation context                                                        */
/* -------------------------------------------------------------------------- */

/**
 * Jobs run interleaved on one event loop, so job and step context travels
 * with each logger instead of living in module state. Only the run id is
 * process-wide.
 */
export interface LogContext {
    job?: string;
    step?: string;
}

let _runId: string = '';

/** Set the active run id. Called by the scheduler at run start. */
export function setRunCorrelation(runId: string): void {
    _runId = runId;
}

/** Clear the run id. Called at run end. */
export function clearRunCorrelation(): void {
    _runId = '';
}

/* -------------------------------------------------------------------------- */
/* Core emit                                                                  */
/* -------------------------------------------------------------------------- */

function emit(level: LogLevel, component: string, ctx: LogContext, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < EFFECTIVE_MIN) return;

    const ts = new Date().toISOString();

    if (JSON_MODE) {
        const entry: Record<string, unknown> = { ts, level, component, msg: message };
        if (_runId) entry.run_id = _runId;
        if (ctx.job) entry.job = ctx.job;
        if (ctx.step) entry.step = ctx.step;
        if (data) entry.data = data;
        writeOutput(level, JSON.stringify(entry));
    } else {
        const scope = ctx.job ? ` [${ctx.job}${ctx.step ? ' > ' + ctx.step : ''}]` : '';
        const run = _runId ? ` [${_runId.slice(0, 8)}]` : '';
        const prefix = `[${ts}] [${level.toUpperCase().padEnd(5)}] [${component}]${run}${scope}`;
        const line = data
            ? `${prefix} ${message} ${JSON.stringify(data)}`
            : `${prefix} ${message}`;
        writeOutput(level, line);
    }
}

function writeOutput(level: LogLevel, line: string): void {
    switch (level) {
        case 'error': process.stderr.write(line + '\n'); break;
        case 'warn':  process.stderr.write(line + '\n'); break;
        default:      process.stdout.write(line + '\n'); break;
    }

    if (LOG_FILE) {
        try {
            fs.appendFileSync(LOG_FILE, line + '\n');
        } catch (e) {
            LOG_FILE_FAILURES++;
            if (LOG_FILE_FAILURES === 1) {
                process.stderr.write(`[logger] cannot append to ${LOG_FILE}: ${String(e)}\n`);
            }
        }
    }
}

/* -------------------------------------------------------------------------- */
/* Logger interface                                                           */
/* -------------------------------------------------------------------------- */

export interface Logger {
    debug(msg: string, data?: Record<string, unknown>): void;
    info(msg: string, data?: Record<string, unknown>): void;
    warn(msg: string, data?: Record<string, unknown>): void;
    error(msg: string, data?: Record<string, unknown>): void;
    child(component: string): Logger;
    withContext(ctx: LogContext): Logger;
}

export function createLogger(component: string, ctx: LogContext = {}): Logger {
    return {
        debug: (msg, data) => emit('debug', component, ctx, msg, data),
        info:  (msg, data) => emit('info',  component, ctx, msg, data),
        warn:  (msg, data) => emit('warn',  component, ctx, msg, data),
        error: (msg, data) => emit('error', component, ctx, msg, data),
        child: (sub) => createLogger(`${component}:${sub}`, ctx),
        withContext: (next) => createLogger(component, { ...ctx, ...next }),
    };
}
