/**
 * Shared Configuration Constants
 *
 * Centralized defaults for the matrix runner.
 * Values can be overridden via environment variables.
 */

import * as os from 'os';
import * as path from 'path';

function envInt(name: string, fallback: number): number {
    const raw = process.env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    const parsed = parseInt(raw, 10);
    return Number.isFinite(parsed) ? parsed : fallback;
}

// Timeouts (milliseconds)
export const TIMEOUTS = {
    REMOTE_LOOKUP_MS: envInt('MATRIX_REMOTE_LOOKUP_TIMEOUT', 30000),     // git ls-remote
    PROVISION_MS: envInt('MATRIX_PROVISION_TIMEOUT', 1800000),          // 30 minutes per job environment
    STEP_MS: envInt('MATRIX_STEP_TIMEOUT', 3600000),                    // 1 hour per step
    KILL_GRACE_MS: 5000,                                                // SIGTERM -> SIGKILL
};

// Retries (caller-side policy for remote corpus lookups)
export const RETRIES = {
    REMOTE_LOOKUP_ATTEMPTS: envInt('MATRIX_REMOTE_LOOKUP_ATTEMPTS', 3),
    REMOTE_LOOKUP_BACKOFF_MS: envInt('MATRIX_REMOTE_LOOKUP_BACKOFF', 1000),
};

// Cache store
export const CACHE = {
    DB_PATH: process.env.MATRIX_CACHE_DB || path.join(os.homedir(), '.matrix-runner', 'cache.db'),
    BUSY_TIMEOUT_MS: envInt('MATRIX_CACHE_BUSY_TIMEOUT', 5000),
    MAX_FILE_BYTES: 512 * 1024 * 1024,      // 512MB per stored file
    LRU_MAX_BYTES: 256 * 1024 * 1024,       // 256MB of blob reads kept in memory
    PRUNE_DAYS: envInt('MATRIX_CACHE_PRUNE_DAYS', 30),
    DEFAULT_PURPOSE: 'datasets',
};

// Workspace for per-job sandboxes
export const SANDBOX_ROOT = process.env.MATRIX_SANDBOX_ROOT || path.join(os.tmpdir(), 'matrix-runner');

// Captured output kept per step in the report
export const MAX_CAPTURED_OUTPUT_CHARS = 8000;
