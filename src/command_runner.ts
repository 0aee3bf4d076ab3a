/**
 * Command Runner — executes one opaque shell command in a child process.
 *
 * Each command runs as the leader of its own process group. A command that
 * outlives its timeout has the whole group sent SIGTERM, then SIGKILL after
 * a grace period, and resolves as timed out. Spawn failures resolve with a
 * null exit code rather than rejecting; the caller decides what a failure
 * means.
 */

import { spawn } from 'child_process';
import { createLogger } from './logger';
import { MAX_CAPTURED_OUTPUT_CHARS, TIMEOUTS } from './config';
import { errorMessage } from './structured_error';

const log = createLogger('command-runner');

export interface CommandOptions {
    cwd: string;
    env: Record<string, string>;
    timeoutMs: number;
}

export interface CommandResult {
    exitCode: number | null;
    stdout: string;
    stderr: string;
    durationMs: number;
    timedOut: boolean;
    /** Set when the process could not be started at all */
    spawnError?: string;
}

export interface CommandRunner {
    run(command: string, options: CommandOptions): Promise<CommandResult>;
}

function appendCapped(buffer: string, chunk: string): string {
    const next = buffer + chunk;
    return next.length > MAX_CAPTURED_OUTPUT_CHARS ? next.slice(next.length - MAX_CAPTURED_OUTPUT_CHARS) : next;
}

/**
 * Runs commands through a login bash shell so profile-installed tools
 * (conda, pyenv) are on PATH.
 */
export class ShellCommandRunner implements CommandRunner {
    constructor(private readonly shell: string = 'bash', private readonly shellArgs: string[] = ['-lc']) { }

    run(command: string, options: CommandOptions): Promise<CommandResult> {
        const started = Date.now();

        return new Promise<CommandResult>((resolve) => {
            let stdout = '';
            let stderr = '';
            let settled = false;
            let timedOut = false;

            const child = spawn(this.shell, [...this.shellArgs, command], {
                cwd: options.cwd,
                env: { ...process.env, ...options.env },
                stdio: ['ignore', 'pipe', 'pipe'],
                detached: true,
            });

            // `a && b`, pipes and login shells leave grandchildren holding the pipes open
            const signalGroup = (signal: NodeJS.Signals) => {
                if (child.pid === undefined) return;
                try {
                    process.kill(-child.pid, signal);
                } catch (err) {
                    log.debug(`Process group ${child.pid} already gone: ${errorMessage(err)}`, { command });
                }
            };

            const finish = (exitCode: number | null, spawnError?: string) => {
                if (settled) return;
                settled = true;
                clearTimeout(timer);
                resolve({ exitCode, stdout, stderr, durationMs: Date.now() - started, timedOut, spawnError });
            };

            const timer = setTimeout(() => {
                timedOut = true;
                log.warn(`Command timeout after ${options.timeoutMs}ms, terminating`, { command });
                signalGroup('SIGTERM');
                // left running past settle so a group member that ignored SIGTERM still dies
                setTimeout(() => signalGroup('SIGKILL'), TIMEOUTS.KILL_GRACE_MS).unref();
            }, options.timeoutMs);

            child.stdout.setEncoding('utf8');
            child.stderr.setEncoding('utf8');
            child.stdout.on('data', (chunk: string) => { stdout = appendCapped(stdout, chunk); });
            child.stderr.on('data', (chunk: string) => { stderr = appendCapped(stderr, chunk); });

            child.on('error', (err: Error) => {
                log.error(`Failed to start command: ${err.message}`, { command });
                finish(null, err.message);
            });

            child.on('exit', () => {
                if (!timedOut) return;
                // a group member may still hold the pipes open
                child.stdout.destroy();
                child.stderr.destroy();
                finish(null);
            });

            child.on('close', (code: number | null) => {
                finish(timedOut ? null : code);
            });
        });
    }
}

export function commandSucceeded(result: CommandResult): boolean {
    return !result.timedOut && result.spawnError === undefined && result.exitCode === 0;
}

export function describeCommandFailure(result: CommandResult): string {
    if (result.spawnError) return `could not start: ${result.spawnError}`;
    if (result.timedOut) return 'timed out';
    const tail = (result.stderr || result.stdout).trim().split('\n').slice(-3).join(' | ');
    return tail ? `exit code ${result.exitCode}: ${tail}` : `exit code ${result.exitCode}`;
}
