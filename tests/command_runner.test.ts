import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';

import { ShellCommandRunner, commandSucceeded, describeCommandFailure } from '../src/command_runner';

const sh = new ShellCommandRunner('sh', ['-c']);
const cwd = fs.realpathSync(os.tmpdir());

test('captures stdout of a successful command', async () => {
    const result = await sh.run('printf %s "$GREETING"', { cwd, env: { GREETING: 'hello' }, timeoutMs: 5000 });

    assert.equal(result.exitCode, 0);
    assert.equal(result.stdout, 'hello');
    assert.equal(commandSucceeded(result), true);
});

test('runs in the requested directory', async () => {
    const result = await sh.run('pwd', { cwd, env: {}, timeoutMs: 5000 });
    assert.equal(result.stdout.trim(), cwd);
});

test('a non-zero exit is described with the tail of stderr', async () => {
    const result = await sh.run('echo oops >&2; exit 3', { cwd, env: {}, timeoutMs: 5000 });

    assert.equal(result.exitCode, 3);
    assert.equal(commandSucceeded(result), false);
    assert.equal(describeCommandFailure(result), 'exit code 3: oops');
});

test('a command past its timeout is terminated', async () => {
    const result = await sh.run('exec sleep 5', { cwd, env: {}, timeoutMs: 100 });

    assert.equal(result.timedOut, true);
    assert.equal(result.exitCode, null);
    assert.equal(describeCommandFailure(result), 'timed out');
    assert.ok(result.durationMs < 4000);
});

test('a timeout stops every process the command started, not just the shell', async () => {
    for (const command of ['sleep 3; echo done', 'sleep 3 | cat', 'true && sleep 3 && echo done']) {
        const result = await sh.run(command, { cwd, env: {}, timeoutMs: 100 });

        assert.equal(result.timedOut, true, command);
        assert.equal(result.exitCode, null, command);
        assert.equal(result.stdout, '', command);
        assert.ok(result.durationMs < 1500, `${command} took ${result.durationMs}ms`);
    }
});

test('a shell that cannot be started resolves with a spawn error', async () => {
    const missing = new ShellCommandRunner('/nonexistent/shell', ['-c']);
    const result = await missing.run('true', { cwd, env: {}, timeoutMs: 5000 });

    assert.equal(result.exitCode, null);
    assert.ok(result.spawnError);
    assert.match(describeCommandFailure(result), /^could not start: /);
});
