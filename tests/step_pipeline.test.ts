import test from 'node:test';
import assert from 'node:assert/strict';

import { StepPipeline } from '../src/step_pipeline';
import type { CommandStep, Step } from '../src/matrix_types';
import { FakeCommandRunner, FakeTestRunner, MISS, fail, fakeEnvironment, jobSpec, ok, timedOut } from './fakes';

const job = jobSpec({ python: '3.12' });

function cmd(name: string, extra: Partial<CommandStep> = {}): CommandStep {
    return { kind: 'command', name, command: `cmd-${name}`, ...extra };
}

function pipeline(commands: FakeCommandRunner, tests = new FakeTestRunner()): StepPipeline {
    return new StepPipeline({ commandRunner: commands, testRunner: tests, defaultTimeoutMs: 1000 });
}

test('a fatal failure stops the pipeline before the next step', async () => {
    const runner = new FakeCommandRunner({ 'cmd-B': fail(1, 'boom\n') });
    const result = await pipeline(runner).run([cmd('A'), cmd('B'), cmd('C')], fakeEnvironment(), { job, cache: MISS });

    assert.equal(result.status, 'failed');
    assert.deepEqual(result.results.map((r) => [r.name, r.status]), [['A', 'success'], ['B', 'failed']]);
    assert.deepEqual(runner.commands, ['cmd-A', 'cmd-B']);

    const b = result.results[1];
    assert.equal(b.exitCode, 1);
    assert.equal(b.error?.code, 'STEP_FAILED');
    assert.equal(b.error?.message, 'Step "B" failed: exit code 1: boom');
});

test('continueOnFailure records the failure and carries on', async () => {
    const runner = new FakeCommandRunner({ 'cmd-B': fail(2) });
    const steps: Step[] = [cmd('A'), cmd('B', { continueOnFailure: true }), cmd('C')];
    const result = await pipeline(runner).run(steps, fakeEnvironment(), { job, cache: MISS });

    assert.equal(result.status, 'failed');
    assert.deepEqual(result.results.map((r) => r.status), ['success', 'failed', 'success']);
    assert.deepEqual(runner.commands, ['cmd-A', 'cmd-B', 'cmd-C']);
});

test('skipped steps never execute and are recorded as skipped', async () => {
    const runner = new FakeCommandRunner();
    const steps: Step[] = [cmd('A'), cmd('B', { skipIf: () => true }), cmd('C')];
    const result = await pipeline(runner).run(steps, fakeEnvironment(), { job, cache: MISS });

    assert.equal(result.status, 'success');
    assert.deepEqual(result.results[1], { name: 'B', status: 'skipped', exitCode: null, durationMs: 0 });
    assert.deepEqual(runner.commands, ['cmd-A', 'cmd-C']);
});

test('skip predicates see earlier results and the cache state', async () => {
    const runner = new FakeCommandRunner({ 'cmd-A': fail(1) });
    const steps: Step[] = [
        cmd('A', { continueOnFailure: true }),
        cmd('cleanup', { skipIf: (s) => !s.results.some((r) => r.name === 'A' && r.status === 'failed') }),
        cmd('warm', { skipIf: (s) => s.cache.restore.hit === 'miss' }),
    ];
    const result = await pipeline(runner).run(steps, fakeEnvironment(), { job, cache: MISS });

    assert.deepEqual(result.results.map((r) => r.status), ['failed', 'success', 'skipped']);
});

test('a skip predicate that throws fails the step', async () => {
    const runner = new FakeCommandRunner();
    const steps: Step[] = [cmd('A', { skipIf: () => { throw new Error('nope'); } }), cmd('B')];
    const result = await pipeline(runner).run(steps, fakeEnvironment(), { job, cache: MISS });

    assert.equal(result.status, 'failed');
    assert.equal(result.results.length, 1);
    assert.equal(result.results[0].error?.code, 'INTERNAL_ERROR');
    assert.equal(result.results[0].error?.message, 'skipIf threw: nope');
    assert.deepEqual(runner.commands, []);
});

test('cancellation is honoured at step boundaries', async () => {
    const controller = new AbortController();
    const runner = new FakeCommandRunner({
        'cmd-A': () => {
            controller.abort(new Error('fail-fast'));
            return ok();
        },
    });
    const result = await pipeline(runner).run([cmd('A'), cmd('B')], fakeEnvironment(), {
        job,
        cache: MISS,
        signal: controller.signal,
    });

    assert.equal(result.status, 'cancelled');
    assert.deepEqual(result.results.map((r) => r.name), ['A']);
    assert.deepEqual(runner.commands, ['cmd-A']);
});

test('a job cancelled after a tolerated failure reports the failure', async () => {
    const controller = new AbortController();
    const runner = new FakeCommandRunner({
        'cmd-A': () => {
            controller.abort(new Error('fail-fast'));
            return fail(1, 'broken');
        },
    });
    const result = await pipeline(runner).run([cmd('A', { continueOnFailure: true }), cmd('B')], fakeEnvironment(), {
        job,
        cache: MISS,
        signal: controller.signal,
    });

    assert.equal(result.status, 'failed');
    assert.deepEqual(result.results.map((r) => [r.name, r.status]), [['A', 'failed']]);
    assert.deepEqual(runner.commands, ['cmd-A']);
});

test('an already-aborted signal runs nothing', async () => {
    const controller = new AbortController();
    controller.abort();
    const runner = new FakeCommandRunner();
    const result = await pipeline(runner).run([cmd('A')], fakeEnvironment(), { job, cache: MISS, signal: controller.signal });

    assert.deepEqual(result, { status: 'cancelled', results: [] });
    assert.equal(runner.calls.length, 0);
});

test('a timed-out command fails with TIMEOUT', async () => {
    const runner = new FakeCommandRunner({ 'cmd-A': timedOut() });
    const result = await pipeline(runner).run([cmd('A', { timeoutMs: 250 })], fakeEnvironment(), { job, cache: MISS });

    assert.equal(runner.calls[0].options.timeoutMs, 250);
    assert.equal(result.results[0].error?.code, 'TIMEOUT');
    assert.equal(result.results[0].error?.message, 'Step "A" timed out after 250ms');
});

test('commands run in the job environment with step env layered on top', async () => {
    const runner = new FakeCommandRunner();
    await pipeline(runner).run(
        [cmd('A', { env: { PLEXON2_TEST: 'true' }, workingDir: 'sub' }), cmd('B')],
        fakeEnvironment(),
        { job, cache: MISS }
    );

    assert.deepEqual(runner.calls[0].options, {
        cwd: '/work/sub',
        env: { CONDA_PREFIX: '/tmp/sandbox/job-0-abc/env', PLEXON2_TEST: 'true' },
        timeoutMs: 1000,
    });
    assert.equal(runner.calls[1].options.cwd, '/work');
    assert.deepEqual(runner.calls[1].options.env, { CONDA_PREFIX: '/tmp/sandbox/job-0-abc/env' });
});

test('test steps go through the test runner and carry coverage', async () => {
    const tests = new FakeTestRunner({ coverage: { percent: 84, statements: 100, missed: 16 } });
    const result = await pipeline(new FakeCommandRunner(), tests).run(
        [{ kind: 'test', name: 'io', paths: ['neo/test/iotest'], coverageTarget: 'neo', env: { PLEXON2_TEST: 'true' } }],
        fakeEnvironment(),
        { job, cache: MISS }
    );

    assert.equal(result.status, 'success');
    assert.deepEqual(result.results[0].coverage, { percent: 84, statements: 100, missed: 16 });
    assert.deepEqual(tests.calls[0], {
        paths: ['neo/test/iotest'],
        options: { coverageTarget: 'neo', env: { PLEXON2_TEST: 'true' }, cwd: '/work', timeoutMs: 1000 },
    });
});

test('failing tests produce a STEP_FAILED result', async () => {
    const tests = new FakeTestRunner({ passed: false, exitCode: 1, failure: 'exit code 1' });
    const result = await pipeline(new FakeCommandRunner(), tests).run(
        [{ kind: 'test', name: 'io', paths: ['t'] }],
        fakeEnvironment(),
        { job, cache: MISS }
    );

    assert.equal(result.status, 'failed');
    assert.equal(result.results[0].exitCode, 1);
    assert.equal(result.results[0].error?.code, 'STEP_FAILED');
    assert.equal(result.results[0].error?.message, 'Tests failed: exit code 1');
});

test('a runner that throws fails the step instead of the pipeline', async () => {
    const runner = new FakeCommandRunner({ 'cmd-A': () => { throw new Error('spawn exploded'); } });
    const result = await pipeline(runner).run([cmd('A')], fakeEnvironment(), { job, cache: MISS });

    assert.equal(result.status, 'failed');
    assert.equal(result.results[0].exitCode, null);
    assert.equal(result.results[0].error?.message, 'Step "A" errored: spawn exploded');
});
