import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { CacheKeyResolver } from '../src/cache_key_resolver';
import { CacheStore } from '../src/cache_store';
import { EnvironmentProvisioner } from '../src/environment_provisioner';
import { JobRunner, resolveCorpusPath, type CacheSavePolicy, type JobTemplate } from '../src/job_runner';
import { expandMatrix } from '../src/matrix_scheduler';
import { StepPipeline } from '../src/step_pipeline';
import { RemoteLookupError } from '../src/structured_error';
import type { CommandOptions, CommandResult } from '../src/command_runner';
import type { Step } from '../src/matrix_types';
import { FakeCommandRunner, FakePackageManager, FakeRemoteLookup, FakeTestRunner, POLICY, fail, ok } from './fakes';

const [JOB] = expandMatrix([
    { name: 'python', values: ['3.12'] },
    { name: 'numpy', values: ['2.0'] },
]);

/** Writes a corpus file where the job says the corpus lives, like a dataset download would. */
function fetchCorpus(options: CommandOptions): CommandResult {
    const dir = options.env.MATRIX_CORPUS_PATH;
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(path.join(dir, 'recording.pl2'), 'corpus-v1');
    return ok();
}

interface Harness {
    runner: JobRunner;
    commands: FakeCommandRunner;
    packages: FakePackageManager;
    remote: FakeRemoteLookup;
    store: CacheStore;
    corpusDir: string;
}

function withTmp(fn: (tmp: string) => Promise<void>): () => Promise<void> {
    return async () => {
        const tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'job-runner-'));
        try {
            await fn(tmp);
        } finally {
            fs.rmSync(tmp, { recursive: true, force: true });
        }
    };
}

function harness(tmp: string, opts: {
    steps?: Step[];
    save?: CacheSavePolicy;
    remote?: FakeRemoteLookup;
    packages?: FakePackageManager;
    store?: CacheStore;
    script?: ConstructorParameters<typeof FakeCommandRunner>[0];
} = {}): Harness {
    const commands = new FakeCommandRunner({ fetch: fetchCorpus, ...opts.script });
    const packages = opts.packages ?? new FakePackageManager();
    const remote = opts.remote ?? new FakeRemoteLookup('abc123');
    const store = opts.store ?? new CacheStore(path.join(tmp, 'cache.db'));
    const corpusDir = path.join(tmp, 'corpus-{job}');

    const template: JobTemplate = {
        corpus: { url: 'https://example.invalid/corpus.git', path: corpusDir, purpose: 'datasets', save: opts.save ?? 'success' },
        provision: {
            runtimeAxis: 'python',
            packageAxes: { numpy: 'numpy' },
            packages: { pip: '' },
            systemPackages: [],
            policy: POLICY,
        },
        steps: opts.steps ?? [
            { kind: 'command', name: 'fetch', command: 'fetch', skipIf: (s) => s.cache.restore.hit === 'exact' },
            { kind: 'command', name: 'check', command: 'check' },
        ],
    };

    const runner = new JobRunner({
        resolver: new CacheKeyResolver(remote),
        cacheStore: store,
        provisioner: new EnvironmentProvisioner({
            packageManager: packages,
            runtime: 'python',
            workDir: tmp,
            sandboxRoot: path.join(tmp, 'sandboxes'),
        }),
        pipeline: new StepPipeline({ commandRunner: commands, testRunner: new FakeTestRunner() }),
        template,
        lookupAttempts: 2,
        lookupBackoffMs: 0,
    });

    return { runner, commands, packages, remote, store, corpusDir: path.join(tmp, `corpus-${JOB.id}`) };
}

test('provisions the runtime axis version and the axis-pinned packages', withTmp(async (tmp) => {
    const h = harness(tmp);
    const result = await h.runner.run(JOB, new AbortController().signal);

    assert.equal(result.status, 'success');
    assert.equal(h.packages.created[0].runtimeVersion, '3.12');
    assert.deepEqual(h.packages.installed, [{ pip: '', numpy: '2.0' }]);
    assert.equal(h.commands.calls[0].options.env.MATRIX_JOB, '(3.12) (2.0)');
    // sandbox released after the pipeline
    assert.deepEqual(fs.readdirSync(path.join(tmp, 'sandboxes')), []);
    h.store.close();
}));

test('first run populates the cache, second run restores it exactly and does not re-save', withTmp(async (tmp) => {
    const store = new CacheStore(path.join(tmp, 'cache.db'));

    const first = harness(tmp, { store });
    const r1 = await first.runner.run(JOB, new AbortController().signal);
    assert.equal(r1.status, 'success');
    assert.equal(r1.cache?.restore.hit, 'miss');
    assert.equal(r1.cache?.key?.key, `${process.platform}-datasets-abc123`);
    assert.deepEqual(r1.cache?.save, { outcome: 'stored' });

    fs.rmSync(first.corpusDir, { recursive: true, force: true });

    const second = harness(tmp, { store });
    const r2 = await second.runner.run(JOB, new AbortController().signal);
    assert.equal(r2.cache?.restore.hit, 'exact');
    assert.equal(r2.cache?.restore.stale, false);
    assert.deepEqual(r2.cache?.save, { outcome: 'skipped', reason: 'exists' });
    assert.deepEqual(r2.steps.map((s) => s.status), ['skipped', 'success']);
    assert.equal(fs.readFileSync(path.join(second.corpusDir, 'recording.pl2'), 'utf8'), 'corpus-v1');
    assert.equal(second.commands.calls[0].options.env.MATRIX_CACHE_HIT, 'exact');

    store.close();
}));

test('a remote lookup failure degrades to a cache miss and the job still runs', withTmp(async (tmp) => {
    const remote = new FakeRemoteLookup(new RemoteLookupError('host unreachable', 'https://example.invalid/corpus.git'));
    const h = harness(tmp, { remote });
    const result = await h.runner.run(JOB, new AbortController().signal);

    assert.equal(result.status, 'success');
    assert.equal(remote.calls, 2);
    assert.equal(result.cache?.key, null);
    assert.equal(result.cache?.restore.hit, 'miss');
    assert.equal(result.cache?.save, undefined);
    assert.deepEqual(h.store.list(), []);
    h.store.close();
}));

test('provisioning failure fails the job before any step runs', withTmp(async (tmp) => {
    const h = harness(tmp, { packages: new FakePackageManager({ failCreate: 'conda exploded' }) });
    const result = await h.runner.run(JOB, new AbortController().signal);

    assert.equal(result.status, 'failed');
    assert.deepEqual(result.steps, []);
    assert.equal(result.error?.code, 'PROVISION_FAILED');
    assert.equal(result.error?.message, 'Provisioning failed at runtime: conda exploded');
    assert.deepEqual(h.commands.calls, []);
    h.store.close();
}));

test('save policy "success" leaves the cache alone when the pipeline fails', withTmp(async (tmp) => {
    const h = harness(tmp, { script: { check: fail(1) } });
    const result = await h.runner.run(JOB, new AbortController().signal);

    assert.equal(result.status, 'failed');
    assert.equal(result.error?.code, 'STEP_FAILED');
    assert.equal(result.cache?.save, undefined);
    assert.deepEqual(h.store.list(), []);
    h.store.close();
}));

test('save policy "always" populates the cache even when a later step fails', withTmp(async (tmp) => {
    const h = harness(tmp, { save: 'always', script: { check: fail(1) } });
    const result = await h.runner.run(JOB, new AbortController().signal);

    assert.equal(result.status, 'failed');
    assert.deepEqual(result.cache?.save, { outcome: 'stored' });
    assert.deepEqual(h.store.list().map((e) => e.key), [`${process.platform}-datasets-abc123`]);
    h.store.close();
}));

test('an aborted signal cancels the job before provisioning', withTmp(async (tmp) => {
    const h = harness(tmp);
    const controller = new AbortController();
    controller.abort(new Error('fail-fast after (3.9) failed'));

    const result = await h.runner.run(JOB, controller.signal);

    assert.equal(result.status, 'cancelled');
    assert.equal(result.error?.code, 'CANCELLED');
    assert.equal(result.error?.message, 'Cancelled: fail-fast after (3.9) failed');
    assert.deepEqual(h.packages.created, []);
    assert.equal(h.remote.calls, 0);
    h.store.close();
}));

test('corpus path tokens and home directory are expanded', () => {
    const [job] = expandMatrix([{ name: 'python', values: ['3.9'] }]);
    assert.equal(resolveCorpusPath('~/ephy_testing_data', job), path.join(os.homedir(), 'ephy_testing_data'));
    assert.equal(resolveCorpusPath('/data/{job}/{python}', job), '/data/job-0/3.9');
});
