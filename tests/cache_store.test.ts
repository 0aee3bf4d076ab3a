import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { CacheStore } from '../src/cache_store';
import { buildCacheKey } from '../src/cache_key_resolver';

const DAY_MS = 24 * 60 * 60 * 1000;

function setup(now?: () => number) {
    const tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'cache-store-'));
    const store = new CacheStore(path.join(tmp, 'db', 'cache.db'), { now });
    const dir = (name: string) => path.join(tmp, name);
    const write = (root: string, rel: string, content: string) => {
        const file = path.join(root, rel);
        fs.mkdirSync(path.dirname(file), { recursive: true });
        fs.writeFileSync(file, content);
    };
    const cleanup = () => {
        store.close();
        fs.rmSync(tmp, { recursive: true, force: true });
    };
    return { tmp, store, dir, write, cleanup };
}

test('save stores once; later saves for the same key are skipped', async () => {
    const { store, dir, write, cleanup } = setup();
    try {
        const key = buildCacheKey('linux', 'datasets', 'abc123');
        write(dir('src'), 'a.txt', 'v1');

        assert.deepEqual(await store.save(key, dir('src')), { outcome: 'stored' });
        write(dir('src'), 'a.txt', 'v2');
        assert.deepEqual(await store.save(key, dir('src')), { outcome: 'skipped', reason: 'exists' });

        const restored = await store.restore(key, [key.prefix], dir('out'));
        assert.deepEqual(restored, { hit: 'exact', key: 'linux-datasets-abc123', localPath: dir('out'), stale: false });
        assert.equal(fs.readFileSync(path.join(dir('out'), 'a.txt'), 'utf8'), 'v1');
    } finally {
        cleanup();
    }
});

test('restore recreates nested files and their modes', async () => {
    const { store, dir, write, cleanup } = setup();
    try {
        const key = buildCacheKey('linux', 'datasets', 'abc123');
        write(dir('src'), 'plexon/sub/recording.pl2', 'binary-ish');
        write(dir('src'), 'run.sh', '#!/bin/sh');
        fs.chmodSync(path.join(dir('src'), 'run.sh'), 0o755);

        await store.save(key, dir('src'));
        await store.restore(key, [], dir('out'));

        assert.equal(fs.readFileSync(path.join(dir('out'), 'plexon', 'sub', 'recording.pl2'), 'utf8'), 'binary-ish');
        assert.equal(fs.statSync(path.join(dir('out'), 'run.sh')).mode & 0o777, 0o755);
        assert.deepEqual(store.list().map((e) => [e.key, e.fileCount]), [['linux-datasets-abc123', 2]]);
    } finally {
        cleanup();
    }
});

test('a prefix match is reported as prefix and stale, never exact', async () => {
    const { store, dir, write, cleanup } = setup();
    try {
        write(dir('old'), 'a.txt', 'old');
        await store.save(buildCacheKey('linux', 'datasets', 'old'), dir('old'));

        const wanted = buildCacheKey('linux', 'datasets', 'new');
        const result = await store.restore(wanted, [wanted.prefix], dir('out'));

        assert.deepEqual(result, { hit: 'prefix', key: 'linux-datasets-old', localPath: dir('out'), stale: true });
        assert.equal(fs.readFileSync(path.join(dir('out'), 'a.txt'), 'utf8'), 'old');
    } finally {
        cleanup();
    }
});

test('a prefix match takes the most recently stored entry', async () => {
    const { store, dir, write, cleanup } = setup();
    try {
        write(dir('one'), 'a.txt', 'first');
        write(dir('two'), 'a.txt', 'second');
        await store.save(buildCacheKey('linux', 'datasets', 'first'), dir('one'));
        await store.save(buildCacheKey('linux', 'datasets', 'second'), dir('two'));

        const wanted = buildCacheKey('linux', 'datasets', 'third');
        const result = await store.restore(wanted, [wanted.prefix], dir('out'));

        assert.equal(result.key, 'linux-datasets-second');
        assert.equal(fs.readFileSync(path.join(dir('out'), 'a.txt'), 'utf8'), 'second');
    } finally {
        cleanup();
    }
});

test('platform namespaces never share entries', async () => {
    const { store, dir, write, cleanup } = setup();
    try {
        write(dir('src'), 'a.txt', 'mac');
        await store.save(buildCacheKey('darwin', 'datasets', 'abc'), dir('src'));

        const linux = buildCacheKey('linux', 'datasets', 'abc');
        assert.equal((await store.restore(linux, [linux.prefix, 'darwin-datasets-'], dir('out'))).hit, 'miss');
        assert.deepEqual(store.list('linux'), []);
        assert.equal(store.list('darwin').length, 1);
    } finally {
        cleanup();
    }
});

test('an empty or missing directory is not cached', async () => {
    const { store, dir, cleanup } = setup();
    try {
        const key = buildCacheKey('linux', 'datasets', 'abc');
        fs.mkdirSync(dir('empty'));
        assert.deepEqual(await store.save(key, dir('empty')), { outcome: 'skipped', reason: 'empty' });
        assert.deepEqual(await store.save(key, dir('absent')), { outcome: 'skipped', reason: 'empty' });
        assert.equal(store.has(key.key), false);
    } finally {
        cleanup();
    }
});

test('an unavailable store misses on restore and skips on save', async () => {
    const tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'cache-store-'));
    try {
        // a regular file where the database directory should be
        const blocker = path.join(tmp, 'blocker');
        fs.writeFileSync(blocker, '');
        const store = new CacheStore(path.join(blocker, 'cache.db'));
        assert.equal(store.available, false);

        fs.mkdirSync(path.join(tmp, 'src'));
        fs.writeFileSync(path.join(tmp, 'src', 'a.txt'), 'x');
        const key = buildCacheKey('linux', 'datasets', 'abc');

        assert.deepEqual(await store.restore(key, [key.prefix], path.join(tmp, 'out')), {
            hit: 'miss',
            localPath: path.join(tmp, 'out'),
            stale: false,
        });
        assert.deepEqual(await store.save(key, path.join(tmp, 'src')), { outcome: 'skipped', reason: 'unavailable' });
    } finally {
        fs.rmSync(tmp, { recursive: true, force: true });
    }
});

test('prune removes entries unused for the window and keeps recently restored ones', async () => {
    let clock = 1_700_000_000_000;
    const { store, dir, write, cleanup } = setup(() => clock);
    try {
        write(dir('src'), 'a.txt', 'x');
        const stale = buildCacheKey('linux', 'datasets', 'stale');
        const used = buildCacheKey('linux', 'datasets', 'used');
        await store.save(stale, dir('src'));
        await store.save(used, dir('src'));

        clock += 20 * DAY_MS;
        await store.restore(used, [], dir('out'));
        clock += 20 * DAY_MS;

        assert.equal(store.prune(30), 1);
        assert.deepEqual(store.list().map((e) => e.key), ['linux-datasets-used']);
        assert.equal(store.list()[0].lastRestoredAt?.getTime(), 1_700_000_000_000 + 20 * DAY_MS);
    } finally {
        cleanup();
    }
});

test('identical files are shared between entries and survive pruning of one of them', async () => {
    let clock = 1_700_000_000_000;
    const { store, dir, write, cleanup } = setup(() => clock);
    try {
        write(dir('src'), 'a.txt', 'same');
        const one = buildCacheKey('linux', 'datasets', 'one');
        const two = buildCacheKey('linux', 'datasets', 'two');
        await store.save(one, dir('src'));
        clock += 40 * DAY_MS;
        await store.save(two, dir('src'));

        const [first, second] = store.list();
        assert.equal(first.contentHash, second.contentHash);

        assert.equal(store.prune(30), 1);
        assert.equal((await store.restore(two, [], dir('out'))).hit, 'exact');
        assert.equal(fs.readFileSync(path.join(dir('out'), 'a.txt'), 'utf8'), 'same');
    } finally {
        cleanup();
    }
});
