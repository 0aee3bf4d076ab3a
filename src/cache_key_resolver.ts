/**
 * Cache Key Resolver
 *
 * Derives the cache key for an external data corpus from the corpus
 * repository's current head reference. The key changes exactly when the
 * corpus content changes; code changes in the repository under test never
 * touch it.
 */

import { execFile } from 'child_process';
import { createLogger } from './logger';
import { TIMEOUTS } from './config';
import { RemoteLookupError, errorMessage } from './structured_error';
import type { CacheKey } from './matrix_types';

const log = createLogger('cache-key');

/** Remote corpus host: answers "what is your current head". */
export interface RemoteLookup {
    headReference(url: string): Promise<string>;
}

/**
 * `git ls-remote <url> HEAD`, first field of the first line.
 */
export class GitRemoteLookup implements RemoteLookup {
    constructor(private readonly timeoutMs: number = TIMEOUTS.REMOTE_LOOKUP_MS) { }

    headReference(url: string): Promise<string> {
        return new Promise<string>((resolve, reject) => {
            execFile(
                'git',
                ['ls-remote', url, 'HEAD'],
                { timeout: this.timeoutMs, env: { ...process.env, GIT_TERMINAL_PROMPT: '0' } },
                (err, stdout, stderr) => {
                    if (err) {
                        const detail = String(stderr).trim() || err.message;
                        reject(new RemoteLookupError(`git ls-remote failed for ${url}: ${detail}`, url, err));
                        return;
                    }
                    resolve(parseLsRemote(String(stdout)));
                }
            );
        });
    }
}

export function parseLsRemote(output: string): string {
    const firstLine = output.split('\n').find((line) => line.trim() !== '') ?? '';
    return firstLine.split('\t')[0].trim();
}

export function buildCacheKey(platform: string, purpose: string, identifier: string): CacheKey {
    const prefix = `${platform}-${purpose}-`;
    return { platform, purpose, identifier, prefix, key: `${prefix}${identifier}` };
}

export class CacheKeyResolver {
    constructor(private readonly remote: RemoteLookup) { }

    /**
     * Single lookup, no retries. Throws RemoteLookupError when the remote is
     * unreachable or answers without a reference.
     */
    async resolve(corpusRepoUrl: string, platform: string, purpose: string): Promise<CacheKey> {
        let identifier: string;
        try {
            identifier = await this.remote.headReference(corpusRepoUrl);
        } catch (e) {
            if (e instanceof RemoteLookupError) throw e;
            throw new RemoteLookupError(`Remote lookup failed for ${corpusRepoUrl}: ${errorMessage(e)}`, corpusRepoUrl, e);
        }

        if (identifier.trim() === '') {
            throw new RemoteLookupError(`Remote returned no head reference: ${corpusRepoUrl}`, corpusRepoUrl);
        }

        const key = buildCacheKey(platform, purpose, identifier);
        log.debug(`Resolved cache key ${key.key}`, { url: corpusRepoUrl });
        return key;
    }
}
