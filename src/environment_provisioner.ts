/**
 * Environment Provisioner
 *
 * Materializes one isolated environment per job: a private sandbox
 * directory, a runtime at the requested version, and each declared package
 * at its pinned version. Nothing is shared between jobs except the system
 * package layer, which is installed through its own collaborator.
 */

import * as fs from 'fs';
import * as path from 'path';
import { createLogger } from './logger';
import { SANDBOX_ROOT } from './config';
import { commandSucceeded, describeCommandFailure, type CommandRunner } from './command_runner';
import { ProvisionError, errorMessage } from './structured_error';
import type { DependencyPolicy, Environment, ProvisionRequest } from './matrix_types';

const log = createLogger('provisioner');

/* -------------------------------------------------------------------------- */
/* Collaborators                                                              */
/* -------------------------------------------------------------------------- */

export interface RuntimeTarget {
    /** Directory the environment's runtime lives in */
    prefix: string;
    runtime: string;
    runtimeVersion: string;
}

/** Creates runtimes and installs pinned packages into them. Throws on failure. */
export interface PackageManager {
    createEnvironment(target: RuntimeTarget, policy: DependencyPolicy, timeoutMs: number): Promise<void>;
    installPackages(target: RuntimeTarget, packages: Record<string, string>, policy: DependencyPolicy, timeoutMs: number): Promise<void>;
    /** Variables that activate the environment for commands run in it */
    activationVars(target: RuntimeTarget): Record<string, string>;
}

/** OS-level packages (shared machine state, not per-job). Throws on failure. */
export interface SystemPackageInstaller {
    install(packages: string[], policy: DependencyPolicy, timeoutMs: number): Promise<void>;
}

export function shellQuote(value: string): string {
    return /^[A-Za-z0-9_\-.,:/=+@%]+$/.test(value) ? value : `'${value.replace(/'/g, `'\\''`)}'`;
}

async function runOrThrow(runner: CommandRunner, command: string, cwd: string, timeoutMs: number): Promise<void> {
    const result = await runner.run(command, { cwd, env: {}, timeoutMs });
    if (!commandSucceeded(result)) {
        throw new Error(`${command} -> ${describeCommandFailure(result)}`);
    }
}

/**
 * conda with a per-job prefix: `conda create --prefix <sandbox>/env`.
 */
export class CondaPackageManager implements PackageManager {
    constructor(private readonly runner: CommandRunner, private readonly executable: string = 'conda') { }

    private channelArgs(policy: DependencyPolicy): string {
        return policy.channels.map((c) => ` -c ${shellQuote(c)}`).join('');
    }

    async createEnvironment(target: RuntimeTarget, policy: DependencyPolicy, timeoutMs: number): Promise<void> {
        const spec = shellQuote(`${target.runtime}=${target.runtimeVersion}`);
        const command = `${this.executable} create --yes --quiet --prefix ${shellQuote(target.prefix)} ${spec}${this.channelArgs(policy)}`;
        await runOrThrow(this.runner, command, path.dirname(target.prefix), timeoutMs);
    }

    async installPackages(target: RuntimeTarget, packages: Record<string, string>, policy: DependencyPolicy, timeoutMs: number): Promise<void> {
        const specs = Object.entries(packages).map(([name, version]) => shellQuote(version ? `${name}=${version}` : name));
        if (specs.length === 0) return;
        const command = `${this.executable} install --yes --quiet --prefix ${shellQuote(target.prefix)} ${specs.join(' ')}${this.channelArgs(policy)}`;
        await runOrThrow(this.runner, command, path.dirname(target.prefix), timeoutMs);
    }

    activationVars(target: RuntimeTarget): Record<string, string> {
        return {
            CONDA_PREFIX: target.prefix,
            PATH: `${path.join(target.prefix, 'bin')}${path.delimiter}${process.env.PATH ?? ''}`,
        };
    }
}

export class AptSystemPackageInstaller implements SystemPackageInstaller {
    constructor(private readonly runner: CommandRunner, private readonly useSudo: boolean = true) { }

    async install(packages: string[], policy: DependencyPolicy, timeoutMs: number): Promise<void> {
        if (packages.length === 0) return;
        const sudo = this.useSudo ? 'sudo ' : '';
        const downgrade = policy.allowVersionDowngrade ? ' --allow-downgrades' : '';
        const command =
            `${sudo}apt-get update -qq && ` +
            `${sudo}apt-get install -yqq${downgrade} ${packages.map(shellQuote).join(' ')}`;
        await runOrThrow(this.runner, command, '/', timeoutMs);
    }
}

/* -------------------------------------------------------------------------- */
/* Provisioner                                                                */
/* -------------------------------------------------------------------------- */

export interface EnvironmentProvisionerOptions {
    packageManager: PackageManager;
    systemPackages?: SystemPackageInstaller;
    /** Runtime package name handed to the package manager (e.g. "python") */
    runtime: string;
    /** Directory steps run in unless they name their own */
    workDir: string;
    sandboxRoot?: string;
}

export class EnvironmentProvisioner {
    private readonly sandboxRoot: string;

    constructor(private readonly opts: EnvironmentProvisionerOptions) {
        this.sandboxRoot = opts.sandboxRoot ?? SANDBOX_ROOT;
    }

    /**
     * Fails with ProvisionError when the runtime, any pinned package or a
     * system package cannot be installed, or the policy timeout runs out.
     * The sandbox is removed on failure.
     */
    async provision(request: ProvisionRequest): Promise<Environment> {
        const deadline = Date.now() + request.policy.timeoutMs;
        const remaining = (stage: string): number => {
            const left = deadline - Date.now();
            if (left <= 0) {
                throw new ProvisionError(`Provisioning timed out before ${stage}`, {
                    job: request.jobId,
                    timeout_ms: request.policy.timeoutMs,
                });
            }
            return left;
        };

        let root: string;
        try {
            fs.mkdirSync(this.sandboxRoot, { recursive: true });
            root = fs.mkdtempSync(path.join(this.sandboxRoot, `${request.jobId}-`));
        } catch (e) {
            throw new ProvisionError(`Cannot create sandbox: ${errorMessage(e)}`, { job: request.jobId }, e);
        }

        const target: RuntimeTarget = {
            prefix: path.join(root, 'env'),
            runtime: this.opts.runtime,
            runtimeVersion: request.runtimeVersion,
        };

        let stage = 'runtime';
        try {
            log.info(`Creating ${target.runtime} ${target.runtimeVersion} environment`, { job: request.jobId, root });
            await this.opts.packageManager.createEnvironment(target, request.policy, remaining(stage));

            stage = 'packages';
            if (Object.keys(request.packages).length > 0) {
                log.info('Installing pinned packages', { job: request.jobId, packages: request.packages });
                await this.opts.packageManager.installPackages(target, request.packages, request.policy, remaining(stage));
            }

            stage = 'system packages';
            const systemPackages = request.systemPackages ?? [];
            if (systemPackages.length > 0) {
                if (!this.opts.systemPackages) {
                    throw new Error('no system package installer configured');
                }
                await this.opts.systemPackages.install(systemPackages, request.policy, remaining(stage));
            }
        } catch (e) {
            this.removeSandbox(root);
            if (e instanceof ProvisionError) throw e;
            throw new ProvisionError(
                `Provisioning failed at ${stage}: ${errorMessage(e)}`,
                { job: request.jobId, stage, runtime_version: request.runtimeVersion },
                e
            );
        }

        return {
            id: path.basename(root),
            name: `${request.jobId}-${target.runtime}-${request.runtimeVersion}`,
            root,
            runtimeVersion: request.runtimeVersion,
            packages: { ...request.packages },
            vars: this.opts.packageManager.activationVars(target),
            workDir: this.opts.workDir,
        };
    }

    release(env: Environment): void {
        this.removeSandbox(env.root);
    }

    private removeSandbox(root: string): void {
        try {
            fs.rmSync(root, { recursive: true, force: true });
        } catch (e) {
            log.warn(`Could not remove sandbox ${root}: ${errorMessage(e)}`);
        }
    }
}
