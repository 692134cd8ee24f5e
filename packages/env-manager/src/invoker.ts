import { spawn } from 'child_process';
import { constants as fsConstants, promises as fs } from 'fs';
import { constants as osConstants } from 'os';
import { InvocationError, errorMessage } from './errors';
import type { EnvironmentHandle } from './handle';
import { pathFlavor } from './paths';
import type { CommandResult, CommandRunner, InvokeOptions, RunOutcome } from './types';
import { logger as defaultLogger, type EnvLogger } from './utils/logger';

const DEFAULT_PATHEXT = '.COM;.EXE;.BAT;.CMD';

/**
 * Spawns a process and collects its output. Resolves on exit whatever the
 * exit code; rejects when the process could not be started.
 */
export const runCommand: CommandRunner = (command, args, opts) =>
    new Promise<RunOutcome>((resolve, reject) => {
        const child = spawn(command, args, {
            cwd: opts.cwd,
            env: opts.env,
            shell: opts.shell ?? false,
            stdio: ['ignore', 'pipe', 'pipe'],
            windowsHide: true
        });

        let stdout = '';
        let stderr = '';
        let settled = false;

        child.stdout.setEncoding('utf8');
        child.stderr.setEncoding('utf8');
        child.stdout.on('data', (chunk: string) => (stdout += chunk));
        child.stderr.on('data', (chunk: string) => (stderr += chunk));

        child.on('error', (error) => {
            if (settled) return;
            settled = true;
            reject(error);
        });

        child.on('close', (code, signal) => {
            if (settled) return;
            settled = true;
            const exitCode = code ?? (signal ? 128 + osConstants.signals[signal] : 1);
            resolve({ exitCode, stdout, stderr });
        });
    });

export function errnoCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

const CMD_SPECIAL = /[\s"&|<>^(),;=!%]/;

/**
 * Quotes one argument for a `cmd.exe /s /c` command line, which is how Node
 * runs `.bat` and `.cmd` files when `shell` is set. Node joins the pieces
 * with spaces and does no quoting of its own.
 */
export function quoteForCmd(arg: string): string {
    if (arg === '') return '""';
    if (!CMD_SPECIAL.test(arg)) return arg;
    return `"${arg.replace(/"/g, '""')}"`;
}

function findKey(env: NodeJS.ProcessEnv, name: string): string {
    return Object.keys(env).find((key) => key.toUpperCase() === name) ?? name;
}

export interface ProcessInvokerOptions {
    runner?: CommandRunner;
    logger?: EnvLogger;
    /** Inherited environment; defaults to process.env. */
    env?: NodeJS.ProcessEnv;
}

export class ProcessInvoker {
    private readonly runner: CommandRunner;
    private readonly log: EnvLogger;
    private readonly baseEnv: NodeJS.ProcessEnv;

    constructor(private readonly handle: EnvironmentHandle, options: ProcessInvokerOptions = {}) {
        this.runner = options.runner ?? runCommand;
        this.log = options.logger ?? defaultLogger;
        this.baseEnv = options.env ?? process.env;
    }

    /**
     * Runs a binary from the environment's binary directory, falling back to
     * the inherited PATH. A non-zero exit is returned, not thrown.
     */
    async invoke(binary: string, args: string[] = [], options: InvokeOptions = {}): Promise<CommandResult> {
        const inherited = { ...this.baseEnv, ...options.env };
        const executable = await this.resolveBinary(binary, inherited, true);
        return this.execute(binary, executable, args, this.activatedEnv(inherited), options.cwd);
    }

    /** Runs a host tool found on the inherited PATH, outside the environment. */
    async invokeHost(command: string, args: string[] = [], options: InvokeOptions = {}): Promise<CommandResult> {
        const env = { ...this.baseEnv, ...options.env };
        const executable = await this.resolveBinary(command, env, false);
        return this.execute(command, executable, args, env, options.cwd);
    }

    async resolveBinary(binary: string, env: NodeJS.ProcessEnv, searchEnvironment: boolean): Promise<string> {
        if (binary.trim() === '') {
            throw new InvocationError(binary, 'Binary name is empty', 'ENOENT');
        }

        const flavor = pathFlavor(this.handle.platform);
        const hasSeparator = binary.includes('/') || (this.handle.platform === 'windows' && binary.includes('\\'));
        if (hasSeparator) {
            const candidate = flavor.resolve(binary);
            if (await this.isExecutable(candidate)) return candidate;
            throw new InvocationError(binary, `Executable not found: ${candidate}`, 'ENOENT');
        }

        const searchPath = env[findKey(env, 'PATH')] ?? '';
        const dirs = searchPath.split(flavor.delimiter).filter((dir) => dir !== '');
        if (searchEnvironment) dirs.unshift(this.handle.binaryDir);

        const names = this.candidateNames(binary, env);
        for (const dir of dirs) {
            for (const name of names) {
                const candidate = flavor.join(dir, name);
                if (await this.isExecutable(candidate)) return candidate;
            }
        }

        const where = searchEnvironment ? `${this.handle.binaryDir} or PATH` : 'PATH';
        throw new InvocationError(binary, `Executable '${binary}' not found in ${where}`, 'ENOENT');
    }

    private candidateNames(binary: string, env: NodeJS.ProcessEnv): string[] {
        if (this.handle.platform !== 'windows' || pathFlavor('windows').extname(binary) !== '') {
            return [binary];
        }
        const extensions = (env[findKey(env, 'PATHEXT')] ?? DEFAULT_PATHEXT)
            .split(';')
            .filter((ext) => ext !== '')
            .map((ext) => ext.toLowerCase());
        return [...extensions.map((ext) => `${binary}${ext}`), binary];
    }

    private async isExecutable(candidate: string): Promise<boolean> {
        try {
            const stat = await fs.stat(candidate);
            if (!stat.isFile()) return false;
            if (this.handle.platform === 'posix' && process.platform !== 'win32') {
                await fs.access(candidate, fsConstants.X_OK);
            }
            return true;
        } catch {
            return false;
        }
    }

    /** Same variables a shell activation script would set. */
    private activatedEnv(inherited: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
        const env: NodeJS.ProcessEnv = { ...inherited };
        const pathKey = findKey(env, 'PATH');
        const delimiter = pathFlavor(this.handle.platform).delimiter;
        const current = env[pathKey];
        env[pathKey] = current ? `${this.handle.binaryDir}${delimiter}${current}` : this.handle.binaryDir;
        env.VIRTUAL_ENV = this.handle.root;
        delete env[findKey(env, 'PYTHONHOME')];
        return env;
    }

    private async execute(
        name: string,
        executable: string,
        args: string[],
        env: NodeJS.ProcessEnv,
        cwd?: string
    ): Promise<CommandResult> {
        const display = [name, ...args].join(' ');
        this.log.debug(`Running: ${display}`);

        const shell = this.handle.platform === 'windows' && /\.(bat|cmd)$/i.test(executable);
        const command = shell ? quoteForCmd(executable) : executable;
        const commandArgs = shell ? args.map(quoteForCmd) : args;

        let outcome: RunOutcome;
        try {
            outcome = await this.runner(command, commandArgs, { cwd, env, shell });
        } catch (error) {
            const message = `Failed to start '${name}': ${errorMessage(error)}`;
            this.log.error(message);
            throw new InvocationError(name, message, errnoCode(error), { cause: error });
        }

        if (outcome.exitCode !== 0) {
            this.log.debug(`Command '${display}' exited with code ${outcome.exitCode}`);
        }

        return Object.freeze({
            command: name,
            args: Object.freeze([...args]),
            exitCode: outcome.exitCode,
            stdout: outcome.stdout,
            stderr: outcome.stderr,
            success: outcome.exitCode === 0
        });
    }
}
