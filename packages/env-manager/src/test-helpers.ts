// Shared fixtures for the test suites: temp directories and a fake runner
// standing in for `python -m venv` and pip.

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { CommandRunner, RunOutcome } from './types';
import { Logger } from './utils/logger';

export const silentLogger = new Logger('silent');

export async function makeTempDir(prefix = 'venv-test-'): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function writeExecutable(file: string, content = '#!/bin/sh\n'): Promise<void> {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, content, { mode: 0o755 });
}

/** Lays out the POSIX tree `python -m venv` would produce. */
export async function writeFakeEnvironment(root: string, version = '3.11.4'): Promise<void> {
    const [major, minor] = version.split('.');
    await writeExecutable(path.join(root, 'bin', 'python'));
    await writeExecutable(path.join(root, 'bin', 'pip'));
    await fs.writeFile(path.join(root, 'bin', 'activate'), '# activate\n');
    await fs.mkdir(path.join(root, 'lib', `python${major}.${minor}`, 'site-packages'), { recursive: true });
    await fs.writeFile(path.join(root, 'pyvenv.cfg'), `home = /usr/bin\ninclude-system-site-packages = false\nversion = ${version}\n`);
}

export interface RecordedCall {
    command: string;
    args: string[];
    env: NodeJS.ProcessEnv;
    cwd?: string;
}

export interface FakePythonOptions {
    version?: string;
    packages?: Record<string, string>;
    /** Exit code of the creation tool; the tree is still written when non-zero and `writeOnFailure` is set. */
    createExitCode?: number;
    writeOnFailure?: boolean;
    /** When false the creation tool exits 0 without writing anything. */
    writeTree?: boolean;
    listExitCode?: number;
    pipCheck?: RunOutcome;
}

/**
 * Runner that simulates the creation tool (invoked as the Node executable) and
 * the environment's python for `-m pip list|install|check` and `-c print(1)`.
 */
export class FakePython {
    readonly calls: RecordedCall[] = [];
    readonly packages: Map<string, string>;

    constructor(private readonly options: FakePythonOptions = {}) {
        this.packages = new Map(Object.entries(options.packages ?? { pip: '24.0', setuptools: '69.5.1' }));
    }

    readonly runner: CommandRunner = async (command, args, opts) => {
        this.calls.push({ command, args: [...args], env: opts.env, cwd: opts.cwd });

        if (command === process.execPath && args.includes('venv')) {
            return this.createEnvironment(args[args.length - 1]);
        }
        if (command.endsWith(path.join('bin', 'python'))) {
            return this.python(args);
        }
        return { exitCode: 127, stdout: '', stderr: `unexpected command ${command}` };
    };

    private async createEnvironment(root: string): Promise<RunOutcome> {
        const exitCode = this.options.createExitCode ?? 0;
        const write = exitCode === 0 ? this.options.writeTree ?? true : this.options.writeOnFailure ?? false;
        if (write) await writeFakeEnvironment(root, this.options.version);
        return exitCode === 0
            ? { exitCode, stdout: '', stderr: '' }
            : { exitCode, stdout: '', stderr: 'Error: venv creation failed' };
    }

    private python(args: string[]): RunOutcome {
        const [flag, module, sub, ...rest] = args;
        if (flag === '-c' && module === 'print(1)') {
            return { exitCode: 0, stdout: '1\n', stderr: '' };
        }
        if (flag !== '-m' || module !== 'pip') {
            return { exitCode: 2, stdout: '', stderr: `python: unsupported arguments ${args.join(' ')}` };
        }

        if (sub === 'list') {
            if (this.options.listExitCode) {
                return { exitCode: this.options.listExitCode, stdout: '', stderr: 'No module named pip' };
            }
            const lines = [...this.packages].map(([name, version]) => `${name}==${version}`);
            return { exitCode: 0, stdout: `${lines.join('\n')}\n`, stderr: '' };
        }
        if (sub === 'install') {
            for (const requirement of rest) {
                const [name, version] = requirement.split('==');
                this.packages.set(name, version ?? '1.0.0');
            }
            return { exitCode: 0, stdout: `Successfully installed ${rest.join(' ')}\n`, stderr: '' };
        }
        if (sub === 'check') {
            return this.options.pipCheck ?? { exitCode: 0, stdout: 'No broken requirements found.\n', stderr: '' };
        }
        return { exitCode: 1, stdout: '', stderr: `ERROR: unknown command "${sub}"` };
    }
}
