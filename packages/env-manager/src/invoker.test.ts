import { promises as fs } from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { InvocationError } from './errors';
import { EnvironmentHandle } from './handle';
import { ProcessInvoker, errnoCode, quoteForCmd, runCommand } from './invoker';
import { FakePython, makeTempDir, silentLogger, writeExecutable, writeFakeEnvironment } from './test-helpers';
import type { CommandRunner } from './types';

describe('ProcessInvoker', () => {
    let tmp: string;
    let root: string;
    let hostBin: string;
    let handle: EnvironmentHandle;

    beforeEach(async () => {
        tmp = await makeTempDir();
        root = path.join(tmp, '.venv');
        hostBin = path.join(tmp, 'host-bin');
        await writeFakeEnvironment(root);
        await writeExecutable(path.join(hostBin, 'python'));
        await writeExecutable(path.join(hostBin, 'git'));
        handle = new EnvironmentHandle(root, 'posix');
    });

    afterEach(async () => {
        await fs.rm(tmp, { recursive: true, force: true });
    });

    function invokerWith(runner: CommandRunner, env: NodeJS.ProcessEnv = { PATH: hostBin }) {
        return new ProcessInvoker(handle, { runner, logger: silentLogger, env });
    }

    it('prefers the environment binary directory over PATH', async () => {
        const fake = new FakePython();
        const result = await invokerWith(fake.runner).invoke('python', ['-c', 'print(1)']);

        expect(fake.calls[0].command).toBe(path.join(root, 'bin', 'python'));
        expect(result).toEqual({
            command: 'python',
            args: ['-c', 'print(1)'],
            exitCode: 0,
            stdout: '1\n',
            stderr: '',
            success: true
        });
        expect(Object.isFrozen(result)).toBe(true);
    });

    it('falls back to the inherited PATH', async () => {
        const runner = vi.fn<Parameters<CommandRunner>, ReturnType<CommandRunner>>().mockResolvedValue({
            exitCode: 0,
            stdout: 'git version 2.43.0\n',
            stderr: ''
        });

        const result = await invokerWith(runner).invoke('git', ['--version']);

        expect(runner.mock.calls[0][0]).toBe(path.join(hostBin, 'git'));
        expect(result.stdout).toBe('git version 2.43.0\n');
    });

    it('activates the environment for the child process', async () => {
        const fake = new FakePython();
        await invokerWith(fake.runner, { PATH: hostBin, PYTHONHOME: '/opt/python', HOME: '/home/dev' }).invoke('python', [
            '-c',
            'print(1)'
        ]);

        const env = fake.calls[0].env;
        expect(env.PATH).toBe(`${path.join(root, 'bin')}:${hostBin}`);
        expect(env.VIRTUAL_ENV).toBe(root);
        expect(env.HOME).toBe('/home/dev');
        expect(env).not.toHaveProperty('PYTHONHOME');
    });

    it('applies per-call environment overrides and cwd', async () => {
        const fake = new FakePython();
        await invokerWith(fake.runner).invoke('python', ['-c', 'print(1)'], { cwd: tmp, env: { PIP_NO_INPUT: '1' } });

        expect(fake.calls[0].cwd).toBe(tmp);
        expect(fake.calls[0].env.PIP_NO_INPUT).toBe('1');
    });

    it('returns a non-zero exit as a result', async () => {
        const fake = new FakePython();
        const result = await invokerWith(fake.runner).invoke('python', ['-m', 'pip', 'frobnicate']);

        expect(result.success).toBe(false);
        expect(result.exitCode).toBe(1);
        expect(result.stderr).toBe('ERROR: unknown command "frobnicate"');
    });

    it('raises InvocationError for an unknown binary', async () => {
        const fake = new FakePython();
        const invoker = invokerWith(fake.runner);

        await expect(invoker.invoke('no-such-tool')).rejects.toBeInstanceOf(InvocationError);
        await expect(invoker.invoke('no-such-tool')).rejects.toThrow(
            `Executable 'no-such-tool' not found in ${path.join(root, 'bin')} or PATH`
        );
        expect(fake.calls).toHaveLength(0);
    });

    it('skips files that are not executable', async () => {
        await fs.writeFile(path.join(root, 'bin', 'notes'), 'plain text', { mode: 0o644 });
        await expect(invokerWith(new FakePython().runner).invoke('notes')).rejects.toBeInstanceOf(InvocationError);
    });

    it('raises InvocationError when the OS refuses to start the process', async () => {
        const refusal = Object.assign(new Error('spawn EACCES'), { code: 'EACCES' });
        const runner = vi.fn<Parameters<CommandRunner>, ReturnType<CommandRunner>>().mockRejectedValue(refusal);

        const error = await invokerWith(runner)
            .invoke('python', ['--version'])
            .catch((e: unknown) => e);

        expect(error).toBeInstanceOf(InvocationError);
        expect(error).toMatchObject({ binary: 'python', code: 'EACCES', message: "Failed to start 'python': spawn EACCES" });
    });

    it('runs host tools without searching the environment', async () => {
        const fake = new FakePython();
        await invokerWith(fake.runner).invokeHost('python', ['-m', 'venv', root]);

        expect(fake.calls[0].command).toBe(path.join(hostBin, 'python'));
        expect(fake.calls[0].env.VIRTUAL_ENV).toBeUndefined();
    });

    it('accepts explicit executable paths', async () => {
        const fake = new FakePython();
        const explicit = path.join(hostBin, 'git');
        await invokerWith(fake.runner).invokeHost(explicit, ['status']);

        expect(fake.calls[0].command).toBe(explicit);
        await expect(invokerWith(fake.runner).invokeHost(path.join(hostBin, 'missing'))).rejects.toThrow(
            `Executable not found: ${path.join(hostBin, 'missing')}`
        );
    });
});

describe('runCommand', () => {
    it('captures output and exit code of a real process', async () => {
        const outcome = await runCommand(
            process.execPath,
            ['-e', "process.stdout.write('1'); process.stderr.write('warn'); process.exitCode = 3"],
            { env: process.env }
        );

        expect(outcome).toEqual({ exitCode: 3, stdout: '1', stderr: 'warn' });
    });

    it('rejects when the executable does not exist', async () => {
        const error = await runCommand(path.join(await makeTempDir(), 'missing'), [], { env: process.env }).catch(
            (e: unknown) => e
        );

        expect(errnoCode(error)).toBe('ENOENT');
    });
});

describe('quoteForCmd', () => {
    it('leaves plain arguments alone', () => {
        expect(quoteForCmd('install')).toBe('install');
        expect(quoteForCmd('C:\\env\\Scripts\\pip.cmd')).toBe('C:\\env\\Scripts\\pip.cmd');
    });

    it('quotes paths with spaces', () => {
        expect(quoteForCmd('C:\\Users\\A B\\.venv\\Scripts\\activate.bat')).toBe(
            '"C:\\Users\\A B\\.venv\\Scripts\\activate.bat"'
        );
    });

    it('quotes shell metacharacters and doubles embedded quotes', () => {
        expect(quoteForCmd('a&b')).toBe('"a&b"');
        expect(quoteForCmd('requests>=2.31')).toBe('"requests>=2.31"');
        expect(quoteForCmd('say "hi"')).toBe('"say ""hi"""');
        expect(quoteForCmd('')).toBe('""');
    });
});
