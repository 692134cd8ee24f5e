import { promises as fs } from 'fs';
import * as path from 'path';
import { CreationError, InvalidStateError, InvocationError, RemovalError, errorMessage } from './errors';
import type { EnvironmentHandle } from './handle';
import type { ProcessInvoker } from './invoker';
import type { CommandResult, CreatorCommand, LifecycleState, Platform } from './types';
import { endOperation, logger as defaultLogger, startOperation, type EnvLogger } from './utils/logger';

export function defaultCreator(platform: Platform): CreatorCommand {
    return {
        command: platform === 'windows' ? 'python' : 'python3',
        args: ['-m', 'venv']
    };
}

export interface LifecycleOptions {
    creator?: CreatorCommand;
    logger?: EnvLogger;
}

/**
 * Drives an environment through absent -> creating -> present -> removing -> absent.
 * There is no rollback: a failed creation leaves whatever the tool wrote.
 */
export class LifecycleController {
    private current: LifecycleState = 'absent';
    private readonly creator: CreatorCommand;
    private readonly log: EnvLogger;

    constructor(
        private readonly handle: EnvironmentHandle,
        private readonly invoker: ProcessInvoker,
        options: LifecycleOptions = {}
    ) {
        this.creator = options.creator ?? defaultCreator(handle.platform);
        this.log = options.logger ?? defaultLogger;
    }

    get state(): LifecycleState {
        return this.current;
    }

    /** Stats the interpreter on every call; another process may have changed the tree. */
    async exists(): Promise<boolean> {
        let present: boolean;
        try {
            present = (await fs.stat(this.handle.interpreterPath)).isFile();
        } catch {
            present = false;
        }
        if (this.current !== 'creating' && this.current !== 'removing') {
            this.current = present ? 'present' : 'absent';
        }
        return present;
    }

    async create(): Promise<CommandResult> {
        if (await this.exists()) {
            throw new InvalidStateError('create', this.current);
        }

        const root = this.handle.root;
        const startTime = startOperation(this.log, `Creating virtual environment at ${root}`);
        this.current = 'creating';

        let result: CommandResult;
        try {
            result = await this.invoker.invokeHost(this.creator.command, [...this.creator.args, root]);
        } catch (error) {
            this.current = 'absent';
            await this.exists();
            const message = `Environment creation tool '${this.creator.command}' could not run: ${errorMessage(error)}`;
            this.log.error(message);
            if (error instanceof InvocationError) {
                throw new CreationError(message, undefined, { cause: error });
            }
            throw error;
        }

        this.current = 'absent';
        const present = await this.exists();

        if (!result.success) {
            const message = `Environment creation failed with exit code ${result.exitCode}`;
            this.log.error(message);
            if (result.stderr.trim() !== '') this.log.error(result.stderr.trim());
            throw new CreationError(message, result);
        }
        if (!present) {
            const message = `Environment creation reported success but ${this.handle.interpreterPath} is missing`;
            this.log.error(message);
            throw new CreationError(message, result);
        }

        await this.handle.refresh();
        endOperation(this.log, startTime, `Virtual environment created: ${root}`);
        return result;
    }

    /**
     * Deletes the whole root tree. Removing an absent environment is a no-op.
     * A non-empty root with neither `pyvenv.cfg` nor an interpreter is left alone.
     */
    async remove(): Promise<void> {
        const root = this.handle.root;
        const existed = await fs.stat(root).then(
            () => true,
            () => false
        );
        if (!existed) {
            this.log.debug(`Nothing to remove at ${root}`);
            this.current = 'absent';
            this.handle.forget();
            return;
        }

        if (!(await this.looksLikeEnvironment(root))) {
            const refusal = new RemovalError(root, {
                reason: 'no pyvenv.cfg or interpreter found, refusing to delete'
            });
            this.log.error(refusal.message);
            throw refusal;
        }

        this.current = 'removing';
        try {
            await fs.rm(root, { recursive: true, force: true });
        } catch (error) {
            this.current = 'absent';
            await this.exists();
            const removalError = new RemovalError(root, { cause: error });
            this.log.error(removalError.message);
            throw removalError;
        }

        this.current = 'absent';
        this.handle.forget();
        this.log.info(`Virtual environment removed: ${root}`);
    }

    private async looksLikeEnvironment(root: string): Promise<boolean> {
        if (await this.exists()) return true;
        const marked = await fs.stat(path.join(root, 'pyvenv.cfg')).then(
            () => true,
            () => false
        );
        if (marked) return true;
        return fs.readdir(root).then(
            (entries) => entries.length === 0,
            () => false
        );
    }
}
