import { ConsistencyChecker } from './consistency';
import { ConfigError, errorMessage } from './errors';
import { EnvironmentHandle } from './handle';
import { ProcessInvoker } from './invoker';
import { LifecycleController } from './lifecycle';
import {
    managerSettingsSchema,
    type CommandResult,
    type CommandRunner,
    type ConsistencyReport,
    type ExpectedConfigurationInput,
    type InvokeOptions,
    type LifecycleState,
    type ManagerSettings,
    type ManagerSettingsInput
} from './types';
import { logger as defaultLogger, type EnvLogger } from './utils/logger';

export interface ManagerOptions extends ManagerSettingsInput {
    logger?: EnvLogger;
    runner?: CommandRunner;
    /** Inherited process environment for child processes. */
    env?: NodeJS.ProcessEnv;
}

/**
 * Session object over one environment root. `use()` creates the environment
 * on entry if needed and runs `exit()` exactly once however the body ends.
 *
 * @example
 * await EnvironmentManager.with({ root: '.venv', ephemeral: true }, async (env) => {
 *     await env.install('requests');
 *     const result = await env.run('python', '-c', 'import requests');
 * });
 */
export class EnvironmentManager {
    readonly handle: EnvironmentHandle;
    private readonly settings: ManagerSettings;
    private readonly log: EnvLogger;
    private readonly invoker: ProcessInvoker;
    private readonly lifecycle: LifecycleController;
    private readonly checker: ConsistencyChecker;

    constructor(options: ManagerOptions) {
        const { logger, runner, env, ...input } = options;
        const parsed = managerSettingsSchema.safeParse(input);
        if (!parsed.success) {
            throw new ConfigError('Invalid environment manager options', parsed.error.issues);
        }

        this.settings = parsed.data;
        this.log = logger ?? defaultLogger;
        this.handle = new EnvironmentHandle(this.settings.root, this.settings.platform);
        this.invoker = new ProcessInvoker(this.handle, { runner, logger: this.log, env });
        this.lifecycle = new LifecycleController(this.handle, this.invoker, {
            creator: this.settings.creator,
            logger: this.log
        });
        this.checker = new ConsistencyChecker(this.handle, this.invoker, this.lifecycle, { logger: this.log });
    }

    static async with<T>(options: ManagerOptions, body: (manager: EnvironmentManager) => Promise<T>): Promise<T> {
        return new EnvironmentManager(options).use(body);
    }

    get state(): LifecycleState {
        return this.lifecycle.state;
    }

    get ephemeral(): boolean {
        return this.settings.ephemeral;
    }

    /**
     * When both the body and the teardown fail, the rejection is an
     * AggregateError holding the body's error first.
     */
    async use<T>(body: (manager: this) => Promise<T>): Promise<T> {
        await this.enter();
        let result: T;
        try {
            result = await body(this);
        } catch (error) {
            try {
                await this.exit();
            } catch (exitError) {
                this.log.error(`Teardown after a failed session also failed: ${errorMessage(exitError)}`);
                throw new AggregateError([error, exitError], errorMessage(error));
            }
            throw error;
        }
        await this.exit();
        return result;
    }

    /** Creates the environment when absent; otherwise optionally reports drift as warnings. */
    async enter(): Promise<this> {
        if (!(await this.lifecycle.exists())) {
            await this.lifecycle.create();
            return this;
        }

        await this.handle.refresh();
        if (this.settings.checkOnEnter) {
            try {
                const report = await this.checker.check(this.settings.expected);
                for (const item of report.discrepancies) {
                    this.log.warn(item.message);
                }
            } catch (error) {
                this.log.warn(`Consistency check on entry could not run: ${errorMessage(error)}`);
            }
        }
        return this;
    }

    async exit(): Promise<void> {
        if (this.settings.ephemeral) {
            await this.lifecycle.remove();
        }
    }

    async exists(): Promise<boolean> {
        return this.lifecycle.exists();
    }

    async create(): Promise<CommandResult> {
        return this.lifecycle.create();
    }

    async remove(): Promise<void> {
        return this.lifecycle.remove();
    }

    /** Removes and recreates the environment for a clean slate. */
    async flush(): Promise<this> {
        this.log.info(`Flushing virtual environment: ${this.handle.root}`);
        await this.lifecycle.remove();
        await this.lifecycle.create();
        return this;
    }

    async check(expected?: ExpectedConfigurationInput): Promise<ConsistencyReport> {
        return this.checker.check(expected ?? this.settings.expected);
    }

    async run(binary: string, ...args: string[]): Promise<CommandResult> {
        return this.invoker.invoke(binary, args);
    }

    async runWith(binary: string, args: string[], options: InvokeOptions = {}): Promise<CommandResult> {
        return this.invoker.invoke(binary, args, options);
    }

    async install(...packages: string[]): Promise<CommandResult> {
        const result = await this.invoker.invoke('python', ['-m', 'pip', 'install', ...packages]);
        if (result.success) {
            this.log.success(`Installed ${packages.join(', ')}`);
        } else {
            this.log.error(`pip install ${packages.join(' ')} failed with exit code ${result.exitCode}`);
        }
        return result;
    }
}
