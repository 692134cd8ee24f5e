import chalk from 'chalk';
import { z } from 'zod';

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export type LogLevel = z.infer<typeof logLevelSchema>;

export interface EnvLogger {
    debug(message: string): void;
    info(message: string): void;
    success(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

const rank: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4
};

export function levelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
    const parsed = logLevelSchema.safeParse(env.VENV_LOG_LEVEL?.toLowerCase());
    return parsed.success ? parsed.data : 'info';
}

export class Logger implements EnvLogger {
    constructor(
        private readonly level: LogLevel = levelFromEnv(),
        private readonly write: (line: string) => void = (line) => console.log(line)
    ) {}

    debug(message: string): void {
        if (this.enabled('debug')) this.write(`${chalk.gray('·')} ${chalk.gray(message)}`);
    }

    info(message: string): void {
        if (this.enabled('info')) this.write(`${chalk.blue('ℹ')} ${message}`);
    }

    success(message: string): void {
        if (this.enabled('info')) this.write(`${chalk.green('✓')} ${message}`);
    }

    warn(message: string): void {
        if (this.enabled('warn')) this.write(`${chalk.yellow('⚠')} ${message}`);
    }

    error(message: string): void {
        if (this.enabled('error')) this.write(`${chalk.red('✗')} ${message}`);
    }

    private enabled(level: LogLevel): boolean {
        return rank[level] >= rank[this.level];
    }
}

export function startOperation(log: EnvLogger, message: string): number {
    log.info(message);
    return Date.now();
}

export function endOperation(log: EnvLogger, startTime: number, message: string): void {
    const duration = ((Date.now() - startTime) / 1000).toFixed(1);
    log.success(`${message} (${duration}s)`);
}

export const logger = new Logger();
