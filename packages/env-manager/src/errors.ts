import type { ZodIssue } from 'zod';
import type { CommandResult } from './types';

export class EnvError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class PathResolutionError extends EnvError {
    constructor(public readonly root: string, reason: string) {
        super(`Cannot resolve environment root '${root}': ${reason}`);
    }
}

/** The binary could not be located, or the OS refused to start it. */
export class InvocationError extends EnvError {
    constructor(
        public readonly binary: string,
        message: string,
        public readonly code?: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
    }
}

export class CreationError extends EnvError {
    constructor(message: string, public readonly result?: CommandResult, options?: { cause?: unknown }) {
        super(message, options);
    }
}

export class RemovalError extends EnvError {
    constructor(public readonly root: string, options: { cause?: unknown; reason?: string } = {}) {
        const reason = options.reason ?? errorMessage(options.cause);
        super(`Failed to remove environment at ${root}: ${reason}`, { cause: options.cause });
    }
}

/**
 * The package listing could not be produced. A failing consistency report is
 * not an error; this is raised only when the check itself cannot run.
 */
export class ConsistencyError extends EnvError {
    constructor(message: string, public readonly result?: CommandResult, options?: { cause?: unknown }) {
        super(message, options);
    }
}

export class InvalidStateError extends EnvError {
    constructor(operation: string, public readonly state: string) {
        super(`Cannot ${operation} while environment is ${state}`);
    }
}

export class ConfigError extends EnvError {
    constructor(message: string, public readonly issues: ZodIssue[] = [], options?: { cause?: unknown }) {
        super(issues.length > 0 ? `${message}: ${formatIssues(issues)}` : message, options);
    }
}

function formatIssues(issues: ZodIssue[]): string {
    return issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : 'Unknown error';
}
