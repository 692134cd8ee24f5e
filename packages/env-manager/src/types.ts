import { z } from 'zod';

export const platformSchema = z.enum(['windows', 'posix']);

export type Platform = z.infer<typeof platformSchema>;

const packagesSchema = z
    .union([z.array(z.string().min(1)), z.record(z.string().nullable())])
    .default([])
    .transform((packages) =>
        Array.isArray(packages)
            ? packages
            : Object.entries(packages).map(([name, specifier]) => `${name}${specifier ?? ''}`)
    );

// Expected state of a consistent environment
export const expectedConfigurationSchema = z.object({
    interpreter: z.boolean().default(true),
    packages: packagesSchema,
    directories: z.array(z.string().min(1)).default([]),
    files: z.array(z.string().min(1)).default([]),
    strict: z.boolean().default(false),
    allowedExtras: z.array(z.string().min(1)).default(['pip', 'setuptools', 'wheel']),
    pipCheck: z.boolean().default(false)
}).refine((config) => config.interpreter || (config.packages.length === 0 && !config.pipCheck), {
    message: 'packages and pipCheck need the interpreter',
    path: ['interpreter']
});

export type ExpectedConfiguration = z.output<typeof expectedConfigurationSchema>;
export type ExpectedConfigurationInput = z.input<typeof expectedConfigurationSchema>;

export const creatorSchema = z.object({
    command: z.string().min(1),
    args: z.array(z.string()).default(['-m', 'venv'])
});

export type CreatorCommand = z.output<typeof creatorSchema>;

export const managerSettingsSchema = z.object({
    root: z.string(),
    platform: platformSchema.optional(),
    ephemeral: z.boolean().default(false),
    checkOnEnter: z.boolean().default(false),
    expected: expectedConfigurationSchema.optional(),
    creator: creatorSchema.optional()
});

export type ManagerSettings = z.output<typeof managerSettingsSchema>;
export type ManagerSettingsInput = z.input<typeof managerSettingsSchema>;

export interface EnvironmentPaths {
    root: string;
    binaryDir: string;
    interpreterPath: string;
    /** Null on POSIX layouts until the Python version is known. */
    sitePackagesDir: string | null;
    configPath: string;
}

export type LifecycleState = 'absent' | 'creating' | 'present' | 'removing';

export interface CommandResult {
    readonly command: string;
    readonly args: readonly string[];
    readonly exitCode: number;
    readonly stdout: string;
    readonly stderr: string;
    readonly success: boolean;
}

export interface InvokeOptions {
    cwd?: string;
    env?: Record<string, string | undefined>;
}

export interface RunOutcome {
    exitCode: number;
    stdout: string;
    stderr: string;
}

/**
 * Spawns one process and waits for it to exit. Rejects only when the process
 * could not be started.
 */
export type CommandRunner = (
    command: string,
    args: string[],
    opts: { cwd?: string; env: NodeJS.ProcessEnv; shell?: boolean }
) => Promise<RunOutcome>;

export type DiscrepancyKind =
    | 'environment-missing'
    | 'missing-package'
    | 'version-mismatch'
    | 'unexpected-package'
    | 'missing-directory'
    | 'not-a-directory'
    | 'missing-file'
    | 'broken-requirements';

export interface Discrepancy {
    readonly kind: DiscrepancyKind;
    readonly item: string;
    readonly expected: string;
    readonly actual: string;
    readonly message: string;
}

export interface ConsistencyReport {
    readonly passed: boolean;
    readonly environmentPresent: boolean;
    readonly discrepancies: readonly Discrepancy[];
    readonly checkedAt: string;
}

export interface InstalledPackage {
    name: string;
    version: string | null;
}
