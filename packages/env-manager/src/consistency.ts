import { promises as fs } from 'fs';
import { ConfigError, ConsistencyError, InvocationError, errorMessage } from './errors';
import type { EnvironmentHandle } from './handle';
import type { ProcessInvoker } from './invoker';
import type { LifecycleController } from './lifecycle';
import { pathFlavor } from './paths';
import {
    formatSpecifiers,
    mergeRequirements,
    normalizeName,
    parseRequirement,
    satisfies,
    type Requirement
} from './requirements';
import {
    expectedConfigurationSchema,
    type CommandResult,
    type ConsistencyReport,
    type Discrepancy,
    type ExpectedConfiguration,
    type ExpectedConfigurationInput,
    type InstalledPackage
} from './types';
import { logger as defaultLogger, type EnvLogger } from './utils/logger';

export const LIST_PACKAGES_ARGS = ['-m', 'pip', 'list', '--format=freeze'];
export const PIP_CHECK_ARGS = ['-m', 'pip', 'check'];

/**
 * Reads `pip list` output in either freeze ("name==version") or column
 * ("name version") format. Header, rule and notice lines are skipped.
 */
export function parsePackageList(output: string): Map<string, InstalledPackage> {
    const installed = new Map<string, InstalledPackage>();
    for (const rawLine of output.split(/\r?\n/)) {
        const line = rawLine.trim();
        if (line === '' || /^(-|#|\[notice\]|warning:)/i.test(line) || /^package\s+version\b/i.test(line)) {
            continue;
        }

        let name: string;
        let version: string | null;
        if (line.includes('==')) {
            const [left, right] = line.split('==', 2);
            name = left;
            version = right.trim() || null;
        } else if (line.includes(' @ ')) {
            name = line.slice(0, line.indexOf(' @ '));
            version = null;
        } else {
            const [first, second] = line.split(/\s+/);
            name = first;
            version = second ?? null;
        }

        const normalized = normalizeName(name);
        if (normalized !== '') installed.set(normalized, { name: name.trim(), version });
    }
    return installed;
}

export function parseExpected(input: unknown = {}): ExpectedConfiguration {
    const parsed = expectedConfigurationSchema.safeParse(input);
    if (!parsed.success) {
        throw new ConfigError('Invalid expected configuration', parsed.error.issues);
    }
    return parsed.data;
}

function discrepancy(kind: Discrepancy['kind'], item: string, expected: string, actual: string, message: string): Discrepancy {
    return Object.freeze({ kind, item, expected, actual, message });
}

function buildReport(environmentPresent: boolean, discrepancies: Discrepancy[]): ConsistencyReport {
    return Object.freeze({
        passed: discrepancies.length === 0,
        environmentPresent,
        discrepancies: Object.freeze([...discrepancies]),
        checkedAt: new Date().toISOString()
    });
}

export interface ConsistencyCheckerOptions {
    logger?: EnvLogger;
}

/** Compares an environment against an expected configuration. Never mutates it. */
export class ConsistencyChecker {
    private readonly log: EnvLogger;

    constructor(
        private readonly handle: EnvironmentHandle,
        private readonly invoker: ProcessInvoker,
        private readonly lifecycle: LifecycleController,
        options: ConsistencyCheckerOptions = {}
    ) {
        this.log = options.logger ?? defaultLogger;
    }

    async check(input: ExpectedConfigurationInput = {}): Promise<ConsistencyReport> {
        const expected = parseExpected(input);
        const requirements = mergeRequirements(expected.packages.map(parseRequirement));

        const present = expected.interpreter ? await this.lifecycle.exists() : await this.isDirectory(this.handle.root);
        if (!present) {
            const root = this.handle.root;
            this.log.warn(`Virtual environment missing: ${root}`);
            return buildReport(false, [
                discrepancy('environment-missing', root, 'present', 'absent', `Environment missing: ${root}`)
            ]);
        }

        const discrepancies: Discrepancy[] = [];
        if (expected.interpreter) {
            const installed = await this.listPackages();
            discrepancies.push(...this.comparePackages(requirements, installed, expected));
        }
        discrepancies.push(...(await this.checkStructure(expected)));
        if (expected.pipCheck) {
            const broken = await this.pipCheck();
            if (broken) discrepancies.push(broken);
        }

        const report = buildReport(true, discrepancies);
        if (report.passed) {
            this.log.success('Virtual environment is consistent with configuration.');
        } else {
            this.log.warn(`Virtual environment has ${discrepancies.length} discrepancies.`);
        }
        return report;
    }

    async listPackages(): Promise<Map<string, InstalledPackage>> {
        const result = await this.runPip(LIST_PACKAGES_ARGS, 'list installed packages');
        if (!result.success) {
            const error = new ConsistencyError(`Package listing failed with exit code ${result.exitCode}`, result);
            this.log.error(error.message);
            throw error;
        }
        return parsePackageList(result.stdout);
    }

    private comparePackages(
        requirements: Requirement[],
        installed: Map<string, InstalledPackage>,
        expected: ExpectedConfiguration
    ): Discrepancy[] {
        const found: Discrepancy[] = [];
        for (const requirement of requirements) {
            const pkg = installed.get(requirement.name);
            const wanted = requirement.specifiers.length > 0 ? formatSpecifiers(requirement.specifiers) : 'installed';
            if (!pkg) {
                found.push(
                    discrepancy('missing-package', requirement.name, wanted, 'not installed', `Missing package: ${requirement.name}`)
                );
                continue;
            }
            if (requirement.specifiers.length > 0 && (pkg.version === null || !satisfies(pkg.version, requirement.specifiers))) {
                const actual = pkg.version ?? 'unknown';
                found.push(
                    discrepancy(
                        'version-mismatch',
                        requirement.name,
                        wanted,
                        actual,
                        `Incorrect version for ${requirement.name}: expected ${wanted}, got ${actual}`
                    )
                );
            }
        }

        if (expected.strict) {
            const allowed = new Set([...requirements.map((r) => r.name), ...expected.allowedExtras.map(normalizeName)]);
            const extras = [...installed.keys()].filter((name) => !allowed.has(name)).sort();
            for (const name of extras) {
                const version = installed.get(name)?.version ?? 'installed';
                found.push(discrepancy('unexpected-package', name, 'not installed', version, `Unexpected package: ${name}`));
            }
        }
        return found;
    }

    private async checkStructure(expected: ExpectedConfiguration): Promise<Discrepancy[]> {
        const flavor = pathFlavor(this.handle.platform);
        const found: Discrepancy[] = [];

        for (const dir of expected.directories) {
            const full = flavor.join(this.handle.root, dir);
            const stat = await fs.stat(full).catch(() => null);
            if (!stat) {
                found.push(discrepancy('missing-directory', dir, 'directory', 'missing', `Missing directory: ${full}`));
            } else if (!stat.isDirectory()) {
                found.push(discrepancy('not-a-directory', dir, 'directory', 'file', `Not a directory: ${full}`));
            }
        }

        for (const file of expected.files) {
            const full = flavor.join(this.handle.root, file);
            const stat = await fs.stat(full).catch(() => null);
            if (!stat?.isFile()) {
                found.push(discrepancy('missing-file', file, 'file', stat ? 'directory' : 'missing', `Missing file: ${full}`));
            }
        }
        return found;
    }

    private async pipCheck(): Promise<Discrepancy | null> {
        const result = await this.runPip(PIP_CHECK_ARGS, 'run pip check');
        if (result.success) {
            this.log.debug('pip check passed.');
            return null;
        }
        const detail = (result.stdout.trim() || result.stderr.trim()).split(/\r?\n/)[0] ?? '';
        return discrepancy(
            'broken-requirements',
            'pip check',
            'no broken requirements',
            detail,
            `pip check failed: ${detail}`
        );
    }

    private async runPip(args: string[], purpose: string): Promise<CommandResult> {
        try {
            return await this.invoker.invoke('python', args);
        } catch (error) {
            if (!(error instanceof InvocationError)) throw error;
            const wrapped = new ConsistencyError(`Could not ${purpose}: ${errorMessage(error)}`, undefined, { cause: error });
            this.log.error(wrapped.message);
            throw wrapped;
        }
    }

    private async isDirectory(dir: string): Promise<boolean> {
        const stat = await fs.stat(dir).catch(() => null);
        return stat?.isDirectory() ?? false;
    }
}
