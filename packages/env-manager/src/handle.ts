import { promises as fs } from 'fs';
import { detectPlatform, resolvePaths } from './paths';
import type { EnvironmentPaths, Platform } from './types';

export function parsePyvenvCfg(content: string): Record<string, string> {
    const entries: Record<string, string> = {};
    for (const line of content.split(/\r?\n/)) {
        const index = line.indexOf('=');
        if (index <= 0 || line.trimStart().startsWith('#')) continue;
        entries[line.slice(0, index).trim().toLowerCase()] = line.slice(index + 1).trim();
    }
    return entries;
}

/**
 * Identifies one environment by its root directory. Paths are derived on every
 * access so a create/remove cycle can never leave them stale.
 */
export class EnvironmentHandle {
    private pythonVersion?: string;

    constructor(
        private readonly rootInput: string,
        public readonly platform: Platform = detectPlatform()
    ) {
        // fail fast on a malformed root
        resolvePaths(rootInput, { platform });
    }

    get paths(): EnvironmentPaths {
        return resolvePaths(this.rootInput, { platform: this.platform, pythonVersion: this.pythonVersion });
    }

    get root(): string {
        return this.paths.root;
    }

    get interpreterPath(): string {
        return this.paths.interpreterPath;
    }

    get binaryDir(): string {
        return this.paths.binaryDir;
    }

    get version(): string | undefined {
        return this.pythonVersion;
    }

    /** Re-reads pyvenv.cfg; the version is cleared when the file is gone. */
    async refresh(): Promise<this> {
        let content: string;
        try {
            content = await fs.readFile(this.paths.configPath, 'utf-8');
        } catch {
            this.pythonVersion = undefined;
            return this;
        }

        const cfg = parsePyvenvCfg(content);
        const match = /^(\d+)\.(\d+)/.exec(cfg.version_info ?? cfg.version ?? '');
        this.pythonVersion = match ? `${match[1]}.${match[2]}` : undefined;
        return this;
    }

    forget(): void {
        this.pythonVersion = undefined;
    }
}
