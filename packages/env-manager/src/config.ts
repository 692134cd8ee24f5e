import { promises as fs } from 'fs';
import { parseExpected } from './consistency';
import { ConfigError, errorMessage } from './errors';
import { detectPlatform } from './paths';
import type { ExpectedConfiguration, ExpectedConfigurationInput, Platform } from './types';

/** What a freshly created environment should contain on the given platform. */
export function defaultExpectedConfiguration(platform: Platform = detectPlatform()): ExpectedConfigurationInput {
    return {
        packages: ['pip'],
        files: platform === 'windows' ? ['Scripts/activate.bat', 'Scripts/python.exe'] : ['bin/activate', 'bin/python']
    };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function readJson(file: string): Promise<unknown> {
    let content: string;
    try {
        content = await fs.readFile(file, 'utf-8');
    } catch (error) {
        throw new ConfigError(`Config file not found: ${file}`, [], { cause: error });
    }

    try {
        return JSON.parse(content);
    } catch (error) {
        throw new ConfigError(`Error processing config file ${file}: ${errorMessage(error)}`, [], { cause: error });
    }
}

/**
 * Loads an expected configuration from a JSON file path or an inline value.
 * Top-level keys override the platform defaults.
 */
export async function loadExpectedConfiguration(
    source?: string | ExpectedConfigurationInput,
    platform: Platform = detectPlatform()
): Promise<ExpectedConfiguration> {
    const overrides: unknown = typeof source === 'string' ? await readJson(source) : source ?? {};
    if (!isRecord(overrides)) {
        throw new ConfigError('Expected configuration must be a JSON object');
    }
    return parseExpected({ ...defaultExpectedConfiguration(platform), ...overrides });
}
