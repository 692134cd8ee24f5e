import * as path from 'path';
import { PathResolutionError } from './errors';
import type { EnvironmentPaths, Platform } from './types';

export interface ResolveOptions {
    platform?: Platform;
    /** Major.minor version, e.g. "3.11"; needed for the POSIX site-packages location. */
    pythonVersion?: string;
}

export function detectPlatform(nodePlatform: NodeJS.Platform = process.platform): Platform {
    return nodePlatform === 'win32' ? 'windows' : 'posix';
}

export function pathFlavor(platform: Platform): path.PlatformPath {
    return platform === 'windows' ? path.win32 : path.posix;
}

/**
 * Computes where the interpreter, executables and packages of an environment
 * live. Lexical only: the environment does not need to exist.
 */
export function resolvePaths(root: string, options: ResolveOptions = {}): EnvironmentPaths {
    if (root.trim() === '') {
        throw new PathResolutionError(root, 'root path is empty');
    }
    if (root.includes('\0')) {
        throw new PathResolutionError(root, 'root path contains a NUL byte');
    }

    const platform = options.platform ?? detectPlatform();
    const flavor = pathFlavor(platform);
    const absoluteRoot = flavor.resolve(root);
    const configPath = flavor.join(absoluteRoot, 'pyvenv.cfg');

    if (platform === 'windows') {
        const binaryDir = flavor.join(absoluteRoot, 'Scripts');
        return {
            root: absoluteRoot,
            binaryDir,
            interpreterPath: flavor.join(binaryDir, 'python.exe'),
            sitePackagesDir: flavor.join(absoluteRoot, 'Lib', 'site-packages'),
            configPath
        };
    }

    const binaryDir = flavor.join(absoluteRoot, 'bin');
    return {
        root: absoluteRoot,
        binaryDir,
        interpreterPath: flavor.join(binaryDir, 'python'),
        sitePackagesDir: options.pythonVersion
            ? flavor.join(absoluteRoot, 'lib', `python${options.pythonVersion}`, 'site-packages')
            : null,
        configPath
    };
}
