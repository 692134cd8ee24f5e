export { EnvironmentManager, type ManagerOptions } from './manager';
export { EnvironmentHandle, parsePyvenvCfg } from './handle';
export { detectPlatform, resolvePaths, type ResolveOptions } from './paths';
export { ProcessInvoker, quoteForCmd, runCommand, type ProcessInvokerOptions } from './invoker';
export { LifecycleController, defaultCreator, type LifecycleOptions } from './lifecycle';
export { ConsistencyChecker, parseExpected, parsePackageList } from './consistency';
export { defaultExpectedConfiguration, loadExpectedConfiguration } from './config';
export {
    compareVersions,
    mergeRequirements,
    normalizeName,
    parseRequirement,
    satisfies,
    type Requirement,
    type Specifier
} from './requirements';
export * from './errors';
export * from './types';
export { Logger, levelFromEnv, logger, type EnvLogger, type LogLevel } from './utils/logger';
