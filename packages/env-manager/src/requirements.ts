import { ConfigError } from './errors';

export type Operator = '===' | '~=' | '==' | '!=' | '<=' | '>=' | '<' | '>';

export interface Specifier {
    operator: Operator;
    version: string;
}

export interface Requirement {
    name: string;
    specifiers: Specifier[];
    raw: string;
}

const OPERATORS: readonly string[] = ['===', '~=', '==', '!=', '<=', '>=', '<', '>'];

function isOperator(value: string): value is Operator {
    return OPERATORS.includes(value);
}

interface ParsedVersion {
    release: number[];
    preRank: number;
    preNumber: number;
    post: number;
    dev: number;
}

const NAME_PATTERN = /^\s*([A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?)\s*(?:\[[^\]]*\])?\s*(.*)$/;
const SPECIFIER_PATTERN = /^(===|~=|==|!=|<=|>=|<|>)\s*(\S+)$/;
// release, then optional pre, post and dev segments in PEP 440 order
const VERSION_PATTERN =
    /^v?(?:\d+!)?(\d+(?:\.\d+)*)(?:[-_.]?(alpha|a|beta|b|preview|pre|c|rc)[-_.]?(\d*))?(?:[-_.]?(post|rev|r)[-_.]?(\d*))?(?:[-_.]?(dev)[-_.]?(\d*))?/i;

const PRE_RANKS: Record<string, number> = {
    a: 1,
    alpha: 1,
    b: 2,
    beta: 2,
    c: 3,
    rc: 3,
    pre: 3,
    preview: 3
};
// a bare dev release sorts before any pre-release; no pre-release sorts after all of them
const DEV_ONLY = 0;
const NO_PRE = 4;

/** PEP 503 normalisation: case-insensitive, runs of -_. are equivalent. */
export function normalizeName(name: string): string {
    return name.trim().toLowerCase().replace(/[-_.]+/g, '-');
}

export function parseRequirement(raw: string): Requirement {
    const match = NAME_PATTERN.exec(raw);
    if (!match) {
        throw new ConfigError(`Invalid requirement '${raw}'`);
    }

    const rest = match[2].trim();
    const specifiers = rest === '' ? [] : rest.split(',').map((part) => parseSpecifier(part.trim(), raw));
    return { name: normalizeName(match[1]), specifiers, raw: raw.trim() };
}

/**
 * Collapses requirements naming the same package, keeping the first
 * occurrence's position and joining all specifiers.
 */
export function mergeRequirements(requirements: Requirement[]): Requirement[] {
    const merged = new Map<string, Requirement>();
    for (const requirement of requirements) {
        const existing = merged.get(requirement.name);
        if (existing) {
            merged.set(requirement.name, {
                name: existing.name,
                specifiers: [...existing.specifiers, ...requirement.specifiers],
                raw: `${existing.raw}, ${requirement.raw}`
            });
        } else {
            merged.set(requirement.name, requirement);
        }
    }
    return [...merged.values()];
}

function parseSpecifier(part: string, raw: string): Specifier {
    const match = SPECIFIER_PATTERN.exec(part);
    if (!match) {
        throw new ConfigError(`Invalid version specifier '${part}' in requirement '${raw}'`);
    }
    const operator = match[1];
    if (!isOperator(operator)) {
        throw new ConfigError(`Unsupported operator '${operator}' in requirement '${raw}'`);
    }
    return { operator, version: match[2] };
}

function parseVersion(version: string): ParsedVersion | null {
    const match = VERSION_PATTERN.exec(version.trim());
    if (!match) return null;
    const [, release, pre, preNumber, post, postNumber, dev, devNumber] = match;

    let preRank = NO_PRE;
    if (pre) preRank = PRE_RANKS[pre.toLowerCase()];
    else if (dev && !post) preRank = DEV_ONLY;

    return {
        release: release.split('.').map(Number),
        preRank,
        preNumber: pre && preNumber ? Number(preNumber) : 0,
        post: post ? Number(postNumber || 0) : -1,
        dev: dev ? Number(devNumber || 0) : Number.POSITIVE_INFINITY
    };
}

function compareNumbers(a: number, b: number): number {
    if (a < b) return -1;
    return a > b ? 1 : 0;
}

function compareRelease(a: number[], b: number[]): number {
    const length = Math.max(a.length, b.length);
    for (let i = 0; i < length; i++) {
        const diff = (a[i] ?? 0) - (b[i] ?? 0);
        if (diff !== 0) return Math.sign(diff);
    }
    return 0;
}

/** Returns -1, 0 or 1; null when either side is not a recognisable version. */
export function compareVersions(a: string, b: string): number | null {
    const left = parseVersion(a);
    const right = parseVersion(b);
    if (!left || !right) return null;

    return (
        compareRelease(left.release, right.release) ||
        compareNumbers(left.preRank, right.preRank) ||
        compareNumbers(left.preNumber, right.preNumber) ||
        compareNumbers(left.post, right.post) ||
        compareNumbers(left.dev, right.dev)
    );
}

function matchesPrefix(version: string, pattern: string): boolean {
    const installed = parseVersion(version);
    const prefix = pattern.slice(0, -2).split('.').map(Number);
    if (!installed) return false;
    return prefix.every((segment, i) => (installed.release[i] ?? 0) === segment);
}

function satisfiesOne(version: string, { operator, version: target }: Specifier): boolean {
    if (operator === '===') return version.trim() === target;
    if ((operator === '==' || operator === '!=') && target.endsWith('.*')) {
        return matchesPrefix(version, target) === (operator === '==');
    }
    if (operator === '~=') {
        const segments = target.split('.');
        if (segments.length < 2) return false;
        const floor = compareVersions(version, target);
        return floor !== null && floor >= 0 && matchesPrefix(version, `${segments.slice(0, -1).join('.')}.*`);
    }

    const order = compareVersions(version, target);
    if (order === null) return false;
    switch (operator) {
        case '==':
            return order === 0;
        case '!=':
            return order !== 0;
        case '<=':
            return order <= 0;
        case '>=':
            return order >= 0;
        case '<':
            return order < 0;
        case '>':
            return order > 0;
    }
}

export function satisfies(version: string, specifiers: Specifier[]): boolean {
    return specifiers.every((specifier) => satisfiesOne(version, specifier));
}

export function formatSpecifiers(specifiers: Specifier[]): string {
    return specifiers.map((s) => `${s.operator}${s.version}`).join(',');
}
