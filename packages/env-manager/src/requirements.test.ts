import { describe, expect, it } from 'vitest';
import { ConfigError } from './errors';
import {
    compareVersions,
    formatSpecifiers,
    mergeRequirements,
    normalizeName,
    parseRequirement,
    satisfies
} from './requirements';

describe('normalizeName', () => {
    it('folds case and separator runs', () => {
        expect(normalizeName('Typing_Extensions')).toBe('typing-extensions');
        expect(normalizeName('zope.interface')).toBe('zope-interface');
        expect(normalizeName('  My--Package__x ')).toBe('my-package-x');
    });
});

describe('parseRequirement', () => {
    it('parses a bare name', () => {
        expect(parseRequirement('requests')).toEqual({ name: 'requests', specifiers: [], raw: 'requests' });
    });

    it('parses several specifiers and drops extras', () => {
        const requirement = parseRequirement('Requests[socks] >=2.31, <3');

        expect(requirement.name).toBe('requests');
        expect(requirement.specifiers).toEqual([
            { operator: '>=', version: '2.31' },
            { operator: '<', version: '3' }
        ]);
        expect(formatSpecifiers(requirement.specifiers)).toBe('>=2.31,<3');
    });

    it('rejects malformed input', () => {
        expect(() => parseRequirement('>=1.0')).toThrow(ConfigError);
        expect(() => parseRequirement('requests~2')).toThrow("Invalid version specifier '~2' in requirement 'requests~2'");
    });
});

describe('compareVersions', () => {
    it('orders release segments numerically', () => {
        expect(compareVersions('2.10.0', '2.9.1')).toBe(1);
        expect(compareVersions('1.0', '1.0.0')).toBe(0);
        expect(compareVersions('0.9', '1')).toBe(-1);
    });

    it('puts pre-releases before the final release and post-releases after', () => {
        expect(compareVersions('2.0.0rc1', '2.0.0')).toBe(-1);
        expect(compareVersions('2.0.0a2', '2.0.0b1')).toBe(-1);
        expect(compareVersions('2.0.0.post1', '2.0.0')).toBe(1);
        expect(compareVersions('2.0.dev3', '2.0a1')).toBe(-1);
    });

    it('orders a dev release before the pre- or post-release it precedes', () => {
        expect(compareVersions('1.0a1.dev1', '1.0a1')).toBe(-1);
        expect(compareVersions('1.0a1.dev1', '1.0a1.dev2')).toBe(-1);
        expect(compareVersions('1.0.post1.dev2', '1.0.post1')).toBe(-1);
        expect(compareVersions('1.0.post1.dev2', '1.0')).toBe(1);
        expect(satisfies('1.0a1.dev1', parseRequirement('pkg>=1.0a1').specifiers)).toBe(false);
    });

    it('returns null for unparseable versions', () => {
        expect(compareVersions('unknown', '1.0')).toBeNull();
    });
});

describe('mergeRequirements', () => {
    it('joins requirements that normalise to the same name, keeping the first position', () => {
        const merged = mergeRequirements(['requests>=2', 'pip', 'Requests<3'].map(parseRequirement));

        expect(merged.map((r) => r.name)).toEqual(['requests', 'pip']);
        expect(formatSpecifiers(merged[0].specifiers)).toBe('>=2,<3');
        expect(merged[0].raw).toBe('requests>=2, Requests<3');
    });
});

describe('satisfies', () => {
    const check = (version: string, requirement: string) => satisfies(version, parseRequirement(`pkg${requirement}`).specifiers);

    it('handles comparison operators', () => {
        expect(check('2.31.0', '>=2.31.0')).toBe(true);
        expect(check('2.28.1', '>=2.31.0')).toBe(false);
        expect(check('2.31.0', '>=2.0,<3')).toBe(true);
        expect(check('3.0.0', '>=2.0,<3')).toBe(false);
        expect(check('1.4', '!=1.4')).toBe(false);
        expect(check('1.4', '==1.4.0')).toBe(true);
    });

    it('handles wildcard equality', () => {
        expect(check('2.3.9', '==2.3.*')).toBe(true);
        expect(check('2.4.0', '==2.3.*')).toBe(false);
        expect(check('2.4.0', '!=2.3.*')).toBe(true);
    });

    it('handles compatible release', () => {
        expect(check('1.4.7', '~=1.4.5')).toBe(true);
        expect(check('1.5.0', '~=1.4.5')).toBe(false);
        expect(check('2.9', '~=2.2')).toBe(true);
        expect(check('3.0', '~=2.2')).toBe(false);
    });

    it('matches arbitrary equality literally', () => {
        expect(check('1.0+local', '===1.0+local')).toBe(true);
        expect(check('1.0', '===1.0+local')).toBe(false);
    });
});
