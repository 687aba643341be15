import {
  classifyVersionSpec,
  compareVersions,
  isExactVersion,
  isValidVersion,
  maxSatisfying,
  parseRange,
  parseVersion,
  satisfies,
  sortVersionsDescending,
} from '../../src/domain/version';
import { RegistryError } from '../../src/domain/errors';

describe('version parsing', () => {
  test('accepts dotted numeric versions with prerelease and build suffixes', () => {
    expect(isValidVersion('1.0.0')).toBe(true);
    expect(isValidVersion('2')).toBe(true);
    expect(isValidVersion('1.2.3.4')).toBe(true);
    expect(isValidVersion('1.0.0-rc.1')).toBe(true);
    expect(isValidVersion('1.0.0+build.7')).toBe(true);
  });

  test('rejects malformed versions', () => {
    expect(isValidVersion('')).toBe(false);
    expect(isValidVersion('v1.0.0')).toBe(false);
    expect(isValidVersion('1..0')).toBe(false);
    expect(isValidVersion('1.0.0-')).toBe(false);
    expect(isValidVersion(`1.${'0'.repeat(70)}`)).toBe(false);
  });

  test('parseVersion throws a Validation error', () => {
    let caught: unknown;
    try {
      parseVersion('nope');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(RegistryError);
    expect(caught instanceof RegistryError && caught.kind).toBe('Validation');
  });

  test('parses components', () => {
    const parsed = parseVersion('1.2.3-beta.11+sha.1');
    expect(parsed.numbers).toEqual([1, 2, 3]);
    expect(parsed.prerelease).toEqual(['beta', 11]);
    expect(parsed.build).toEqual(['sha', '1']);
  });
});

describe('version ordering', () => {
  test('orders numerically, not lexically', () => {
    expect(compareVersions('1.10.0', '1.9.0')).toBe(1);
    expect(compareVersions('1.2.0', '1.10.0')).toBe(-1);
  });

  test('missing components compare as zero, ties broken by raw string', () => {
    expect(compareVersions('1.0', '1.0.0')).toBe(-1);
    expect(compareVersions('1.0.0', '1.0')).toBe(1);
    expect(compareVersions('1.0.0', '1.0.0')).toBe(0);
  });

  test('a prerelease sorts before its release', () => {
    const ordered = [
      '1.0.0-alpha',
      '1.0.0-alpha.1',
      '1.0.0-alpha.beta',
      '1.0.0-beta',
      '1.0.0-beta.2',
      '1.0.0-beta.11',
      '1.0.0-rc.1',
      '1.0.0',
    ];
    for (let i = 0; i < ordered.length - 1; i++) {
      expect(compareVersions(ordered[i], ordered[i + 1])).toBe(-1);
    }
  });

  test('sortVersionsDescending', () => {
    expect(sortVersionsDescending(['1.0.0', '2.0.0-rc.1', '2.0.0', '1.10.0', '1.2.0'])).toEqual([
      '2.0.0',
      '2.0.0-rc.1',
      '1.10.0',
      '1.2.0',
      '1.0.0',
    ]);
  });
});

describe('version ranges', () => {
  const published = ['1.0.0', '1.2.3', '1.9.0', '2.0.0', '2.1.0-beta.1'];

  test.each([
    ['^1.2.0', '1.9.0'],
    ['~1.2.0', '1.2.3'],
    ['1.x', '1.9.0'],
    ['1.2.*', '1.2.3'],
    ['1', '1.9.0'],
    ['>=1.0.0 <2.0.0', '1.9.0'],
    ['>= 1.0.0 < 1.5', '1.2.3'],
    ['1.0.0 - 1.2', '1.2.3'],
    ['^3.0.0 || ~1.2.0', '1.2.3'],
    ['*', '2.0.0'],
    ['latest', '2.0.0'],
    ['>=2.1.0-beta.0', '2.1.0-beta.1'],
    ['=1.0.0', '1.0.0'],
    ['<=1.2', '1.2.3'],
    ['>1.2', '2.0.0'],
  ])('maxSatisfying(%s) is %s', (range, expected) => {
    expect(maxSatisfying(published, range)).toBe(expected);
  });

  test('returns undefined when nothing matches', () => {
    expect(maxSatisfying(published, '^5.0.0')).toBeUndefined();
    expect(maxSatisfying(published, '<*')).toBeUndefined();
  });

  test('caret on zero-major versions is narrow', () => {
    expect(satisfies('0.2.9', '^0.2.3')).toBe(true);
    expect(satisfies('0.3.0', '^0.2.3')).toBe(false);
    expect(satisfies('0.0.3', '^0.0.3')).toBe(true);
    expect(satisfies('0.0.4', '^0.0.3')).toBe(false);
  });

  test('prereleases only match ranges that name one on the same release', () => {
    expect(satisfies('2.1.0-beta.1', '>=2.0.0')).toBe(false);
    expect(satisfies('2.1.0-beta.2', '^2.1.0-beta.1')).toBe(true);
    expect(satisfies('2.2.0-beta.1', '^2.1.0-beta.1')).toBe(false);
  });

  test('malformed ranges are Validation errors', () => {
    expect(() => parseRange('not a range')).toThrow('Invalid version range: "not a range"');
  });

  test('classifies specs', () => {
    expect(classifyVersionSpec('1.2.3')).toBe('exact');
    expect(classifyVersionSpec('1.0.0-rc.1')).toBe('exact');
    expect(classifyVersionSpec('1')).toBe('ambiguous');
    expect(classifyVersionSpec('2.4')).toBe('ambiguous');
    expect(classifyVersionSpec('^1')).toBe('range');
    expect(classifyVersionSpec('latest')).toBe('range');
    expect(isExactVersion('1.2.3')).toBe(true);
    expect(isExactVersion('1.2')).toBe(false);
  });
});
