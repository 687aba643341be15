/**
 * Version ordering and range resolution.
 *
 * Pure functions over version strings; nothing here touches storage.
 * Versions are dot-separated numeric components with optional prerelease
 * ("-rc.1") and build ("+sha.5114f85") suffixes. Missing numeric components
 * compare as zero, a prerelease sorts before its release, and build metadata
 * does not affect precedence. Versions of equal precedence are ordered by
 * their raw string so that the order is total.
 *
 * Ranges follow the familiar npm grammar: `*`, `latest`, `1.x`, `1.2`,
 * `>=1.2.0 <2.0.0`, `^1.2.3`, `~1.2.3`, `1.0.0 - 2.3`, and `||` unions.
 */

import { validationError } from './errors';

const VERSION_PATTERN =
  /^(\d+(?:\.\d+)*)(?:-([0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*))?(?:\+([0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*))?$/;
const PARTIAL_PATTERN =
  /^v?((?:\d+|[xX*])(?:\.(?:\d+|[xX*]))*)(?:-([0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*))?(?:\+[0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*)?$/;
const COMPARATOR_PATTERN = /^(\^|~|>=|<=|>|<|=)?(.*)$/;
const MAX_VERSION_LENGTH = 64;

export interface ParsedVersion {
  raw: string;
  numbers: number[];
  prerelease: Array<string | number>;
  build: string[];
}

export type ComparatorOperator = '<' | '<=' | '>' | '>=' | '=';

export interface Comparator {
  operator: ComparatorOperator;
  version: ParsedVersion;
}

/** A parsed range: a union of comparator sets, each an intersection. */
export interface VersionRange {
  raw: string;
  sets: Comparator[][];
}

function parseIdentifiers(value: string | undefined): Array<string | number> {
  if (!value) return [];
  return value.split('.').map((id) => (/^\d+$/.test(id) ? Number(id) : id));
}

/** Parse a version string; returns undefined when it is not a valid version. */
export function tryParseVersion(raw: string): ParsedVersion | undefined {
  if (raw.length === 0 || raw.length > MAX_VERSION_LENGTH) return undefined;
  const match = VERSION_PATTERN.exec(raw);
  if (!match) return undefined;
  const numbers = match[1].split('.').map(Number);
  if (numbers.some((n) => !Number.isSafeInteger(n))) return undefined;
  return {
    raw,
    numbers,
    prerelease: parseIdentifiers(match[2]),
    build: match[3] ? match[3].split('.') : [],
  };
}

export function parseVersion(raw: string): ParsedVersion {
  const parsed = tryParseVersion(raw);
  if (!parsed) {
    throw validationError(`Invalid version: "${raw}"`, { version: raw });
  }
  return parsed;
}

export function isValidVersion(raw: string): boolean {
  return tryParseVersion(raw) !== undefined;
}

function compareNumbers(a: number[], b: number[]): number {
  const length = Math.max(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    if (diff !== 0) return diff < 0 ? -1 : 1;
  }
  return 0;
}

function compareIdentifier(a: string | number, b: string | number): number {
  if (typeof a === 'number' && typeof b === 'number') return a === b ? 0 : a < b ? -1 : 1;
  if (typeof a === 'number') return -1;
  if (typeof b === 'number') return 1;
  return a === b ? 0 : a < b ? -1 : 1;
}

function comparePrerelease(a: Array<string | number>, b: Array<string | number>): number {
  if (a.length === 0 && b.length === 0) return 0;
  if (a.length === 0) return 1;
  if (b.length === 0) return -1;
  const length = Math.max(a.length, b.length);
  for (let i = 0; i < length; i++) {
    if (i >= a.length) return -1;
    if (i >= b.length) return 1;
    const diff = compareIdentifier(a[i], b[i]);
    if (diff !== 0) return diff;
  }
  return 0;
}

/** Precedence comparison; build metadata and raw spelling are ignored. */
export function comparePrecedence(a: ParsedVersion, b: ParsedVersion): number {
  return compareNumbers(a.numbers, b.numbers) || comparePrerelease(a.prerelease, b.prerelease);
}

/** Total order over valid version strings. */
export function compareVersions(a: string, b: string): number {
  const diff = comparePrecedence(parseVersion(a), parseVersion(b));
  if (diff !== 0) return diff;
  return a === b ? 0 : a < b ? -1 : 1;
}

export function sortVersionsDescending(versions: readonly string[]): string[] {
  return [...versions].sort((a, b) => compareVersions(b, a));
}

// ─── Ranges ─────────────────────────────────────────────────────────────────

interface PartialVersion {
  /** Numeric components before the first wildcard. */
  numbers: number[];
  prerelease: Array<string | number>;
  /** True when the token named at least three components and no wildcard. */
  complete: boolean;
}

function parsePartial(token: string, range: string): PartialVersion {
  if (token === '' || token === '*' || token === 'x' || token === 'X') {
    return { numbers: [], prerelease: [], complete: false };
  }
  const match = PARTIAL_PATTERN.exec(token);
  if (!match) {
    throw validationError(`Invalid version range: "${range}"`, { range, token });
  }
  const parts = match[1].split('.');
  const numbers: number[] = [];
  let wildcard = false;
  for (const part of parts) {
    if (/^\d+$/.test(part) && !wildcard) {
      numbers.push(Number(part));
    } else {
      wildcard = true;
    }
  }
  const complete = !wildcard && numbers.length >= 3;
  return {
    numbers,
    prerelease: complete ? parseIdentifiers(match[2]) : [],
    complete,
  };
}

function makeVersion(numbers: number[], prerelease: Array<string | number> = []): ParsedVersion {
  const padded = [...numbers];
  while (padded.length < 3) padded.push(0);
  const core = padded.join('.');
  return {
    raw: prerelease.length > 0 ? `${core}-${prerelease.join('.')}` : core,
    numbers: padded,
    prerelease,
    build: [],
  };
}

/** Increment the component at `index`, dropping everything after it. */
function bump(numbers: number[], index: number): ParsedVersion {
  const next = numbers.slice(0, index + 1);
  while (next.length <= index) next.push(0);
  next[index] += 1;
  return makeVersion(next);
}

const NOTHING: Comparator[] = [{ operator: '<', version: makeVersion([0, 0, 0]) }];

function caret(p: PartialVersion): Comparator[] {
  const lower: Comparator = { operator: '>=', version: makeVersion(p.numbers, p.prerelease) };
  const [major, minor, patch] = p.numbers;
  if (major !== 0 || p.numbers.length === 1) {
    return [lower, { operator: '<', version: bump(p.numbers, 0) }];
  }
  if (minor !== 0 || p.numbers.length === 2) {
    return [lower, { operator: '<', version: bump(p.numbers, 1) }];
  }
  return [lower, { operator: '<', version: bump([major, minor, patch], 2) }];
}

function tilde(p: PartialVersion): Comparator[] {
  const lower: Comparator = { operator: '>=', version: makeVersion(p.numbers, p.prerelease) };
  const index = p.numbers.length === 1 ? 0 : 1;
  return [lower, { operator: '<', version: bump(p.numbers, index) }];
}

function expandComparator(token: string, range: string): Comparator[] {
  const match = COMPARATOR_PATTERN.exec(token);
  const operator = match?.[1] ?? '';
  const p = parsePartial(match?.[2] ?? '', range);
  const last = p.numbers.length - 1;

  if (p.numbers.length === 0) {
    // Bare wildcard: anything, except "<*" and ">*" which match nothing.
    return operator === '<' || operator === '>' ? NOTHING : [];
  }

  switch (operator) {
    case '^':
      return caret(p);
    case '~':
      return tilde(p);
    case '>':
      return p.complete
        ? [{ operator: '>', version: makeVersion(p.numbers, p.prerelease) }]
        : [{ operator: '>=', version: bump(p.numbers, last) }];
    case '>=':
      return [{ operator: '>=', version: makeVersion(p.numbers, p.prerelease) }];
    case '<':
      return [{ operator: '<', version: makeVersion(p.numbers, p.prerelease) }];
    case '<=':
      return p.complete
        ? [{ operator: '<=', version: makeVersion(p.numbers, p.prerelease) }]
        : [{ operator: '<', version: bump(p.numbers, last) }];
    default:
      return p.complete
        ? [{ operator: '=', version: makeVersion(p.numbers, p.prerelease) }]
        : [
            { operator: '>=', version: makeVersion(p.numbers) },
            { operator: '<', version: bump(p.numbers, last) },
          ];
  }
}

function parseHyphen(lowerToken: string, upperToken: string, range: string): Comparator[] {
  const lower = parsePartial(lowerToken, range);
  const upper = parsePartial(upperToken, range);
  const result: Comparator[] = [];
  if (lower.numbers.length > 0) {
    result.push({ operator: '>=', version: makeVersion(lower.numbers, lower.prerelease) });
  }
  if (upper.numbers.length > 0) {
    result.push(
      upper.complete
        ? { operator: '<=', version: makeVersion(upper.numbers, upper.prerelease) }
        : { operator: '<', version: bump(upper.numbers, upper.numbers.length - 1) },
    );
  }
  return result;
}

/** Parse a range expression. Throws a Validation error on malformed input. */
export function parseRange(raw: string): VersionRange {
  const trimmed = raw.trim();
  if (trimmed === '' || trimmed === 'latest') {
    return { raw, sets: [[]] };
  }
  const sets = trimmed.split('||').map((part) => {
    const set = part.trim();
    const hyphen = /^(\S+)\s+-\s+(\S+)$/.exec(set);
    if (hyphen) return parseHyphen(hyphen[1], hyphen[2], raw);
    const tokens = set
      .replace(/(>=|<=|>|<|=|\^|~)\s+/g, '$1')
      .split(/\s+/)
      .filter((token) => token.length > 0);
    return tokens.flatMap((token) => expandComparator(token, raw));
  });
  return { raw, sets };
}

function testComparator(version: ParsedVersion, comparator: Comparator): boolean {
  const diff = comparePrecedence(version, comparator.version);
  switch (comparator.operator) {
    case '<':
      return diff < 0;
    case '<=':
      return diff <= 0;
    case '>':
      return diff > 0;
    case '>=':
      return diff >= 0;
    case '=':
      return diff === 0;
  }
}

function testSet(version: ParsedVersion, set: Comparator[]): boolean {
  if (!set.every((comparator) => testComparator(version, comparator))) return false;
  if (version.prerelease.length === 0) return true;
  // A prerelease only matches when the range opts into prereleases of the same release.
  return set.some(
    (comparator) =>
      comparator.version.prerelease.length > 0 &&
      compareNumbers(comparator.version.numbers, version.numbers) === 0,
  );
}

export function satisfies(version: string, range: VersionRange | string): boolean {
  const parsed = tryParseVersion(version);
  if (!parsed) return false;
  const r = typeof range === 'string' ? parseRange(range) : range;
  return r.sets.some((set) => testSet(parsed, set));
}

/** Highest version satisfying the range, or undefined. */
export function maxSatisfying(
  versions: readonly string[],
  range: VersionRange | string,
): string | undefined {
  const r = typeof range === 'string' ? parseRange(range) : range;
  return sortVersionsDescending(versions.filter((v) => isValidVersion(v))).find((v) =>
    satisfies(v, r),
  );
}

/**
 * Whether a version-or-range spec should be looked up as an exact version.
 * Specs naming fewer than three numeric components without a prerelease
 * or build suffix ("1", "2.4") are ambiguous and may also be tried as ranges.
 */
export function classifyVersionSpec(spec: string): 'exact' | 'ambiguous' | 'range' {
  const parsed = tryParseVersion(spec);
  if (!parsed) return 'range';
  if (parsed.numbers.length < 3 && parsed.prerelease.length === 0 && parsed.build.length === 0) {
    return 'ambiguous';
  }
  return 'exact';
}

/** True when the spec names one full version rather than a range. */
export function isExactVersion(spec: string): boolean {
  return classifyVersionSpec(spec) === 'exact';
}
