import { SemVer, compare } from 'semver';
import { VersionRangeValue } from '../types';
import { parseVersion } from './version';

export type Comparator = '==' | '!=' | '>' | '>=' | '<' | '<=';

export interface Constraint {
  comparator: Comparator;
  version: SemVer;
}

const ITEM = /^(==|!=|>=|<=|>|<)?\s*(\S+)$/;
const TRUNCATED = /^(0|[1-9]\d*)(?:\.(0|[1-9]\d*))?$/;

function isComparator(value: string): value is Comparator {
  return ['==', '!=', '>', '>=', '<', '<='].includes(value);
}

/**
 * Versions in a range may be truncated: `2` and `2.4` mean `2.0.0` and `2.4.0`.
 */
function parseRangeVersion(value: string): SemVer | undefined {
  const match = TRUNCATED.exec(value);
  if (match) {
    return new SemVer(`${match[1]}.${match[2] ?? '0'}.0`);
  }
  return parseVersion(value);
}

/**
 * A conjunction of version constraints, e.g. `>= 1.2, != 1.5.2, < 2.0`.
 * The integer `0` (or the string `"0"`) matches any version.
 */
export class VersionRange {
  private constructor(
    readonly constraints: readonly Constraint[],
    private readonly source: VersionRangeValue
  ) {}

  static parse(value: VersionRangeValue): VersionRange {
    const range = VersionRange.tryParse(value);
    if (typeof range === 'string') {
      throw new RangeError(`invalid version range ${JSON.stringify(value)}: ${range}`);
    }
    return range;
  }

  /**
   * Parse a range, returning the reason it is invalid instead of throwing
   */
  static tryParse(value: VersionRangeValue): VersionRange | string {
    if (value === 0) return new VersionRange([], value);
    if (value.trim() === '0') return new VersionRange([], value);

    const constraints: Constraint[] = [];
    for (const raw of value.split(',')) {
      const item = raw.trim();
      if (item === '') return 'empty constraint';
      const match = ITEM.exec(item);
      if (!match) return `malformed constraint "${item}"`;
      const [, op, versionText] = match;
      if (op === undefined && versionText === '0') {
        return '0 matches any version and must stand alone';
      }
      const version = parseRangeVersion(versionText);
      if (!version) return `invalid version "${versionText}"`;
      const comparator = op ?? '>=';
      if (!isComparator(comparator)) return `unknown comparator "${comparator}"`;
      constraints.push({ comparator, version });
    }
    return new VersionRange(constraints, value);
  }

  static isValid(value: VersionRangeValue): boolean {
    return typeof VersionRange.tryParse(value) !== 'string';
  }

  /**
   * True when the version satisfies every constraint
   */
  satisfiedBy(version: string | SemVer): boolean {
    const candidate = typeof version === 'string' ? parseRangeVersion(version) : version;
    if (!candidate) return false;
    return this.constraints.every((c) => test(c.comparator, compare(candidate, c.version)));
  }

  toString(): string {
    return String(this.source);
  }

  toJSON(): VersionRangeValue {
    return this.source;
  }
}

function test(comparator: Comparator, order: number): boolean {
  switch (comparator) {
    case '==':
      return order === 0;
    case '!=':
      return order !== 0;
    case '>':
      return order > 0;
    case '>=':
      return order >= 0;
    case '<':
      return order < 0;
    case '<=':
      return order <= 0;
  }
}
