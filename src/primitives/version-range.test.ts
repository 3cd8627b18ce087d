import { VersionRange } from './version-range';
import { isVersion, parseVersion } from './version';

describe('parseVersion', () => {
  it('should parse strict semantic versions', () => {
    expect(parseVersion('1.2.3')?.major).toBe(1);
    expect(isVersion('1.0.0-beta.1+build.5')).toBe(true);
  });

  it('should reject truncated and prefixed versions', () => {
    expect(parseVersion('1.2')).toBeUndefined();
    expect(isVersion('v1.2.3')).toBe(false);
    expect(isVersion('01.2.3')).toBe(false);
  });
});

describe('VersionRange', () => {
  it('should treat 0 as any version', () => {
    expect(VersionRange.parse(0).satisfiedBy('0.0.1')).toBe(true);
    expect(VersionRange.parse('0').satisfiedBy('99.0.0')).toBe(true);
    expect(VersionRange.parse(0).constraints).toHaveLength(0);
  });

  it('should read a bare version as a minimum', () => {
    const range = VersionRange.parse('1.2.0');
    expect(range.constraints[0].comparator).toBe('>=');
    expect(range.satisfiedBy('1.2.0')).toBe(true);
    expect(range.satisfiedBy('1.1.9')).toBe(false);
  });

  it('should require every constraint to hold', () => {
    const range = VersionRange.parse('>= 1.2, != 1.5.2, < 2.0');
    expect(range.satisfiedBy('1.5.1')).toBe(true);
    expect(range.satisfiedBy('1.5.2')).toBe(false);
    expect(range.satisfiedBy('2.0.0')).toBe(false);
    expect(range.satisfiedBy('1.1.0')).toBe(false);
  });

  it('should pad truncated versions', () => {
    const range = VersionRange.parse('== 2');
    expect(range.satisfiedBy('2.0.0')).toBe(true);
    expect(range.satisfiedBy('2.0.1')).toBe(false);
  });

  it('should order pre-releases below releases', () => {
    expect(VersionRange.parse('> 1.0.0-beta').satisfiedBy('1.0.0')).toBe(true);
    expect(VersionRange.parse('>= 1.0.0').satisfiedBy('1.0.0-rc.1')).toBe(false);
  });

  it('should accept comparators without spaces', () => {
    expect(VersionRange.parse('>=1.2').satisfiedBy('1.3.0')).toBe(true);
  });

  it('should report why a range is invalid', () => {
    expect(VersionRange.tryParse('')).toBe('empty constraint');
    expect(VersionRange.tryParse('>= 1.0, 0')).toBe('0 matches any version and must stand alone');
    expect(VersionRange.tryParse('~> 1.0')).toBe('malformed constraint "~> 1.0"');
    expect(VersionRange.tryParse('>= 1.0.x')).toBe('invalid version "1.0.x"');
  });

  it('should throw RangeError from parse', () => {
    expect(() => VersionRange.parse('>= nope')).toThrow(RangeError);
    expect(VersionRange.isValid('>= nope')).toBe(false);
  });

  it('should not satisfy unparseable versions', () => {
    expect(VersionRange.parse(0).satisfiedBy('not a version')).toBe(false);
  });

  it('should serialize as written', () => {
    expect(VersionRange.parse(0).toJSON()).toBe(0);
    expect(VersionRange.parse('>= 1.2').toString()).toBe('>= 1.2');
    expect(JSON.stringify({ range: VersionRange.parse('< 2') })).toBe('{"range":"< 2"}');
  });
});
