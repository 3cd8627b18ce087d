import { isLicenseExpression, licenseError } from './license';
import { isDigestAlgorithm, isDigestHex } from './digest-hex';

describe('isLicenseExpression', () => {
  it('should accept SPDX identifiers and expressions', () => {
    expect(isLicenseExpression('PostgreSQL')).toBe(true);
    expect(isLicenseExpression('MIT OR Apache-2.0')).toBe(true);
    expect(isLicenseExpression('(MIT AND BSD-3-Clause) OR PostgreSQL')).toBe(true);
  });

  it('should reject unknown licenses and broken expressions', () => {
    expect(isLicenseExpression('Not-A-License')).toBe(false);
    expect(isLicenseExpression('MIT OR')).toBe(false);
    expect(licenseError('')).toEqual(expect.any(String));
  });
});

describe('isDigestHex', () => {
  it('should match the hex length of each algorithm', () => {
    expect(isDigestHex('sha1', 'a'.repeat(40))).toBe(true);
    expect(isDigestHex('sha1', 'A'.repeat(40))).toBe(true);
    expect(isDigestHex('sha256', 'a'.repeat(63))).toBe(false);
    expect(isDigestHex('sha512', 'a'.repeat(128))).toBe(true);
  });

  it('should reject non-hex characters', () => {
    expect(isDigestHex('sha1', 'g'.repeat(40))).toBe(false);
  });

  it('should know the supported algorithms', () => {
    expect(isDigestAlgorithm('sha256')).toBe(true);
    expect(isDigestAlgorithm('md5')).toBe(false);
  });
});
