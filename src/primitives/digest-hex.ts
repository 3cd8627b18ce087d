import { DigestAlgorithm } from '../types';

export const DIGEST_ALGORITHMS: readonly DigestAlgorithm[] = ['sha512', 'sha256', 'sha1'];

/**
 * Hex characters per algorithm
 */
export const DIGEST_HEX_LENGTH: Record<DigestAlgorithm, number> = {
  sha1: 40,
  sha256: 64,
  sha512: 128,
};

const HEX = /^[0-9a-fA-F]+$/;

export function isDigestAlgorithm(value: string): value is DigestAlgorithm {
  return value === 'sha1' || value === 'sha256' || value === 'sha512';
}

export function isDigestHex(algorithm: DigestAlgorithm, value: string): boolean {
  return value.length === DIGEST_HEX_LENGTH[algorithm] && HEX.test(value);
}
