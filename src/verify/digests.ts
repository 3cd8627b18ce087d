import { createHash, timingSafeEqual } from 'crypto';
import { DigestMismatchError, SemanticViolationError } from '../core/errors';
import { pointer } from '../core/json';
import { DIGEST_ALGORITHMS, isDigestAlgorithm, isDigestHex } from '../primitives/digest-hex';
import { DigestAlgorithm, DigestSet } from '../types';

export type Content = Uint8Array | string;

export interface DigestEntry {
  algorithm: DigestAlgorithm;
  hex: string;
}

function hash(algorithm: DigestAlgorithm, content: Content): Buffer {
  return createHash(algorithm).update(content).digest();
}

/**
 * A non-empty set of content digests. Entries are kept in precedence
 * order: sha512, sha256, sha1.
 */
export class Digests {
  private constructor(private readonly entries: readonly DigestEntry[]) {}

  /**
   * Build from a digest mapping, checking each hex string against its algorithm
   */
  static from(set: Readonly<Record<string, unknown>>, at: string = ''): Digests {
    const entries: DigestEntry[] = [];
    for (const [algorithm, hex] of Object.entries(set)) {
      if (!isDigestAlgorithm(algorithm)) {
        throw new SemanticViolationError(at + pointer(algorithm), 'unknown digest algorithm');
      }
      if (typeof hex !== 'string' || !isDigestHex(algorithm, hex)) {
        throw new SemanticViolationError(at + pointer(algorithm), `not a ${algorithm} hex digest`);
      }
      entries.push({ algorithm, hex: hex.toLowerCase() });
    }
    if (entries.length === 0) {
      throw new SemanticViolationError(at || '/', 'at least one digest is required');
    }
    entries.sort(
      (a, b) => DIGEST_ALGORITHMS.indexOf(a.algorithm) - DIGEST_ALGORITHMS.indexOf(b.algorithm)
    );
    return new Digests(entries);
  }

  /**
   * Compute digests of content
   */
  static compute(content: Content, algorithms: readonly DigestAlgorithm[] = DIGEST_ALGORITHMS): Digests {
    const set: DigestSet = {};
    for (const algorithm of algorithms) {
      set[algorithm] = hash(algorithm, content).toString('hex');
    }
    return Digests.from(set);
  }

  get algorithms(): DigestAlgorithm[] {
    return this.entries.map((e) => e.algorithm);
  }

  get(algorithm: DigestAlgorithm): string | undefined {
    return this.entries.find((e) => e.algorithm === algorithm)?.hex;
  }

  /**
   * The digest to prefer for display or prioritization
   */
  strongest(): DigestEntry {
    return this.entries[0];
  }

  /**
   * sha1-only sets are valid but weaker evidence
   */
  get sha1Only(): boolean {
    return this.entries.length === 1 && this.entries[0].algorithm === 'sha1';
  }

  /**
   * Check content against every digest in the set, in constant time per digest.
   * Throws DigestMismatchError for the first algorithm that disagrees.
   */
  verify(content: Content): void {
    for (const { algorithm, hex } of this.entries) {
      const actual = hash(algorithm, content);
      const expected = Buffer.from(hex, 'hex');
      if (!timingSafeEqual(actual, expected)) {
        throw new DigestMismatchError(algorithm, hex, actual.toString('hex'));
      }
    }
  }

  matches(content: Content): boolean {
    try {
      this.verify(content);
      return true;
    } catch (error) {
      if (error instanceof DigestMismatchError) return false;
      throw error;
    }
  }

  toJSON(): DigestSet {
    const set: DigestSet = {};
    for (const { algorithm, hex } of this.entries) {
      set[algorithm] = hex;
    }
    return set;
  }
}
