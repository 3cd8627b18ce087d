import { SemVer } from 'semver';

const SEMVER =
  /^(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)(?:-((?:0|[1-9]\d*|\d*[a-zA-Z-][0-9a-zA-Z-]*)(?:\.(?:0|[1-9]\d*|\d*[a-zA-Z-][0-9a-zA-Z-]*))*))?(?:\+([0-9a-zA-Z-]+(?:\.[0-9a-zA-Z-]+)*))?$/;

/**
 * Parse a strict semantic version (no leading `v`, no truncation).
 * Build metadata is kept but never compared.
 */
export function parseVersion(value: string): SemVer | undefined {
  if (!SEMVER.test(value)) return undefined;
  return new SemVer(value);
}

export function isVersion(value: string): boolean {
  return SEMVER.test(value);
}
