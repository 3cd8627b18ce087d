const CONTROL = /[\u0000-\u001f\u007f]/;

/**
 * Check a relative unix path. Returns the reason it is invalid, or undefined.
 *
 * `./README` is allowed, while `a/./b`, `../a` and `a/../b` are not.
 */
export function pathError(value: string): string | undefined {
  if (value.length === 0) return 'path must not be empty';
  if (CONTROL.test(value)) return 'path must not contain control characters';
  if (value.includes('\\')) return 'path must use unix separators';
  if (value.startsWith('/')) return 'path must be relative';
  return segmentError(value.split('/'));
}

export function isPath(value: string): boolean {
  return pathError(value) === undefined;
}

const ESCAPABLE = '\\*?[]{}()!,';

function escapeError(value: string): string | undefined {
  for (let i = 0; i < value.length; i++) {
    if (value[i] !== '\\') continue;
    const next = value.charAt(i + 1);
    if (next === '' || !ESCAPABLE.includes(next)) {
      return 'backslash must escape a glob character';
    }
    i++;
  }
  return undefined;
}

/**
 * Check a glob pattern. A leading slash anchors the pattern at the
 * distribution root; literal segments follow the path rules. A backslash
 * only escapes a glob character, so `this\\and\\that` is allowed while
 * `this\and\that` is not.
 */
export function globError(value: string): string | undefined {
  if (value.length === 0) return 'glob must not be empty';
  if (CONTROL.test(value)) return 'glob must not contain control characters';
  const escape = escapeError(value);
  if (escape) return escape;
  const body = value.startsWith('/') ? value.slice(1) : value;
  if (body.length === 0) return 'glob must name something below the root';
  return segmentError(body.split('/'));
}

export function isGlob(value: string): boolean {
  return globError(value) === undefined;
}

function segmentError(segments: string[]): string | undefined {
  for (let i = 0; i < segments.length; i++) {
    const segment = segments[i];
    if (segment === '..') return 'path must not contain a parent directory segment';
    if (segment === '.' && i > 0) return 'current directory segment is only allowed first';
    if (segment === '' && i < segments.length - 1) return 'path must not contain empty segments';
  }
  return undefined;
}
