import { Generation } from '../types';
import { isTerm } from './term';
import { VersionRange } from './version-range';

/**
 * A parsed package URL: `pkg:<type>/<namespace>/<name>@<version>?<qualifiers>#<subpath>`
 */
export interface Purl {
  type: string;
  namespace?: string;
  name: string;
  version?: VersionRange;
  qualifiers?: string;
  subpath?: string;
}

const TYPE = /^[a-zA-Z.+-][a-zA-Z0-9.+-]*$/;

function decode(value: string): string | undefined {
  try {
    return decodeURIComponent(value);
  } catch {
    return undefined;
  }
}

/**
 * Parse a purl. Returns the reason it is invalid when it cannot be parsed.
 *
 * The version segment is percent-decoded and must be a valid version range.
 * The `pgxn` type allows a namespace naming the releasing user; the
 * `postgres` type takes no namespace.
 */
export function parsePurl(value: string): Purl | string {
  if (!value.startsWith('pkg:')) return 'package URL must start with "pkg:"';
  let rest = value.slice(4).replace(/^\/+/, '');

  let subpath: string | undefined;
  const hash = rest.indexOf('#');
  if (hash >= 0) {
    subpath = rest.slice(hash + 1);
    rest = rest.slice(0, hash);
  }

  let qualifiers: string | undefined;
  const question = rest.indexOf('?');
  if (question >= 0) {
    qualifiers = rest.slice(question + 1);
    rest = rest.slice(0, question);
  }

  let version: VersionRange | undefined;
  const at = rest.lastIndexOf('@');
  if (at >= 0) {
    const decoded = decode(rest.slice(at + 1));
    if (decoded === undefined) return 'version is not valid percent-encoding';
    const range = VersionRange.tryParse(decoded);
    if (typeof range === 'string') return `invalid version: ${range}`;
    version = range;
    rest = rest.slice(0, at);
  }

  const segments = rest.split('/').filter((s) => s.length > 0);
  if (segments.length < 2) return 'package URL requires a type and a name';
  const [type, ...path] = segments;
  if (!TYPE.test(type)) return `invalid package type "${type}"`;

  const name = decode(path[path.length - 1]);
  if (!name) return 'package name is not valid percent-encoding';
  const namespaceParts = path.slice(0, -1).map(decode);
  if (namespaceParts.some((p) => p === undefined)) {
    return 'namespace is not valid percent-encoding';
  }
  const namespace = namespaceParts.length > 0 ? namespaceParts.join('/') : undefined;

  const purl: Purl = { type: type.toLowerCase(), name };
  if (namespace !== undefined) purl.namespace = namespace;
  if (version) purl.version = version;
  if (qualifiers !== undefined) purl.qualifiers = qualifiers;
  if (subpath !== undefined) purl.subpath = subpath;

  if (purl.type === 'pgxn' && namespace !== undefined && !isTerm(namespace, Generation.Current)) {
    return `pgxn namespace must be a user name, got "${namespace}"`;
  }
  if (purl.type === 'postgres' && namespace !== undefined) {
    return 'postgres packages take no namespace';
  }
  return purl;
}

export function isPurl(value: string): boolean {
  return typeof parsePurl(value) !== 'string';
}

/**
 * Serialize a purl, percent-encoding the version segment
 */
export function formatPurl(purl: Purl): string {
  const parts = [purl.type];
  if (purl.namespace !== undefined) {
    parts.push(...purl.namespace.split('/').map(encodeURIComponent));
  }
  parts.push(encodeURIComponent(purl.name));
  let out = `pkg:${parts.join('/')}`;
  if (purl.version) out += `@${encodeURIComponent(purl.version.toString())}`;
  if (purl.qualifiers !== undefined) out += `?${purl.qualifiers}`;
  if (purl.subpath !== undefined) out += `#${purl.subpath}`;
  return out;
}
