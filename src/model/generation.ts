import { UnsupportedSpecVersionError } from '../core/errors';
import { isObject } from '../core/json';
import { Generation } from '../types';

/**
 * Read the generation from `meta-spec.version`. Unknown major versions are
 * rejected before anything else looks at the document.
 */
export function detectGeneration(document: unknown): Generation {
  const spec = isObject(document) ? document['meta-spec'] : undefined;
  const version = isObject(spec) ? spec.version : undefined;
  if (typeof version !== 'string' || version.length < 2) {
    throw new UnsupportedSpecVersionError();
  }
  if (version.startsWith('1.')) return Generation.Legacy;
  if (version.startsWith('2.')) return Generation.Current;
  throw new UnsupportedSpecVersionError(version);
}
