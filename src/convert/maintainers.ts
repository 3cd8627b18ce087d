import { fullFormats } from 'ajv-formats/dist/formats';
import { ConversionError } from '../core/errors';
import { Maintainer } from '../types';

const EMAIL = fullFormats.email;
const ANGLE = /^(.*?)\s*<([^<>\s]+)>$/;

function isEmail(value: string): boolean {
  return EMAIL instanceof RegExp && EMAIL.test(value);
}

/**
 * Parse a free-text `Name <email>` maintainer. Entries without an email get
 * the distribution homepage as their url, if there is one.
 */
export function parseLegacyMaintainer(raw: string, homepage?: string): Maintainer {
  const text = raw.trim();
  const match = ANGLE.exec(text);
  if (match && isEmail(match[2])) {
    return { name: match[1] || match[2], email: match[2] };
  }
  if (isEmail(text)) {
    return { name: text, email: text };
  }
  if (homepage !== undefined) {
    return { name: text, url: homepage };
  }
  throw new ConversionError(`Maintainer "${raw}" has no email address and there is no homepage`);
}

/**
 * Parse every legacy maintainer, dropping entries that come out identical
 */
export function upgradeMaintainers(raw: readonly string[], homepage?: string): Maintainer[] {
  const seen = new Set<string>();
  const maintainers: Maintainer[] = [];
  for (const entry of raw) {
    const maintainer = parseLegacyMaintainer(entry, homepage);
    const key = JSON.stringify([maintainer.name, maintainer.email, maintainer.url]);
    if (!seen.has(key)) {
      seen.add(key);
      maintainers.push(maintainer);
    }
  }
  return maintainers;
}
