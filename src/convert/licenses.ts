import { ConversionError } from '../core/errors';
import { isObject } from '../core/json';
import { readDataFile } from '../core/resources';
import { LegacyLicense } from '../types';

/** A license known only by its key together with one specific URL */
interface UrlEntry {
  key: string;
  url: string;
  spdx: string;
}

interface LicenseTable {
  names: Record<string, string>;
  urlKeys: Record<string, string>;
  urlEntries: UrlEntry[];
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return isObject(value) && Object.values(value).every((v) => typeof v === 'string');
}

function isUrlEntry(value: unknown): value is UrlEntry {
  return (
    isObject(value) &&
    typeof value.key === 'string' &&
    typeof value.url === 'string' &&
    typeof value.spdx === 'string'
  );
}

function isLicenseTable(value: unknown): value is LicenseTable {
  return (
    isObject(value) &&
    isStringRecord(value.names) &&
    isStringRecord(value.urlKeys) &&
    Array.isArray(value.urlEntries) &&
    value.urlEntries.every(isUrlEntry)
  );
}

let table: LicenseTable | undefined;

function licenseTable(): LicenseTable {
  if (!table) {
    const data = readDataFile('legacy-licenses.json');
    if (!isLicenseTable(data)) {
      throw new Error('data/legacy-licenses.json is malformed');
    }
    table = data;
  }
  return table;
}

function lookup(map: Record<string, string>, key: string, what: string): string {
  if (!Object.prototype.hasOwnProperty.call(map, key)) {
    throw new ConversionError(`${what} "${key}" has no SPDX equivalent`);
  }
  return map[key];
}

/**
 * Map a legacy license (name, list of names, or name-to-URL mapping) to an
 * SPDX expression. Several licenses become alternatives joined with OR.
 */
export function legacyLicenseToSpdx(license: LegacyLicense): string {
  const { names, urlKeys, urlEntries } = licenseTable();
  if (typeof license === 'string') {
    return lookup(names, license, 'License');
  }
  if (Array.isArray(license)) {
    return license.map((name) => lookup(names, name, 'License')).join(' OR ');
  }
  return Object.entries(license)
    .map(([name, url]) => {
      const entry = urlEntries.find((e) => e.key === name && e.url === url);
      return entry ? entry.spdx : lookup(urlKeys, name, 'License');
    })
    .join(' OR ');
}
