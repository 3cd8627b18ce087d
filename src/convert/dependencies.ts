import { readDataFile } from '../core/resources';
import { customProps } from '../core/json';
import { formatPurl } from '../primitives/purl';
import { parseVersion } from '../primitives/version';
import {
  Dependencies,
  LegacyPhaseName,
  LegacyPrereqs,
  PackagePhase,
  Packages,
  Phase,
  Relation,
} from '../types';

const PHASES: ReadonlyArray<[LegacyPhaseName, PackagePhase]> = [
  ['develop', 'develop'],
  ['configure', 'configure'],
  ['build', 'build'],
  ['test', 'test'],
  ['runtime', 'run'],
];

const RELATIONS: readonly Relation[] = ['requires', 'recommends', 'suggests', 'conflicts'];

let coreExtensions: Set<string> | undefined;

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function isCoreExtension(name: string): boolean {
  if (!coreExtensions) {
    const data = readDataFile('postgres-core-extensions.json');
    if (!isStringArray(data)) {
      throw new Error('data/postgres-core-extensions.json is malformed');
    }
    coreExtensions = new Set(data);
  }
  return coreExtensions.has(name);
}

/**
 * Package URL for a legacy prerequisite: core contrib extensions and
 * procedural languages live under `postgres`, everything else under `pgxn`.
 */
export function purlFor(name: string): string {
  const ext = name.toLowerCase();
  return formatPurl({ type: isCoreExtension(ext) ? 'postgres' : 'pgxn', name: ext });
}

/**
 * Turn legacy `prereqs` into `dependencies`. The PostgreSQL prerequisite
 * becomes `postgres.version`, keeping the lowest version required anywhere.
 */
export function legacyPrereqsToDependencies(prereqs: LegacyPrereqs): Dependencies | undefined {
  let postgres: string | undefined;
  const packages: Packages = customProps(prereqs);

  for (const [legacyName, phaseName] of PHASES) {
    const legacyPhase = prereqs[legacyName];
    if (!legacyPhase) continue;

    const phase: Phase = customProps(legacyPhase);
    for (const relation of RELATIONS) {
      const deps: Record<string, string | 0> = {};
      for (const [name, range] of Object.entries(legacyPhase[relation] ?? {})) {
        if (name.toLowerCase() === 'postgresql') {
          const version = typeof range === 'string' ? parseVersion(range) : undefined;
          if (version && (postgres === undefined || version.compare(postgres) < 0)) {
            postgres = version.version;
          }
          continue;
        }
        deps[purlFor(name)] = range;
      }
      if (Object.keys(deps).length > 0) phase[relation] = deps;
    }
    if (Object.keys(phase).length > 0) packages[phaseName] = phase;
  }

  const dependencies: Dependencies = {};
  if (postgres !== undefined) dependencies.postgres = { version: postgres };
  if (Object.keys(packages).length > 0) dependencies.packages = packages;
  return Object.keys(dependencies).length > 0 ? dependencies : undefined;
}
