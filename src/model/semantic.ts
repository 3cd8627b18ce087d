import { SemanticViolationError } from '../core/errors';
import { pointer } from '../core/json';
import { globError, pathError } from '../primitives/path';
import { isTag, isTerm } from '../primitives/term';
import { isVersion } from '../primitives/version';
import { VersionRange } from '../primitives/version-range';
import { parsePurl } from '../primitives/purl';
import { licenseError } from '../primitives/license';
import { isPlatform } from '../primitives/platform';
import { isDigestHex } from '../primitives/digest-hex';
import {
  CONTENT_KINDS,
  Dependencies,
  DependencySet,
  DistributionDocument,
  Generation,
  LegacyDistributionDocument,
  LegacyList,
  LegacyPhaseName,
  PackagePhase,
  Relation,
  VersionRangeValue,
} from '../types';

const RELATIONS: readonly Relation[] = ['requires', 'recommends', 'suggests', 'conflicts'];
const PHASES: readonly PackagePhase[] = ['configure', 'build', 'test', 'run', 'develop'];
const LEGACY_PHASES: readonly LegacyPhaseName[] = ['configure', 'build', 'test', 'runtime', 'develop'];
const PATH_FIELDS = ['control', 'sql', 'doc', 'lib', 'bin', 'man', 'html'];

function fail(path: string, reason: string): never {
  throw new SemanticViolationError(path, reason);
}

function checkTerm(value: string, at: string, generation: Generation = Generation.Current): void {
  if (!isTerm(value, generation)) fail(at, `"${value}" is not a valid term`);
}

function checkVersion(value: string, at: string): void {
  if (!isVersion(value)) fail(at, `"${value}" is not a semantic version`);
}

function checkPath(value: string, at: string): void {
  const reason = pathError(value);
  if (reason) fail(at, reason);
}

function checkRange(value: VersionRangeValue, at: string): void {
  const range = VersionRange.tryParse(value);
  if (typeof range === 'string') fail(at, range);
}

function checkDependencySet(deps: DependencySet, at: string): void {
  deps.platforms?.forEach((platform, i) => {
    if (!isPlatform(platform)) fail(at + pointer('platforms', i), `"${platform}" is not a platform`);
  });
  if (deps.postgres) {
    checkRange(deps.postgres.version, at + pointer('postgres', 'version'));
    deps.postgres.with?.forEach((feature, i) =>
      checkTerm(feature, at + pointer('postgres', 'with', i))
    );
  }
  for (const phaseName of PHASES) {
    const phase = deps.packages?.[phaseName];
    if (!phase) continue;
    for (const relation of RELATIONS) {
      for (const [purl, range] of Object.entries(phase[relation] ?? {})) {
        const at2 = at + pointer('packages', phaseName, relation, purl);
        const parsed = parsePurl(purl);
        if (typeof parsed === 'string') fail(at2, parsed);
        checkRange(range, at2);
      }
    }
  }
}

function checkDependencies(deps: Dependencies, at: string): void {
  checkDependencySet(deps, at);
  deps.variations?.forEach((variation, i) => {
    for (const key of ['where', 'dependencies'] as const) {
      const nested = variation[key];
      const at2 = at + pointer('variations', i, key);
      if ('variations' in nested) fail(at2, 'variations must not be nested');
      checkDependencySet(nested, at2);
    }
  });
}

/**
 * Grammar and cross-field checks a schema cannot express for a
 * generation 2 distribution. Throws SemanticViolationError on the first problem.
 */
export function checkDistribution(doc: DistributionDocument): void {
  checkTerm(doc.name, '/name');
  checkVersion(doc.version, '/version');

  const license = licenseError(doc.license);
  if (license) fail('/license', license);

  if (!doc['meta-spec'].version.startsWith('2.')) {
    fail('/meta-spec/version', 'expected a generation 2 meta-spec version');
  }

  doc.maintainers.forEach((maintainer, i) => {
    if (maintainer.email === undefined && maintainer.url === undefined) {
      fail(pointer('maintainers', i), 'maintainer requires an email or a url');
    }
  });

  let kinds = 0;
  for (const kind of CONTENT_KINDS) {
    const entries = doc.contents[kind];
    if (!entries) continue;
    for (const [name, entry] of Object.entries(entries)) {
      const at = pointer('contents', kind, name);
      checkTerm(name, at);
      for (const [field, value] of Object.entries(entry)) {
        if (PATH_FIELDS.includes(field) && typeof value === 'string') {
          checkPath(value, at + pointer(field));
        }
      }
    }
    if (Object.keys(entries).length > 0) kinds++;
  }
  if (kinds === 0) fail('/contents', 'contents must describe at least one item');

  doc.classifications?.tags?.forEach((tag, i) => {
    if (!isTag(tag)) fail(pointer('classifications', 'tags', i), `"${tag}" is not a valid tag`);
  });

  doc.ignore?.forEach((glob, i) => {
    const reason = globError(glob);
    if (reason) fail(pointer('ignore', i), reason);
  });

  if (doc.dependencies) checkDependencies(doc.dependencies, '/dependencies');

  doc.artifacts?.forEach((artifact, i) => {
    const at = pointer('artifacts', i);
    if (artifact.sha256 === undefined && artifact.sha512 === undefined) {
      fail(at, 'artifact requires a sha256 or sha512 digest');
    }
    if (artifact.sha256 !== undefined && !isDigestHex('sha256', artifact.sha256)) {
      fail(at + '/sha256', 'not a sha256 hex digest');
    }
    if (artifact.sha512 !== undefined && !isDigestHex('sha512', artifact.sha512)) {
      fail(at + '/sha512', 'not a sha512 hex digest');
    }
    if (artifact.platform !== undefined && !isPlatform(artifact.platform)) {
      fail(at + '/platform', `"${artifact.platform}" is not a platform`);
    }
  });
}

export function listOf(value: LegacyList | undefined): string[] {
  if (value === undefined) return [];
  return typeof value === 'string' ? [value] : [...value];
}

/**
 * Grammar checks for a generation 1 distribution
 */
export function checkLegacyDistribution(doc: LegacyDistributionDocument): void {
  checkTerm(doc.name, '/name', Generation.Legacy);
  checkVersion(doc.version, '/version');

  if (!doc['meta-spec'].version.startsWith('1.')) {
    fail('/meta-spec/version', 'expected a generation 1 meta-spec version');
  }

  for (const [name, extension] of Object.entries(doc.provides)) {
    const at = pointer('provides', name);
    checkTerm(name, at, Generation.Legacy);
    checkPath(extension.file, at + '/file');
    checkVersion(extension.version, at + '/version');
    if (extension.docfile !== undefined) checkPath(extension.docfile, at + '/docfile');
  }

  listOf(doc.maintainer).forEach((m, i) => {
    if (m.trim() === '') fail(pointer('maintainer', i), 'maintainer must not be blank');
  });

  for (const phaseName of LEGACY_PHASES) {
    const phase = doc.prereqs?.[phaseName];
    if (!phase) continue;
    for (const relation of RELATIONS) {
      for (const [name, range] of Object.entries(phase[relation] ?? {})) {
        checkRange(range, pointer('prereqs', phaseName, relation, name));
      }
    }
  }
}
