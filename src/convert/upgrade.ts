import { v4 as uuidv4 } from 'uuid';
import { ConversionError, MetaError, violationsOf } from '../core/errors';
import { customProps } from '../core/json';
import { Logger } from '../core/logger';
import { globError, isGlob } from '../primitives/path';
import { isTag } from '../primitives/term';
import { Distribution } from '../model/distribution';
import { LegacyDistribution } from '../model/legacy';
import { EngineOptions, resolveOptions } from '../model/options';
import { listOf } from '../model/semantic';
import { encodePayload } from '../verify/jws';
import {
  Classifications,
  Contents,
  DistributionDocument,
  ExtensionEntry,
  LegacyDistributionDocument,
  LegacyMetaSpec,
  LegacyNoIndex,
  LegacyReleaseDocument,
  LegacyResources,
  MetaSpec,
  ReleaseDocument,
  ReleasePayloadDocument,
  Resources,
} from '../types';
import { legacyPrereqsToDependencies } from './dependencies';
import { legacyLicenseToSpdx } from './licenses';
import { upgradeMaintainers } from './maintainers';

export const SPEC_VERSION = '2.0.0';
export const SPEC_URL = 'https://rfcs.pgxn.org/0003-meta-spec-v2.html';
const LEGACY_SPEC_URLS = ['https://pgxn.org/meta/spec.txt', 'http://pgxn.org/meta/spec.txt'];
const MAX_TAGS = 32;

function upgradeSpec(spec: LegacyMetaSpec, logger: Logger): MetaSpec {
  const upgraded: MetaSpec = { ...customProps(spec), version: SPEC_VERSION };
  if (spec.url !== undefined) {
    if (LEGACY_SPEC_URLS.includes(spec.url)) {
      upgraded.url = SPEC_URL;
    } else {
      logger.debug(`Dropping non-canonical meta-spec url ${spec.url}`);
    }
  }
  return upgraded;
}

function upgradeContents(provides: LegacyDistributionDocument['provides']): Contents {
  const extensions: Record<string, ExtensionEntry> = {};
  for (const [name, legacy] of Object.entries(provides)) {
    const entry: ExtensionEntry = {
      ...customProps(legacy),
      control: `${name}.control`,
      sql: legacy.file,
    };
    if (legacy.docfile !== undefined) entry.doc = legacy.docfile;
    if (legacy.abstract !== undefined) entry.abstract = legacy.abstract;
    extensions[name] = entry;
  }
  return { extensions };
}

function upgradeTags(tags: string[], logger: Logger): Classifications | undefined {
  const kept: string[] = [];
  for (const tag of tags) {
    if (!isTag(tag)) {
      logger.warn(`Dropping tag "${tag}": not a valid tag`);
    } else if (!kept.includes(tag)) {
      kept.push(tag);
    }
  }
  if (kept.length > MAX_TAGS) {
    logger.warn(`Keeping the first ${MAX_TAGS} of ${kept.length} tags`);
  }
  return kept.length > 0 ? { tags: kept.slice(0, MAX_TAGS) } : undefined;
}

function upgradeIgnore(noIndex: LegacyNoIndex, logger: Logger): string[] | undefined {
  const ignore: string[] = [];
  for (const entry of [...listOf(noIndex.file), ...listOf(noIndex.directory)]) {
    if (!isGlob(entry)) {
      logger.warn(`Dropping no_index entry "${entry}": ${globError(entry) ?? 'not a valid glob'}`);
    } else if (!ignore.includes(entry)) {
      ignore.push(entry);
    }
  }
  return ignore.length > 0 ? ignore : undefined;
}

function upgradeResources(legacy: LegacyResources): Resources | undefined {
  const resources: Resources = {};
  if (legacy.homepage !== undefined) resources.homepage = legacy.homepage;

  const bugs = legacy.bugtracker;
  if (bugs?.web !== undefined) {
    resources.issues = bugs.web;
  } else if (bugs?.mailto !== undefined) {
    resources.issues = `mailto:${bugs.mailto}`;
  }

  const repo = legacy.repository;
  const repository = repo?.web ?? repo?.url;
  if (repository !== undefined) resources.repository = repository;

  Object.assign(resources, customProps(legacy));
  return Object.keys(resources).length > 0 ? resources : undefined;
}

/**
 * Map a legacy document onto the generation 2 shape. The result still has
 * to pass validation; `upgrade` takes care of that.
 */
export function upgradeDocument(
  legacy: LegacyDistributionDocument,
  logger: Logger
): DistributionDocument {
  const homepage = legacy.resources?.homepage;
  const doc: DistributionDocument = {
    ...customProps(legacy),
    name: legacy.name,
    version: legacy.version,
    abstract: legacy.abstract,
    license: legacyLicenseToSpdx(legacy.license),
    maintainers: upgradeMaintainers(listOf(legacy.maintainer), homepage),
    'meta-spec': upgradeSpec(legacy['meta-spec'], logger),
    contents: upgradeContents(legacy.provides),
  };

  if (legacy.description !== undefined) doc.description = legacy.description;
  if (legacy.generated_by !== undefined) doc.producer = legacy.generated_by;

  const classifications = upgradeTags(listOf(legacy.tags), logger);
  if (classifications) doc.classifications = classifications;

  const ignore = legacy.no_index ? upgradeIgnore(legacy.no_index, logger) : undefined;
  if (ignore) doc.ignore = ignore;

  const dependencies = legacy.prereqs ? legacyPrereqsToDependencies(legacy.prereqs) : undefined;
  if (dependencies) doc.dependencies = dependencies;

  const resources = legacy.resources ? upgradeResources(legacy.resources) : undefined;
  if (resources) doc.resources = resources;

  return doc;
}

/**
 * Upgrade a legacy release. Legacy releases carry no signature, so the
 * envelope gets a random placeholder that only satisfies the JWS schema.
 */
export function upgradeReleaseDocument(
  legacy: LegacyReleaseDocument,
  logger: Logger
): ReleaseDocument {
  const { user, date, sha1, ...distribution } = legacy;
  const doc = upgradeDocument(distribution, logger);
  const payload: ReleasePayloadDocument = {
    date,
    digests: { sha1 },
    uri: `dist/${legacy.name}/${legacy.version}/${legacy.name}-${legacy.version}.zip`,
    user,
  };
  return {
    ...doc,
    certs: {
      pgxn: {
        payload: encodePayload(payload),
        signature: uuidv4().replace(/-/g, ''),
      },
    },
  };
}

/**
 * Convert a legacy distribution to generation 2. The result is validated
 * against the generation 2 schema; a document that cannot be expressed
 * there fails with ConversionError.
 */
export function upgrade(legacy: LegacyDistribution, options: EngineOptions = {}): Distribution {
  const { logger } = resolveOptions(options);
  const doc = upgradeDocument(legacy.toJSON(), logger);
  try {
    return Distribution.tryFrom(doc, options);
  } catch (error) {
    if (error instanceof MetaError) {
      throw new ConversionError(
        `Cannot upgrade ${legacy.name} ${legacy.version}`,
        violationsOf(error)
      );
    }
    throw error;
  }
}
