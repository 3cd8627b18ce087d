import {
  ConversionError,
  MergeError,
  MetaError,
  SchemaViolationError,
  SemanticViolationError,
  violationsOf,
} from '../core/errors';
import { isJsonObject, isJsonValue } from '../core/json';
import { upgradeDocument, upgradeReleaseDocument } from '../convert/upgrade';
import { schemaId } from '../schema/loader';
import { Distribution } from '../model/distribution';
import { Release } from '../model/release';
import { detectGeneration } from '../model/generation';
import { EngineOptions, resolveOptions } from '../model/options';
import { encodePayload } from '../verify/jws';
import {
  CustomProps,
  DigestSet,
  Generation,
  JsonValue,
  JwsDocument,
  JwsSignatureBlock,
  LegacyDistributionDocument,
  LegacyReleaseDocument,
  ReleaseDocument,
  ReleasePayloadDocument,
} from '../types';
import { applyMergePatch } from './patch';

/**
 * Release-only fields supplied by the indexing service
 */
export interface ReleaseFields {
  user: string;
  date: string | Date;
  digests: DigestSet;
  /** Defaults to `dist/<name>/<version>/<name>-<version>.zip` */
  uri?: string;
  /** One block gives the flattened JWS form, several the general form */
  signatures?: JwsSignatureBlock | JwsSignatureBlock[];
  /** Extra top-level custom keys; never replace keys the distribution has */
  custom?: CustomProps;
}

function envelope(payload: string, signatures: ReleaseFields['signatures']): Partial<JwsDocument> {
  if (signatures === undefined) return { payload };
  if (Array.isArray(signatures)) return { payload, signatures };
  return { ...signatures, payload };
}

/**
 * Combine a distribution with release fields. The distribution is
 * authoritative; the merged whole must satisfy the release schema.
 */
export function merge(
  distribution: Distribution,
  fields: ReleaseFields,
  options: EngineOptions = {}
): Release {
  const { registry, logger } = resolveOptions(options);

  const payload: ReleasePayloadDocument = {
    date: fields.date instanceof Date ? fields.date.toISOString() : fields.date,
    digests: fields.digests,
    uri:
      fields.uri ??
      `dist/${distribution.name}/${distribution.version}/${distribution.name}-${distribution.version}.zip`,
    user: fields.user,
  };
  const payloadId = schemaId(Generation.Current, 'payload');
  const checked = registry.validate(payloadId, payload);
  if (!checked.valid) {
    throw new MergeError(
      'Release payload is invalid',
      checked.violations.map((v) => ({ ...v, location: `/certs/pgxn/payload${v.location}` }))
    );
  }

  const doc: Record<string, unknown> = {};
  Object.assign(doc, distribution.toJSON());
  for (const [key, value] of Object.entries(fields.custom ?? {})) {
    if (key in doc) {
      logger.debug(`Ignoring release field ${key}: the distribution already defines it`);
    } else {
      doc[key] = value;
    }
  }
  doc.certs = { pgxn: envelope(encodePayload(payload), fields.signatures) };

  const id = schemaId(Generation.Current, 'release');
  const outcome = registry.validate<ReleaseDocument>(id, doc);
  if (!outcome.valid) {
    throw new MergeError('Merged release is invalid', outcome.violations);
  }

  try {
    return Release.tryFrom(outcome.value, options);
  } catch (error) {
    if (error instanceof MetaError) {
      throw new MergeError('Merged release is invalid', violationsOf(error));
    }
    throw error;
  }
}

function isLegacyRelease(doc: LegacyDistributionDocument): doc is LegacyReleaseDocument {
  return 'user' in doc && 'date' in doc && 'sha1' in doc;
}

/**
 * Build a distribution or release from a base document and a series of
 * RFC 7396 merge patches. A legacy base is upgraded before patching.
 */
export function mergePatches(
  documents: readonly unknown[],
  options: EngineOptions = {}
): Distribution | Release {
  const { registry, logger } = resolveOptions(options);
  if (documents.length === 0) {
    throw new MergeError('No documents to merge');
  }
  const [base, ...patches] = documents;

  let merged: JsonValue;
  if (detectGeneration(base) === Generation.Legacy) {
    const legacyRelease = registry.validate<LegacyReleaseDocument>(
      schemaId(Generation.Legacy, 'release'),
      base
    );
    const legacy = legacyRelease.valid
      ? legacyRelease
      : registry.validate<LegacyDistributionDocument>(schemaId(Generation.Legacy, 'distribution'), base);
    if (!legacy.valid) {
      throw new SchemaViolationError(schemaId(Generation.Legacy, 'distribution'), legacy.violations);
    }
    const upgraded = isLegacyRelease(legacy.value)
      ? upgradeReleaseDocument(legacy.value, logger)
      : upgradeDocument(legacy.value, logger);
    const plain: unknown = upgraded;
    if (!isJsonValue(plain)) {
      throw new MergeError('Upgraded base document is not JSON');
    }
    merged = plain;
  } else if (isJsonValue(base)) {
    merged = base;
  } else {
    throw new MergeError('Base document is not JSON');
  }

  patches.forEach((patch, i) => {
    if (!isJsonValue(patch)) {
      throw new MergeError(`Patch ${i + 1} is not JSON`);
    }
    merged = applyMergePatch(merged, patch);
  });

  try {
    if (isJsonObject(merged) && 'certs' in merged) {
      return Release.tryFrom(merged, options);
    }
    return Distribution.tryFrom(merged, options);
  } catch (error) {
    if (
      error instanceof SchemaViolationError ||
      error instanceof SemanticViolationError ||
      error instanceof ConversionError
    ) {
      throw new MergeError('Merged document is invalid', violationsOf(error));
    }
    throw error;
  }
}
