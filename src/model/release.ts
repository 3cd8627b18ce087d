import { ConversionError, MetaError, SchemaViolationError, violationsOf } from '../core/errors';
import { deepFreeze } from '../core/json';
import { schemaId } from '../schema/loader';
import { upgradeReleaseDocument } from '../convert/upgrade';
import { DecodedJws, ReleasePayload, decodeReleaseJws } from '../verify/jws';
import { Digests } from '../verify/digests';
import {
  Certs,
  Generation,
  JwsSignatureBlock,
  LegacyReleaseDocument,
  ReleaseDocument,
} from '../types';
import { Distribution } from './distribution';
import { detectGeneration } from './generation';
import { EngineOptions, resolveOptions } from './options';
import { checkLegacyDistribution } from './semantic';

/**
 * A distribution plus the provenance the indexing service signed for it
 */
export class Release {
  private constructor(
    readonly distribution: Distribution,
    private readonly certs: Readonly<Certs>,
    private readonly jws: DecodedJws
  ) {}

  /**
   * Build a release from either generation. Legacy releases (top-level
   * `user`, `date` and `sha1`) are upgraded first.
   */
  static tryFrom(value: unknown, options: EngineOptions = {}): Release {
    const resolved = resolveOptions(options);
    const { registry, logger } = resolved;

    if (detectGeneration(value) === Generation.Legacy) {
      const legacyId = schemaId(Generation.Legacy, 'release');
      const legacy = registry.validate<LegacyReleaseDocument>(legacyId, value);
      if (!legacy.valid) {
        throw new SchemaViolationError(legacyId, legacy.violations);
      }
      checkLegacyDistribution(legacy.value);
      const upgraded = upgradeReleaseDocument(legacy.value, logger);
      try {
        return Release.tryFrom(upgraded, options);
      } catch (error) {
        if (error instanceof MetaError && !(error instanceof ConversionError)) {
          throw new ConversionError(
            `Cannot upgrade ${legacy.value.name} ${legacy.value.version}`,
            violationsOf(error)
          );
        }
        throw error;
      }
    }

    const id = schemaId(Generation.Current, 'release');
    const outcome = registry.validate<ReleaseDocument>(id, value);
    if (!outcome.valid) {
      throw new SchemaViolationError(id, outcome.violations);
    }

    const { certs, ...rest } = structuredClone(outcome.value);
    const distribution = Distribution.tryFrom(rest, options);
    const jws = decodeReleaseJws(certs.pgxn, registry);

    if (jws.payload.digests.sha1Only && resolved.sha1Policy === 'warn') {
      logger.warn(
        `${distribution.name} ${distribution.version} is only covered by a sha1 digest`
      );
    }
    return new Release(distribution, deepFreeze(certs), jws);
  }

  get name(): string {
    return this.distribution.name;
  }

  get version(): string {
    return this.distribution.version;
  }

  get payload(): ReleasePayload {
    return this.jws.payload;
  }

  get user(): string {
    return this.jws.payload.user;
  }

  get date(): Date {
    return this.jws.payload.date;
  }

  get uri(): string {
    return this.jws.payload.uri;
  }

  get digests(): Digests {
    return this.jws.payload.digests;
  }

  get signatures(): readonly JwsSignatureBlock[] {
    return this.jws.signatures;
  }

  toJSON(): ReleaseDocument {
    return { ...this.distribution.toJSON(), certs: structuredClone(this.certs) };
  }
}
