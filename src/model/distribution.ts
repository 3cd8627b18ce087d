import { SchemaViolationError } from '../core/errors';
import { customProps, deepFreeze } from '../core/json';
import { schemaId } from '../schema/loader';
import { SemVer } from 'semver';
import { parseVersion } from '../primitives/version';
import {
  Artifact,
  Classifications,
  Contents,
  CustomProps,
  Dependencies,
  DistributionDocument,
  Generation,
  Maintainer,
  MetaSpec,
  Resources,
} from '../types';
import { detectGeneration } from './generation';
import { EngineOptions, resolveOptions } from './options';
import { checkDistribution } from './semantic';

/**
 * Generation 2 distribution metadata. Instances are immutable and only
 * come out of `Distribution.tryFrom`.
 */
export class Distribution {
  private constructor(private readonly doc: Readonly<DistributionDocument>) {}

  /**
   * Validate an untyped document against the distribution schema, then
   * re-check every field grammar the schema cannot express.
   */
  static tryFrom(value: unknown, options: EngineOptions = {}): Distribution {
    const { registry } = resolveOptions(options);
    detectGeneration(value);

    const id = schemaId(Generation.Current, 'distribution');
    const outcome = registry.validate<DistributionDocument>(id, value);
    if (!outcome.valid) {
      throw new SchemaViolationError(id, outcome.violations);
    }

    const doc = structuredClone(outcome.value);
    checkDistribution(doc);
    return new Distribution(deepFreeze(doc));
  }

  get name(): string {
    return this.doc.name;
  }

  get version(): string {
    return this.doc.version;
  }

  /**
   * Parsed version for precedence comparisons
   */
  get semver(): SemVer {
    const parsed = parseVersion(this.doc.version);
    if (!parsed) {
      throw new RangeError(`Invalid version ${this.doc.version}`);
    }
    return parsed;
  }

  get abstract(): string {
    return this.doc.abstract;
  }

  get description(): string | undefined {
    return this.doc.description;
  }

  get producer(): string | undefined {
    return this.doc.producer;
  }

  get license(): string {
    return this.doc.license;
  }

  get spec(): Readonly<MetaSpec> {
    return this.doc['meta-spec'];
  }

  get maintainers(): readonly Readonly<Maintainer>[] {
    return this.doc.maintainers;
  }

  get classifications(): Readonly<Classifications> | undefined {
    return this.doc.classifications;
  }

  get contents(): Readonly<Contents> {
    return this.doc.contents;
  }

  get ignore(): readonly string[] | undefined {
    return this.doc.ignore;
  }

  get dependencies(): Readonly<Dependencies> | undefined {
    return this.doc.dependencies;
  }

  get resources(): Readonly<Resources> | undefined {
    return this.doc.resources;
  }

  get artifacts(): readonly Readonly<Artifact>[] | undefined {
    return this.doc.artifacts;
  }

  /**
   * Top-level `x_` properties
   */
  get custom(): CustomProps {
    return customProps(this.doc);
  }

  /**
   * A mutable copy of the underlying document
   */
  toJSON(): DistributionDocument {
    return structuredClone(this.doc);
  }
}
