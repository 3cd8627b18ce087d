import { SchemaViolationError } from '../core/errors';
import { customProps, deepFreeze } from '../core/json';
import { schemaId } from '../schema/loader';
import {
  CustomProps,
  Generation,
  LegacyDistributionDocument,
  LegacyExtension,
  LegacyLicense,
  LegacyMetaSpec,
} from '../types';
import { detectGeneration } from './generation';
import { EngineOptions, resolveOptions } from './options';
import { checkLegacyDistribution, listOf } from './semantic';

/**
 * Generation 1 distribution metadata
 */
export class LegacyDistribution {
  private constructor(private readonly doc: Readonly<LegacyDistributionDocument>) {}

  static tryFrom(value: unknown, options: EngineOptions = {}): LegacyDistribution {
    const { registry } = resolveOptions(options);
    detectGeneration(value);

    const id = schemaId(Generation.Legacy, 'distribution');
    const outcome = registry.validate<LegacyDistributionDocument>(id, value);
    if (!outcome.valid) {
      throw new SchemaViolationError(id, outcome.violations);
    }

    const doc = structuredClone(outcome.value);
    checkLegacyDistribution(doc);
    return new LegacyDistribution(deepFreeze(doc));
  }

  get name(): string {
    return this.doc.name;
  }

  get version(): string {
    return this.doc.version;
  }

  get abstract(): string {
    return this.doc.abstract;
  }

  get license(): LegacyLicense {
    return this.doc.license;
  }

  get spec(): Readonly<LegacyMetaSpec> {
    return this.doc['meta-spec'];
  }

  /**
   * Maintainers in their free-text `Name <email>` form
   */
  get maintainers(): string[] {
    return listOf(this.doc.maintainer);
  }

  get provides(): Readonly<Record<string, LegacyExtension>> {
    return this.doc.provides;
  }

  get tags(): string[] {
    return listOf(this.doc.tags);
  }

  get custom(): CustomProps {
    return customProps(this.doc);
  }

  toJSON(): LegacyDistributionDocument {
    return structuredClone(this.doc);
  }
}
