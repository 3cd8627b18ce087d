import {
  SchemaViolationError,
  SemanticViolationError,
  UnsupportedSpecVersionError,
} from '../core/errors';
import { fixture } from '../../tests/helpers/corpus';
import { DistributionDocument, Generation, JsonObject } from '../types';
import { Distribution } from './distribution';
import { detectGeneration } from './generation';
import { checkDistribution } from './semantic';

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected an error');
}

describe('detectGeneration', () => {
  it('should read the major meta-spec version', () => {
    expect(detectGeneration(fixture('v1/pair.json'))).toBe(Generation.Legacy);
    expect(detectGeneration(fixture('v2/pair.json'))).toBe(Generation.Current);
  });

  it('should reject unknown versions', () => {
    expect(() => detectGeneration({ 'meta-spec': { version: '3.0.0' } })).toThrow(
      'unsupported meta-spec version "3.0.0"'
    );
  });

  it('should reject documents without a meta-spec', () => {
    expect(() => detectGeneration({ name: 'pair' })).toThrow('cannot determine meta-spec version');
    expect(() => detectGeneration('pair')).toThrow(UnsupportedSpecVersionError);
  });
});

describe('Distribution', () => {
  describe('tryFrom', () => {
    it('should load a minimal distribution', () => {
      const dist = Distribution.tryFrom(fixture('v2/pair.json'));

      expect(dist.name).toBe('pair');
      expect(dist.version).toBe('0.1.8');
      expect(dist.semver.minor).toBe(1);
      expect(dist.license).toBe('PostgreSQL');
      expect(dist.maintainers).toEqual([{ name: 'Jo Example', email: 'jo@example.com' }]);
      expect(dist.contents.extensions?.pair.sql).toBe('sql/pair.sql');
      expect(dist.spec.version).toBe('2.0.0');
      expect(dist.dependencies).toBeUndefined();
    });

    it('should load every section of a full distribution', () => {
      const dist = Distribution.tryFrom(fixture('v2/widget.json'));

      expect(dist.producer).toBe('Hand-written');
      expect(dist.contents.modules?.widget_hook.preload).toBe('session');
      expect(dist.contents.apps?.widgetctl.bin).toBe('bin/widgetctl');
      expect(dist.classifications?.tags).toEqual(['widget', 'data type']);
      expect(dist.ignore).toEqual(['/.github', '*.tmp']);
      expect(dist.dependencies?.postgres?.version).toBe('14.0');
      expect(dist.dependencies?.packages?.test?.requires).toEqual({ 'pkg:pgxn/pgtap': 0 });
      expect(dist.dependencies?.variations).toHaveLength(1);
      expect(dist.resources?.badges?.[0].alt).toBe('Build status');
      expect(dist.artifacts?.[0].type).toBe('source');
      expect(dist.custom).toEqual({ x_build_id: 'abc123' });
    });

    it('should round-trip the document', () => {
      const doc = fixture('v2/widget.json');
      expect(Distribution.tryFrom(doc).toJSON()).toEqual(doc);
    });

    it('should not share state with the input or output', () => {
      const doc = fixture('v2/pair.json');
      const dist = Distribution.tryFrom(doc);
      doc.name = 'changed';
      const out = dist.toJSON();
      out.name = 'changed-again';

      expect(dist.name).toBe('pair');
      expect(Object.isFrozen(dist.contents)).toBe(true);
    });

    it('should report schema violations', () => {
      const doc = fixture('v2/pair.json');
      doc.version = '1.0';
      const error = thrown(() => Distribution.tryFrom(doc));

      expect(error).toBeInstanceOf(SchemaViolationError);
      if (error instanceof SchemaViolationError) {
        expect(error.violations.map((v) => v.location)).toContain('/version');
      }
    });

    it('should reject paths that escape the distribution', () => {
      const doc = fixture('v2/pair.json');
      doc.contents = { extensions: { pair: { control: '../pair.control', sql: 'sql/pair.sql' } } };
      const error = thrown(() => Distribution.tryFrom(doc));

      expect(error).toBeInstanceOf(SchemaViolationError);
      if (error instanceof SchemaViolationError) {
        expect(error.violations).toContainEqual({
          location: '/contents/extensions/pair/control',
          message: 'must match format "path"',
          keyword: 'format',
        });
      }
    });

    it('should require an email or url for each maintainer', () => {
      const doc = fixture('v2/pair.json');
      doc.maintainers = [{ name: 'Jo Example' }];
      const error = thrown(() => Distribution.tryFrom(doc));

      expect(error).toBeInstanceOf(SemanticViolationError);
      if (error instanceof SemanticViolationError) {
        expect(error.path).toBe('/maintainers/0');
        expect(error.reason).toBe('maintainer requires an email or a url');
      }
    });

    it('should check package URLs in dependencies', () => {
      const doc = fixture('v2/pair.json');
      const packages: JsonObject = { run: { requires: { 'pkg:postgres/contrib/citext': 0 } } };
      doc.dependencies = { packages };
      const error = thrown(() => Distribution.tryFrom(doc));

      expect(error).toBeInstanceOf(SemanticViolationError);
      if (error instanceof SemanticViolationError) {
        expect(error.path).toBe('/dependencies/packages/run/requires/pkg:postgres~1contrib~1citext');
        expect(error.reason).toBe('postgres packages take no namespace');
      }
    });

    it('should check version ranges the schema lets through', () => {
      const doc = fixture('v2/pair.json');
      doc.dependencies = { postgres: { version: '>= 12, 0' } };

      expect(() => Distribution.tryFrom(doc)).toThrow(
        '/dependencies/postgres/version: 0 matches any version and must stand alone'
      );
    });

    it('should reject a legacy document', () => {
      expect(() => Distribution.tryFrom(fixture('v1/pair.json'))).toThrow(SchemaViolationError);
    });

    it('should reject an unknown meta-spec version before validating', () => {
      const doc = fixture('v2/pair.json');
      doc['meta-spec'] = { version: '3.0.0' };
      expect(() => Distribution.tryFrom(doc)).toThrow(UnsupportedSpecVersionError);
    });
  });
});

describe('distribution invariants', () => {
  const SHA512 = 'c'.repeat(128);

  function base(): DistributionDocument {
    return Distribution.tryFrom(fixture('v2/pair.json')).toJSON();
  }

  it('should reject variations nested inside a variation', () => {
    const doc = fixture('v2/pair.json');
    doc.dependencies = {
      variations: [
        {
          where: { platforms: ['linux'], variations: [{ where: {}, dependencies: {} }] },
          dependencies: { pipeline: 'pgxs' },
        },
      ],
    };
    const error = thrown(() => Distribution.tryFrom(doc));

    expect(error).toBeInstanceOf(SchemaViolationError);
    if (error instanceof SchemaViolationError) {
      expect(error.violations).toEqual([
        {
          location: '/dependencies/variations/0/where',
          message: 'must NOT have additional properties (variations)',
          keyword: 'additionalProperties',
        },
      ]);
    }
  });

  it('should catch nested variations in the semantic layer too', () => {
    const where = { platforms: ['linux'], variations: [] };
    const doc: DistributionDocument = {
      ...base(),
      dependencies: { variations: [{ where, dependencies: { pipeline: 'pgxs' } }] },
    };

    expect(() => checkDistribution(doc)).toThrow(
      '/dependencies/variations/0/where: variations must not be nested'
    );
  });

  it('should reject an artifact without a sha256 or sha512 digest', () => {
    const doc = fixture('v2/pair.json');
    doc.artifacts = [{ url: 'https://example.org/pair.zip', type: 'source' }];
    const error = thrown(() => Distribution.tryFrom(doc));

    expect(error).toBeInstanceOf(SchemaViolationError);
    if (error instanceof SchemaViolationError) {
      expect(error.violations).toContainEqual({
        location: '/artifacts/0',
        message: 'must match a schema in anyOf',
        keyword: 'anyOf',
      });
      expect(error.violations.every((v) => v.location === '/artifacts/0')).toBe(true);
    }
  });

  it('should require an artifact digest in the semantic layer too', () => {
    const doc: DistributionDocument = {
      ...base(),
      artifacts: [{ url: 'https://example.org/pair.zip', type: 'source' }],
    };

    expect(() => checkDistribution(doc)).toThrow(
      '/artifacts/0: artifact requires a sha256 or sha512 digest'
    );
  });

  it('should accept an artifact with only a sha512 digest', () => {
    const doc = fixture('v2/pair.json');
    doc.artifacts = [{ url: 'https://example.org/pair.zip', type: 'source', sha512: SHA512 }];

    expect(Distribution.tryFrom(doc).toJSON().artifacts).toEqual([
      { url: 'https://example.org/pair.zip', type: 'source', sha512: SHA512 },
    ]);
  });

  it('should reject empty contents', () => {
    const doc = fixture('v2/pair.json');
    doc.contents = {};
    const error = thrown(() => Distribution.tryFrom(doc));

    expect(error).toBeInstanceOf(SchemaViolationError);
    if (error instanceof SchemaViolationError) {
      expect(error.violations).toEqual([
        {
          location: '/contents',
          message: 'must NOT have fewer than 1 properties',
          keyword: 'minProperties',
        },
      ]);
    }
  });

  it('should reject contents holding only custom keys', () => {
    const doc = fixture('v2/pair.json');
    doc.contents = { x_note: 'nothing here yet' };
    const error = thrown(() => Distribution.tryFrom(doc));

    expect(error).toBeInstanceOf(SemanticViolationError);
    if (error instanceof SemanticViolationError) {
      expect(error.path).toBe('/contents');
      expect(error.reason).toBe('contents must describe at least one item');
    }
  });

  it('should reject a content kind with no entries', () => {
    const doc = fixture('v2/pair.json');
    doc.contents = { extensions: {} };

    expect(() => Distribution.tryFrom(doc)).toThrow(SchemaViolationError);
  });
});
