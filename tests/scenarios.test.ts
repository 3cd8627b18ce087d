import { createHash } from 'crypto';
import {
  Digests,
  Distribution,
  LegacyDistribution,
  Release,
  Generation,
  DigestMismatchError,
  getDefaultRegistry,
  loadDistribution,
  merge,
  schemaId,
  upgrade,
} from '../src';
import { fixture, recordingLogger } from './helpers/corpus';

const ARCHIVE = Buffer.from('pair-0.1.8 archive');
const SIGNATURE = 'c2lnbmF0dXJlLXBsYWNlaG9sZGVyLWZvci10ZXN0cw';

describe('metadata scenarios', () => {
  it('loads the pair distribution', () => {
    const dist = Distribution.tryFrom(fixture('v2/pair.json'));

    expect(dist.name).toBe('pair');
    expect(dist.version).toBe('0.1.8');
  });

  it('upgrades the legacy pair distribution', () => {
    const dist = upgrade(LegacyDistribution.tryFrom(fixture('v1/pair.json')));

    expect(dist.contents.extensions?.pair.sql).toBe('sql/pair.sql');
  });

  it('verifies content against a sha512 digest', () => {
    const sha512 = createHash('sha512').update(ARCHIVE).digest('hex');
    const digests = Digests.from({ sha512 });

    expect(sha512).toMatch(/^[0-9a-f]{128}$/);
    expect(() => digests.verify(ARCHIVE)).not.toThrow();
    expect(() => digests.verify(Buffer.from('pair-0.1.9 archive'))).toThrow(DigestMismatchError);
  });

  it('round-trips every current distribution in the corpus', () => {
    for (const name of ['v2/pair.json', 'v2/widget.json']) {
      const first = Distribution.tryFrom(fixture(name));
      const second = Distribution.tryFrom(JSON.parse(JSON.stringify(first)));

      expect(second.toJSON()).toEqual(first.toJSON());
    }
  });

  it('carries a legacy document all the way to a verified release', () => {
    const logger = recordingLogger();
    const dist = loadDistribution(fixture('v1/widget.json'), { logger });
    const digests = Digests.compute(ARCHIVE, ['sha512', 'sha256']);

    const release = merge(
      dist,
      {
        user: 'ada',
        date: '2024-05-06T07:08:09Z',
        digests: digests.toJSON(),
        signatures: { signature: SIGNATURE },
      },
      { logger }
    );
    const reloaded = Release.tryFrom(JSON.parse(JSON.stringify(release)), { logger });

    expect(reloaded.name).toBe('widget');
    expect(reloaded.distribution.license).toBe('PostgreSQL OR MIT');
    expect(reloaded.digests.algorithms).toEqual(['sha512', 'sha256']);
    expect(reloaded.digests.matches(ARCHIVE)).toBe(true);
    expect(
      getDefaultRegistry().validate(schemaId(Generation.Current, 'release'), release.toJSON()).valid
    ).toBe(true);
  });
});
