import { EnvelopeError, PayloadDecodeError, SemanticViolationError } from '../core/errors';
import { getDefaultRegistry } from '../schema/registry';
import { ReleasePayload, decodePayload, decodeReleaseJws, encodePayload } from './jws';

const SIGNATURE = 'c2lnbmF0dXJlLXBsYWNlaG9sZGVyLWZvci10ZXN0cw';
const SHA1 = 'a'.repeat(40);

const payload = {
  user: 'jo',
  date: '2024-01-02T03:04:05Z',
  uri: 'dist/pair/0.1.8/pair-0.1.8.zip',
  digests: { sha1: SHA1 },
};

const invalidUtf8 = Buffer.concat([
  Buffer.from('{"user":"ad'),
  Buffer.from([0xff]),
  Buffer.from(`","date":"${payload.date}","uri":"${payload.uri}","digests":{"sha1":"${SHA1}"}}`),
]).toString('base64url');

function stageOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof PayloadDecodeError) return error.stage;
    throw error;
  }
  return undefined;
}

describe('decodePayload', () => {
  it('should decode Base64URL JSON', () => {
    expect(decodePayload(encodePayload(payload))).toEqual(payload);
  });

  it('should label Base64URL failures', () => {
    expect(stageOf(() => decodePayload('not+base64/url'))).toBe('base64');
    expect(stageOf(() => decodePayload('abcde'))).toBe('base64');
  });

  it('should label JSON failures', () => {
    expect(stageOf(() => decodePayload(Buffer.from('{"user":').toString('base64url')))).toBe('json');
  });

  it('should refuse bytes that are not UTF-8', () => {
    expect(() => decodePayload(invalidUtf8)).toThrow('payload is not valid UTF-8');
    expect(stageOf(() => decodePayload(invalidUtf8))).toBe('json');
  });
});

describe('decodeReleaseJws', () => {
  const registry = getDefaultRegistry();

  it('should decode the flattened form', () => {
    const decoded = decodeReleaseJws(
      { payload: encodePayload(payload), protected: 'eyJhbGciOiJFUzI1NiJ9', signature: SIGNATURE },
      registry
    );

    expect(decoded.form).toBe('flattened');
    expect(decoded.signatures).toEqual([{ protected: 'eyJhbGciOiJFUzI1NiJ9', signature: SIGNATURE }]);
    expect(decoded.payload.user).toBe('jo');
    expect(decoded.payload.digests.sha1Only).toBe(true);
  });

  it('should decode the general form', () => {
    const decoded = decodeReleaseJws(
      { payload: encodePayload(payload), signatures: [{ signature: SIGNATURE }] },
      registry
    );

    expect(decoded.form).toBe('general');
    expect(decoded.signatures).toHaveLength(1);
  });

  it('should reject a malformed envelope before touching the payload', () => {
    expect(() => decodeReleaseJws({ payload: '!!!', signature: SIGNATURE }, registry)).toThrow(
      EnvelopeError
    );
    expect(() => decodeReleaseJws({ payload: encodePayload(payload) }, registry)).toThrow(
      EnvelopeError
    );
  });

  it('should validate the decoded payload', () => {
    const jws = { payload: encodePayload({ ...payload, uri: 'elsewhere' }), signature: SIGNATURE };
    expect(stageOf(() => decodeReleaseJws(jws, registry))).toBe('schema');
  });

  it('should not build a release from a payload that is not UTF-8', () => {
    const jws = { payload: invalidUtf8, signature: SIGNATURE };
    expect(() => decodeReleaseJws(jws, registry)).toThrow(PayloadDecodeError);
  });

  it('should keep custom payload keys', () => {
    const jws = { payload: encodePayload({ ...payload, x_mirror: 'eu' }), signature: SIGNATURE };
    const decoded = decodeReleaseJws(jws, registry);

    expect(decoded.payload.custom).toEqual({ x_mirror: 'eu' });
    expect(decoded.payload.toJSON()).toEqual({ ...payload, x_mirror: 'eu' });
  });
});

describe('ReleasePayload', () => {
  it('should reject dates that do not parse', () => {
    expect(() => new ReleasePayload({ ...payload, date: 'yesterday' })).toThrow(SemanticViolationError);
  });
});
