import {
  EnvelopeError,
  PayloadDecodeError,
  SemanticViolationError,
  errorMessage,
} from '../core/errors';
import { customProps, deepFreeze } from '../core/json';
import { isTerm } from '../primitives/term';
import { SchemaRegistry } from '../schema/registry';
import { schemaId } from '../schema/loader';
import {
  CustomProps,
  Generation,
  JwsDocument,
  JwsSignatureBlock,
  ReleasePayloadDocument,
} from '../types';
import { Digests } from './digests';

const BASE64URL = /^[A-Za-z0-9_-]*$/;

/**
 * Provenance the indexing service signs for a release
 */
export class ReleasePayload {
  readonly user: string;
  readonly date: Date;
  readonly uri: string;
  readonly digests: Digests;
  readonly custom: Readonly<CustomProps>;
  private readonly timestamp: string;

  constructor(document: ReleasePayloadDocument) {
    if (!isTerm(document.user)) {
      throw new SemanticViolationError('/user', 'user must be a term');
    }
    const date = new Date(document.date);
    if (Number.isNaN(date.getTime())) {
      throw new SemanticViolationError('/date', 'date is not a valid timestamp');
    }
    this.user = document.user;
    this.date = date;
    this.timestamp = document.date;
    this.uri = document.uri;
    this.digests = Digests.from(document.digests, '/digests');
    this.custom = deepFreeze(customProps(document));
  }

  toJSON(): ReleasePayloadDocument {
    return {
      ...structuredClone(this.custom),
      date: this.timestamp,
      digests: this.digests.toJSON(),
      uri: this.uri,
      user: this.user,
    };
  }
}

export type JwsForm = 'general' | 'flattened';

/**
 * A release JWS with its payload decoded. Signatures are carried but not
 * cryptographically verified.
 */
export interface DecodedJws {
  form: JwsForm;
  signatures: readonly JwsSignatureBlock[];
  payload: ReleasePayload;
}

const UTF8 = new TextDecoder('utf-8', { fatal: true });

export function encodePayload(payload: ReleasePayloadDocument): string {
  return Buffer.from(JSON.stringify(payload), 'utf-8').toString('base64url');
}

/**
 * Decode a Base64URL payload string into JSON, labelling the failing stage
 */
export function decodePayload(payload: string): unknown {
  if (!BASE64URL.test(payload) || payload.length % 4 === 1) {
    throw new PayloadDecodeError('base64', 'payload is not Base64URL');
  }
  let text: string;
  try {
    text = UTF8.decode(Buffer.from(payload, 'base64url'));
  } catch (error) {
    throw new PayloadDecodeError('json', `payload is not valid UTF-8: ${errorMessage(error)}`);
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    const reason = errorMessage(error);
    throw new PayloadDecodeError('json', reason);
  }
}

function signaturesOf(jws: JwsDocument): { form: JwsForm; signatures: JwsSignatureBlock[] } {
  if ('signatures' in jws) {
    return { form: 'general', signatures: jws.signatures };
  }
  const block: JwsSignatureBlock = { signature: jws.signature };
  if (jws.protected !== undefined) block.protected = jws.protected;
  if (jws.header !== undefined) block.header = jws.header;
  return { form: 'flattened', signatures: [block] };
}

/**
 * Two-pass decoding: validate the envelope with the payload as an opaque
 * string, then decode the payload and validate it as release data.
 */
export function decodeReleaseJws(envelope: unknown, registry: SchemaRegistry): DecodedJws {
  const outer = registry.validate<JwsDocument>(schemaId(Generation.Current, 'jws'), envelope);
  if (!outer.valid) {
    throw new EnvelopeError(outer.violations);
  }
  const jws = outer.value;

  const decoded = decodePayload(jws.payload);
  const inner = registry.validate<ReleasePayloadDocument>(
    schemaId(Generation.Current, 'payload'),
    decoded
  );
  if (!inner.valid) {
    throw new PayloadDecodeError('schema', 'payload does not match the release payload schema', inner.violations);
  }

  const { form, signatures } = signaturesOf(jws);
  return {
    form,
    signatures: deepFreeze(structuredClone(signatures)),
    payload: new ReleasePayload(inner.value),
  };
}
