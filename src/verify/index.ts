export { Digests, DigestEntry, Content } from './digests';
export {
  ReleasePayload,
  DecodedJws,
  JwsForm,
  decodeReleaseJws,
  decodePayload,
  encodePayload,
} from './jws';
