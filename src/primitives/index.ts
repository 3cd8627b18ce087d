export { isTerm, isTag } from './term';
export { pathError, isPath, globError, isGlob } from './path';
export { parseVersion, isVersion } from './version';
export { VersionRange, Comparator, Constraint } from './version-range';
export { Purl, parsePurl, isPurl, formatPurl } from './purl';
export { licenseError, isLicenseExpression } from './license';
export { Platform, Architecture, ARCHITECTURES, parsePlatform, isPlatform } from './platform';
export {
  DIGEST_ALGORITHMS,
  DIGEST_HEX_LENGTH,
  isDigestAlgorithm,
  isDigestHex,
} from './digest-hex';
