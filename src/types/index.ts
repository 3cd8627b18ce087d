/**
 * Any value that can appear in a JSON document
 */
export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * Producer-defined extension keys (`x_foo`, `X_bar`)
 */
export type CustomKey = `x_${string}` | `X_${string}`;

/**
 * Open bag of custom keys attached to most metadata objects
 */
export type CustomProps = { [key: CustomKey]: JsonValue };

/**
 * Metadata specification generation, taken from `meta-spec.version`
 */
export enum Generation {
  Legacy = 1,
  Current = 2,
}

/**
 * Log levels accepted by the logger and configuration
 */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

/**
 * What to do with a digest set that only carries sha1
 */
export type Sha1Policy = 'accept' | 'warn';

export interface MetaConfig {
  schemaDir?: string;
  defaultFile: string;
  logLevel: LogLevel;
  sha1Policy: Sha1Policy;
  server: {
    port: number;
  };
}

// ---------------------------------------------------------------------------
// Generation 2 documents

export interface MetaSpec extends CustomProps {
  version: string;
  url?: string;
}

export interface Maintainer extends CustomProps {
  name: string;
  email?: string;
  url?: string;
}

export interface ExtensionEntry extends CustomProps {
  control: string;
  sql: string;
  doc?: string;
  abstract?: string;
  tle?: boolean;
}

export type ModuleType = 'extension' | 'hook' | 'bgw';
export type Preload = 'server' | 'session';

export interface ModuleEntry extends CustomProps {
  type: ModuleType;
  lib: string;
  doc?: string;
  abstract?: string;
  preload?: Preload;
}

export interface AppEntry extends CustomProps {
  bin: string;
  lang?: string;
  lib?: string;
  man?: string;
  html?: string;
  doc?: string;
  abstract?: string;
}

export interface WorkerEntry extends CustomProps {
  lib: string;
  doc?: string;
  abstract?: string;
  preload?: Preload;
}

export interface LibraryEntry extends CustomProps {
  lib: string;
  doc?: string;
  abstract?: string;
}

export interface Contents extends CustomProps {
  extensions?: Record<string, ExtensionEntry>;
  modules?: Record<string, ModuleEntry>;
  apps?: Record<string, AppEntry>;
  workers?: Record<string, WorkerEntry>;
  libraries?: Record<string, LibraryEntry>;
}

export type ContentKind = 'extensions' | 'modules' | 'apps' | 'workers' | 'libraries';

export const CONTENT_KINDS: readonly ContentKind[] = [
  'extensions',
  'modules',
  'apps',
  'workers',
  'libraries',
];

export interface Classifications extends CustomProps {
  tags?: string[];
  categories?: string[];
}

/**
 * Version range as written in documents: `0` (any version) or a constraint string
 */
export type VersionRangeValue = 0 | string;

export type Relation = 'requires' | 'recommends' | 'suggests' | 'conflicts';
export type PackagePhase = 'configure' | 'build' | 'test' | 'run' | 'develop';

export type Phase = CustomProps & { [R in Relation]?: Record<string, VersionRangeValue> };
export type Packages = CustomProps & { [P in PackagePhase]?: Phase };

export interface Postgres extends CustomProps {
  version: VersionRangeValue;
  with?: string[];
}

export type Pipeline =
  | 'pgxs'
  | 'meson'
  | 'pgrx'
  | 'autoconf'
  | 'cmake'
  | 'npm'
  | 'cpanm'
  | 'go'
  | 'cargo';

export interface DependencySet extends CustomProps {
  platforms?: string[];
  postgres?: Postgres;
  pipeline?: Pipeline;
  packages?: Packages;
}

export interface Variation extends CustomProps {
  where: DependencySet;
  dependencies: DependencySet;
}

export interface Dependencies extends DependencySet {
  variations?: Variation[];
}

export interface Badge extends CustomProps {
  src: string;
  alt: string;
  url?: string;
}

export interface Resources extends CustomProps {
  homepage?: string;
  issues?: string;
  repository?: string;
  docs?: string;
  support?: string;
  badges?: Badge[];
}

export interface Artifact extends CustomProps {
  url: string;
  type: string;
  platform?: string;
  sha256?: string;
  sha512?: string;
}

export interface DistributionDocument extends CustomProps {
  name: string;
  version: string;
  abstract: string;
  description?: string;
  producer?: string;
  license: string;
  maintainers: Maintainer[];
  'meta-spec': MetaSpec;
  classifications?: Classifications;
  contents: Contents;
  ignore?: string[];
  dependencies?: Dependencies;
  resources?: Resources;
  artifacts?: Artifact[];
}

export type DigestAlgorithm = 'sha1' | 'sha256' | 'sha512';

export type DigestSet = { [A in DigestAlgorithm]?: string };

export interface ReleasePayloadDocument extends CustomProps {
  user: string;
  date: string;
  uri: string;
  digests: DigestSet;
}

export interface JwsSignatureBlock {
  protected?: string;
  header?: JsonObject;
  signature: string;
}

/**
 * JWS general serialization: several signatures over one payload
 */
export interface GeneralJws {
  payload: string;
  signatures: JwsSignatureBlock[];
}

/**
 * JWS flattened serialization: one signature inline with the payload
 */
export interface FlattenedJws extends JwsSignatureBlock {
  payload: string;
}

export type JwsDocument = GeneralJws | FlattenedJws;

export interface Certs extends CustomProps {
  pgxn: JwsDocument;
}

export interface ReleaseDocument extends DistributionDocument {
  certs: Certs;
}

// ---------------------------------------------------------------------------
// Generation 1 documents

export type LegacyList = string | string[];

export interface LegacyMetaSpec extends CustomProps {
  version: string;
  url?: string;
}

export interface LegacyExtension extends CustomProps {
  file: string;
  version: string;
  abstract?: string;
  docfile?: string;
}

export interface LegacyNoIndex extends CustomProps {
  file?: LegacyList;
  directory?: LegacyList;
}

export type LegacyPhaseName = 'configure' | 'build' | 'test' | 'runtime' | 'develop';
export type LegacyPhase = CustomProps & { [R in Relation]?: Record<string, VersionRangeValue> };
export type LegacyPrereqs = CustomProps & { [P in LegacyPhaseName]?: LegacyPhase };

export interface LegacyResources extends CustomProps {
  homepage?: string;
  bugtracker?: CustomProps & { web?: string; mailto?: string };
  repository?: CustomProps & { url?: string; web?: string; type?: string };
}

export type LegacyLicense = string | string[] | Record<string, string>;

export interface LegacyDistributionDocument extends CustomProps {
  name: string;
  version: string;
  abstract: string;
  description?: string;
  generated_by?: string;
  license: LegacyLicense;
  maintainer: LegacyList;
  'meta-spec': LegacyMetaSpec;
  provides: Record<string, LegacyExtension>;
  tags?: LegacyList;
  no_index?: LegacyNoIndex;
  prereqs?: LegacyPrereqs;
  release_status?: 'stable' | 'testing' | 'unstable';
  resources?: LegacyResources;
}

export interface LegacyReleaseDocument extends LegacyDistributionDocument {
  user: string;
  date: string;
  sha1: string;
}
