export const ARCHITECTURES = [
  '386',
  'amd64',
  'arm',
  'arm64',
  'loong64',
  'mips',
  'mips64',
  'mips64le',
  'mipsle',
  'ppc64',
  'ppc64le',
  'riscv64',
  's390x',
  'sparc64',
  'wasm',
] as const;

export type Architecture = (typeof ARCHITECTURES)[number];

export interface Platform {
  os: string;
  version?: string;
  arch?: Architecture;
}

const OS = /^[a-z][a-z0-9]*$/;
const OS_VERSION = /^[0-9]+(?:\.[0-9A-Za-z+]*)*$/;

function isArchitecture(value: string): value is Architecture {
  return ARCHITECTURES.some((arch) => arch === value);
}

/**
 * Parse `os[-version][-arch]`, e.g. `linux`, `darwin-23.5-arm64`, `any-amd64`
 */
export function parsePlatform(value: string): Platform | undefined {
  const parts = value.split('-');
  if (parts.length > 3) return undefined;
  const [os, ...rest] = parts;
  if (!OS.test(os)) return undefined;

  const platform: Platform = { os };
  const last = rest[rest.length - 1];
  if (last !== undefined && isArchitecture(last)) {
    platform.arch = last;
    rest.pop();
  }
  if (rest.length > 1) return undefined;
  if (rest.length === 1) {
    if (!OS_VERSION.test(rest[0])) return undefined;
    platform.version = rest[0];
  }
  return platform;
}

export function isPlatform(value: string): boolean {
  return parsePlatform(value) !== undefined;
}
