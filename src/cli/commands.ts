import * as fs from 'fs';
import * as path from 'path';
import { MetaError, errorMessage, violationsOf } from '../core/errors';
import { isObject } from '../core/json';
import { Release, loadDistribution, readDocument } from '../model';
import { EngineOptions } from '../model/options';
import { mergePatches } from '../merge';
import { Digests } from '../verify';
import { DigestAlgorithm } from '../types';

/**
 * Where command output goes; the CLI binds this to stdout and stderr
 */
export interface CliOutput {
  out(line: string): void;
  err(line: string): void;
}

export const consoleOutput: CliOutput = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

function report(error: unknown, file: string, io: CliOutput): number {
  if (error instanceof MetaError) {
    io.err(`${file}: ${error.message}`);
    for (const v of violationsOf(error)) {
      io.err(`  ${v.location || '/'}: ${v.message} [${v.keyword}]`);
    }
    return 1;
  }
  const reason = errorMessage(error);
  io.err(`${file}: ${reason}`);
  return 1;
}

function read(file: string): unknown {
  return readDocument(path.resolve(file));
}

/**
 * Validate a distribution (or release) file. Returns the exit code.
 */
export function runValidate(
  file: string,
  asRelease: boolean,
  options: EngineOptions,
  io: CliOutput
): number {
  try {
    const document = read(file);
    const meta = asRelease ? Release.tryFrom(document, options) : loadDistribution(document, options);
    io.out(`${file}: ${meta.name} ${meta.version} is valid`);
    return 0;
  } catch (error) {
    return report(error, file, io);
  }
}

/**
 * Print the generation 2 form of a document
 */
export function runUpgrade(file: string, options: EngineOptions, io: CliOutput): number {
  try {
    const document = read(file);
    const meta =
      isObject(document) && 'user' in document
        ? Release.tryFrom(document, options)
        : loadDistribution(document, options);
    io.out(JSON.stringify(meta.toJSON(), null, 2));
    return 0;
  } catch (error) {
    return report(error, file, io);
  }
}

/**
 * Apply the second and later files as merge patches to the first
 */
export function runMerge(files: string[], options: EngineOptions, io: CliOutput): number {
  try {
    const meta = mergePatches(files.map(read), options);
    io.out(JSON.stringify(meta.toJSON(), null, 2));
    return 0;
  } catch (error) {
    return report(error, files.join(', '), io);
  }
}

/**
 * Print the digests of a file, strongest first
 */
export function runDigest(file: string, io: CliOutput): number {
  try {
    const digests = Digests.compute(fs.readFileSync(file));
    for (const algorithm of digests.algorithms) {
      io.out(`${algorithm}  ${digests.get(algorithm)}`);
    }
    return 0;
  } catch (error) {
    return report(error, file, io);
  }
}

export type ExpectedDigests = Partial<Record<DigestAlgorithm, string>>;

/**
 * Check a file against the given digests; every one must match
 */
export function runVerify(file: string, expected: ExpectedDigests, io: CliOutput): number {
  try {
    const digests = Digests.from(expected);
    digests.verify(fs.readFileSync(file));
    io.out(`${file}: ${digests.algorithms.join(', ')} OK`);
    if (digests.sha1Only) {
      io.err('Warning: sha1 alone is weak evidence of integrity');
    }
    return 0;
  } catch (error) {
    return report(error, file, io);
  }
}
