import * as fs from 'fs';
import * as path from 'path';
import { isJsonObject } from '../../src/core/json';
import { Logger } from '../../src/core/logger';
import { JsonObject } from '../../src/types';

const CORPUS = path.join(__dirname, '..', 'assets', 'corpus');

/**
 * Load a fresh copy of a corpus document, e.g. `v2/pair.json`
 */
export function fixture(name: string): JsonObject {
  const parsed: unknown = JSON.parse(fs.readFileSync(path.join(CORPUS, name), 'utf-8'));
  if (!isJsonObject(parsed)) {
    throw new Error(`${name} is not a JSON object`);
  }
  return parsed;
}

export function fixturePath(name: string): string {
  return path.join(CORPUS, name);
}

export interface RecordingLogger extends Logger {
  messages: {
    log: string[];
    warn: string[];
    error: string[];
    debug: string[];
  };
}

/**
 * Logger that keeps every message for later assertions
 */
export function recordingLogger(): RecordingLogger {
  const messages: RecordingLogger['messages'] = { log: [], warn: [], error: [], debug: [] };
  return {
    messages,
    log: (message) => messages.log.push(message),
    warn: (message) => messages.warn.push(message),
    error: (message) => messages.error.push(message),
    debug: (message) => messages.debug.push(message),
  };
}
