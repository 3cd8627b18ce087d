import * as fs from 'fs';
import { upgrade } from '../convert/upgrade';
import { Generation } from '../types';
import { Distribution } from './distribution';
import { detectGeneration } from './generation';
import { LegacyDistribution } from './legacy';
import { EngineOptions } from './options';
import { Release } from './release';

/**
 * Build a generation 2 distribution from a document of either generation
 */
export function loadDistribution(value: unknown, options: EngineOptions = {}): Distribution {
  if (detectGeneration(value) === Generation.Legacy) {
    return upgrade(LegacyDistribution.tryFrom(value, options), options);
  }
  return Distribution.tryFrom(value, options);
}

export function loadRelease(value: unknown, options: EngineOptions = {}): Release {
  return Release.tryFrom(value, options);
}

/**
 * Read and parse a JSON document from disk
 */
export function readDocument(file: string): unknown {
  return JSON.parse(fs.readFileSync(file, 'utf-8'));
}
