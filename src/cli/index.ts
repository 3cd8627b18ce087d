#!/usr/bin/env node

import { Command } from 'commander';
import { loadConfig, validateConfig } from '../config';
import { errorMessage } from '../core/errors';
import { ConsoleLogger } from '../core/logger';
import { createRegistry } from '../schema';
import { startServer } from '../api';
import { EngineOptions } from '../model/options';
import { MetaConfig } from '../types';
import {
  ExpectedDigests,
  consoleOutput,
  runDigest,
  runMerge,
  runUpgrade,
  runValidate,
  runVerify,
} from './commands';

const program = new Command();

let config: MetaConfig | undefined;
let engine: EngineOptions | undefined;

function getConfig(): MetaConfig {
  if (!config) {
    config = loadConfig();
    const problems = validateConfig(config);
    if (problems.length > 0) {
      problems.forEach((p) => console.error(`Config: ${p}`));
      process.exit(2);
    }
  }
  return config;
}

function getEngine(): EngineOptions {
  if (!engine) {
    const cfg = getConfig();
    engine = {
      registry: createRegistry(cfg.schemaDir),
      logger: new ConsoleLogger(cfg.logLevel),
      sha1Policy: cfg.sha1Policy,
    };
  }
  return engine;
}

program
  .name('pgxn-meta')
  .description('Validate, upgrade and merge PGXN distribution metadata')
  .version('0.5.0');

/**
 * Validate command (default)
 */
program
  .command('validate', { isDefault: true })
  .description('Validate a META.json file')
  .argument('[file]', 'File to validate (default: META.json)')
  .option('-r, --release', 'Validate as release metadata')
  .action((file: string | undefined, options: { release?: boolean }) => {
    const target = file ?? getConfig().defaultFile;
    process.exitCode = runValidate(target, options.release === true, getEngine(), consoleOutput);
  });

/**
 * Upgrade command
 */
program
  .command('upgrade')
  .description('Print the generation 2 form of a legacy META.json')
  .argument('[file]', 'File to upgrade (default: META.json)')
  .action((file: string | undefined) => {
    const target = file ?? getConfig().defaultFile;
    process.exitCode = runUpgrade(target, getEngine(), consoleOutput);
  });

/**
 * Merge command
 */
program
  .command('merge')
  .description('Apply JSON merge patches to a base document')
  .argument('<files...>', 'Base document followed by patches')
  .action((files: string[]) => {
    process.exitCode = runMerge(files, getEngine(), consoleOutput);
  });

/**
 * Digest command
 */
program
  .command('digest')
  .description('Print sha512, sha256 and sha1 digests of a file')
  .argument('<file>', 'File to hash')
  .action((file: string) => {
    process.exitCode = runDigest(file, consoleOutput);
  });

/**
 * Verify command
 */
program
  .command('verify')
  .description('Check a file against expected digests')
  .argument('<file>', 'File to check')
  .option('--sha1 <hex>', 'Expected sha1 digest')
  .option('--sha256 <hex>', 'Expected sha256 digest')
  .option('--sha512 <hex>', 'Expected sha512 digest')
  .action((file: string, options: ExpectedDigests) => {
    const expected: ExpectedDigests = {};
    if (options.sha1 !== undefined) expected.sha1 = options.sha1;
    if (options.sha256 !== undefined) expected.sha256 = options.sha256;
    if (options.sha512 !== undefined) expected.sha512 = options.sha512;
    process.exitCode = runVerify(file, expected, consoleOutput);
  });

/**
 * Serve command - start the HTTP API
 */
program
  .command('serve')
  .description('Start the metadata HTTP service')
  .option('-p, --port <port>', 'Port to listen on')
  .action(async (options: { port?: string }) => {
    const port = options.port !== undefined ? parseInt(options.port, 10) : getConfig().server.port;
    if (isNaN(port)) {
      console.error('Port must be a number');
      process.exitCode = 1;
      return;
    }
    await startServer(port, getEngine());
  });

program.parseAsync().catch((error: unknown) => {
  console.error(errorMessage(error));
  process.exitCode = 1;
});
