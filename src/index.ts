export * from './types';
export * from './core/errors';
export { Logger, ConsoleLogger, defaultLogger } from './core/logger';
export { loadConfig, getDefaultConfig, validateConfig } from './config';
export * from './primitives';
export * from './schema';
export * from './model';
export * from './convert';
export * from './merge';
export * from './verify';
export { createApp, createApiRouter, startServer } from './api';
