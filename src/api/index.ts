export { createApp, createApiRouter, startServer } from './server';
