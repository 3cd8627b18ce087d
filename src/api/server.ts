import express, { Request, Response, Router, NextFunction, RequestHandler } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { MetaError, SchemaRegistrationError, violationsOf } from '../core/errors';
import { isObject } from '../core/json';
import { Logger, defaultLogger } from '../core/logger';
import { Distribution, Release, loadDistribution } from '../model';
import { EngineOptions } from '../model/options';
import { mergePatches } from '../merge';
import { Digests } from '../verify';

const SERVICE = 'pgxn-meta';
const VERSION = '0.5.0';

function statusFor(error: MetaError): number {
  return error instanceof SchemaRegistrationError ? 500 : 422;
}

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

function isBase64(value: string): boolean {
  return value.length % 4 === 0 && BASE64.test(value);
}

/** Status carried by body-parser errors such as entity.too.large */
function clientStatus(error: Error): number | undefined {
  const status: unknown = 'status' in error ? error.status : undefined;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

function summary(meta: Distribution | Release): Record<string, string> {
  return { name: meta.name, version: meta.version };
}

/**
 * Create the metadata API router
 */
export function createApiRouter(options: EngineOptions = {}): Router {
  const router = Router();

  // Middleware to parse JSON
  router.use(express.json({ limit: '1mb' }));

  /**
   * POST /meta/validate?as=distribution|release
   * Validate a document of either generation
   */
  const validateHandler: RequestHandler = (req: Request, res: Response, next: NextFunction): void => {
    try {
      const document: unknown = req.body;
      const as = req.query.as ?? 'distribution';
      if (as !== 'distribution' && as !== 'release') {
        res.status(400).json({
          error: 'Invalid request',
          message: 'as must be "distribution" or "release"',
        });
        return;
      }
      const meta =
        as === 'release' ? Release.tryFrom(document, options) : loadDistribution(document, options);
      res.json({ valid: true, ...summary(meta) });
    } catch (error) {
      next(error);
    }
  };
  router.post('/validate', validateHandler);

  /**
   * POST /meta/upgrade
   * Convert a legacy distribution or release to generation 2
   */
  const upgradeHandler: RequestHandler = (req: Request, res: Response, next: NextFunction): void => {
    try {
      const document: unknown = req.body;
      const meta =
        isObject(document) && 'user' in document
          ? Release.tryFrom(document, options)
          : loadDistribution(document, options);
      res.json(meta.toJSON());
    } catch (error) {
      next(error);
    }
  };
  router.post('/upgrade', upgradeHandler);

  /**
   * POST /meta/merge
   * Apply merge patches to a base document
   */
  const mergeHandler: RequestHandler = (req: Request, res: Response, next: NextFunction): void => {
    try {
      const body: unknown = req.body;
      if (!isObject(body) || !Array.isArray(body.documents)) {
        res.status(400).json({
          error: 'Invalid request',
          message: 'Request body must contain a documents array',
        });
        return;
      }
      const meta = mergePatches(body.documents, options);
      res.json(meta.toJSON());
    } catch (error) {
      next(error);
    }
  };
  router.post('/merge', mergeHandler);

  /**
   * POST /meta/verify
   * Check base64 content against a digest set
   */
  const verifyHandler: RequestHandler = (req: Request, res: Response, next: NextFunction): void => {
    try {
      const body: unknown = req.body;
      if (!isObject(body) || !isObject(body.digests) || typeof body.content !== 'string') {
        res.status(400).json({
          error: 'Invalid request',
          message: 'Request body must contain digests and base64 content',
        });
        return;
      }
      if (!isBase64(body.content)) {
        res.status(400).json({
          error: 'Invalid request',
          message: 'content must be base64 encoded',
        });
        return;
      }
      const digests = Digests.from(body.digests, '/digests');
      digests.verify(Buffer.from(body.content, 'base64'));
      res.json({ verified: true, algorithms: digests.algorithms });
    } catch (error) {
      next(error);
    }
  };
  router.post('/verify', verifyHandler);

  return router;
}

/**
 * Create a full Express application with the metadata API
 */
export function createApp(options: EngineOptions = {}): express.Application {
  const app = express();
  const logger: Logger = options.logger ?? defaultLogger;

  app.use((req: Request, res: Response, next: NextFunction) => {
    const requestId = req.get('X-Request-Id') ?? uuidv4();
    res.set('X-Request-Id', requestId);
    next();
  });

  // Mount the API router
  app.use('/meta', createApiRouter(options));

  // Health check endpoint
  const healthHandler: RequestHandler = (_req: Request, res: Response): void => {
    res.json({ status: 'ok', service: SERVICE });
  };
  app.get('/health', healthHandler);

  // Root endpoint with info
  const rootHandler: RequestHandler = (_req: Request, res: Response): void => {
    res.json({
      name: SERVICE,
      version: VERSION,
      description: 'PGXN metadata validation and conversion',
      endpoints: {
        validate: 'POST /meta/validate',
        upgrade: 'POST /meta/upgrade',
        merge: 'POST /meta/merge',
        verify: 'POST /meta/verify',
      },
    });
  };
  app.get('/', rootHandler);

  // Error handling middleware
  const errorHandler = (err: Error, _req: Request, res: Response, _next: NextFunction): void => {
    if (err instanceof MetaError) {
      res.status(statusFor(err)).json({
        error: err.code,
        message: err.message,
        violations: violationsOf(err),
      });
      return;
    }
    const status = clientStatus(err);
    if (err instanceof SyntaxError) {
      res
        .status(status ?? 400)
        .json({ error: 'Invalid request', message: 'Request body must be valid JSON' });
      return;
    }
    if (status !== undefined) {
      res.status(status).json({ error: 'Invalid request', message: err.message });
      return;
    }
    logger.error(`[${SERVICE}] Error: ${err.message}`);
    // In production, don't expose internal error details
    const isDevelopment = process.env.NODE_ENV !== 'production';
    res.status(500).json({
      error: 'Internal server error',
      message: isDevelopment ? err.message : 'An unexpected error occurred',
    });
  };
  app.use(errorHandler);

  return app;
}

/**
 * Start the metadata service
 */
export function startServer(
  port: number = 3000,
  options: EngineOptions = {}
): Promise<ReturnType<express.Application['listen']>> {
  const logger = options.logger ?? defaultLogger;
  return new Promise((resolve) => {
    const app = createApp(options);
    const server = app.listen(port, () => {
      logger.log(`[${SERVICE}] Server running at http://localhost:${port}`);
      logger.log(`[${SERVICE}] API available at http://localhost:${port}/meta`);
      resolve(server);
    });
  });
}
