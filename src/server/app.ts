import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import type { Config } from '../lib/config';
import { createApiRouter, type ApiDeps } from './api';

export interface AppDeps extends ApiDeps {
  config: ApiDeps['config'] & Pick<Config, 'corsOrigin' | 'nodeEnv'>;
}

export function createApp(deps: AppDeps): express.Express {
  const { config } = deps;
  const server = express();

  // Trust proxy for rate limiting behind reverse proxy
  if (!config.isDev) {
    server.set('trust proxy', 1);
  }

  server.use(cors({ origin: config.corsOrigin, credentials: true }));
  server.use(express.json({ limit: '64kb' }));

  server.use('/api', createApiRouter(deps));

  // Health check endpoint
  server.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      env: config.nodeEnv,
      timestamp: new Date().toISOString(),
    });
  });

  server.use((_req, res) => {
    res.status(404).json({ success: false, error: 'Route not found', code: 'NOT_FOUND' });
  });

  // Four parameters mark this as the error handler
  server.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError && 'body' in err) {
      res.status(400).json({ success: false, error: 'Malformed JSON body', code: 'VALIDATION_ERROR' });
      return;
    }
    console.error(`[server] ${req.method} ${req.path} failed:`, err);
    res.status(500).json({ success: false, error: 'Internal server error', code: 'INTERNAL_ERROR' });
  });

  return server;
}
