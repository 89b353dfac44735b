import express, { Router } from 'express';
import type { Express, Request, Response } from 'express';
import type { Server } from 'http';
import type { OscNode } from '../core/node.js';
import { metricsHandler, trackHttpMetrics } from '../middleware/metrics.js';
import { logger } from '../utils/logger.js';

/**
 * Read-only view of a running node: health, runtime status and metrics.
 */
export function createStatusRouter(node: OscNode): Router {
  const router = Router();

  // 200 while datagrams are being processed, 503 before and after
  router.get('/health', (_req: Request, res: Response) => {
    const state = node.getState();
    const healthy = state === 'running';
    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'ok' : 'unavailable',
      state,
      timestamp: new Date().toISOString(),
    });
  });

  router.get('/status', (_req: Request, res: Response) => {
    res.json(node.status());
  });

  router.get('/metrics', metricsHandler);

  return router;
}

export function createStatusApp(node: OscNode): Express {
  const app = express();

  app.use(trackHttpMetrics);
  app.use(createStatusRouter(node));

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not Found' });
  });

  return app;
}

/**
 * Serve the status app on `port`. Resolves with the listening server.
 */
export function startStatusServer(app: Express, port: number, host: string = '0.0.0.0'): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      server.off('error', reject);
      logger.info(`Status API listening on http://${host}:${port}`);
      resolve(server);
    });
    server.once('error', reject);
  });
}
