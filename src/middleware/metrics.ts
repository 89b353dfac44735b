import type { Request, Response, NextFunction } from 'express';
import { metrics } from '../utils/metrics.js';
import { logger } from '../utils/logger.js';

/**
 * Middleware to track HTTP request metrics
 */
export function trackHttpMetrics(req: Request, res: Response, next: NextFunction): void {
  const start = process.hrtime();

  res.on('finish', () => {
    const diff = process.hrtime(start);
    const durationMs = diff[0] * 1e3 + diff[1] * 1e-6;

    // Use the matched route path where there is one, otherwise the URL path
    const routePath: string = typeof req.route?.path === 'string' ? req.route.path : req.path;
    metrics.trackHttpRequest(req.method, routePath, res.statusCode, durationMs);
  });

  next();
}

/**
 * Expose the Prometheus metrics endpoint
 */
export async function metricsHandler(_req: Request, res: Response): Promise<void> {
  try {
    res.set('Content-Type', metrics.register.contentType);
    res.send(await metrics.getMetrics());
  } catch (error) {
    logger.error('Error generating metrics', { error: String(error) });
    res.status(500).send('Error generating metrics');
  }
}
