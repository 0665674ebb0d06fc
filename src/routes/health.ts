import { Router } from 'express';

const SERVICE_NAME = 'ceps-analysis-service';

export interface ReadinessCheck {
  /** Throws or resolves false when the service cannot take work. */
  (): Promise<boolean> | boolean;
}

export function createHealthRouter(isReady: ReadinessCheck = () => true): Router {
  const router = Router();

  router.get('/', (req, res) => {
    res.json({
      status: 'healthy',
      service: SERVICE_NAME,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      memory: process.memoryUsage(),
    });
  });

  router.get('/ready', async (req, res) => {
    try {
      if (!(await isReady())) {
        return res.status(503).json({ status: 'not ready', service: SERVICE_NAME });
      }
      res.json({
        status: 'ready',
        service: SERVICE_NAME,
      });
    } catch (error) {
      res.status(503).json({
        status: 'not ready',
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  });

  return router;
}
