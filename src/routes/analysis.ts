import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import * as crypto from 'crypto';
import { DIMENSIONS } from '../types/analysis.js';
import type { AnalysisService } from '../services/analysisService.js';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[1-5][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

// Request validation schemas
export const analysisOptionsSchema = z.object({
  dimensions: z.array(z.enum(DIMENSIONS)).min(1).optional(),
  perAgentTimeoutMs: z.number().int().positive().max(300_000).optional(),
  overallDeadlineMs: z.number().int().positive().max(600_000).optional(),
  cacheTtlMs: z.number().int().min(0).optional(),
}).strict();

const startRequestSchema = z.object({
  // Callers may supply their own jobId so both systems share the same ID
  jobId: z.string().uuid().optional(),
  url: z.string().trim().min(1),
  options: analysisOptionsSchema.optional().default({}),
});

const runRequestSchema = startRequestSchema.omit({ jobId: true });

export function createAnalysisRouter(service: AnalysisService): Router {
  const router = Router();

  // Queue an analysis job
  router.post('/start', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const validated = startRequestSchema.parse(req.body);
      const jobId = validated.jobId || crypto.randomUUID();

      await service.startAnalysis({ jobId, url: validated.url, options: validated.options });
      console.log(`[route] analysis ${jobId} queued: ${validated.url}`);

      res.status(202).json({
        message: 'Analysis started successfully',
        jobId,
      });
    } catch (error) {
      next(error);
    }
  });

  // Poll a job
  router.get('/status/:jobId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { jobId } = req.params;

      if (!jobId || !UUID_PATTERN.test(jobId)) {
        return res.status(400).json({
          error: 'Invalid job ID format',
          jobId,
        });
      }

      const [status, details] = await Promise.all([
        service.getAnalysisStatus(jobId),
        service.getAnalysisDetails(jobId),
      ]);

      res.json({
        jobId,
        status: status || 'NOT_FOUND',
        result: details?.analysis,
        error: details?.error,
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      next(error);
    }
  });

  // Analyse synchronously and return the result in the response
  router.post('/run', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const validated = runRequestSchema.parse(req.body);
      const analysis = await service.analyzeUrl(validated.url, validated.options);
      res.json(analysis);
    } catch (error) {
      next(error);
    }
  });

  router.get('/cache', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await service.cacheReport());
    } catch (error) {
      next(error);
    }
  });

  router.delete('/cache', async (req: Request, res: Response, next: NextFunction) => {
    try {
      await service.purgeCache();
      res.json({ purged: true });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
