import express from 'express';
import helmet from 'helmet';
import cors from 'cors';
import compression from 'compression';
import morgan from 'morgan';
import rateLimit from 'express-rate-limit';
import type { AnalysisService } from './services/analysisService.js';
import { createAnalysisRouter } from './routes/analysis.js';
import { createHealthRouter, type ReadinessCheck } from './routes/health.js';
import { errorHandler } from './middleware/errorHandler.js';
import { createAuthMiddleware } from './middleware/auth.js';

export interface AppOptions {
  apiKey: string;
  webhookSecret: string;
  nodeEnv?: string;
  corsOrigins?: string[];
  rateLimit?: { windowMs: number; max: number };
  isReady?: ReadinessCheck;
}

export function createApp(service: AnalysisService, options: AppOptions) {
  const app = express();
  const production = options.nodeEnv === 'production';

  // Required behind cloud load balancers
  app.set('trust proxy', 1);

  // Security middleware
  app.use(helmet());
  app.use(cors({
    origin: production && options.corsOrigins?.length ? options.corsOrigins : true,
    credentials: true,
  }));

  // Rate limiting, keyed on the forwarded client address when present
  const limiter = rateLimit({
    windowMs: options.rateLimit?.windowMs ?? 15 * 60 * 1000, // 15 minutes
    max: options.rateLimit?.max ?? 100,
    message: 'Too many requests from this IP, please try again later.',
    standardHeaders: true,
    legacyHeaders: false,
    skip: (req) => {
      if (!req.ip || req.ip === '::1' || req.ip === '127.0.0.1' || req.ip === '::ffff:127.0.0.1') {
        return true;
      }
      return false;
    },
    keyGenerator: (req) => {
      const forwarded = req.headers['x-forwarded-for'];
      const realIp = req.headers['x-real-ip'];

      let clientIp = req.ip;
      if (typeof forwarded === 'string' && forwarded) {
        clientIp = forwarded.split(',')[0].trim();
      } else if (typeof realIp === 'string' && realIp) {
        clientIp = realIp;
      }

      return clientIp || 'unknown';
    },
  });
  app.use(limiter);

  // Body parsing and compression
  app.use(compression());
  app.use(express.json({ limit: '1mb' }));

  // Logging
  app.use(morgan(production ? 'combined' : 'dev'));

  // Health check (no auth required)
  app.use('/health', createHealthRouter(options.isReady));

  // Protected routes
  app.use(
    '/api/analysis',
    createAuthMiddleware({ apiKey: options.apiKey, webhookSecret: options.webhookSecret }),
    createAnalysisRouter(service)
  );

  // Error handling
  app.use(errorHandler);

  return app;
}
