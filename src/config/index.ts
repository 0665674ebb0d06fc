import 'dotenv/config';
import { DIMENSIONS } from '../types/analysis.js';

export const config = {
  port: parseInt(process.env.PORT || '8080'),
  nodeEnv: process.env.NODE_ENV || 'development',

  // Security
  apiKey: process.env.API_KEY || 'default-api-key',
  webhookSecret: process.env.WEBHOOK_SECRET || process.env.API_KEY || 'default-secret',
  corsOrigins: (process.env.CORS_ORIGINS || '').split(',').map((o) => o.trim()).filter(Boolean),

  // Callback (optional)
  callbackUrl: process.env.CALLBACK_URL || '',

  // Jobs
  maxConcurrentJobs: parseInt(process.env.MAX_CONCURRENT_JOBS || '2'),
  requestTimeout: parseInt(process.env.REQUEST_TIMEOUT || '120000'), // 2 minutes
  jobRetentionMs: parseInt(process.env.JOB_RETENTION_MS || '3600000'), // 1 hour
  maxRetainedJobs: parseInt(process.env.MAX_RETAINED_JOBS || '1000'),

  // Language model (any OpenAI-compatible endpoint; Gemini by default)
  llm: {
    apiKey: process.env.LLM_API_KEY || process.env.GEMINI_API_KEY || '',
    baseURL: process.env.LLM_BASE_URL || 'https://generativelanguage.googleapis.com/v1beta/openai/',
    model: process.env.LLM_MODEL || process.env.GEMINI_MODEL || 'gemini-2.5-flash',
    visionModel: process.env.LLM_VISION_MODEL || undefined,
    temperature: parseFloat(process.env.LLM_TEMPERATURE || '0.2'),
    maxTokens: parseInt(process.env.LLM_MAX_TOKENS || '2048'),
    maxRetries: parseInt(process.env.LLM_MAX_RETRIES || '0'),
    timeoutMs: parseInt(process.env.LLM_TIMEOUT_MS || '20000'),
  },

  // Orchestration defaults; callers may override per request
  analysis: {
    dimensions: [...DIMENSIONS],
    perAgentTimeoutMs: parseInt(process.env.PER_AGENT_TIMEOUT_MS || '20000'),
    overallDeadlineMs: parseInt(process.env.OVERALL_DEADLINE_MS || '60000'),
    cacheTtlMs: parseInt(process.env.CACHE_TTL_MS || String(24 * 60 * 60 * 1000)),
    maxConcurrency: parseInt(process.env.MAX_AGENT_CONCURRENCY || '5'),
    visionEnabled: process.env.VISION_ENABLED !== 'false',
  },

  scraper: {
    timeoutMs: parseInt(process.env.SCRAPER_TIMEOUT_MS || '15000'),
    maxPageBytes: parseInt(process.env.MAX_PAGE_BYTES || String(5 * 1024 * 1024)), // 5MB
    userAgent:
      process.env.SCRAPER_USER_AGENT ||
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  },

  parser: {
    maxTextChars: parseInt(process.env.MAX_TEXT_CHARS || '0'), // 0 keeps the full text
    maxImages: parseInt(process.env.MAX_IMAGES || '3'),
  },
};

export type AppConfig = typeof config;
