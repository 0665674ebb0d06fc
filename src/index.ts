import { config } from './config/index.js';
import { createApp } from './app.js';
import { createAgents } from './agents/index.js';
import { OpenAIInferenceClient } from './services/inferenceClient.js';
import { ResponseCache } from './services/responseCache.js';
import { Orchestrator } from './services/orchestrator.js';
import { HttpFetcher } from './services/fetcher.js';
import { CheerioPageParser } from './services/pageParser.js';
import { AnalysisService } from './services/analysisService.js';

const cache = new ResponseCache(undefined, { defaultTtlMs: config.analysis.cacheTtlMs });

const client = new OpenAIInferenceClient({
  apiKey: config.llm.apiKey,
  baseURL: config.llm.baseURL,
  model: config.llm.model,
  visionModel: config.llm.visionModel,
  temperature: config.llm.temperature,
  maxTokens: config.llm.maxTokens,
  maxRetries: config.llm.maxRetries,
});

const agents = createAgents(
  { client, cache, defaultCallTimeoutMs: config.llm.timeoutMs },
  { visionEnabled: config.analysis.visionEnabled }
);

const service = new AnalysisService({
  orchestrator: new Orchestrator(agents),
  fetcher: new HttpFetcher({
    timeoutMs: config.scraper.timeoutMs,
    maxBytes: config.scraper.maxPageBytes,
    userAgent: config.scraper.userAgent,
  }),
  parser: new CheerioPageParser({
    maxTextChars: config.parser.maxTextChars,
    maxImages: config.parser.maxImages,
  }),
  cache,
  defaults: {
    dimensions: config.analysis.dimensions,
    perAgentTimeoutMs: config.analysis.perAgentTimeoutMs,
    overallDeadlineMs: config.analysis.overallDeadlineMs,
    cacheTtlMs: config.analysis.cacheTtlMs,
    callTimeoutMs: config.llm.timeoutMs,
    maxConcurrency: config.analysis.maxConcurrency,
  },
  maxConcurrentJobs: config.maxConcurrentJobs,
  jobTimeoutMs: config.requestTimeout,
  jobRetentionMs: config.jobRetentionMs,
  maxRetainedJobs: config.maxRetainedJobs,
  callback: config.callbackUrl
    ? { url: config.callbackUrl, secret: config.webhookSecret, apiKey: config.apiKey }
    : undefined,
});

const app = createApp(service, {
  apiKey: config.apiKey,
  webhookSecret: config.webhookSecret,
  nodeEnv: config.nodeEnv,
  corsOrigins: config.corsOrigins,
  isReady: () => Boolean(config.llm.apiKey),
});

// Expired cache entries are otherwise only evicted when read; idle services also shed old jobs here
const pruneTimer = setInterval(() => {
  service.pruneJobs();
  cache
    .prune()
    .then((removed) => {
      if (removed > 0) console.log(`[cache] pruned ${removed} expired entries`);
    })
    .catch((err: unknown) => console.warn('[cache] prune failed:', err));
}, 10 * 60 * 1000);
pruneTimer.unref();

// Start server
const PORT = config.port;
app.listen(PORT, () => {
  console.log(`🚀 CEPS analysis service running on port ${PORT}`);
  console.log(`📊 Max concurrent jobs: ${config.maxConcurrentJobs}`);
  console.log(`⏱️  Per-agent timeout: ${config.analysis.perAgentTimeoutMs}ms, run deadline: ${config.analysis.overallDeadlineMs}ms`);
  if (!config.llm.apiKey) console.warn('[inference] LLM_API_KEY is not set; every agent will fail');
});

export default app;
