import crypto from 'crypto';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createAgents } from '../agents/index.js';
import {
  byLabel,
  EXAMPLE_REPLIES,
  FakeInferenceClient,
  makePage,
  StubFetcher,
  type Responder,
} from '../testing/fixtures.js';
import { DIMENSIONS } from '../types/analysis.js';
import { FetchError, ValidationError } from '../utils/errors.js';
import { AnalysisService, type AnalysisServiceDeps, type CallbackSettings } from './analysisService.js';
import { Orchestrator } from './orchestrator.js';
import { CheerioPageParser } from './pageParser.js';
import { ResponseCache } from './responseCache.js';

function build(
  options: {
    responder?: Responder;
    fetcher?: StubFetcher;
    maxConcurrentJobs?: number;
    callback?: CallbackSettings;
    retention?: Pick<AnalysisServiceDeps, 'jobRetentionMs' | 'maxRetainedJobs' | 'now'>;
  } = {}
) {
  const client = new FakeInferenceClient(options.responder ?? byLabel(EXAMPLE_REPLIES));
  const cache = new ResponseCache();
  const fetcher = options.fetcher ?? new StubFetcher();
  const service = new AnalysisService({
    orchestrator: new Orchestrator(createAgents({ client, cache })),
    fetcher,
    parser: new CheerioPageParser(),
    cache,
    defaults: {
      dimensions: [...DIMENSIONS],
      perAgentTimeoutMs: 1_000,
      overallDeadlineMs: 2_000,
      cacheTtlMs: 60_000,
    },
    maxConcurrentJobs: options.maxConcurrentJobs,
    callback: options.callback,
    ...options.retention,
  });
  return { service, client, cache, fetcher };
}

const JOB_A = '6f1c2b3a-4d5e-4f60-8a7b-9c0d1e2f3a4b';
const JOB_B = '7a2d3c4b-5e6f-4a71-9b8c-0d1e2f3a4b5c';

describe('AnalysisService', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  describe('analyzePage', () => {
    it('scores a page where every agent succeeds', async () => {
      const { service } = build();

      const result = await service.analyzePage(makePage());

      expect(result.overallScore).toBe(82);
      expect(result.grade).toBe('B');
      expect(result.noData).toBe(false);
      expect(result.externalCalls).toBe(5);
      expect(result.usage).toEqual({ promptTokens: 50, completionTokens: 25, totalTokens: 75 });
    });

    it('renormalizes around a failed dimension', async () => {
      const { service } = build({ responder: byLabel({ ...EXAMPLE_REPLIES, 'visual-agent-meta': 'garbage' }) });

      const result = await service.analyzePage(makePage());

      expect(result.overallScore).toBe(85.9);
      expect(result.grade).toBe('B');
      expect(result.failedDimensions).toEqual(['VISUAL']);
      expect(result.dimensions.VISUAL?.status).toBe('FAILED');
      // VISUAL was tried twice because its reply was malformed
      expect(result.externalCalls).toBe(6);
    });

    it('returns a no-data result when every agent fails', async () => {
      const { service } = build({ responder: () => 'garbage' });

      const result = await service.analyzePage(makePage());

      expect(result).toMatchObject({ overallScore: 0, grade: 'F', noData: true, externalCalls: 10 });
      expect(result.failedDimensions).toEqual([...DIMENSIONS]);
    });

    it('applies overrides', async () => {
      const { service, client } = build();

      const result = await service.analyzePage(makePage(), { dimensions: ['TEXT'] });

      expect(Object.keys(result.dimensions)).toEqual(['TEXT']);
      expect(result.overallScore).toBe(80);
      expect(client.calls.map((c) => c.label)).toEqual(['text-agent']);
    });

    it('rejects invalid overrides', async () => {
      const { service } = build();

      await expect(service.analyzePage(makePage(), { dimensions: [] })).rejects.toBeInstanceOf(ValidationError);
      await expect(service.analyzePage(makePage(), { perAgentTimeoutMs: -5 })).rejects.toBeInstanceOf(ValidationError);
    });

    it('refuses defaults a run could never honour', () => {
      const client = new FakeInferenceClient(byLabel(EXAMPLE_REPLIES));
      const cache = new ResponseCache();

      expect(
        () =>
          new AnalysisService({
            orchestrator: new Orchestrator(createAgents({ client, cache })),
            fetcher: new StubFetcher(),
            parser: new CheerioPageParser(),
            cache,
            defaults: {
              dimensions: [...DIMENSIONS],
              perAgentTimeoutMs: 1_000,
              overallDeadlineMs: 30 * 24 * 60 * 60 * 1000,
              cacheTtlMs: 60_000,
            },
          })
      ).toThrow('overallDeadlineMs must be at most 2147483647 milliseconds');
    });
  });

  describe('analyzeUrl', () => {
    it('fetches, parses and scores', async () => {
      const { service, client } = build();

      const analysis = await service.analyzeUrl('bakery.test');

      expect(analysis.url).toBe('https://bakery.test/');
      expect(analysis.statusCode).toBe(200);
      expect(Number.isNaN(Date.parse(analysis.analyzedAt))).toBe(false);
      expect(analysis.result.overallScore).toBe(82);
      expect(client.calls.find((c) => c.label === 'text-agent')?.prompt).toContain('Title: Corner Bakery');
    });
  });

  describe('jobs', () => {
    it('runs a queued job to completion', async () => {
      const { service } = build();

      await service.startAnalysis({ jobId: JOB_A, url: 'https://bakery.test/' });

      await vi.waitFor(async () => expect(await service.getAnalysisStatus(JOB_A)).toBe('COMPLETED'));
      const details = await service.getAnalysisDetails(JOB_A);
      expect(details?.status).toBe('COMPLETED');
      expect(details?.analysis?.result.grade).toBe('B');
    });

    it('records fetch failures on the job', async () => {
      const fetcher = new StubFetcher({ error: new FetchError('Page responded with 500 Internal Server Error', 500) });
      const { service } = build({ fetcher });

      await service.startAnalysis({ jobId: JOB_A, url: 'https://bakery.test/' });

      await vi.waitFor(async () => expect(await service.getAnalysisStatus(JOB_A)).toBe('FAILED'));
      expect((await service.getAnalysisDetails(JOB_A))?.error).toBe(
        'FetchError: Page responded with 500 Internal Server Error'
      );
    });

    it('refuses jobs with invalid options', async () => {
      const { service } = build();

      await expect(
        service.startAnalysis({ jobId: JOB_A, url: 'https://bakery.test/', options: { dimensions: [] } })
      ).rejects.toBeInstanceOf(ValidationError);
      expect(await service.getAnalysisStatus(JOB_A)).toBeNull();
    });

    it('queues jobs beyond maxConcurrentJobs', async () => {
      const fetcher = new StubFetcher({ gated: true });
      const { service } = build({ fetcher, maxConcurrentJobs: 1 });

      await service.startAnalysis({ jobId: JOB_A, url: 'https://bakery.test/a' });
      await service.startAnalysis({ jobId: JOB_B, url: 'https://bakery.test/b' });

      expect(await service.getAnalysisStatus(JOB_A)).toBe('PROCESSING');
      expect(await service.getAnalysisStatus(JOB_B)).toBe('QUEUED');
      expect(fetcher.requested).toEqual(['https://bakery.test/a']);

      fetcher.release();

      await vi.waitFor(async () => expect(await service.getAnalysisStatus(JOB_B)).toBe('COMPLETED'));
      expect(await service.getAnalysisStatus(JOB_A)).toBe('COMPLETED');
      expect(fetcher.requested).toEqual(['https://bakery.test/a', 'https://bakery.test/b']);
    });

    it('forgets the oldest finished jobs beyond the retention cap', async () => {
      const { service } = build({ retention: { maxRetainedJobs: 1 } });

      await service.startAnalysis({ jobId: JOB_A, url: 'https://bakery.test/a' });
      await vi.waitFor(async () => expect(await service.getAnalysisStatus(JOB_A)).toBe('COMPLETED'));
      await service.startAnalysis({ jobId: JOB_B, url: 'https://bakery.test/b' });
      await vi.waitFor(async () => expect(await service.getAnalysisStatus(JOB_B)).toBe('COMPLETED'));

      expect(await service.getAnalysisStatus(JOB_A)).toBeNull();
      expect(await service.getAnalysisDetails(JOB_A)).toBeNull();
    });

    it('forgets finished jobs once their retention lapses', async () => {
      let now = 0;
      const { service } = build({ retention: { jobRetentionMs: 1_000, now: () => now } });

      await service.startAnalysis({ jobId: JOB_A, url: 'https://bakery.test/' });
      await vi.waitFor(async () => expect(await service.getAnalysisStatus(JOB_A)).toBe('COMPLETED'));

      now = 999;
      expect(service.pruneJobs()).toBe(0);
      now = 1_000;
      expect(service.pruneJobs()).toBe(1);
      expect(await service.getAnalysisStatus(JOB_A)).toBeNull();
    });

    it('posts a signed callback when a job finishes', async () => {
      const fetchMock = vi.fn(
        async (..._args: [input: string | URL | Request, init?: RequestInit]) => new Response('ok', { status: 200 })
      );
      vi.stubGlobal('fetch', fetchMock);
      const { service } = build({
        callback: { url: 'https://hooks.test/ceps', secret: 'test-secret', apiKey: 'test-key' },
      });

      await service.startAnalysis({ jobId: JOB_A, url: 'https://bakery.test/' });
      await vi.waitFor(() => expect(fetchMock).toHaveBeenCalledTimes(1));

      const [target, init] = fetchMock.mock.calls[0];
      const body = typeof init?.body === 'string' ? init.body : '';
      const headers = new Headers(init?.headers);
      const expected = crypto.createHmac('sha256', 'test-secret').update(body).digest('hex');

      expect(target).toBe('https://hooks.test/ceps');
      expect(init?.method).toBe('POST');
      expect(headers.get('X-Signature')).toBe(`sha256=${expected}`);
      expect(headers.get('X-API-Key')).toBe('test-key');
      expect(JSON.parse(body)).toMatchObject({ jobId: JOB_A, status: 'COMPLETED' });
    });
  });

  describe('cache', () => {
    it('reports and purges the response cache', async () => {
      const { service } = build();
      await service.analyzePage(makePage());
      await service.analyzePage(makePage());

      expect(await service.cacheReport()).toEqual({ hits: 5, misses: 5, entries: 5 });

      await service.purgeCache();
      expect(await service.cacheReport()).toEqual({ hits: 0, misses: 0, entries: 0 });
    });
  });
});
