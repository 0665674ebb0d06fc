import { normalizeAndValidateUrl, type FetchedPage, type Fetcher } from '../services/fetcher.js';
import type { InferenceCallOptions, InferenceClient, InferenceOutput } from '../services/inferenceClient.js';
import type { AgentResult, AgentStatus, Dimension, ImageRef, PageData } from '../types/analysis.js';

export function makePage(overrides: Partial<PageData> = {}): PageData {
  return {
    url: 'https://bakery.test/',
    title: 'Corner Bakery',
    metaDescription: 'Fresh bread daily.',
    textContent: 'We bake sourdough every morning. Visit us on Main Street.',
    images: [],
    headings: [
      { level: 1, text: 'Welcome' },
      { level: 2, text: 'Visit us' },
    ],
    links: [
      { href: 'https://bakery.test/menu', text: 'Menu', internal: true },
      { href: 'https://twitter.com/bakery', text: 'Twitter', internal: false },
    ],
    socialLinks: ['https://twitter.com/bakery'],
    meta: { description: 'Fresh bread daily.' },
    http: { statusCode: 200, responseTimeMs: 120, byteSize: 2048 },
    security: { hasHttps: true, hasCertificate: true },
    signals: {
      hasViewportMeta: true,
      hasCharset: true,
      hasLangAttr: true,
      hasFavicon: true,
      hasStructuredData: false,
      hasPrivacyPolicy: true,
      hasContactInfo: true,
      formsCount: 1,
      scriptsCount: 2,
      stylesheetsCount: 1,
    },
    ...overrides,
  };
}

export function makeResult(
  dimension: Dimension,
  score: number,
  status: AgentStatus = 'SUCCESS',
  extra: Partial<AgentResult> = {}
): AgentResult {
  return {
    dimension,
    agentName: `${dimension} agent`,
    score: status === 'SUCCESS' ? score : 0,
    findings: [],
    summary: status === 'SUCCESS' ? `${dimension} looks fine.` : '',
    usage: { promptTokens: 0, completionTokens: 0 },
    calls: 1,
    status,
    ...(status === 'SUCCESS' ? {} : { error: 'Error: agent failed' }),
    fromCache: false,
    durationMs: 5,
    ...extra,
  };
}

/** JSON reply in the shape the agents ask the model for. */
export function verdict(score: number, extra: Record<string, unknown> = {}): string {
  return JSON.stringify({ score, findings: [], summary: `Scored ${score}.`, ...extra });
}

export interface FakeCall {
  kind: 'text' | 'vision';
  prompt: string;
  images: ImageRef[];
  label?: string;
  signal?: AbortSignal;
}

export type Responder = (call: FakeCall) => string | InferenceOutput | Promise<string | InferenceOutput>;

export const FAKE_USAGE = { promptTokens: 10, completionTokens: 5 };

export class FakeInferenceClient implements InferenceClient {
  readonly calls: FakeCall[] = [];

  constructor(private readonly responder: Responder) {}

  async callText(prompt: string, options: InferenceCallOptions = {}): Promise<InferenceOutput> {
    return this.respond({ kind: 'text', prompt, images: [], label: options.label, signal: options.signal });
  }

  async callVision(images: ImageRef[], prompt: string, options: InferenceCallOptions = {}): Promise<InferenceOutput> {
    return this.respond({ kind: 'vision', prompt, images, label: options.label, signal: options.signal });
  }

  private async respond(call: FakeCall): Promise<InferenceOutput> {
    this.calls.push(call);
    const out = await this.responder(call);
    return typeof out === 'string' ? { text: out, usage: { ...FAKE_USAGE } } : out;
  }
}

/** Replies in order; the last reply repeats once the list runs out. */
export function sequence(...replies: string[]): Responder {
  let i = 0;
  return () => replies[Math.min(i++, replies.length - 1)];
}

/** Replies by call label, e.g. { 'text-agent': verdict(80) }. */
export function byLabel(replies: Record<string, string>, fallback = verdict(50)): Responder {
  return (call) => (call.label !== undefined && call.label in replies ? replies[call.label] : fallback);
}

/** Never settles and ignores its signal. */
export const hang: Responder = () => new Promise<string>(() => undefined);

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Replies that reproduce the reference scores: TEXT 80, UX 90, TECH 70, TRUST 100, VISUAL 60. */
export const EXAMPLE_REPLIES: Record<string, string> = {
  'text-agent': verdict(80),
  'ux-agent': verdict(90),
  'tech-agent': verdict(70),
  'trust-agent': verdict(100),
  'visual-agent-meta': verdict(60),
};

export const BAKERY_HTML =
  '<html lang="en"><head><title>Corner Bakery</title></head><body><h1>Welcome</h1><p>Fresh bread.</p></body></html>';

/** Serves BAKERY_HTML, optionally held until release() or failing with `error`. */
export class StubFetcher implements Fetcher {
  readonly requested: string[] = [];
  private open: boolean;
  private waiters: Array<() => void> = [];
  private readonly error?: Error;

  constructor(options: { gated?: boolean; error?: Error } = {}) {
    this.open = !options.gated;
    this.error = options.error;
  }

  release(): void {
    this.open = true;
    this.waiters.splice(0).forEach((resume) => resume());
  }

  async fetchPage(url: string): Promise<FetchedPage> {
    this.requested.push(url);
    if (!this.open) await new Promise<void>((resume) => this.waiters.push(resume));
    if (this.error) throw this.error;
    return {
      html: BAKERY_HTML,
      finalUrl: normalizeAndValidateUrl(url),
      statusCode: 200,
      elapsedMs: 42,
      byteSize: BAKERY_HTML.length,
    };
  }
}
