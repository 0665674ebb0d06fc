// types/analysis.ts
export const DIMENSIONS = ['TEXT', 'VISUAL', 'UX', 'TRUST', 'TECH'] as const;

export type Dimension = (typeof DIMENSIONS)[number];

export function isDimension(value: string): value is Dimension {
  return (DIMENSIONS as readonly string[]).includes(value);
}

export interface ImageRef {
  url: string;
  alt: string;
  context: string;
}

export interface Heading {
  level: number;
  text: string;
}

export interface PageLink {
  href: string;
  text: string;
  internal: boolean;
}

export interface PageSignals {
  hasViewportMeta: boolean;
  hasCharset: boolean;
  hasLangAttr: boolean;
  hasFavicon: boolean;
  hasStructuredData: boolean;
  hasPrivacyPolicy: boolean;
  hasContactInfo: boolean;
  formsCount: number;
  scriptsCount: number;
  stylesheetsCount: number;
}

export interface PageData {
  url: string;
  title: string;
  metaDescription: string;
  textContent: string;
  images: ImageRef[];
  headings: Heading[];
  links: PageLink[];
  socialLinks: string[];
  meta: Record<string, string>;
  http: {
    statusCode: number;
    responseTimeMs: number;
    byteSize: number;
  };
  security: {
    hasHttps: boolean;
    hasCertificate: boolean;
  };
  signals: PageSignals;
}

export type Severity = 'INFO' | 'WARNING' | 'CRITICAL';

export interface Finding {
  severity: Severity;
  message: string;
  evidence?: string;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
}

export type AgentStatus = 'SUCCESS' | 'FAILED' | 'TIMED_OUT' | 'SKIPPED';

export interface AgentRequest<TInput = unknown> {
  dimension: Dimension;
  input: TInput;
  fingerprint: string;
}

export interface AgentResult {
  dimension: Dimension;
  agentName: string;
  score: number;
  findings: Finding[];
  summary: string;
  usage: TokenUsage;
  /** External model calls attempted while producing this result. */
  calls: number;
  status: AgentStatus;
  error?: string;
  fromCache: boolean;
  durationMs: number;
}

export type AgentResults = Partial<Record<Dimension, AgentResult>>;

export interface AnalysisConfig {
  dimensions: Dimension[];
  perAgentTimeoutMs: number;
  overallDeadlineMs: number;
  cacheTtlMs: number;
  cacheTtlByDimension?: Partial<Record<Dimension, number>>;
  /** Timeout for a single model call; defaults to perAgentTimeoutMs. */
  callTimeoutMs?: number;
  /** Defaults to the number of requested dimensions. */
  maxConcurrency?: number;
}

export interface RunMetrics {
  externalCalls: number;
  promptTokens: number;
  completionTokens: number;
  durationMs: number;
  /** Cache lookups made by this run's agents. */
  cache: {
    hits: number;
    misses: number;
  };
}

export interface RunReport {
  results: AgentResults;
  metrics: RunMetrics;
}

export type Grade = 'A' | 'B' | 'C' | 'D' | 'F';

export interface DimensionScore {
  status: AgentStatus;
  score: number | null;
  baseWeight: number;
  appliedWeight: number;
  summary: string;
  findings: Finding[];
  error?: string;
}

export interface CEPSResult {
  overallScore: number;
  grade: Grade;
  noData: boolean;
  dimensions: Partial<Record<Dimension, DimensionScore>>;
  failedDimensions: Dimension[];
  externalCalls: number;
  usage: TokenUsage & { totalTokens: number };
  durationMs: number;
}

export interface PageAnalysis {
  url: string;
  statusCode: number;
  analyzedAt: string;
  result: CEPSResult;
}
