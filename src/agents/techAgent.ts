import type { Dimension, PageData } from '../types/analysis.js';
import { BaseAgent } from './baseAgent.js';
import { groundingRules, RESPONSE_FORMAT } from './prompts.js';
import type { ModelCall } from './types.js';

export interface TechInput {
  url: string;
  statusCode: number;
  responseTimeMs: number;
  byteSize: number;
  hasHttps: boolean;
  hasViewportMeta: boolean;
  hasCharset: boolean;
  hasLangAttr: boolean;
  hasFavicon: boolean;
  hasStructuredData: boolean;
  scriptsCount: number;
  stylesheetsCount: number;
  imagesCount: number;
  title: string;
  metaDescription: string;
}

export class TechAgent extends BaseAgent<TechInput> {
  readonly dimension: Dimension = 'TECH';
  readonly name = 'Technical Health';

  protected selectInput(page: PageData): TechInput {
    return {
      url: page.url,
      statusCode: page.http.statusCode,
      responseTimeMs: page.http.responseTimeMs,
      byteSize: page.http.byteSize,
      hasHttps: page.security.hasHttps,
      hasViewportMeta: page.signals.hasViewportMeta,
      hasCharset: page.signals.hasCharset,
      hasLangAttr: page.signals.hasLangAttr,
      hasFavicon: page.signals.hasFavicon,
      hasStructuredData: page.signals.hasStructuredData,
      scriptsCount: page.signals.scriptsCount,
      stylesheetsCount: page.signals.stylesheetsCount,
      imagesCount: page.images.length,
      title: page.title,
      metaDescription: page.metaDescription,
    };
  }

  protected planCalls(input: TechInput): ModelCall[] {
    const prompt = `You are a website technical health auditor.
Analyse the following technical signals and score the page's technical quality.

URL: ${input.url}
HTTP status: ${input.statusCode}
Response time: ${input.responseTimeMs}ms
Page size: ${(input.byteSize / 1024).toFixed(1)} KB
Has HTTPS: ${input.hasHttps}
Has viewport meta: ${input.hasViewportMeta}
Has charset declaration: ${input.hasCharset}
Has language attribute: ${input.hasLangAttr}
Has favicon: ${input.hasFavicon}
Has structured data: ${input.hasStructuredData}
Scripts count: ${input.scriptsCount}
Stylesheets count: ${input.stylesheetsCount}
Images count: ${input.imagesCount}
Title: ${input.title || '(missing)'}
Meta description: ${input.metaDescription || '(missing)'}

Evaluate:
1. Response time (< 2000ms excellent, > 5000ms poor)
2. Page size optimization
3. Basic SEO (title, meta description, lang, charset)
4. Mobile-readiness (viewport meta)
5. Resource count (scripts/stylesheets — fewer is better)
6. Favicon and branding basics
7. Structured data for rich search results

${groundingRules('metrics')}
- Do NOT guess about JavaScript performance, rendering, or anything not in the data.

${RESPONSE_FORMAT}`;

    return [{ kind: 'text', label: 'tech-agent', prompt, weight: 1 }];
  }
}
