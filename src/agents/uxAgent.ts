import type { Dimension, Heading, PageData } from '../types/analysis.js';
import { BaseAgent } from './baseAgent.js';
import { excerpt, formatHeadings, groundingRules, RESPONSE_FORMAT } from './prompts.js';
import type { ModelCall } from './types.js';

export interface UxInput {
  url: string;
  title: string;
  headings: Heading[];
  internalLinks: number;
  externalLinks: number;
  formsCount: number;
  hasViewportMeta: boolean;
  hasLangAttr: boolean;
  responseTimeMs: number;
  byteSize: number;
  textExcerpt: string;
}

const UX_EXCERPT_CHARS = 2000;

export class UxAgent extends BaseAgent<UxInput> {
  readonly dimension: Dimension = 'UX';
  readonly name = 'User Experience';

  protected selectInput(page: PageData): UxInput {
    const internalLinks = page.links.filter((l) => l.internal).length;
    return {
      url: page.url,
      title: page.title,
      headings: page.headings,
      internalLinks,
      externalLinks: page.links.length - internalLinks,
      formsCount: page.signals.formsCount,
      hasViewportMeta: page.signals.hasViewportMeta,
      hasLangAttr: page.signals.hasLangAttr,
      responseTimeMs: page.http.responseTimeMs,
      byteSize: page.http.byteSize,
      textExcerpt: excerpt(page.textContent, UX_EXCERPT_CHARS),
    };
  }

  protected planCalls(input: UxInput): ModelCall[] {
    const prompt = `You are a UX auditor for websites.
Analyse the following structural data and evaluate the user experience.

URL: ${input.url}
Title: ${input.title || '(missing)'}
Heading structure:
${formatHeadings(input.headings)}
Internal links count: ${input.internalLinks}
External links count: ${input.externalLinks}
Forms count: ${input.formsCount}
Has viewport meta (mobile-friendly signal): ${input.hasViewportMeta}
Has language attribute: ${input.hasLangAttr}
Response time: ${input.responseTimeMs}ms
Page size: ${(input.byteSize / 1024).toFixed(1)} KB
Text excerpt (first ${UX_EXCERPT_CHARS} chars):
"""
${input.textExcerpt}
"""

Evaluate:
1. Heading hierarchy (proper H1 → H2 → H3 structure)
2. Navigation clarity (enough internal links, logical structure)
3. Mobile-friendliness signals
4. Page load-time perception
5. Content scannability and readability layout
6. Form usability (if any)

${groundingRules('structural data')}
- Do NOT guess about visual layout, colors, or anything not represented in the data.

${RESPONSE_FORMAT}`;

    return [{ kind: 'text', label: 'ux-agent', prompt, weight: 1 }];
  }
}
