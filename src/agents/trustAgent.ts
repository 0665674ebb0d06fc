import type { Dimension, PageData } from '../types/analysis.js';
import { BaseAgent } from './baseAgent.js';
import { groundingRules, RESPONSE_FORMAT } from './prompts.js';
import type { ModelCall } from './types.js';

export interface TrustInput {
  url: string;
  hasHttps: boolean;
  hasCertificate: boolean;
  hasPrivacyPolicy: boolean;
  hasContactInfo: boolean;
  socialLinks: string[];
  externalLinks: number;
  hasStructuredData: boolean;
  formsCount: number;
  title: string;
  metaDescription: string;
}

export class TrustAgent extends BaseAgent<TrustInput> {
  readonly dimension: Dimension = 'TRUST';
  readonly name = 'Trust & Credibility';

  protected selectInput(page: PageData): TrustInput {
    return {
      url: page.url,
      hasHttps: page.security.hasHttps,
      hasCertificate: page.security.hasCertificate,
      hasPrivacyPolicy: page.signals.hasPrivacyPolicy,
      hasContactInfo: page.signals.hasContactInfo,
      socialLinks: page.socialLinks.slice(0, 5),
      externalLinks: page.links.filter((l) => !l.internal).length,
      hasStructuredData: page.signals.hasStructuredData,
      formsCount: page.signals.formsCount,
      title: page.title,
      metaDescription: page.metaDescription,
    };
  }

  protected planCalls(input: TrustInput): ModelCall[] {
    const prompt = `You are a website trust and credibility auditor.
Analyse the following signals and score the page's trustworthiness.

URL: ${input.url}
Has HTTPS: ${input.hasHttps}
Served with a TLS certificate: ${input.hasCertificate}
Has privacy policy: ${input.hasPrivacyPolicy}
Has contact information: ${input.hasContactInfo}
Social media links found: ${input.socialLinks.length}
Social URLs: ${input.socialLinks.join(', ') || '(none)'}
External links count: ${input.externalLinks}
Has structured data (schema.org): ${input.hasStructuredData}
Forms count: ${input.formsCount}
Title: ${input.title || '(missing)'}
Meta description: ${input.metaDescription || '(missing)'}

Evaluate:
1. HTTPS / TLS security
2. Privacy policy presence
3. Contact information availability
4. Social media presence (legitimacy signal)
5. Professional presentation (title, meta)
6. Structured data for search credibility
7. Any red-flag patterns (e.g. excessive forms, no legal pages)

${groundingRules('signals')}
- If a field is true, treat it as a positive signal. If false, treat it as a gap.

${RESPONSE_FORMAT}`;

    return [{ kind: 'text', label: 'trust-agent', prompt, weight: 1 }];
  }
}
