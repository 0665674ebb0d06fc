import type { Dimension, Heading, PageData } from '../types/analysis.js';
import { BaseAgent } from './baseAgent.js';
import { excerpt, formatHeadings, groundingRules, RESPONSE_FORMAT } from './prompts.js';
import type { ModelCall } from './types.js';

export interface TextInput {
  url: string;
  title: string;
  metaDescription: string;
  textExcerpt: string;
  headings: Heading[];
}

const TEXT_EXCERPT_CHARS = 4000;

export class TextAgent extends BaseAgent<TextInput> {
  readonly dimension: Dimension = 'TEXT';
  readonly name = 'Content Quality';

  protected selectInput(page: PageData): TextInput {
    return {
      url: page.url,
      title: page.title,
      metaDescription: page.metaDescription,
      textExcerpt: excerpt(page.textContent, TEXT_EXCERPT_CHARS),
      headings: page.headings,
    };
  }

  protected planCalls(input: TextInput): ModelCall[] {
    const prompt = `You are a website content quality auditor.
Analyse the following webpage text and metadata.

URL: ${input.url}
Title: ${input.title || '(missing)'}
Meta description: ${input.metaDescription || '(missing)'}
Headings:
${formatHeadings(input.headings)}
Text excerpt (first ${TEXT_EXCERPT_CHARS} chars):
"""
${input.textExcerpt}
"""

Evaluate:
1. Clarity and readability
2. Grammar and spelling quality
3. Content depth and usefulness
4. Keyword relevance to page title / meta
5. Call-to-action effectiveness

${groundingRules('text')}
- If the text is empty or very short, score it low and explain why.

${RESPONSE_FORMAT}`;

    return [{ kind: 'text', label: 'text-agent', prompt, weight: 1 }];
  }
}
