import type { Dimension, ImageRef, PageData } from '../types/analysis.js';
import { BaseAgent } from './baseAgent.js';
import { groundingRules, RESPONSE_FORMAT } from './prompts.js';
import type { AgentDeps, ModelCall } from './types.js';

export interface VisualInput {
  images: ImageRef[];
}

export interface VisualAgentOptions {
  visionEnabled?: boolean;
}

// The vision verdict carries more weight than the metadata-only one.
const METADATA_WEIGHT = 0.4;
const VISION_WEIGHT = 0.6;

export class VisualAgent extends BaseAgent<VisualInput> {
  readonly dimension: Dimension = 'VISUAL';
  readonly name = 'Visual Quality';
  private readonly visionEnabled: boolean;

  constructor(deps: AgentDeps, options: VisualAgentOptions = {}) {
    super(deps);
    this.visionEnabled = options.visionEnabled ?? true;
  }

  get kind(): string {
    return this.visionEnabled ? `${super.kind}+vision` : super.kind;
  }

  protected selectInput(page: PageData): VisualInput {
    return { images: page.images };
  }

  protected planCalls(input: VisualInput): ModelCall[] {
    const withAlt = input.images.filter((img) => img.alt.trim().length > 0);
    const details = input.images
      .slice(0, 10)
      .map((img, i) => `${i + 1}. alt="${img.alt}" context="${img.context}"`)
      .join('\n');

    const metadataPrompt = `You are a website visual-design auditor.
Based on the image metadata below, evaluate the visual quality of the page.

Number of images found: ${input.images.length}
Images with alt-text: ${withAlt.length} / ${input.images.length}
Images:
${details || '(none)'}

Score the visual dimension 0-100 considering:
1. Presence and quantity of meaningful images
2. Alt-text quality and accessibility
3. Relevance of each image to its surrounding context

${groundingRules('metadata')}
- Do NOT assume anything about what the images look like from metadata alone.

${RESPONSE_FORMAT}`;

    const calls: ModelCall[] = [
      { kind: 'text', label: 'visual-agent-meta', prompt: metadataPrompt, weight: METADATA_WEIGHT },
    ];

    if (this.visionEnabled && input.images.length > 0) {
      const visionPrompt = `You are a website visual-design auditor.
Look at the following website image(s) and evaluate:
1. Visual hierarchy and layout quality
2. Color scheme and contrast
3. Image relevance to the surrounding page context
4. Overall aesthetic professionalism

Context for each image, in order:
${input.images.map((img, i) => `${i + 1}. ${img.context || '(no context)'}`).join('\n')}

${groundingRules('image(s)')}
- Do NOT speculate about parts of the website not shown.

${RESPONSE_FORMAT}`;

      calls.push({
        kind: 'vision',
        label: 'visual-agent-vision',
        prompt: visionPrompt,
        images: input.images,
        weight: VISION_WEIGHT,
      });
    }

    return calls;
  }
}
