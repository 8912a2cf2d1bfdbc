/**
 * Image classifier backends. Each takes one JPEG and returns the model's raw
 * text; `parseClassifierResponse` maps that text onto a label.
 */

import Anthropic from '@anthropic-ai/sdk';
import { logger } from '../logger.js';
import { asString, field } from '../util/json.js';
import { VISUAL_LABELS } from '../types/index.js';
import type { VisualLabel } from '../types/index.js';

/** Fixed per-request timeout for every backend. */
export const CLASSIFY_TIMEOUT_MS = 5_000;

export const CLASSIFIER_PROMPT = `You are a visual referee for a professional tactical shooter match.

Classify exactly ONE label:
- KILL
- DEATH
- ROUND_END
- NO_EVENT

Only output the label.`;

/** Boundary to the remote image-classification service. */
export interface ImageClassifier {
  classify(jpeg: Buffer): Promise<string>;
}

/**
 * First label contained in the response, checked in declaration order.
 * Anything unrecognized is NO_EVENT.
 */
export function parseClassifierResponse(raw: string): VisualLabel {
  const text = raw.trim().toUpperCase();
  for (const label of VISUAL_LABELS) {
    if (text.includes(label)) return label;
  }
  return 'NO_EVENT';
}

export interface OllamaClassifierOptions {
  url: string;
  model: string;
  fetchImpl?: typeof fetch;
}

/** Local vision model served by Ollama's /api/generate. */
export class OllamaImageClassifier implements ImageClassifier {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: OllamaClassifierOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async classify(jpeg: Buffer): Promise<string> {
    const response = await this.fetchImpl(this.options.url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model: this.options.model,
        prompt: CLASSIFIER_PROMPT,
        images: [jpeg.toString('base64')],
        stream: false,
        options: { temperature: 0, num_predict: 10 },
      }),
      signal: AbortSignal.timeout(CLASSIFY_TIMEOUT_MS),
    });

    if (!response.ok) {
      throw new Error(`Ollama returned HTTP ${response.status}`);
    }
    const body: unknown = await response.json();
    return asString(field(body, 'response')) ?? 'NO_EVENT';
  }
}

export interface AnthropicClassifierOptions {
  apiKey: string;
  model: string;
}

/** Claude vision via the Messages API. */
export class AnthropicImageClassifier implements ImageClassifier {
  private client: Anthropic;

  constructor(private readonly options: AnthropicClassifierOptions) {
    this.client = new Anthropic({
      apiKey: options.apiKey,
      timeout: CLASSIFY_TIMEOUT_MS,
      maxRetries: 0,
    });
  }

  async classify(jpeg: Buffer): Promise<string> {
    const response = await this.client.messages.create({
      model: this.options.model,
      max_tokens: 10,
      temperature: 0,
      system: CLASSIFIER_PROMPT,
      messages: [
        {
          role: 'user',
          content: [
            {
              type: 'image',
              source: { type: 'base64', media_type: 'image/jpeg', data: jpeg.toString('base64') },
            },
            { type: 'text', text: 'Classify this frame.' },
          ],
        },
      ],
    });

    const textBlocks = response.content.filter(
      (block): block is Anthropic.Messages.TextBlock => block.type === 'text'
    );
    const text = textBlocks.map(b => b.text).join('\n').trim();
    if (!text) {
      logger.debug('AnthropicImageClassifier: empty response');
    }
    return text;
  }
}
