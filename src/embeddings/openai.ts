import { z } from 'zod';
import type { EmbeddingProvider } from './provider.js';

const DEFAULT_MODEL = 'text-embedding-3-small';
const DEFAULT_BASE_URL = 'https://api.openai.com/v1';
const DIMENSIONS = 1536;
// The API accepts up to 2048 inputs per call; stay well below that
const BATCH_SIZE = 100;

const EmbeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number(),
    }),
  ),
});

export interface OpenAIEmbeddingOptions {
  apiKey: string;
  model?: string;
  /** Any endpoint speaking the OpenAI embeddings protocol. */
  baseUrl?: string;
}

/**
 * Embedding provider for the OpenAI embeddings API.
 * Index chunks are embedded in batches so one add call costs one request per
 * hundred chunks.
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'openai';
  readonly model: string;
  readonly dimensions: number;

  private readonly apiKey: string;
  private readonly baseUrl: string;

  constructor(options: OpenAIEmbeddingOptions) {
    this.apiKey = options.apiKey;
    this.model = options.model ?? DEFAULT_MODEL;
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.dimensions = this.model === 'text-embedding-3-large' ? 3072 : DIMENSIONS;
  }

  async embed(text: string): Promise<Float32Array> {
    const [vector] = await this.callApi([text]);
    return vector;
  }

  async embedBatch(texts: string[]): Promise<Float32Array[]> {
    const results: Float32Array[] = [];
    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      results.push(...(await this.callApi(texts.slice(i, i + BATCH_SIZE))));
    }
    return results;
  }

  private async callApi(inputs: string[]): Promise<Float32Array[]> {
    // The API rejects empty strings; an empty chunk embeds as a single space
    const input = inputs.map((text) => (text.length > 0 ? text : ' '));

    const response = await fetch(`${this.baseUrl}/embeddings`, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({ model: this.model, input }),
    });

    if (!response.ok) {
      const errorBody = await response.text();
      throw new Error(`OpenAI API error (${response.status}): ${errorBody}`);
    }

    const data = EmbeddingResponseSchema.parse(await response.json());

    return data.data
      .slice()
      .sort((a, b) => a.index - b.index)
      .map((item) => new Float32Array(item.embedding));
  }
}
