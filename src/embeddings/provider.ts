import { ConfigurationError } from '../errors.js';

/**
 * EmbeddingProvider interface: abstracts over embedding backends.
 * The index store embeds chunks through it when one is configured and falls
 * back to full-text ranking otherwise.
 */
export interface EmbeddingProvider {
  /** Provider name for logging */
  readonly name: string;
  /** Model identifier */
  readonly model: string;
  /** Vector dimensions */
  readonly dimensions: number;

  embed(text: string): Promise<Float32Array>;

  /** Embed many texts in one round trip where the backend supports it. */
  embedBatch?(texts: string[]): Promise<Float32Array[]>;
}

export const EMBEDDING_PROVIDER_TYPES = ['none', 'openai'] as const;

export type EmbeddingProviderType = (typeof EMBEDDING_PROVIDER_TYPES)[number];

/** Embed texts with the provider's batch call when it has one. */
export async function embedAll(provider: EmbeddingProvider, texts: string[]): Promise<Float32Array[]> {
  if (texts.length === 0) return [];
  if (provider.embedBatch) return provider.embedBatch(texts);

  const vectors: Float32Array[] = [];
  for (const text of texts) {
    vectors.push(await provider.embed(text));
  }
  return vectors;
}

/**
 * Create an embedding provider based on the type.
 */
export async function createEmbeddingProvider(
  type: EmbeddingProviderType,
  options?: { apiKey?: string; model?: string; baseUrl?: string },
): Promise<EmbeddingProvider | null> {
  if (type === 'none') return null;

  const apiKey = options?.apiKey ?? process.env.OPENAI_API_KEY;
  if (!apiKey) {
    throw new ConfigurationError(
      'OpenAI embedding provider requires an API key. Set --openai-api-key or OPENAI_API_KEY env var.',
    );
  }
  const { OpenAIEmbeddingProvider } = await import('./openai.js');
  return new OpenAIEmbeddingProvider({ apiKey, model: options?.model, baseUrl: options?.baseUrl });
}
