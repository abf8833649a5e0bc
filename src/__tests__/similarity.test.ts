import { describe, it, expect, afterEach, vi } from 'vitest';
import { OpenAIEmbeddingProvider } from '../embeddings/openai.js';
import { createEmbeddingProvider, embedAll, type EmbeddingProvider } from '../embeddings/provider.js';
import { bufferToVector, cosineSimilarity, rankByEmbedding, vectorToBuffer } from '../embeddings/similarity.js';
import { ConfigurationError } from '../errors.js';

// === Cosine Similarity ===

describe('cosineSimilarity', () => {
  it('should return 1.0 for identical vectors', () => {
    expect(cosineSimilarity(new Float32Array([1, 0, 0]), new Float32Array([1, 0, 0]))).toBeCloseTo(1.0, 5);
  });

  it('should return -1.0 for opposite vectors', () => {
    expect(cosineSimilarity(new Float32Array([1, 0, 0]), new Float32Array([-1, 0, 0]))).toBeCloseTo(-1.0, 5);
  });

  it('should handle non-unit vectors correctly', () => {
    // (3*4 + 4*3) / (5 * 5) = 0.96
    expect(cosineSimilarity(new Float32Array([3, 4]), new Float32Array([4, 3]))).toBeCloseTo(0.96, 2);
  });

  it('should return 0 for mismatched dimensions and zero vectors', () => {
    expect(cosineSimilarity(new Float32Array([1, 0]), new Float32Array([1, 0, 0]))).toBe(0);
    expect(cosineSimilarity(new Float32Array([0, 0, 0]), new Float32Array([1, 0, 0]))).toBe(0);
  });
});

describe('vector buffers', () => {
  it('should read back what was written', () => {
    const vector = new Float32Array([0.5, -1.25, 3]);
    expect(Array.from(bufferToVector(vectorToBuffer(vector)))).toEqual([0.5, -1.25, 3]);
  });

  it('should copy from an unaligned buffer', () => {
    const padded = Buffer.alloc(9);
    vectorToBuffer(new Float32Array([1.5, 2])).copy(padded, 1);
    expect(Array.from(bufferToVector(padded.subarray(1)))).toEqual([1.5, 2]);
  });
});

describe('rankByEmbedding', () => {
  const items = [
    { id: 'far', vector: new Float32Array([0, 1]) },
    { id: 'none', vector: null },
    { id: 'near', vector: new Float32Array([1, 0.1]) },
    { id: 'exact', vector: new Float32Array([2, 0]) },
  ];

  it('should order by distance and skip items without vectors', () => {
    const ranked = rankByEmbedding(new Float32Array([1, 0]), items, (i) => i.vector, 10);
    expect(ranked.map((r) => r.item.id)).toEqual(['exact', 'near', 'far']);
    expect(ranked[0].distance).toBeCloseTo(0, 5);
    expect(ranked[2].distance).toBeCloseTo(1, 5);
  });

  it('should apply the limit', () => {
    expect(rankByEmbedding(new Float32Array([1, 0]), items, (i) => i.vector, 1)).toHaveLength(1);
  });
});

describe('embedding providers', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
    vi.unstubAllEnvs();
  });

  it('should return no provider for none', async () => {
    expect(await createEmbeddingProvider('none')).toBeNull();
  });

  it('should require an API key for openai', async () => {
    vi.stubEnv('OPENAI_API_KEY', '');
    await expect(createEmbeddingProvider('openai')).rejects.toThrow(ConfigurationError);
  });

  it('should embed one at a time without a batch call', async () => {
    const provider: EmbeddingProvider = {
      name: 'fake',
      model: 'fake-model',
      dimensions: 1,
      embed: async (text) => new Float32Array([text.length]),
    };
    const vectors = await embedAll(provider, ['a', 'abc']);
    expect(vectors.map((v) => v[0])).toEqual([1, 3]);
    expect(await embedAll(provider, [])).toEqual([]);
  });

  it('should call the embeddings endpoint and restore input order', async () => {
    const fetchMock = vi.fn(async () =>
      new Response(
        JSON.stringify({
          data: [
            { embedding: [0, 1], index: 1 },
            { embedding: [1, 0], index: 0 },
          ],
        }),
        { status: 200, headers: { 'Content-Type': 'application/json' } },
      ),
    );
    vi.stubGlobal('fetch', fetchMock);

    const provider = new OpenAIEmbeddingProvider({ apiKey: 'test-key', baseUrl: 'https://embeddings.example.test/v1/' });
    const vectors = await provider.embedBatch(['first', '']);

    expect(vectors.map((v) => Array.from(v))).toEqual([
      [1, 0],
      [0, 1],
    ]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock).toHaveBeenCalledWith('https://embeddings.example.test/v1/embeddings', {
      method: 'POST',
      headers: { Authorization: 'Bearer test-key', 'Content-Type': 'application/json' },
      body: JSON.stringify({ model: 'text-embedding-3-small', input: ['first', ' '] }),
    });
  });

  it('should surface API errors', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('quota exceeded', { status: 429 })));

    const provider = new OpenAIEmbeddingProvider({ apiKey: 'test-key' });
    await expect(provider.embed('text')).rejects.toThrow('OpenAI API error (429): quota exceeded');
  });
});
