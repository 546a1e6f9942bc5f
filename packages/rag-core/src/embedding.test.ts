import { embedMany } from 'ai';
import { fetch } from 'node-fetch-native';
import { createOllama } from 'ollama-ai-provider';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  EmbeddingModelConfigSchema,
  EmbeddingModelProvider,
  HttpEmbeddingFunction,
  MockEmbeddingFunction,
  OllamaEmbeddingFunction,
  createEmbeddingFunction,
  defaultEmbeddingConfig,
  embed,
} from './embedding.js';

const { mockEmbeddingModel } = vi.hoisted(() => ({
  mockEmbeddingModel: { provider: 'ollama', modelId: 'mock-ollama-model' },
}));

vi.mock('ai', () => ({
  embedMany: vi.fn(),
}));

vi.mock('ollama-ai-provider', () => ({
  createOllama: vi.fn(() => ({ embedding: vi.fn(() => mockEmbeddingModel) })),
}));

vi.mock('node-fetch-native', () => ({
  fetch: vi.fn(),
}));

const cosine = (a: number[], b: number[]) => a.reduce((sum, value, i) => sum + value * b[i], 0);

describe('embedding', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('MockEmbeddingFunction', () => {
    it('should produce unit vectors of the configured dimension by default', async () => {
      const fn = createEmbeddingFunction(defaultEmbeddingConfig);
      const [vector] = await fn.generate(['Gebührenordnung']);

      expect(fn).toBeInstanceOf(MockEmbeddingFunction);
      expect(vector).toHaveLength(256);
      expect(cosine(vector, vector)).toBeCloseTo(1, 10);
      expect(embedMany).not.toHaveBeenCalled();
    });

    it('should be deterministic', async () => {
      const fn = new MockEmbeddingFunction(64);
      const [first] = await fn.generate(['Meldebescheinigung beantragen']);
      const [second] = await new MockEmbeddingFunction(64).generate(['Meldebescheinigung beantragen']);
      expect(first).toEqual(second);
    });

    it('should place texts that share words closer than unrelated ones', async () => {
      const [query, related, unrelated] = await new MockEmbeddingFunction().generate([
        'Gebührenordnung',
        'Gebührenordnung der Stadt',
        'Hundesteuer',
      ]);
      expect(cosine(query, related)).toBeGreaterThan(cosine(query, unrelated));
    });

    it('should return a zero vector for text without words', async () => {
      const [vector] = await new MockEmbeddingFunction(8).generate(['  ...  ']);
      expect(vector).toEqual([0, 0, 0, 0, 0, 0, 0, 0]);
    });
  });

  describe('OllamaEmbeddingFunction', () => {
    it('should call embedMany with the configured model', async () => {
      vi.mocked(embedMany).mockResolvedValueOnce({
        embeddings: [[0.5, 0.5]],
        values: ['Antrag'],
        usage: { tokens: 3 },
      });
      const fn = createEmbeddingFunction(
        EmbeddingModelConfigSchema.parse({ provider: 'ollama', baseURL: 'http://localhost:11434' }),
      );

      await expect(fn.generate(['Antrag'])).resolves.toEqual([[0.5, 0.5]]);
      expect(fn).toBeInstanceOf(OllamaEmbeddingFunction);
      expect(createOllama).toHaveBeenCalledWith({ baseURL: 'http://localhost:11434' });
      expect(embedMany).toHaveBeenCalledWith({ model: mockEmbeddingModel, values: ['Antrag'] });
    });

    it('should hand the abort signal to embedMany', async () => {
      vi.mocked(embedMany).mockResolvedValueOnce({
        embeddings: [[0.5, 0.5]],
        values: ['Antrag'],
        usage: { tokens: 3 },
      });
      const controller = new AbortController();

      await embed(new OllamaEmbeddingFunction('nomic-embed-text'), 'Antrag', controller.signal);

      expect(embedMany).toHaveBeenCalledWith({
        model: mockEmbeddingModel,
        values: ['Antrag'],
        abortSignal: controller.signal,
      });
    });

    it('should reject a mismatched embedding count', async () => {
      vi.mocked(embedMany).mockResolvedValueOnce({
        embeddings: [[0.1]],
        values: ['a', 'b'],
        usage: { tokens: 2 },
      });
      const fn = new OllamaEmbeddingFunction('nomic-embed-text');

      await expect(fn.generate(['a', 'b'])).rejects.toThrow('Ollama embedding count mismatch: expected 2, got 1');
    });

    it('should skip the model for empty input', async () => {
      await expect(new OllamaEmbeddingFunction('nomic-embed-text').generate([])).resolves.toEqual([]);
      expect(embedMany).not.toHaveBeenCalled();
    });
  });

  describe('HttpEmbeddingFunction', () => {
    const url = 'http://embed.local/embed';

    it('should post texts in batches and concatenate the results', async () => {
      vi.mocked(fetch)
        .mockResolvedValueOnce(new Response(JSON.stringify({ embeddings: [[1], [2]] }), { status: 200 }))
        .mockResolvedValueOnce(new Response(JSON.stringify({ embeddings: [[3]] }), { status: 200 }));
      const fn = new HttpEmbeddingFunction(url, { Authorization: 'Bearer test-secret' }, 2);

      await expect(fn.generate(['t1', 't2', 't3'])).resolves.toEqual([[1], [2], [3]]);
      expect(fetch).toHaveBeenCalledTimes(2);
      expect(fetch).toHaveBeenNthCalledWith(2, url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', Authorization: 'Bearer test-secret' },
        body: JSON.stringify({ texts: ['t3'] }),
      });
    });

    it('should hand the abort signal to fetch', async () => {
      vi.mocked(fetch).mockResolvedValueOnce(new Response(JSON.stringify({ embeddings: [[1]] }), { status: 200 }));
      const controller = new AbortController();

      await new HttpEmbeddingFunction(url).generate(['t1'], controller.signal);

      expect(fetch).toHaveBeenCalledWith(url, expect.objectContaining({ signal: controller.signal }));
    });

    it('should wrap HTTP errors', async () => {
      vi.mocked(fetch).mockResolvedValueOnce(
        new Response('boom', { status: 500, statusText: 'Internal Server Error' }),
      );
      const fn = new HttpEmbeddingFunction(url);

      await expect(fn.generate(['t1'])).rejects.toThrow(
        'HTTP embedding generation failed: HTTP error 500: Internal Server Error. Body: boom',
      );
    });

    it('should reject malformed responses and count mismatches', async () => {
      vi.mocked(fetch)
        .mockResolvedValueOnce(new Response(JSON.stringify({ vectors: [] }), { status: 200 }))
        .mockResolvedValueOnce(new Response(JSON.stringify({ embeddings: [[1]] }), { status: 200 }));
      const fn = new HttpEmbeddingFunction(url);

      await expect(fn.generate(['t1'])).rejects.toThrow('Invalid response format from embedding API');
      await expect(fn.generate(['t1', 't2'])).rejects.toThrow('HTTP embedding count mismatch: expected 2, got 1');
    });
  });

  describe('embed', () => {
    it('should return the single vector', async () => {
      const vector = await embed(new MockEmbeddingFunction(16), 'Parkausweis');
      expect(vector).toHaveLength(16);
    });

    it('should fail when the capability returns nothing', async () => {
      await expect(embed({ generate: async () => [] }, 'Parkausweis')).rejects.toThrow(
        'Embedding generation returned no results.',
      );
    });
  });

  it('should reject an HTTP config without a valid URL', () => {
    expect(EmbeddingModelConfigSchema.safeParse({ provider: EmbeddingModelProvider.Http, url: 'nope' }).success).toBe(
      false,
    );
  });
});
