/**
 * Unit tests for retriever module
 */

import { Retriever, validateRetrievalParams } from '../src/retriever';
import { VectorIndex } from '../src/vectorStore';
import { Dispatcher } from '../src/dispatcher';
import { ConfigError, EmbeddingServiceError, TimeoutError } from '../src/errors';
import { createTestEntry, KeywordEmbeddings } from './test-helpers';

describe('Retriever Module', () => {
  const vocabulary = ['leave', 'salary', 'office'];
  let index: VectorIndex;
  let embeddings: KeywordEmbeddings;
  let retriever: Retriever;

  beforeEach(() => {
    index = new VectorIndex({ dimension: 3 });
    index.insert([
      createTestEntry('policy#0', [1, 0, 0], 'policy'),
      createTestEntry('payroll#0', [0, 1, 0], 'payroll'),
      createTestEntry('policy#1', [1, 1, 0], 'policy')
    ]);
    embeddings = new KeywordEmbeddings(vocabulary);
    retriever = new Retriever(embeddings, index, new Dispatcher(2));
  });

  it('should embed the question once and return ranked results', async () => {
    const results = await retriever.retrieve('How much annual leave?', 2, 0.1);

    expect(embeddings.calls).toEqual([['How much annual leave?']]);
    expect(results.map(r => r.chunkId)).toEqual(['policy#0', 'policy#1']);
    expect(results.map(r => r.rank)).toEqual([0, 1]);
  });

  it('should return an empty list when nothing reaches the minimum score', async () => {
    const results = await retriever.retrieve('Where is the office?', 4, 0.35);

    expect(results).toEqual([]);
  });

  it('should return fewer than k results from a small index', async () => {
    const results = await retriever.retrieve('leave and salary', 10, 0);

    expect(results).toHaveLength(3);
    expect(results[0].chunkId).toBe('policy#1');
  });

  it('should reject an empty question without calling the gateway', async () => {
    await expect(retriever.retrieve('   ', 4, 0.35)).rejects.toThrow(ConfigError);
    expect(embeddings.calls).toHaveLength(0);
  });

  it('should reject invalid k and minScore', async () => {
    await expect(retriever.retrieve('leave', 0, 0.35)).rejects.toThrow('Invalid k');
    await expect(retriever.retrieve('leave', 4, 1.5)).rejects.toThrow('Invalid minScore');
    expect(embeddings.calls).toHaveLength(0);
  });

  it('should fail when the gateway returns no vector', async () => {
    const empty = { embed: jest.fn(async () => []) };
    const broken = new Retriever(empty, index, new Dispatcher(1));

    await expect(broken.retrieve('leave', 4, 0)).rejects.toThrow(EmbeddingServiceError);
  });

  it('should time out a slow embedding call', async () => {
    const slow = { embed: jest.fn(() => new Promise<number[][]>(() => undefined)) };
    const slowRetriever = new Retriever(slow, index, new Dispatcher(1), 20);

    await expect(slowRetriever.retrieve('leave', 4, 0)).rejects.toThrow(TimeoutError);
  });

  describe('validateRetrievalParams', () => {
    it('should allow any finite minScore for the inner product metric', () => {
      const inner = new VectorIndex({ dimension: 3, metric: 'inner_product' });

      expect(() => validateRetrievalParams(3, 12.5, inner)).not.toThrow();
      expect(() => validateRetrievalParams(3, -2, inner)).not.toThrow();
      expect(() => validateRetrievalParams(3, Infinity, inner)).toThrow(ConfigError);
    });

    it('should require an integer k', () => {
      expect(() => validateRetrievalParams(2.5, 0.3, index)).toThrow(ConfigError);
    });
  });
});
