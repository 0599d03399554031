/**
 * Retriever module
 * Embeds a question with one gateway call and searches the vector index
 */

import { RetrievalResult } from './types';
import { ConfigError, EmbeddingServiceError } from './errors';
import { EmbeddingGateway } from './embeddings';
import { Dispatcher } from './dispatcher';
import { VectorIndex } from './vectorStore';
import { logger } from './logger';

export interface RetrieveOptions {
  signal?: AbortSignal;
}

/**
 * Check k and minScore against what the index can produce
 */
export function validateRetrievalParams(k: number, minScore: number, index: VectorIndex): void {
  if (!Number.isInteger(k) || k < 1) {
    throw new ConfigError('k', `must be an integer >= 1, got ${k}`);
  }

  if (index.metric === 'cosine') {
    if (!(minScore >= 0 && minScore <= 1)) {
      throw new ConfigError('minScore', `must be between 0 and 1, got ${minScore}`);
    }
  } else if (!Number.isFinite(minScore)) {
    throw new ConfigError('minScore', `must be a finite number, got ${minScore}`);
  }
}

export class Retriever {
  constructor(
    private readonly embeddings: EmbeddingGateway,
    private readonly index: VectorIndex,
    private readonly dispatcher: Dispatcher,
    private readonly timeoutMs?: number
  ) {}

  async retrieve(
    question: string,
    k: number,
    minScore: number,
    options: RetrieveOptions = {}
  ): Promise<RetrievalResult[]> {
    if (question.trim().length === 0) {
      throw new ConfigError('question', 'must not be empty');
    }
    validateRetrievalParams(k, minScore, this.index);

    const vectors = await this.dispatcher.run(
      signal => this.embeddings.embed([question], { signal }),
      { signal: options.signal, timeoutMs: this.timeoutMs, label: 'question embedding' }
    );

    const [queryVector] = vectors;
    if (vectors.length !== 1 || !queryVector) {
      throw new EmbeddingServiceError(`Expected 1 question vector, got ${vectors.length}`);
    }

    const results = this.index.search(queryVector, k, minScore);
    logger.debug(
      `Retrieved ${results.length} chunks (k=${k}, minScore=${minScore})`,
      results.map(r => `${r.chunkId}:${r.score.toFixed(3)}`)
    );

    return results;
  }
}
