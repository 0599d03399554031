/**
 * Embedding gateway module
 * Maps texts to fixed-dimension vectors through an external service, in bounded batches
 */

import axios from 'axios';
import { EmbeddingConfig } from './types';
import { CancelledError, ConfigError, EmbeddingServiceError, RagError, TimeoutError } from './errors';
import { Dispatcher } from './dispatcher';
import { logger } from './logger';

export interface EmbedOptions {
  signal?: AbortSignal;
}

/**
 * External embedding service. Output order matches input order and a failure of
 * any element fails the whole batch.
 */
export interface EmbeddingGateway {
  readonly dimension?: number;
  embed(texts: string[], options?: EmbedOptions): Promise<number[][]>;
}

interface EmbeddingsResponse {
  data: Array<{ embedding: number[]; index: number }>;
}

function isEmbeddingsResponse(value: unknown): value is EmbeddingsResponse {
  if (typeof value !== 'object' || value === null || !('data' in value)) {
    return false;
  }

  const { data } = value;
  return Array.isArray(data) && data.every(item =>
    typeof item === 'object' &&
    item !== null &&
    typeof item.index === 'number' &&
    Array.isArray(item.embedding) &&
    item.embedding.every((component: unknown) => typeof component === 'number')
  );
}

/**
 * Validate that a batch result matches the request shape
 */
function checkVectors(vectors: number[][], expectedCount: number, dimension?: number): number[][] {
  if (vectors.length !== expectedCount) {
    throw new EmbeddingServiceError(
      `Embedding service returned ${vectors.length} vectors for ${expectedCount} inputs`
    );
  }

  const width = dimension ?? vectors[0]?.length;
  for (const vector of vectors) {
    if (vector.length !== width) {
      throw new EmbeddingServiceError(
        `Embedding service returned a vector of dimension ${vector.length}, expected ${width}`
      );
    }
  }

  return vectors;
}

/**
 * OpenAI-compatible embeddings endpoint
 */
export class HttpEmbeddingGateway implements EmbeddingGateway {
  readonly dimension: number;

  constructor(private readonly config: EmbeddingConfig) {
    this.dimension = config.dimension;
  }

  async embed(texts: string[], options: EmbedOptions = {}): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const { signal } = options;
    const url = `${this.config.apiUrl.replace(/\/+$/, '')}/embeddings`;

    try {
      const response = await axios.post<unknown>(
        url,
        { model: this.config.model, input: texts },
        {
          headers: {
            'Content-Type': 'application/json',
            ...(this.config.apiKey ? { Authorization: `Bearer ${this.config.apiKey}` } : {})
          },
          timeout: this.config.timeoutMs,
          signal
        }
      );

      if (!isEmbeddingsResponse(response.data)) {
        throw new EmbeddingServiceError('Invalid embedding response shape');
      }

      const ordered = [...response.data.data].sort((a, b) => a.index - b.index);
      return checkVectors(ordered.map(item => item.embedding), texts.length, this.dimension);
    } catch (error) {
      if (error instanceof RagError) {
        throw error;
      }
      if (signal?.aborted && signal.reason instanceof RagError) {
        throw signal.reason;
      }
      if (axios.isAxiosError(error)) {
        if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
          throw new TimeoutError('embedding request', this.config.timeoutMs);
        }
        if (axios.isCancel(error)) {
          throw new CancelledError('embedding request');
        }

        const status = error.response?.status;
        logger.error(`Embedding API error${status ? ` (${status})` : ''}`, error.response?.data ?? error.message);
        throw new EmbeddingServiceError(`Embedding request failed: ${error.message}`, status, error);
      }

      const message = error instanceof Error ? error.message : String(error);
      throw new EmbeddingServiceError(`Embedding request failed: ${message}`, undefined, error);
    }
  }
}

/**
 * FNV-1a hash of a token
 */
function hashToken(token: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}

/**
 * Local embedding using hashed token frequencies.
 * No network involved; useful offline and in tests.
 */
export class HashingEmbeddingGateway implements EmbeddingGateway {
  constructor(readonly dimension: number = 384) {
    if (!Number.isInteger(dimension) || dimension < 1) {
      throw new ConfigError('dimension', `must be a positive integer, got ${dimension}`);
    }
  }

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map(text => this.embedOne(text));
  }

  private embedOne(text: string): number[] {
    const embedding = new Array<number>(this.dimension).fill(0);
    const tokens = text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];

    for (const token of tokens) {
      embedding[hashToken(token) % this.dimension] += 1;
    }

    const magnitude = Math.sqrt(embedding.reduce((sum, val) => sum + val * val, 0));
    return magnitude > 0 ? embedding.map(val => val / magnitude) : embedding;
  }
}

export interface BatchEmbedOptions {
  batchSize: number;
  dispatcher: Dispatcher;
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Embed many texts in bounded batches, concurrently up to the dispatcher's limit.
 * Any failed batch fails the whole call.
 */
export async function embedInBatches(
  gateway: EmbeddingGateway,
  texts: string[],
  options: BatchEmbedOptions
): Promise<number[][]> {
  const { batchSize, dispatcher, timeoutMs, signal } = options;

  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new ConfigError('batchSize', `must be an integer >= 1, got ${batchSize}`);
  }

  const batches: string[][] = [];
  for (let i = 0; i < texts.length; i += batchSize) {
    batches.push(texts.slice(i, i + batchSize));
  }

  logger.debug(`Embedding ${texts.length} texts in ${batches.length} batches`);

  const results = await Promise.all(
    batches.map((batch, index) =>
      dispatcher.run(
        async taskSignal => checkVectors(await gateway.embed(batch, { signal: taskSignal }), batch.length, gateway.dimension),
        { signal, timeoutMs, label: `embedding batch ${index + 1}/${batches.length}` }
      )
    )
  );

  return results.flat();
}
