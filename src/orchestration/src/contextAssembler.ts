/**
 * Context assembly module
 * Packs rank-ordered retrieval results into a bounded context with citations
 */

import { AssembledContext, Chunk, ChunkSource, Citation, ContextConfig, ContextItem, RetrievalResult } from './types';
import { ConfigError } from './errors';
import { logger } from './logger';

export function validateContextConfig(config: ContextConfig): void {
  if (!Number.isInteger(config.budget) || config.budget <= 0) {
    throw new ConfigError('contextBudget', `must be a positive integer, got ${config.budget}`);
  }
  if (!(config.dedupOverlapThreshold > 0 && config.dedupOverlapThreshold <= 1)) {
    throw new ConfigError(
      'dedupOverlapThreshold',
      `must be in (0, 1], got ${config.dedupOverlapThreshold}`
    );
  }
}

/**
 * Share of the shorter chunk covered by the offset overlap of two chunks of one document
 */
export function overlapRatio(a: Chunk, b: Chunk): number {
  if (a.documentId !== b.documentId) {
    return 0;
  }

  const overlap = Math.min(a.endOffset, b.endOffset) - Math.max(a.startOffset, b.startOffset);
  const shorter = Math.min(a.endOffset - a.startOffset, b.endOffset - b.startOffset);

  return overlap > 0 && shorter > 0 ? overlap / shorter : 0;
}

export function citationFor(chunk: Chunk): Citation {
  return {
    chunkId: chunk.id,
    documentId: chunk.documentId,
    document: chunk.source,
    page: chunk.pageNumbers[0] ?? 0
  };
}

async function fetchChunk(source: ChunkSource, chunkId: string): Promise<Chunk | undefined> {
  try {
    const chunk = await source.getChunk(chunkId);
    if (!chunk) {
      logger.warn(`Chunk ${chunkId} not found; skipping`);
    }
    return chunk;
  } catch (error) {
    logger.warn(`Failed to fetch chunk ${chunkId}; skipping`, error);
    return undefined;
  }
}

export async function assembleContext(
  results: RetrievalResult[],
  source: ChunkSource,
  config: ContextConfig
): Promise<AssembledContext> {
  validateContextConfig(config);

  const items: ContextItem[] = [];
  let totalSize = 0;

  for (const result of results) {
    const chunk = await fetchChunk(source, result.chunkId);
    if (!chunk) {
      continue;
    }

    if (items.some(item => item.chunk.id === chunk.id)) {
      continue;
    }

    // Results arrive best-first, so whatever is already included is the higher-scored copy
    const duplicateOf = items.find(item => overlapRatio(item.chunk, chunk) > config.dedupOverlapThreshold);
    if (duplicateOf) {
      logger.debug(`Skipping ${chunk.id}: overlaps ${duplicateOf.chunk.id}`);
      continue;
    }

    if (totalSize + chunk.text.length > config.budget) {
      logger.debug(`Skipping ${chunk.id}: ${chunk.text.length} chars would exceed budget ${config.budget}`);
      continue;
    }

    items.push({ chunk, score: result.score, rank: result.rank });
    totalSize += chunk.text.length;
  }

  logger.info(`Assembled context: ${items.length}/${results.length} chunks, ${totalSize}/${config.budget} chars`);

  return {
    items,
    citations: items.map(item => citationFor(item.chunk)),
    totalSize,
    budget: config.budget,
    topScore: results.length > 0 ? Math.max(...results.map(r => r.score)) : null,
    isEmpty: items.length === 0
  };
}
