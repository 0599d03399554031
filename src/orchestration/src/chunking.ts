/**
 * Chunking module
 * Splits page-ordered document text into fixed-size, overlapping chunks:
 * - every chunk is at most maxChunkSize characters
 * - consecutive chunks share exactly `overlap` characters
 * - cuts prefer a paragraph, then sentence, then word boundary near the size limit
 */

import { Chunk, ChunkingConfig, Document } from './types';
import { ConfigError } from './errors';
import { logger } from './logger';

export const PAGE_SEPARATOR = '\n\n';

interface PageSpan {
  pageNumber: number;
  start: number;
  end: number;
}

export interface JoinedText {
  text: string;
  spans: PageSpan[];
}

/**
 * Join non-blank pages into one text, remembering where each page lives
 */
export function joinPages(document: Document): JoinedText {
  const spans: PageSpan[] = [];
  let text = '';

  for (const page of document.pages) {
    if (page.text.trim().length === 0) {
      continue;
    }

    if (text.length > 0) {
      text += PAGE_SEPARATOR;
    }

    spans.push({ pageNumber: page.pageNumber, start: text.length, end: text.length + page.text.length });
    text += page.text;
  }

  return { text, spans };
}

export function validateChunkingConfig(config: ChunkingConfig): void {
  const { maxChunkSize, overlap, boundaryTolerance } = config;

  if (!Number.isInteger(maxChunkSize) || maxChunkSize <= 0) {
    throw new ConfigError('maxChunkSize', `must be a positive integer, got ${maxChunkSize}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new ConfigError('overlap', `must be a non-negative integer, got ${overlap}`);
  }
  if (overlap >= maxChunkSize) {
    throw new ConfigError('overlap', `must be smaller than maxChunkSize (${overlap} >= ${maxChunkSize})`);
  }
  if (!Number.isInteger(boundaryTolerance) || boundaryTolerance < 0) {
    throw new ConfigError('boundaryTolerance', `must be a non-negative integer, got ${boundaryTolerance}`);
  }
}

// Ordered by preference: a paragraph break beats a sentence end beats any whitespace
const BREAK_PATTERNS: RegExp[] = [/\n\s*\n/g, /[.!?]["')\]]?\s/g, /\s/g];

/**
 * Find the cut position for a chunk ending at or before `hardEnd`.
 * Returns the offset just after the last preferred break inside [minEnd, hardEnd].
 */
function findBoundary(text: string, minEnd: number, hardEnd: number): number {
  if (minEnd >= hardEnd) {
    return hardEnd;
  }

  const window = text.slice(minEnd, hardEnd);

  for (const pattern of BREAK_PATTERNS) {
    let best = -1;
    pattern.lastIndex = 0;

    let match: RegExpExecArray | null;
    while ((match = pattern.exec(window)) !== null) {
      best = match.index + match[0].length;
    }

    if (best > 0) {
      return minEnd + best;
    }
  }

  return hardEnd;
}

function pagesInRange(spans: PageSpan[], start: number, end: number): number[] {
  const pages = spans
    .filter(span => span.start < end && start < span.end)
    .map(span => span.pageNumber);

  if (pages.length > 0) {
    return pages;
  }

  // A chunk made only of a page separator belongs to the page before it
  const previous = spans.filter(span => span.end <= start).pop();
  return previous ? [previous.pageNumber] : [];
}

export function chunkIdFor(documentId: string, sequence: number): string {
  return `${documentId}#${sequence}`;
}

/**
 * Lazily produce the chunks of a document in order
 */
export function* iterateChunks(document: Document, config: ChunkingConfig): Generator<Chunk> {
  validateChunkingConfig(config);

  const { maxChunkSize, overlap } = config;
  // Every chunk must be longer than the overlap or the cursor would not advance
  const tolerance = Math.min(config.boundaryTolerance, maxChunkSize - overlap - 1);
  const { text, spans } = joinPages(document);

  let start = 0;
  let sequence = 0;

  while (start < text.length) {
    const hardEnd = start + maxChunkSize;
    const end = hardEnd >= text.length
      ? text.length
      : findBoundary(text, hardEnd - tolerance, hardEnd);

    yield {
      id: chunkIdFor(document.id, sequence),
      documentId: document.id,
      source: document.source,
      sequence,
      text: text.slice(start, end),
      startOffset: start,
      endOffset: end,
      pageNumbers: pagesInRange(spans, start, end)
    };

    if (end >= text.length) {
      return;
    }

    start = end - overlap;
    sequence++;
  }
}

/**
 * Chunk a whole document
 */
export function chunkDocument(document: Document, config: ChunkingConfig): Chunk[] {
  logger.debug(
    `Chunking ${document.id}: max=${config.maxChunkSize}, overlap=${config.overlap}, tolerance=${config.boundaryTolerance}`
  );

  const chunks = Array.from(iterateChunks(document, config));

  if (chunks.length === 0) {
    logger.warn(`Document ${document.id} has no text; no chunks created`);
  } else {
    logger.debug(`Created ${chunks.length} chunks for ${document.id}`);
  }

  return chunks;
}
