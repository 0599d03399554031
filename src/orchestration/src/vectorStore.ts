/**
 * Vector index module
 * Stores chunk vectors with their metadata and answers nearest-neighbour queries.
 * Every mutation builds a new entry map and swaps it in, so readers and persistence
 * always see a complete snapshot.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import {
  Chunk,
  ChunkMetadata,
  ChunkSource,
  DistanceMetric,
  IndexEntry,
  IndexedDocument,
  RetrievalResult
} from './types';
import { ConfigError, CorruptIndexError, DimensionMismatchError } from './errors';
import { logger } from './logger';

export const INDEX_FORMAT_VERSION = 1;

let temporaryFileCounter = 0;

export interface VectorIndexOptions {
  dimension: number;
  metric?: DistanceMetric;
  path?: string;
}

export interface PersistedIndex {
  version: number;
  dimension: number;
  metric: DistanceMetric;
  entries: IndexEntry[];
}

function dot(vec1: readonly number[], vec2: readonly number[]): number {
  let product = 0;
  for (let i = 0; i < vec1.length; i++) {
    product += vec1[i] * vec2[i];
  }
  return product;
}

function norm(vec: readonly number[]): number {
  return Math.sqrt(dot(vec, vec));
}

/**
 * Cosine similarity; a zero vector is similar to nothing
 */
export function cosineSimilarity(vec1: readonly number[], vec2: readonly number[]): number {
  const denominator = norm(vec1) * norm(vec2);
  return denominator === 0 ? 0 : dot(vec1, vec2) / denominator;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every(item => typeof item === 'number');
}

function isChunkMetadata(value: unknown): value is ChunkMetadata {
  return (
    isRecord(value) &&
    typeof value.documentId === 'string' &&
    typeof value.source === 'string' &&
    typeof value.sequence === 'number' &&
    isNumberArray(value.pageNumbers) &&
    typeof value.startOffset === 'number' &&
    typeof value.endOffset === 'number' &&
    typeof value.text === 'string' &&
    typeof value.contentHash === 'string'
  );
}

function isIndexEntry(value: unknown): value is IndexEntry {
  return (
    isRecord(value) &&
    typeof value.chunkId === 'string' &&
    isNumberArray(value.vector) &&
    isChunkMetadata(value.metadata)
  );
}

export class VectorIndex implements ChunkSource {
  readonly dimension: number;
  readonly metric: DistanceMetric;
  private entries: ReadonlyMap<string, IndexEntry> = new Map();
  private storagePath: string | null;
  private dirty = false;
  // Writes run one after another, in call order
  private pendingWrite: Promise<void> = Promise.resolve();

  constructor(options: VectorIndexOptions) {
    if (!Number.isInteger(options.dimension) || options.dimension < 1) {
      throw new ConfigError('dimension', `must be a positive integer, got ${options.dimension}`);
    }

    this.dimension = options.dimension;
    this.metric = options.metric ?? 'cosine';
    this.storagePath = options.path ?? null;
  }

  /**
   * Load the index at `options.path`, or create an empty one when no file exists yet
   */
  static async open(options: VectorIndexOptions): Promise<VectorIndex> {
    if (!options.path) {
      return new VectorIndex(options);
    }

    try {
      await fs.access(options.path);
    } catch (error) {
      // fs errors are not always instances of this realm's Error, so check the code alone
      if (!(typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT')) {
        throw error;
      }
      logger.info(`No index at ${options.path}; starting empty`);
      return new VectorIndex(options);
    }

    return VectorIndex.load(options.path, options);
  }

  /**
   * Load a persisted index, checking it against the expected dimension and metric
   */
  static async load(filePath: string, expected: VectorIndexOptions): Promise<VectorIndex> {
    const metric = expected.metric ?? 'cosine';
    let parsed: unknown;

    try {
      parsed = JSON.parse(await fs.readFile(filePath, 'utf-8'));
    } catch (error) {
      throw new CorruptIndexError(filePath, 'unreadable or not valid JSON', error);
    }

    if (!isRecord(parsed) || !Array.isArray(parsed.entries)) {
      throw new CorruptIndexError(filePath, 'missing entries');
    }
    if (parsed.version !== INDEX_FORMAT_VERSION) {
      throw new CorruptIndexError(filePath, `unsupported format version ${String(parsed.version)}`);
    }
    if (parsed.dimension !== expected.dimension) {
      throw new CorruptIndexError(
        filePath,
        `stored dimension ${String(parsed.dimension)} does not match configured dimension ${expected.dimension}`
      );
    }
    if (parsed.metric !== metric) {
      throw new CorruptIndexError(
        filePath,
        `stored metric ${String(parsed.metric)} does not match configured metric ${metric}`
      );
    }

    const index = new VectorIndex({ dimension: expected.dimension, metric, path: filePath });
    const entries = new Map<string, IndexEntry>();

    parsed.entries.forEach((entry: unknown, position: number) => {
      if (!isIndexEntry(entry)) {
        throw new CorruptIndexError(filePath, `entry ${position} is malformed`);
      }
      if (entry.vector.length !== expected.dimension) {
        throw new CorruptIndexError(
          filePath,
          `entry ${entry.chunkId} has dimension ${entry.vector.length}, expected ${expected.dimension}`
        );
      }
      entries.set(entry.chunkId, entry);
    });

    index.entries = entries;
    logger.info(`Loaded index from ${filePath}: ${entries.size} entries, dimension ${index.dimension}`);
    return index;
  }

  get size(): number {
    return this.entries.size;
  }

  get path(): string | null {
    return this.storagePath;
  }

  private checkVector(vector: readonly number[], chunkId?: string): void {
    if (vector.length !== this.dimension) {
      throw new DimensionMismatchError(this.dimension, vector.length, chunkId);
    }
    if (!vector.every(Number.isFinite)) {
      throw new ConfigError('vector', `${chunkId ?? 'query vector'} has a non-finite component`);
    }
  }

  private score(query: readonly number[], vector: readonly number[]): number {
    return this.metric === 'cosine' ? cosineSimilarity(query, vector) : dot(query, vector);
  }

  private commit(next: Map<string, IndexEntry>): void {
    this.entries = next;
    this.dirty = true;
  }

  /**
   * Insert or replace entries; nothing changes if any vector is invalid
   */
  insert(entries: IndexEntry[]): void {
    entries.forEach(entry => this.checkVector(entry.vector, entry.chunkId));

    const next = new Map(this.entries);
    for (const entry of entries) {
      next.set(entry.chunkId, { ...entry, vector: [...entry.vector] });
    }

    this.commit(next);
    logger.debug(`Inserted ${entries.length} entries (index size ${next.size})`);
  }

  /**
   * Remove entries; unknown ids are ignored
   */
  remove(chunkIds: string[]): number {
    const next = new Map(this.entries);
    let removed = 0;

    for (const chunkId of chunkIds) {
      if (next.delete(chunkId)) {
        removed++;
      }
    }

    if (removed > 0) {
      this.commit(next);
    }
    return removed;
  }

  /**
   * Drop every chunk of a document and insert its new entries in one swap
   */
  replaceDocument(documentId: string, entries: IndexEntry[]): { removed: number; inserted: number } {
    entries.forEach(entry => this.checkVector(entry.vector, entry.chunkId));

    const next = new Map<string, IndexEntry>();
    let removed = 0;

    for (const [chunkId, entry] of this.entries) {
      if (entry.metadata.documentId === documentId) {
        removed++;
      } else {
        next.set(chunkId, entry);
      }
    }

    for (const entry of entries) {
      next.set(entry.chunkId, { ...entry, vector: [...entry.vector] });
    }

    this.commit(next);
    return { removed, inserted: entries.length };
  }

  /**
   * Up to k entries scoring at least minScore, best first, ties in insertion order
   */
  search(queryVector: readonly number[], k: number, minScore: number): RetrievalResult[] {
    if (!Number.isInteger(k) || k < 1) {
      throw new ConfigError('k', `must be an integer >= 1, got ${k}`);
    }
    this.checkVector(queryVector);

    const scored: Array<{ chunkId: string; score: number }> = [];
    for (const entry of this.entries.values()) {
      const score = this.score(queryVector, entry.vector);
      if (score >= minScore) {
        scored.push({ chunkId: entry.chunkId, score });
      }
    }

    // Array.prototype.sort is stable, which keeps insertion order among equal scores
    scored.sort((a, b) => b.score - a.score);

    return scored.slice(0, k).map(({ chunkId, score }, rank) => ({ chunkId, score, rank }));
  }

  get(chunkId: string): IndexEntry | undefined {
    return this.entries.get(chunkId);
  }

  async getChunk(chunkId: string): Promise<Chunk | undefined> {
    const entry = this.entries.get(chunkId);
    if (!entry) {
      return undefined;
    }

    const { metadata } = entry;
    return {
      id: entry.chunkId,
      documentId: metadata.documentId,
      source: metadata.source,
      sequence: metadata.sequence,
      text: metadata.text,
      startOffset: metadata.startOffset,
      endOffset: metadata.endOffset,
      pageNumbers: metadata.pageNumbers,
      embedding: entry.vector
    };
  }

  chunkIdsForDocument(documentId: string): string[] {
    return Array.from(this.entries.values())
      .filter(entry => entry.metadata.documentId === documentId)
      .sort((a, b) => a.metadata.sequence - b.metadata.sequence)
      .map(entry => entry.chunkId);
  }

  listDocuments(): IndexedDocument[] {
    const documents = new Map<string, IndexedDocument>();

    for (const { metadata } of this.entries.values()) {
      const existing = documents.get(metadata.documentId);
      if (existing) {
        existing.chunkCount++;
      } else {
        documents.set(metadata.documentId, {
          documentId: metadata.documentId,
          source: metadata.source,
          chunkCount: 1
        });
      }
    }

    return Array.from(documents.values());
  }

  toJSON(): PersistedIndex {
    return this.serialize(this.entries);
  }

  private serialize(entries: ReadonlyMap<string, IndexEntry>): PersistedIndex {
    return {
      version: INDEX_FORMAT_VERSION,
      dimension: this.dimension,
      metric: this.metric,
      entries: Array.from(entries.values())
    };
  }

  /**
   * Write the snapshot taken at call time to disk (temporary file + rename).
   * Overlapping calls are queued; changes committed meanwhile stay pending for the next flush.
   */
  async persist(filePath?: string): Promise<void> {
    const target = filePath ?? this.storagePath;
    if (!target) {
      throw new ConfigError('indexPath', 'no path to persist the index to');
    }

    const entries = this.entries;
    const write = this.pendingWrite.then(() => this.write(target, entries));
    // A failed write is reported to its caller and must not block the next one
    this.pendingWrite = write.catch(() => undefined);
    await write;
  }

  private async write(target: string, entries: ReadonlyMap<string, IndexEntry>): Promise<void> {
    const snapshot = this.serialize(entries);
    const temporary = `${target}.${process.pid}.${++temporaryFileCounter}.tmp`;

    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(temporary, JSON.stringify(snapshot), 'utf-8');
    await fs.rename(temporary, target);

    this.storagePath = target;
    if (this.entries === entries) {
      this.dirty = false;
    }
    logger.info(`Persisted ${snapshot.entries.length} entries to ${target}`);
  }

  /**
   * Flush pending changes when the index is backed by a file
   */
  async close(): Promise<void> {
    if (this.storagePath && this.dirty) {
      await this.persist();
    }
  }
}
