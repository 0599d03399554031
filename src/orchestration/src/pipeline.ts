/**
 * Document QA pipeline
 * Orchestrates the two entry points:
 * 1. Ingestion: document -> chunks -> batched embeddings -> vector index
 * 2. Query: question -> retrieval -> context assembly -> grounding policy -> answer
 */

import { createHash } from 'crypto';
import {
  AskResult,
  ChunkingConfig,
  ChunkSource,
  ContextConfig,
  ConversationTurn,
  Document,
  GroundingConfig,
  IndexedDocument,
  IndexEntry,
  IngestResult
} from './types';
import { ConfigError } from './errors';
import { chunkDocument, joinPages, validateChunkingConfig } from './chunking';
import { EmbeddingGateway, embedInBatches } from './embeddings';
import { Dispatcher } from './dispatcher';
import { VectorIndex } from './vectorStore';
import { Retriever, validateRetrievalParams } from './retriever';
import { assembleContext, validateContextConfig } from './contextAssembler';
import { GroundingPolicy } from './groundingPolicy';
import { Generator } from './generator';
import { rewriteQuery } from './queryRewrite';
import { logger } from './logger';

const DOCUMENT_ID_PATTERN = /^[A-Za-z0-9._-]+$/;

export interface PipelineSettings {
  chunking: ChunkingConfig;
  embeddingBatchSize: number;
  embeddingTimeoutMs?: number;
  retrieval: { topK: number; minScore: number };
  context: ContextConfig;
  grounding: GroundingConfig;
  rewriteQuery: boolean;
}

export interface PipelineDependencies {
  index: VectorIndex;
  embeddings: EmbeddingGateway;
  generator: Generator;
  dispatcher: Dispatcher;
  chunkSource?: ChunkSource;
}

export interface AskOptions {
  k?: number;
  minScore?: number;
  contextBudget?: number;
  history?: ConversationTurn[];
  signal?: AbortSignal;
}

export interface IngestOptions {
  signal?: AbortSignal;
}

export function contentHash(document: Document): string {
  return createHash('sha256')
    .update(document.source)
    .update('\u0000')
    .update(joinPages(document).text)
    .digest('hex');
}

export function validateDocument(document: Document): void {
  if (!DOCUMENT_ID_PATTERN.test(document.id)) {
    throw new ConfigError('document.id', `"${document.id}" may only contain letters, digits, ".", "_" and "-"`);
  }
  if (document.pages.length === 0) {
    throw new ConfigError('document.pages', `document ${document.id} has no pages`);
  }
}

export class DocumentQA {
  private readonly index: VectorIndex;
  private readonly embeddings: EmbeddingGateway;
  private readonly generator: Generator;
  private readonly dispatcher: Dispatcher;
  private readonly chunkSource: ChunkSource;
  private readonly retriever: Retriever;
  private readonly policy: GroundingPolicy;

  constructor(dependencies: PipelineDependencies, private readonly settings: PipelineSettings) {
    validateChunkingConfig(settings.chunking);
    validateContextConfig(settings.context);

    this.index = dependencies.index;
    this.embeddings = dependencies.embeddings;
    this.generator = dependencies.generator;
    this.dispatcher = dependencies.dispatcher;
    this.chunkSource = dependencies.chunkSource ?? dependencies.index;
    this.retriever = new Retriever(this.embeddings, this.index, this.dispatcher, settings.embeddingTimeoutMs);
    this.policy = new GroundingPolicy(this.generator, this.dispatcher, settings.grounding);
  }

  /**
   * Chunk, embed and index a document. Re-ingesting changed content replaces the
   * previous chunks; unchanged content is skipped.
   */
  async ingest(document: Document, options: IngestOptions = {}): Promise<IngestResult> {
    validateDocument(document);
    logger.section(`Ingesting ${document.source} (${document.id})`);

    const hash = contentHash(document);
    const existing = this.index.chunkIdsForDocument(document.id);
    if (existing.length > 0 && existing.every(id => this.index.get(id)?.metadata.contentHash === hash)) {
      logger.info(`${document.id} unchanged since last ingestion; skipping`);
      return { chunksCreated: 0, chunkIds: existing, skipped: true };
    }

    const chunks = chunkDocument(document, this.settings.chunking);
    const vectors = await embedInBatches(this.embeddings, chunks.map(c => c.text), {
      batchSize: this.settings.embeddingBatchSize,
      dispatcher: this.dispatcher,
      timeoutMs: this.settings.embeddingTimeoutMs,
      signal: options.signal
    });

    const entries: IndexEntry[] = chunks.map((chunk, i) => ({
      chunkId: chunk.id,
      vector: vectors[i],
      metadata: {
        documentId: chunk.documentId,
        source: chunk.source,
        sequence: chunk.sequence,
        pageNumbers: [...chunk.pageNumbers],
        startOffset: chunk.startOffset,
        endOffset: chunk.endOffset,
        text: chunk.text,
        contentHash: hash
      }
    }));

    const { removed } = this.index.replaceDocument(document.id, entries);
    if (removed > 0) {
      logger.info(`Replaced ${removed} previous chunks of ${document.id}`);
    }

    logger.success(`Indexed ${entries.length} chunks for ${document.id}`);
    return { chunksCreated: entries.length, chunkIds: entries.map(e => e.chunkId), skipped: false };
  }

  /**
   * Answer a question from indexed documents, or refuse
   */
  async ask(question: string, options: AskOptions = {}): Promise<AskResult> {
    const k = options.k ?? this.settings.retrieval.topK;
    const minScore = options.minScore ?? this.settings.retrieval.minScore;
    const budget = options.contextBudget ?? this.settings.context.budget;
    const { signal, history } = options;

    logger.section('Answering question');
    logger.info(`Question: "${question}" (k=${k}, minScore=${minScore}, budget=${budget})`);

    if (question.trim().length === 0) {
      throw new ConfigError('question', 'must not be empty');
    }
    validateRetrievalParams(k, minScore, this.index);
    validateContextConfig({ budget, dedupOverlapThreshold: this.settings.context.dedupOverlapThreshold });

    const searchQuery = this.settings.rewriteQuery
      ? await rewriteQuery(question, this.generator, {
        dispatcher: this.dispatcher,
        maxTokens: this.settings.grounding.maxTokens,
        temperature: this.settings.grounding.temperature,
        timeoutMs: this.settings.grounding.timeoutMs,
        signal
      })
      : question;

    const results = await this.retriever.retrieve(searchQuery, k, minScore, { signal });
    const context = await assembleContext(results, this.chunkSource, {
      budget,
      dedupOverlapThreshold: this.settings.context.dedupOverlapThreshold
    });

    const answer = await this.policy.answer(question, context, { history, signal });

    return {
      answer: answer.text,
      citations: answer.citations.map(c => ({ document: c.document, page: c.page, chunkId: c.chunkId })),
      refused: answer.refused,
      confidence: answer.confidence,
      ...(answer.refusalReason ? { refusalReason: answer.refusalReason } : {})
    };
  }

  removeDocument(documentId: string): number {
    const removed = this.index.remove(this.index.chunkIdsForDocument(documentId));
    logger.info(`Removed ${removed} chunks of ${documentId}`);
    return removed;
  }

  listDocuments(): IndexedDocument[] {
    return this.index.listDocuments();
  }

  async persist(): Promise<void> {
    await this.index.persist();
  }
}
