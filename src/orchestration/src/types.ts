/**
 * Type definitions for the grounded document QA system
 */

export interface Page {
  pageNumber: number;
  text: string;
}

export interface Document {
  id: string;
  source: string;
  pages: readonly Page[];
}

export interface Chunk {
  readonly id: string;
  readonly documentId: string;
  readonly source: string;
  readonly sequence: number;
  readonly text: string;
  readonly startOffset: number;
  readonly endOffset: number;
  readonly pageNumbers: readonly number[];
  readonly embedding?: readonly number[];
}

export interface ChunkMetadata {
  documentId: string;
  source: string;
  sequence: number;
  pageNumbers: number[];
  startOffset: number;
  endOffset: number;
  text: string;
  contentHash: string;
}

export interface IndexEntry {
  chunkId: string;
  vector: readonly number[];
  metadata: ChunkMetadata;
}

export type DistanceMetric = 'cosine' | 'inner_product';

export interface RetrievalResult {
  chunkId: string;
  score: number;
  rank: number;
}

export interface Citation {
  chunkId: string;
  documentId: string;
  document: string;
  page: number;
}

export interface ContextItem {
  chunk: Chunk;
  score: number;
  rank: number;
}

export interface AssembledContext {
  items: ContextItem[];
  citations: Citation[];
  totalSize: number;
  budget: number;
  topScore: number | null;
  isEmpty: boolean;
}

export type RefusalReason =
  | 'EMPTY_CONTEXT'
  | 'LOW_CONFIDENCE'
  | 'NO_VERIFIABLE_CITATIONS'
  | 'MODEL_DECLINED';

export interface Answer {
  text: string;
  citations: Citation[];
  refused: boolean;
  refusalReason?: RefusalReason;
  confidence: number;
}

export interface ConversationTurn {
  role: 'user' | 'assistant';
  content: string;
}

export interface ChunkSource {
  getChunk(chunkId: string): Promise<Chunk | undefined>;
}

export interface IndexedDocument {
  documentId: string;
  source: string;
  chunkCount: number;
}

export interface IngestResult {
  chunksCreated: number;
  chunkIds: string[];
  skipped: boolean;
}

export interface AskResult {
  answer: string;
  citations: Array<{ document: string; page: number; chunkId: string }>;
  refused: boolean;
  confidence: number;
  refusalReason?: RefusalReason;
}

export interface ChunkingConfig {
  maxChunkSize: number;
  overlap: number;
  boundaryTolerance: number;
}

export interface ContextConfig {
  budget: number;
  dedupOverlapThreshold: number;
}

export type CitationMode = 'strict' | 'lenient';

export interface GroundingConfig {
  confidenceFloor: number;
  citationMode: CitationMode;
  maxTokens: number;
  temperature: number;
  timeoutMs?: number;
}

export interface GroqConfig {
  apiKey: string;
  model: string;
  timeoutMs: number;
}

export interface EmbeddingConfig {
  provider: 'http' | 'hashing';
  apiUrl: string;
  apiKey?: string;
  model: string;
  dimension: number;
  timeoutMs: number;
}
