/**
 * Public API of the grounded document QA library
 */

export * from './types';
export * from './errors';
export { Logger, LogLevel, createLogger, logger } from './logger';
export { loadConfig, RagConfig } from './config';
export { chunkDocument, iterateChunks, chunkIdFor, joinPages } from './chunking';
export { Dispatcher, DispatchOptions, DispatchTask } from './dispatcher';
export {
  EmbeddingGateway,
  HttpEmbeddingGateway,
  HashingEmbeddingGateway,
  embedInBatches
} from './embeddings';
export { VectorIndex, VectorIndexOptions, PersistedIndex, cosineSimilarity } from './vectorStore';
export { Retriever } from './retriever';
export { assembleContext } from './contextAssembler';
export { Generator, GroqGenerator, GenerateOptions } from './generator';
export { GroundingPolicy, verifyCitations, computeConfidence } from './groundingPolicy';
export { REFUSAL_MESSAGE } from './prompts';
export { rewriteQuery } from './queryRewrite';
export { DocumentQA, AskOptions, IngestOptions, PipelineSettings } from './pipeline';
export { HttpPdfExtractor, PdfTextExtractor } from './pdfExtractor';
export { createRuntime, Runtime } from './bootstrap';
