/**
 * Configuration
 * Typed settings read from environment variables, with defaults
 */

import { CitationMode, DistanceMetric, EmbeddingConfig, GroqConfig } from './types';
import { ConfigError } from './errors';
import { validateChunkingConfig } from './chunking';
import { validateContextConfig } from './contextAssembler';
import { validateGroundingConfig } from './groundingPolicy';
import { PipelineSettings } from './pipeline';

export interface RagConfig {
  pipeline: PipelineSettings;
  embedding: EmbeddingConfig;
  groq: GroqConfig;
  index: {
    path: string;
    metric: DistanceMetric;
  };
  extraction: {
    apiUrl: string;
    timeoutMs: number;
  };
  concurrency: number;
}

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string, fallback: string): string {
  const value = env[name]?.trim();
  return value ? value : fallback;
}

function readNumber(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(name, `expected a number, got "${raw}"`);
  }
  return value;
}

function readInteger(env: Env, name: string, fallback: number, min: number): number {
  const value = readNumber(env, name, fallback);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(name, `expected an integer >= ${min}, got ${value}`);
  }
  return value;
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) {
    return fallback;
  }
  if (['1', 'true', 'yes', 'on'].includes(raw)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(raw)) {
    return false;
  }
  throw new ConfigError(name, `expected a boolean, got "${raw}"`);
}

function readChoice<T extends string>(env: Env, name: string, choices: readonly T[], fallback: T): T {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }

  const match = choices.find(choice => choice === raw);
  if (!match) {
    throw new ConfigError(name, `expected one of ${choices.join(', ')}, got "${raw}"`);
  }
  return match;
}

const CITATION_MODES: readonly CitationMode[] = ['strict', 'lenient'];
const METRICS: readonly DistanceMetric[] = ['cosine', 'inner_product'];
const EMBEDDING_PROVIDERS: readonly EmbeddingConfig['provider'][] = ['http', 'hashing'];

/**
 * Build the configuration from environment variables
 */
export function loadConfig(env: Env = process.env): RagConfig {
  const generationTimeoutMs = readInteger(env, 'GENERATION_TIMEOUT_MS', 30000, 1);
  const embeddingTimeoutMs = readInteger(env, 'EMBEDDING_TIMEOUT_MS', 15000, 1);

  const pipeline: PipelineSettings = {
    chunking: {
      maxChunkSize: readInteger(env, 'RAG_CHUNK_SIZE', 1200, 1),
      overlap: readInteger(env, 'RAG_CHUNK_OVERLAP', 200, 0),
      boundaryTolerance: readInteger(env, 'RAG_CHUNK_BOUNDARY_TOLERANCE', 120, 0)
    },
    embeddingBatchSize: readInteger(env, 'EMBEDDING_BATCH_SIZE', 64, 1),
    embeddingTimeoutMs,
    retrieval: {
      topK: readInteger(env, 'RAG_TOP_K', 4, 1),
      minScore: readNumber(env, 'RAG_MIN_SCORE', 0.35)
    },
    context: {
      budget: readInteger(env, 'RAG_CONTEXT_BUDGET', 6000, 1),
      dedupOverlapThreshold: readNumber(env, 'RAG_DEDUP_OVERLAP', 0.5)
    },
    grounding: {
      confidenceFloor: readNumber(env, 'RAG_CONFIDENCE_FLOOR', 0.3),
      citationMode: readChoice(env, 'RAG_CITATION_MODE', CITATION_MODES, 'strict'),
      maxTokens: readInteger(env, 'GROQ_MAX_TOKENS', 256, 1),
      temperature: readNumber(env, 'GROQ_TEMPERATURE', 0.1),
      timeoutMs: generationTimeoutMs
    },
    rewriteQuery: readBoolean(env, 'RAG_REWRITE_QUERY', false)
  };

  validateChunkingConfig(pipeline.chunking);
  validateContextConfig(pipeline.context);
  validateGroundingConfig(pipeline.grounding);

  const metric = readChoice(env, 'RAG_INDEX_METRIC', METRICS, 'cosine');
  const { minScore } = pipeline.retrieval;
  if (metric === 'cosine' && !(minScore >= 0 && minScore <= 1)) {
    throw new ConfigError('RAG_MIN_SCORE', `expected a value between 0 and 1, got ${minScore}`);
  }

  const embedding: EmbeddingConfig = {
    provider: readChoice(env, 'EMBEDDING_PROVIDER', EMBEDDING_PROVIDERS, 'http'),
    apiUrl: readString(env, 'EMBEDDING_API_URL', 'https://api.openai.com/v1'),
    apiKey: env.EMBEDDING_API_KEY || env.OPENAI_API_KEY || undefined,
    model: readString(env, 'EMBEDDING_MODEL', 'text-embedding-3-small'),
    dimension: readInteger(env, 'EMBEDDING_DIMENSION', 1536, 1),
    timeoutMs: embeddingTimeoutMs
  };

  const groq: GroqConfig = {
    apiKey: env.GROQ_API_KEY ?? '',
    model: readString(env, 'GROQ_MODEL', 'llama-3.1-8b-instant'),
    timeoutMs: generationTimeoutMs
  };

  return {
    pipeline,
    embedding,
    groq,
    index: {
      path: readString(env, 'RAG_INDEX_PATH', './storage/vector-index.json'),
      metric
    },
    extraction: {
      apiUrl: readString(env, 'EXTRACTION_API_URL', 'http://localhost:8000'),
      timeoutMs: readInteger(env, 'EXTRACTION_TIMEOUT_MS', 120000, 1)
    },
    concurrency: readInteger(env, 'RAG_CONCURRENCY', 4, 1)
  };
}
