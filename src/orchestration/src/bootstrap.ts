/**
 * Wires configured collaborators into a DocumentQA instance.
 * The index is opened here (load-or-create) and must be closed by the caller.
 */

import { RagConfig } from './config';
import { Dispatcher } from './dispatcher';
import { EmbeddingGateway, HashingEmbeddingGateway, HttpEmbeddingGateway } from './embeddings';
import { Generator, GroqGenerator } from './generator';
import { DocumentQA } from './pipeline';
import { VectorIndex } from './vectorStore';

export interface Runtime {
  qa: DocumentQA;
  index: VectorIndex;
  close(): Promise<void>;
}

export function createEmbeddingGateway(config: RagConfig): EmbeddingGateway {
  return config.embedding.provider === 'hashing'
    ? new HashingEmbeddingGateway(config.embedding.dimension)
    : new HttpEmbeddingGateway(config.embedding);
}

export function createGenerator(config: RagConfig): Generator {
  return new GroqGenerator(config.groq);
}

export async function createRuntime(
  config: RagConfig,
  overrides: { generator?: Generator; embeddings?: EmbeddingGateway } = {}
): Promise<Runtime> {
  const index = await VectorIndex.open({
    dimension: config.embedding.dimension,
    metric: config.index.metric,
    path: config.index.path
  });

  const qa = new DocumentQA(
    {
      index,
      embeddings: overrides.embeddings ?? createEmbeddingGateway(config),
      generator: overrides.generator ?? createGenerator(config),
      dispatcher: new Dispatcher(config.concurrency)
    },
    config.pipeline
  );

  return {
    qa,
    index,
    close: () => index.close()
  };
}
