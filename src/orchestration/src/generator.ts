/**
 * Generator module
 * Black-box text generation behind a small interface; the default backend is Groq
 */

import Groq from 'groq-sdk';
import { GroqConfig } from './types';
import { CancelledError, ConfigError, GenerationError, RagError, TimeoutError } from './errors';
import { logger } from './logger';

export interface GenerateOptions {
  maxTokens: number;
  temperature: number;
  signal?: AbortSignal;
}

export interface Generator {
  generate(prompt: string, options: GenerateOptions): Promise<string>;
}

export class GroqGenerator implements Generator {
  private client: Groq | null = null;

  constructor(private readonly config: GroqConfig) {}

  // Created on first use so commands that never generate need no API key
  private getClient(): Groq {
    if (!this.config.apiKey) {
      throw new ConfigError('GROQ_API_KEY', 'is required for answer generation');
    }
    if (!this.client) {
      // Retries belong to the caller, not to the core
      this.client = new Groq({ apiKey: this.config.apiKey, maxRetries: 0, timeout: this.config.timeoutMs });
    }
    return this.client;
  }

  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    const { signal } = options;
    const client = this.getClient();

    try {
      const response = await client.chat.completions.create(
        {
          model: this.config.model,
          messages: [{ role: 'user', content: prompt }],
          temperature: options.temperature,
          max_tokens: options.maxTokens
        },
        { signal }
      );

      const content = response.choices[0]?.message?.content;
      if (typeof content !== 'string' || content.trim().length === 0) {
        throw new GenerationError('Generation service returned an empty response');
      }

      logger.debug(`Generated ${content.length} characters with ${this.config.model}`);
      return content;
    } catch (error) {
      if (error instanceof RagError) {
        throw error;
      }
      if (signal?.aborted) {
        throw signal.reason instanceof RagError ? signal.reason : new CancelledError('generation');
      }
      if (error instanceof Groq.APIConnectionTimeoutError) {
        throw new TimeoutError('generation', this.config.timeoutMs);
      }
      if (error instanceof Groq.APIError) {
        logger.error(`Groq API error (${error.status ?? 'no status'})`, error.message);
        throw new GenerationError(`Generation failed: ${error.message}`, error.status, error);
      }

      const message = error instanceof Error ? error.message : String(error);
      logger.error('Unexpected generation error', error);
      throw new GenerationError(`Generation failed: ${message}`, undefined, error);
    }
  }
}
