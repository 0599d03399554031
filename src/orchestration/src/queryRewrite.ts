/**
 * Query rewriting before retrieval
 */

import { Generator } from './generator';
import { Dispatcher } from './dispatcher';
import { CancelledError, TimeoutError } from './errors';
import { buildRewritePrompt } from './prompts';
import { logger } from './logger';

export const MAX_REWRITE_LENGTH = 200;

export interface RewriteOptions {
  dispatcher: Dispatcher;
  maxTokens: number;
  temperature: number;
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Ask the generator for a retrieval-friendly version of the question.
 * Falls back to the original question when the rewrite is unusable or fails.
 */
export async function rewriteQuery(
  question: string,
  generator: Generator,
  options: RewriteOptions
): Promise<string> {
  try {
    const rewritten = await options.dispatcher.run(
      signal => generator.generate(buildRewritePrompt(question), {
        maxTokens: options.maxTokens,
        temperature: options.temperature,
        signal
      }),
      { signal: options.signal, timeoutMs: options.timeoutMs, label: 'query rewrite' }
    );

    const candidate = rewritten.trim();
    if (!candidate || candidate.length > MAX_REWRITE_LENGTH) {
      logger.debug('Rewrite unusable; keeping original question');
      return question;
    }

    logger.debug(`Query rewritten: "${question}" -> "${candidate}"`);
    return candidate;
  } catch (error) {
    if (error instanceof CancelledError) {
      throw error;
    }

    logger.warn(
      error instanceof TimeoutError ? 'Query rewrite timed out; using original question' : 'Query rewrite failed; using original question',
      error
    );
    return question;
  }
}
