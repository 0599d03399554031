/**
 * Grounding policy
 * Decides between ANSWER and REFUSE, invokes the generator only with assembled
 * context and verifies every citation in the output against that context.
 */

import { Answer, AssembledContext, Citation, ConversationTurn, GroundingConfig, RefusalReason } from './types';
import { CancelledError, ConfigError } from './errors';
import { Generator } from './generator';
import { Dispatcher } from './dispatcher';
import { buildAnswerPrompt, REFUSAL_MESSAGE } from './prompts';
import { logger } from './logger';

const CITATION_PATTERN = /(\s*)\[source:\s*([^\]]*)\]/gi;

export interface GroundingOptions {
  history?: ConversationTurn[];
  signal?: AbortSignal;
}

export interface CitationCheck {
  text: string;
  verified: string[];
  unverified: string[];
}

export function validateGroundingConfig(config: GroundingConfig): void {
  if (!Number.isFinite(config.confidenceFloor)) {
    throw new ConfigError('confidenceFloor', `must be a finite number, got ${config.confidenceFloor}`);
  }
  if (config.citationMode !== 'strict' && config.citationMode !== 'lenient') {
    throw new ConfigError('citationMode', `must be "strict" or "lenient", got ${String(config.citationMode)}`);
  }
  if (!Number.isInteger(config.maxTokens) || config.maxTokens < 1) {
    throw new ConfigError('maxTokens', `must be a positive integer, got ${config.maxTokens}`);
  }
  if (!(config.temperature >= 0 && config.temperature <= 2)) {
    throw new ConfigError('temperature', `must be between 0 and 2, got ${config.temperature}`);
  }
}

function splitIdentifiers(inner: string): string[] {
  return inner
    .split(/[,;]/)
    .map(part => part.trim().replace(/^source:\s*/i, ''))
    .filter(part => part.length > 0);
}

/**
 * Keep citation markers that point into the context and strip the rest.
 * Verified ids come back unique, in order of first appearance.
 */
export function verifyCitations(text: string, knownIds: ReadonlySet<string>): CitationCheck {
  const verified: string[] = [];
  const unverified: string[] = [];

  const cleaned = text.replace(CITATION_PATTERN, (_match, lead: string, inner: string) => {
    const ids = splitIdentifiers(inner);
    const kept = ids.filter(id => knownIds.has(id));

    for (const id of ids) {
      const bucket = knownIds.has(id) ? verified : unverified;
      if (!bucket.includes(id)) {
        bucket.push(id);
      }
    }

    return kept.length > 0 ? `${lead}[source: ${kept.join(', ')}]` : '';
  });

  return { text: cleaned.trim(), verified, unverified };
}

/**
 * Mean retrieval score of the included chunks, clamped to [0, 1]
 */
export function computeConfidence(context: AssembledContext): number {
  if (context.items.length === 0) {
    return 0;
  }

  const mean = context.items.reduce((sum, item) => sum + item.score, 0) / context.items.length;
  return Math.round(Math.min(Math.max(mean, 0), 1) * 1000) / 1000;
}

export function refusal(reason: RefusalReason): Answer {
  return { text: REFUSAL_MESSAGE, citations: [], refused: true, refusalReason: reason, confidence: 0 };
}

function normalizeQuotes(text: string): string {
  return text.replace(/[‘’]/g, "'");
}

export class GroundingPolicy {
  constructor(
    private readonly generator: Generator,
    private readonly dispatcher: Dispatcher,
    private readonly config: GroundingConfig
  ) {
    validateGroundingConfig(config);
  }

  /**
   * Refusal reason decided before generation, or null when generation may proceed
   */
  preflight(context: AssembledContext): RefusalReason | null {
    if (context.isEmpty) {
      return 'EMPTY_CONTEXT';
    }
    if (context.topScore === null || context.topScore < this.config.confidenceFloor) {
      return 'LOW_CONFIDENCE';
    }
    return null;
  }

  async answer(question: string, context: AssembledContext, options: GroundingOptions = {}): Promise<Answer> {
    const blocked = this.preflight(context);
    if (blocked) {
      logger.info(`Refusing before generation: ${blocked}`);
      return refusal(blocked);
    }

    if (options.signal?.aborted) {
      throw new CancelledError('generation');
    }

    const prompt = buildAnswerPrompt(question, context, options.history);
    const output = await this.dispatcher.run(
      signal => this.generator.generate(prompt, {
        maxTokens: this.config.maxTokens,
        temperature: this.config.temperature,
        signal
      }),
      { signal: options.signal, timeoutMs: this.config.timeoutMs, label: 'generation' }
    );

    const byChunk = new Map<string, Citation>(context.citations.map(c => [c.chunkId, c]));
    const check = verifyCitations(output, new Set(byChunk.keys()));

    if (check.unverified.length > 0) {
      logger.warn(`Stripped ${check.unverified.length} unverifiable citations`, check.unverified);
    }

    if (check.verified.length === 0) {
      const declined = normalizeQuotes(check.text).includes(REFUSAL_MESSAGE);
      if (declined) {
        return refusal('MODEL_DECLINED');
      }
      if (this.config.citationMode === 'strict' || check.text.length === 0) {
        return refusal('NO_VERIFIABLE_CITATIONS');
      }

      logger.warn('Answer carries no verifiable citations (lenient mode)');
      return { text: check.text, citations: [], refused: false, confidence: computeConfidence(context) };
    }

    const citations = check.verified.flatMap(id => {
      const citation = byChunk.get(id);
      return citation ? [citation] : [];
    });

    logger.success(`Answer grounded on ${citations.length} citations`);
    return { text: check.text, citations, refused: false, confidence: computeConfidence(context) };
  }
}
