/**
 * Unit tests for query rewriting
 */

import { rewriteQuery, MAX_REWRITE_LENGTH } from '../src/queryRewrite';
import { Dispatcher } from '../src/dispatcher';
import { CancelledError, GenerationError } from '../src/errors';
import { buildRewritePrompt } from '../src/prompts';

describe('Query Rewrite Module', () => {
  const question = 'how much leave?';
  const llmSettings = { maxTokens: 256, temperature: 0.1 };
  let dispatcher: Dispatcher;
  let generate: jest.Mock;

  beforeEach(() => {
    dispatcher = new Dispatcher(1);
    generate = jest.fn();
  });

  it('should return the trimmed rewrite using the configured generation settings', async () => {
    generate.mockResolvedValue('  How many days of annual leave do employees receive?\n');

    const result = await rewriteQuery(question, { generate }, { dispatcher, ...llmSettings });

    expect(result).toBe('How many days of annual leave do employees receive?');
    expect(generate).toHaveBeenCalledWith(
      buildRewritePrompt(question),
      expect.objectContaining({ maxTokens: 256, temperature: 0.1 })
    );
  });

  it('should keep the original question when the rewrite is empty', async () => {
    generate.mockResolvedValue('   ');

    await expect(rewriteQuery(question, { generate }, { dispatcher, ...llmSettings })).resolves.toBe(question);
  });

  it('should keep the original question when the rewrite is too long', async () => {
    generate.mockResolvedValue('w'.repeat(MAX_REWRITE_LENGTH + 1));

    await expect(rewriteQuery(question, { generate }, { dispatcher, ...llmSettings })).resolves.toBe(question);
  });

  it('should keep the original question when generation fails', async () => {
    generate.mockRejectedValue(new GenerationError('service unavailable', 503));

    await expect(rewriteQuery(question, { generate }, { dispatcher, ...llmSettings })).resolves.toBe(question);
  });

  it('should keep the original question when the rewrite times out', async () => {
    generate.mockImplementation(() => new Promise<string>(() => undefined));

    await expect(rewriteQuery(question, { generate }, { dispatcher, ...llmSettings, timeoutMs: 20 })).resolves.toBe(question);
  });

  it('should propagate cancellation', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(rewriteQuery(question, { generate }, { dispatcher, ...llmSettings, signal: controller.signal }))
      .rejects.toThrow(CancelledError);
    expect(generate).not.toHaveBeenCalled();
  });
});
