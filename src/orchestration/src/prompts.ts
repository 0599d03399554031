/**
 * Prompt templates for grounded answering and query rewriting
 */

import { AssembledContext, ConversationTurn } from './types';

export const REFUSAL_MESSAGE = "I don't know based on the provided documents.";

export const SYSTEM_PROMPT = `You are a document assistant.

STRICT RULES:
- Answer using ONLY the provided context.
- Every factual statement MUST be supported by a citation.
- Citations must refer to the source identifiers shown in the context.
- If the context is empty OR the answer is not explicitly stated in the context,
  respond with exactly: "${REFUSAL_MESSAGE}"
- Do NOT use prior knowledge or assumptions.
- Do NOT guess, speculate, or infer.
- Do NOT ask the user for more information.

CITATION FORMAT:
- Put the source identifier in square brackets, for example [source: contract.pdf#3]
- If multiple sources support a statement, cite each of them.

If you cannot cite a statement, you must not include it.`;

export function renderContext(context: AssembledContext): string {
  return context.items
    .map(({ chunk }) => {
      const pages = chunk.pageNumbers.join(', ');
      return `[source: ${chunk.id}] (${chunk.source}, page ${pages})\n${chunk.text.trim()}`;
    })
    .join('\n\n---\n\n');
}

function renderHistory(history: ConversationTurn[]): string {
  return history
    .map(turn => `${turn.role === 'user' ? 'User' : 'Assistant'}: ${turn.content}`)
    .join('\n');
}

export function buildAnswerPrompt(
  question: string,
  context: AssembledContext,
  history: ConversationTurn[] = []
): string {
  const previous = history.length > 0
    ? `\nPrevious conversation (for reference only, not a source):\n${renderHistory(history)}\n`
    : '';

  return `${SYSTEM_PROMPT}

Context (with sources):
${renderContext(context)}
${previous}
Question:
${question}

Answer (with citations):`;
}

export function buildRewritePrompt(question: string): string {
  return `You are a query rewriting assistant for document retrieval.

TASK:
Rewrite the user question to maximize retrieval from the indexed documents.

RULES:
- Preserve the original intent exactly
- Use clear, explicit language
- Expand vague references
- Do NOT answer the question
- Do NOT add new facts
- Output ONLY the rewritten query

Original question:
${question}

Rewritten query:`;
}
