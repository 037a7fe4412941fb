import { RetrievedContext } from '../services/knowledge/types';

export interface ChatTurn {
  role: 'user' | 'assistant';
  content: string;
}

export interface PromptInput {
  query: string;
  context: RetrievedContext;
  history?: ChatTurn[];
}

export const INSTRUCTIONS = [
  'You are a helpful assistant that answers questions using a knowledge base.',
  'Base your answer on the numbered excerpts below and cite the excerpt numbers you use, e.g. [1].',
  'If the excerpts do not contain the answer, say that the knowledge base does not cover it instead of guessing.',
].join('\n');

export const NO_CONTEXT_NOTICE =
  'No relevant context was found in the knowledge base for this question. ' +
  'Tell the user that you could not find the answer in the knowledge base; do not invent one.';

function formatHistory(history: ChatTurn[]): string {
  return history
    .map((turn) => `${turn.role === 'user' ? 'User' : 'Assistant'}: ${turn.content}`)
    .join('\n');
}

function formatContext(context: RetrievedContext): string {
  if (context.length === 0) return NO_CONTEXT_NOTICE;
  return context
    .map((passage, i) =>
      `[${i + 1}] (source: ${passage.source}, offset ${passage.offset}, score ${passage.score.toFixed(3)})\n${passage.text}`
    )
    .join('\n\n');
}

/** Builds the generation prompt; `context` must already be in descending-score order. */
export function composePrompt({ query, context, history = [] }: PromptInput): string {
  const sections = [INSTRUCTIONS];
  if (history.length > 0) {
    sections.push(`Conversation so far:\n${formatHistory(history)}`);
  }
  sections.push(`Knowledge base context:\n${formatContext(context)}`);
  sections.push(`User: ${query}\nAssistant:`);
  return sections.join('\n\n');
}
