import { DebateContext, DebateTurnRequest, HistoryEntry } from '../domain/types';
import { TextGenerationRequest } from '../llm/llm.types';

const PIDGIN_RULES = `Speak in Nigerian Pidgin English.
Be sharp, funny, witty and aggressive but playful.
Keep it short (max 2 sentences).`;

const DEFAULT_PERSONA = 'a witty Nigerian debater who always takes the opposite side of whatever the user says';

/** Keeps the most recent `maxEntries` entries; the oldest are dropped first. */
export function truncateHistory(history: readonly HistoryEntry[], maxEntries: number): readonly HistoryEntry[] {
  if (maxEntries <= 0) {
    return [];
  }
  return history.length > maxEntries ? history.slice(history.length - maxEntries) : history;
}

export function formatHistory(history: readonly HistoryEntry[]): string {
  if (!history.length) {
    return 'None yet';
  }
  return history.map((entry) => `${entry.speaker}: ${entry.text}`).join('\n');
}

export function buildRebuttalPrompt(request: DebateTurnRequest): TextGenerationRequest {
  const persona = request.context
    ? `${request.context.aiCharacter}, debating against ${request.context.opponent}`
    : DEFAULT_PERSONA;
  return {
    systemPrompt: `You are ${persona}.
${PIDGIN_RULES}
Defend your side and answer the last point directly. Reply with the rebuttal only, no speaker label.`,
    prompt: `Current conversation history:
${formatHistory(request.conversationHistory)}

User just said: "${request.speakerUtterance}"`,
  };
}

export function buildOpeningPrompt(context: DebateContext): TextGenerationRequest {
  return {
    systemPrompt: `You are ${context.aiCharacter} in a debate against ${context.opponent}.
The topic is: Who is better?
${PIDGIN_RULES}`,
    prompt: 'Start the debate now.',
  };
}

export function buildJudgePrompt(char1: string, char2: string, history: readonly HistoryEntry[]): TextGenerationRequest {
  return {
    systemPrompt: 'You are an impartial debate judge. Reply with just the winner\'s name, nothing else.',
    prompt: `Judge this debate between ${char1} and ${char2}.
History:
${formatHistory(history)}

Who won based on intelligence, wit, and points?`,
    temperature: 0.2,
    maxTokens: 20,
  };
}

/**
 * Maps the judge's free-text answer onto one of the two debaters when it
 * names exactly one of them.
 */
export function resolveWinner(verdict: string, char1: string, char2: string): string {
  const cleaned = verdict.trim().replace(/^["'*\s]+|["'.!*\s]+$/g, '');
  const lower = cleaned.toLowerCase();
  const names1 = lower.includes(char1.toLowerCase());
  const names2 = lower.includes(char2.toLowerCase());
  if (names1 && !names2) {
    return char1;
  }
  if (names2 && !names1) {
    return char2;
  }
  return cleaned;
}
