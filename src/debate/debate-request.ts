import { DebateTurnRequest, HistoryEntry } from '../domain/types';
import { DebateValidationError } from './debate.errors';

export interface TurnInput {
  utterance: string;
  history: HistoryEntry[];
}

export interface StartDebateInput {
  char1: string;
  char2: string;
  userSide: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireText(body: Record<string, unknown>, field: string): string {
  const value = body[field];
  if (typeof value !== 'string' || !value.trim()) {
    throw new DebateValidationError(`${field} is required and must be a non-empty string`);
  }
  return value.trim();
}

function parseHistory(raw: unknown): HistoryEntry[] {
  if (raw === undefined || raw === null) {
    return [];
  }
  if (!Array.isArray(raw)) {
    throw new DebateValidationError('history must be an array of { speaker, text } entries');
  }
  return raw.map((entry, index) => {
    if (!isRecord(entry) || typeof entry.speaker !== 'string' || typeof entry.text !== 'string') {
      throw new DebateValidationError(`history[${index}] must have string speaker and text fields`);
    }
    return { speaker: entry.speaker.trim(), text: entry.text.trim() };
  });
}

export function parseTurnBody(body: unknown): TurnInput {
  if (!isRecord(body)) {
    throw new DebateValidationError('Request body must be a JSON object');
  }
  return { utterance: requireText(body, 'utterance'), history: parseHistory(body.history) };
}

export function parseSessionTurnBody(body: unknown): string {
  if (!isRecord(body)) {
    throw new DebateValidationError('Request body must be a JSON object');
  }
  return requireText(body, 'utterance');
}

export function parseStartBody(body: unknown): StartDebateInput {
  if (!isRecord(body)) {
    throw new DebateValidationError('Request body must be a JSON object');
  }
  const input = {
    char1: requireText(body, 'char1'),
    char2: requireText(body, 'char2'),
    userSide: requireText(body, 'userSide'),
  };
  if (input.char1.toLowerCase() === input.char2.toLowerCase()) {
    throw new DebateValidationError('char1 and char2 must be different characters');
  }
  const side = input.userSide.toLowerCase();
  if (side !== input.char1.toLowerCase() && side !== input.char2.toLowerCase()) {
    throw new DebateValidationError('userSide must be either char1 or char2');
  }
  return input;
}

/** Builds an immutable turn request; history is copied so later edits by the caller cannot leak in. */
export function createDebateTurnRequest(
  input: TurnInput,
  context?: DebateTurnRequest['context'],
): DebateTurnRequest {
  const history = Object.freeze(input.history.map((entry) => Object.freeze({ ...entry })));
  return Object.freeze({
    speakerUtterance: input.utterance,
    conversationHistory: history,
    style: 'nigerian-pidgin' as const,
    context: context ? Object.freeze({ ...context }) : undefined,
  });
}
