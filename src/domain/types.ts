export type DebateStyle = 'nigerian-pidgin';

export interface HistoryEntry {
  readonly speaker: string;
  readonly text: string;
}

/** Who the AI plays in a session debate, and who it is arguing against. */
export interface DebateContext {
  readonly aiCharacter: string;
  readonly opponent: string;
}

export interface DebateTurnRequest {
  readonly speakerUtterance: string;
  readonly conversationHistory: readonly HistoryEntry[];
  readonly style: DebateStyle;
  readonly context?: DebateContext;
}

export interface SynthesizedAudio {
  audioUrl: string;
  storageKey: string;
  contentType: string;
  durationSeconds?: number;
}

/**
 * `audio` is null exactly when speech synthesis failed; the text is always
 * present.
 */
export type DebateTurnResponse =
  | { readonly responseText: string; readonly audio: SynthesizedAudio; readonly partial: false }
  | { readonly responseText: string; readonly audio: null; readonly partial: true };

export interface DebateSession {
  id: string;
  char1: string;
  char2: string;
  userCharacter: string;
  aiCharacter: string;
  startedAt: Date;
  history: HistoryEntry[];
  turnCount: number;
  finished: boolean;
  winner?: string;
  updatedAt: Date;
}
