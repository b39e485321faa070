import { DebateSession, HistoryEntry } from '../domain/types';

export const DEBATE_SESSIONS_REPOSITORY = 'DEBATE_SESSIONS_REPOSITORY';

export interface DebateSessionCreateInput {
  char1: string;
  char2: string;
  userCharacter: string;
  aiCharacter: string;
  history: HistoryEntry[];
}

export interface DebateSessionUpdateInput {
  history?: HistoryEntry[];
  turnCount?: number;
  finished?: boolean;
  winner?: string;
}

export interface DebateSessionsRepository {
  create(input: DebateSessionCreateInput): Promise<DebateSession>;
  getById(debateId: string): Promise<DebateSession | undefined>;
  update(debateId: string, updates: DebateSessionUpdateInput): Promise<DebateSession | undefined>;
  /** Removes sessions last updated before `cutoff`; resolves with how many went. */
  deleteIdleBefore(cutoff: Date): Promise<number>;
}
