import { Injectable } from '@nestjs/common';
import { v4 as uuid } from 'uuid';
import { InMemoryStoreService } from '../common/in-memory-store.service';
import { DebateSession } from '../domain/types';
import {
  DebateSessionCreateInput,
  DebateSessionsRepository,
  DebateSessionUpdateInput,
} from './debate-sessions.repository';

@Injectable()
export class InMemoryDebateSessionsRepository implements DebateSessionsRepository {
  constructor(private readonly store: InMemoryStoreService) {}

  async create(input: DebateSessionCreateInput): Promise<DebateSession> {
    const now = new Date();
    const session: DebateSession = {
      id: uuid(),
      char1: input.char1,
      char2: input.char2,
      userCharacter: input.userCharacter,
      aiCharacter: input.aiCharacter,
      startedAt: now,
      history: [...input.history],
      turnCount: 0,
      finished: false,
      updatedAt: now,
    };
    return this.store.saveDebate(session);
  }

  async getById(debateId: string): Promise<DebateSession | undefined> {
    return this.store.getDebate(debateId);
  }

  async update(debateId: string, updates: DebateSessionUpdateInput): Promise<DebateSession | undefined> {
    const changes: Partial<DebateSession> = {};
    if (updates.history !== undefined) {
      changes.history = [...updates.history];
    }
    if (updates.turnCount !== undefined) {
      changes.turnCount = updates.turnCount;
    }
    if (updates.finished !== undefined) {
      changes.finished = updates.finished;
    }
    if (updates.winner !== undefined) {
      changes.winner = updates.winner;
    }
    return this.store.updateDebate(debateId, changes);
  }

  async deleteIdleBefore(cutoff: Date): Promise<number> {
    return this.store.deleteDebatesUpdatedBefore(cutoff);
  }
}
