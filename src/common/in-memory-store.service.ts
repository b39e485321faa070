import { Injectable } from '@nestjs/common';
import { DebateSession } from '../domain/types';

@Injectable()
export class InMemoryStoreService {
  private readonly debatesById: Map<string, DebateSession> = new Map();

  getDebate(debateId: string): DebateSession | undefined {
    return this.debatesById.get(debateId);
  }

  saveDebate(debate: DebateSession): DebateSession {
    this.debatesById.set(debate.id, debate);
    return debate;
  }

  updateDebate(debateId: string, updates: Partial<DebateSession>): DebateSession | undefined {
    const existing = this.debatesById.get(debateId);
    if (!existing) {
      return undefined;
    }
    const updated: DebateSession = { ...existing, ...updates, id: existing.id, updatedAt: new Date() };
    this.debatesById.set(debateId, updated);
    return updated;
  }

  deleteDebatesUpdatedBefore(cutoff: Date): number {
    let removed = 0;
    for (const [debateId, debate] of this.debatesById) {
      if (debate.updatedAt.getTime() < cutoff.getTime()) {
        this.debatesById.delete(debateId);
        removed += 1;
      }
    }
    return removed;
  }
}
