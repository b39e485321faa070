import { Inject, Injectable, Logger } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../config/app-config';
import { DebateSession, DebateTurnResponse, HistoryEntry } from '../domain/types';
import { LlmService } from '../llm/llm.service';
import { DebateOrchestratorService, TurnOptions } from './debate-orchestrator.service';
import { buildJudgePrompt, resolveWinner } from './debate-prompt';
import { createDebateTurnRequest, StartDebateInput } from './debate-request';
import { DEBATE_SESSIONS_REPOSITORY, DebateSessionsRepository } from './debate-sessions.repository';
import { DebateFinishedError, DebateNotFoundError, DebateValidationError } from './debate.errors';

export const JUDGE_SPEAKER = 'Judge';

export interface SessionTurnResult {
  debateId: string;
  turn: DebateTurnResponse;
  finished: boolean;
  winner?: string;
}

@Injectable()
export class DebateSessionsService {
  private readonly logger = new Logger(DebateSessionsService.name);
  /** Tail of the turn chain per debate; turns on one debate run one at a time. */
  private readonly turnQueues = new Map<string, Promise<unknown>>();

  constructor(
    @Inject(DEBATE_SESSIONS_REPOSITORY) private readonly repository: DebateSessionsRepository,
    private readonly orchestrator: DebateOrchestratorService,
    private readonly llmService: LlmService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  async startDebate(input: StartDebateInput, options: TurnOptions = {}): Promise<SessionTurnResult> {
    const userPicksFirst = input.userSide.trim().toLowerCase() === input.char1.trim().toLowerCase();
    const userCharacter = userPicksFirst ? input.char1 : input.char2;
    const aiCharacter = userPicksFirst ? input.char2 : input.char1;

    await this.pruneIdleDebates();
    const turn = await this.orchestrator.produceOpening({ aiCharacter, opponent: userCharacter }, options);
    const session = await this.repository.create({
      char1: input.char1,
      char2: input.char2,
      userCharacter,
      aiCharacter,
      history: [{ speaker: aiCharacter, text: turn.responseText }],
    });
    this.logger.log(`Debate ${session.id} started: user=${userCharacter} ai=${aiCharacter}`);
    return { debateId: session.id, turn, finished: false };
  }

  async getDebate(debateId: string): Promise<DebateSession> {
    const session = await this.repository.getById(debateId);
    if (!session) {
      throw new DebateNotFoundError(debateId);
    }
    return session;
  }

  /**
   * Records the user's line and answers it. Once the time limit has passed the
   * debate is judged instead, and no further turns are accepted. Turns on the
   * same debate are queued so each one sees the history the previous one wrote.
   */
  takeTurn(debateId: string, utterance: string, options: TurnOptions = {}): Promise<SessionTurnResult> {
    return this.enqueue(debateId, () => this.applyTurn(debateId, utterance, options));
  }

  private async applyTurn(debateId: string, utterance: string, options: TurnOptions): Promise<SessionTurnResult> {
    const session = await this.getDebate(debateId);
    if (session.finished) {
      throw new DebateFinishedError(debateId);
    }
    const text = utterance.trim();
    if (!text) {
      throw new DebateValidationError('utterance is required and must be a non-empty string');
    }

    const userLine: HistoryEntry = { speaker: session.userCharacter, text };
    const history = [...session.history, userLine];
    const turnCount = session.turnCount + 1;

    if (this.isTimeUp(session)) {
      return this.finish(session, history, turnCount, options);
    }

    const request = createDebateTurnRequest(
      { utterance: text, history: session.history },
      { aiCharacter: session.aiCharacter, opponent: session.userCharacter },
    );
    const turn = await this.orchestrator.produceTurn(request, options);
    await this.repository.update(debateId, {
      history: [...history, { speaker: session.aiCharacter, text: turn.responseText }],
      turnCount,
    });
    return { debateId, turn, finished: false };
  }

  private async finish(
    session: DebateSession,
    history: HistoryEntry[],
    turnCount: number,
    options: TurnOptions,
  ): Promise<SessionTurnResult> {
    const verdict = await this.llmService.generate(
      buildJudgePrompt(session.char1, session.char2, history),
      options.signal,
    );
    const winner = resolveWinner(verdict, session.char1, session.char2);
    const announcement = `Time don reach! The winner na ${winner}!`;
    const turn = await this.orchestrator.voice(announcement, options);

    await this.repository.update(session.id, {
      history: [...history, { speaker: JUDGE_SPEAKER, text: announcement }],
      turnCount,
      finished: true,
      winner,
    });
    this.logger.log(`Debate ${session.id} finished after ${turnCount} turns; winner=${winner}`);
    return { debateId: session.id, turn, finished: true, winner };
  }

  private enqueue<T>(debateId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.turnQueues.get(debateId) ?? Promise.resolve();
    // Runs once the previous turn settles, whatever its outcome.
    const next = previous.then(task, task);
    this.turnQueues.set(debateId, next);
    const release = () => {
      if (this.turnQueues.get(debateId) === next) {
        this.turnQueues.delete(debateId);
      }
    };
    void next.then(release, release);
    return next;
  }

  private async pruneIdleDebates(): Promise<void> {
    const cutoff = new Date(Date.now() - this.config.debate.retentionSeconds * 1000);
    const removed = await this.repository.deleteIdleBefore(cutoff);
    if (removed > 0) {
      this.logger.log(`Pruned ${removed} debate(s) idle since before ${cutoff.toISOString()}`);
    }
  }

  private isTimeUp(session: DebateSession): boolean {
    const elapsedMs = Date.now() - session.startedAt.getTime();
    return elapsedMs > this.config.debate.timeLimitSeconds * 1000;
  }
}
