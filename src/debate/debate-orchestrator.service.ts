import { Inject, Injectable, Logger } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../config/app-config';
import { ProviderError } from '../common/provider-error';
import { DebateContext, DebateTurnRequest, DebateTurnResponse } from '../domain/types';
import { LlmService } from '../llm/llm.service';
import { TextGenerationRequest } from '../llm/llm.types';
import { TtsService } from '../tts/tts.service';
import { buildOpeningPrompt, buildRebuttalPrompt, truncateHistory } from './debate-prompt';
import { DebateValidationError } from './debate.errors';

export interface TurnOptions {
  signal?: AbortSignal;
}

/**
 * Produces one debate turn: a Pidgin rebuttal from the text generator, then
 * audio for it from the speech synthesizer. Text failures fail the turn and
 * skip synthesis; synthesis failures degrade to a text-only, `partial` turn.
 */
@Injectable()
export class DebateOrchestratorService {
  private readonly logger = new Logger(DebateOrchestratorService.name);

  constructor(
    private readonly llmService: LlmService,
    private readonly ttsService: TtsService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  async produceTurn(request: DebateTurnRequest, options: TurnOptions = {}): Promise<DebateTurnResponse> {
    const utterance = typeof request.speakerUtterance === 'string' ? request.speakerUtterance.trim() : '';
    if (!utterance) {
      throw new DebateValidationError('utterance is required and must be a non-empty string');
    }

    const maxHistory = this.config.debate.maxHistoryEntries;
    const history = truncateHistory(request.conversationHistory, maxHistory);
    if (history.length < request.conversationHistory.length) {
      this.logger.debug(`Truncated history from ${request.conversationHistory.length} to ${history.length} entries`);
    }

    const prompt = buildRebuttalPrompt({ ...request, speakerUtterance: utterance, conversationHistory: history });
    return this.renderTurn(prompt, options.signal);
  }

  /** Opening line for a session debate; no user utterance yet. */
  produceOpening(context: DebateContext, options: TurnOptions = {}): Promise<DebateTurnResponse> {
    return this.renderTurn(buildOpeningPrompt(context), options.signal);
  }

  /** Voices already-final text, degrading to a partial turn when synthesis fails. */
  async voice(responseText: string, options: TurnOptions = {}): Promise<DebateTurnResponse> {
    try {
      const audio = await this.ttsService.synthesize(responseText, { signal: options.signal });
      return { responseText, audio, partial: false };
    } catch (error) {
      if (!(error instanceof ProviderError)) {
        throw error;
      }
      this.logger.warn(`Speech synthesis failed (${error.kind}: ${error.message}); returning text-only turn`);
      return { responseText, audio: null, partial: true };
    }
  }

  private async renderTurn(prompt: TextGenerationRequest, signal?: AbortSignal): Promise<DebateTurnResponse> {
    const responseText = await this.llmService.generate(prompt, signal);
    return this.voice(responseText, { signal });
  }
}
