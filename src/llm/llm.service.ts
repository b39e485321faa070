import { Inject, Injectable, Logger } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../config/app-config';
import { ProviderCallRunner } from '../common/provider-call.runner';
import { ProviderError } from '../common/provider-error';
import { TEXT_GENERATOR_TOKEN } from './llm.constants';
import { TextGenerator } from './llm.provider';
import { TextGenerationRequest } from './llm.types';

@Injectable()
export class LlmService {
  private readonly logger = new Logger(LlmService.name);
  private readonly runner: ProviderCallRunner;

  constructor(
    @Inject(TEXT_GENERATOR_TOKEN) private readonly generator: TextGenerator,
    @Inject(APP_CONFIG) config: AppConfig,
  ) {
    this.runner = new ProviderCallRunner('text-generation', config.textGeneration.policy, this.logger);
  }

  /**
   * Generates text under the configured timeout and retry policy. Rejects with
   * a classified {@link ProviderError}, or `OperationCancelledError` when
   * `signal` aborts.
   */
  async generate(request: TextGenerationRequest, signal?: AbortSignal): Promise<string> {
    const text = await this.runner.run(
      'generate',
      (attemptSignal) => this.generator.generate(request, { signal: attemptSignal }),
      signal,
    );
    const trimmed = text.trim();
    if (!trimmed) {
      throw new ProviderError('text-generation', 'upstream', 'Text generation returned an empty response', {
        code: 'EMPTY_COMPLETION',
      });
    }
    return trimmed;
  }
}
