import { Inject, Injectable, Logger } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../config/app-config';
import { ProviderCallRunner } from '../common/provider-call.runner';
import { SynthesizedAudio } from '../domain/types';
import { SPEECH_SYNTHESIZER_TOKEN } from './tts.constants';
import { SpeechSynthesizer } from './tts.interfaces';

@Injectable()
export class TtsService {
  private readonly logger = new Logger(TtsService.name);
  private readonly runner: ProviderCallRunner;

  constructor(
    @Inject(SPEECH_SYNTHESIZER_TOKEN) private readonly provider: SpeechSynthesizer,
    @Inject(APP_CONFIG) config: AppConfig,
  ) {
    this.runner = new ProviderCallRunner('speech-synthesis', config.speechSynthesis.policy, this.logger);
  }

  synthesize(text: string, options: { voice?: string; signal?: AbortSignal } = {}): Promise<SynthesizedAudio> {
    return this.runner.run(
      'synthesize',
      (attemptSignal) => this.provider.synthesize(text, { voice: options.voice, signal: attemptSignal }),
      options.signal,
    );
  }
}
