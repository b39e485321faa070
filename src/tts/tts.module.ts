import { Logger, Module } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../config/app-config';
import { StorageModule } from '../storage/storage.module';
import { StorageService } from '../storage/storage.service';
import { OpenAiTtsProvider } from './openai-tts.provider';
import { SPEECH_SYNTHESIZER_TOKEN } from './tts.constants';
import { SpeechSynthesizer } from './tts.interfaces';
import { TtsService } from './tts.service';
import { YarnGptTtsProvider } from './yarngpt-tts.provider';

@Module({
  imports: [StorageModule],
  providers: [
    {
      provide: SPEECH_SYNTHESIZER_TOKEN,
      inject: [APP_CONFIG, StorageService],
      useFactory: (config: AppConfig, storageService: StorageService): SpeechSynthesizer => {
        const { provider, voice } = config.speechSynthesis;
        new Logger('SpeechSynthesizer').log(`Speech synthesis provider configured: ${provider} (voice ${voice})`);
        if (provider === 'yarngpt') {
          return new YarnGptTtsProvider(config.speechSynthesis, storageService);
        }
        return new OpenAiTtsProvider(config.speechSynthesis, storageService);
      },
    },
    TtsService,
  ],
  exports: [TtsService, SPEECH_SYNTHESIZER_TOKEN],
})
export class TtsModule {}
