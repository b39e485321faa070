import { Logger, Module } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../config/app-config';
import { GeminiTextGenerator } from './gemini-llm.provider';
import { TEXT_GENERATOR_TOKEN } from './llm.constants';
import { TextGenerator } from './llm.provider';
import { LlmService } from './llm.service';
import { OpenAiTextGenerator } from './openai-llm.provider';

@Module({
  providers: [
    {
      provide: TEXT_GENERATOR_TOKEN,
      inject: [APP_CONFIG],
      useFactory: (config: AppConfig): TextGenerator => {
        const logger = new Logger('TextGenerator');
        const { provider, model } = config.textGeneration;
        const generator =
          provider === 'gemini'
            ? new GeminiTextGenerator(config.textGeneration)
            : new OpenAiTextGenerator(config.textGeneration);
        logger.log(`Text generation provider configured: ${provider} (${model})`);

        return {
          generate: (...args: Parameters<TextGenerator['generate']>) => {
            logger.debug(`[${provider}] generate`);
            return generator.generate(...args);
          },
        } satisfies TextGenerator;
      },
    },
    LlmService,
  ],
  exports: [LlmService, TEXT_GENERATOR_TOKEN],
})
export class LlmModule {}
