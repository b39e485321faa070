import { TextGenerationConfig } from '../config/app-config';
import { OpenAiTextGenerator } from './openai-llm.provider';

/**
 * Gemini through its OpenAI-compatible chat completions endpoint. The endpoint
 * comes from `GEMINI_BASE_URL`, which defaults to Google's compatibility URL.
 */
export class GeminiTextGenerator extends OpenAiTextGenerator {
  constructor(config: TextGenerationConfig) {
    super(config, { providerLabel: 'Gemini text generation' });
  }
}
