import OpenAI from 'openai';
import { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { TextGenerationConfig } from '../config/app-config';
import { ProviderError } from '../common/provider-error';
import { TextGenerator } from './llm.provider';
import { TextGenerationOptions, TextGenerationRequest } from './llm.types';

export interface OpenAiTextGeneratorOptions {
  providerLabel?: string;
}

/**
 * Chat-completions text generator. Works against any OpenAI-compatible
 * endpoint; the client is created on first use and reused for the life of the
 * process.
 */
export class OpenAiTextGenerator implements TextGenerator {
  private client: OpenAI | null = null;
  private readonly providerLabel: string;

  constructor(
    private readonly config: TextGenerationConfig,
    options: OpenAiTextGeneratorOptions = {},
  ) {
    this.providerLabel = options.providerLabel ?? 'OpenAI text generation';
  }

  async generate(request: TextGenerationRequest, options: TextGenerationOptions = {}): Promise<string> {
    const client = this.getClient();
    const messages = [
      { role: 'system', content: request.systemPrompt },
      { role: 'user', content: request.prompt },
    ] satisfies ChatCompletionMessageParam[];

    const response = await client.chat.completions.create(
      {
        model: this.config.model,
        messages,
        temperature: request.temperature ?? this.config.temperature,
        max_tokens: request.maxTokens ?? 200,
      },
      { signal: options.signal },
    );

    const content = response.choices[0]?.message?.content?.trim();
    if (!content) {
      throw new ProviderError('text-generation', 'upstream', `${this.providerLabel} returned empty content`, {
        code: 'EMPTY_COMPLETION',
      });
    }
    return content;
  }

  private getClient(): OpenAI {
    if (!this.client) {
      this.client = new OpenAI({
        apiKey: this.config.apiKey,
        baseURL: this.config.baseUrl || undefined,
        // Retries and deadlines are owned by ProviderCallRunner.
        maxRetries: 0,
      });
    }
    return this.client;
  }
}
