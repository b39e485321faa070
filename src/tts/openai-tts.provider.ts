import { Logger } from '@nestjs/common';
import OpenAI from 'openai';
import { SpeechCreateParams } from 'openai/resources/audio/speech';
import { throwIfCancelled } from '../common/abort';
import { SpeechSynthesisConfig } from '../config/app-config';
import { SynthesizedAudio } from '../domain/types';
import { StorageService } from '../storage/storage.service';
import { measureDurationSeconds } from './audio-duration';
import { SpeechSynthesisOptions, SpeechSynthesizer } from './tts.interfaces';

const OPENAI_VOICES = ['alloy', 'ash', 'coral', 'echo', 'fable', 'onyx', 'nova', 'sage', 'shimmer'] as const;

function isOpenAiVoice(voice: string): voice is SpeechCreateParams['voice'] {
  return OPENAI_VOICES.some((candidate) => candidate === voice);
}

export class OpenAiTtsProvider implements SpeechSynthesizer {
  private readonly logger = new Logger(OpenAiTtsProvider.name);
  private readonly model: string;
  private client: OpenAI | null = null;

  constructor(
    private readonly config: SpeechSynthesisConfig,
    private readonly storageService: StorageService,
  ) {
    this.model = config.model ?? 'gpt-4o-mini-tts';
  }

  async synthesize(text: string, options: SpeechSynthesisOptions = {}): Promise<SynthesizedAudio> {
    const client = this.getClient();
    const requested = (options.voice || this.config.voice).trim().toLowerCase();
    const voice = isOpenAiVoice(requested) ? requested : 'alloy';
    if (voice !== requested) {
      this.logger.warn(`Unknown OpenAI voice "${requested}", using ${voice}`);
    }

    const response = await client.audio.speech.create(
      { model: this.model, voice, input: text, response_format: 'mp3' },
      { signal: options.signal },
    );
    const buffer = Buffer.from(await response.arrayBuffer());
    throwIfCancelled(options.signal);
    const contentType = 'audio/mpeg';
    const durationSeconds = await measureDurationSeconds(buffer, contentType, this.logger);
    const upload = await this.storageService.uploadAudio(buffer, {
      extension: 'mp3',
      contentType,
      signal: options.signal,
    });

    return { audioUrl: upload.url, storageKey: upload.key, contentType, durationSeconds };
  }

  private getClient(): OpenAI {
    if (this.client) {
      return this.client;
    }
    this.client = new OpenAI({
      apiKey: this.config.apiKey,
      baseURL: this.config.baseUrl || undefined,
      maxRetries: 0,
    });
    return this.client;
  }
}
