import axios from 'axios';
import { Logger } from '@nestjs/common';
import { SpeechSynthesisConfig } from '../config/app-config';
import { throwIfCancelled } from '../common/abort';
import { ProviderError } from '../common/provider-error';
import { SynthesizedAudio } from '../domain/types';
import { StorageService } from '../storage/storage.service';
import { measureDurationSeconds } from './audio-duration';
import { SpeechSynthesisOptions, SpeechSynthesizer } from './tts.interfaces';
import { contentTypeForFormat, resolveYarnGptVoice } from './voice-config';

export class YarnGptTtsProvider implements SpeechSynthesizer {
  private readonly logger = new Logger(YarnGptTtsProvider.name);
  private readonly endpoint: string;

  constructor(
    private readonly config: SpeechSynthesisConfig,
    private readonly storageService: StorageService,
  ) {
    this.endpoint = `${config.baseUrl ?? 'https://yarngpt.ai/api/v1'}/tts`;
  }

  async synthesize(text: string, options: SpeechSynthesisOptions = {}): Promise<SynthesizedAudio> {
    const voice = resolveYarnGptVoice(options.voice, this.config.voice, this.logger);
    const format = this.config.responseFormat;
    const contentType = contentTypeForFormat(format);

    const response = await axios.post<ArrayBuffer>(
      this.endpoint,
      { text, voice, response_format: format },
      {
        headers: {
          Authorization: `Bearer ${this.config.apiKey}`,
          Accept: contentType,
          'Content-Type': 'application/json',
        },
        responseType: 'arraybuffer',
        signal: options.signal,
      },
    );
    const buffer = Buffer.from(response.data);
    if (!buffer.length) {
      throw new ProviderError('speech-synthesis', 'upstream', 'YarnGPT returned an empty audio payload', {
        status: response.status,
        code: 'EMPTY_AUDIO',
      });
    }

    // The attempt may have timed out or been cancelled while the response was in flight.
    throwIfCancelled(options.signal);
    const durationSeconds = await measureDurationSeconds(buffer, contentType, this.logger);
    const upload = await this.storageService.uploadAudio(buffer, {
      extension: format,
      contentType,
      signal: options.signal,
    });
    this.logger.log(`Synthesized ${buffer.length} bytes with voice ${voice}: ${upload.key}`);
    return { audioUrl: upload.url, storageKey: upload.key, contentType, durationSeconds };
  }
}
