import { SynthesizedAudio } from '../domain/types';

export interface SpeechSynthesisOptions {
  voice?: string;
  signal?: AbortSignal;
}

export interface SpeechSynthesizer {
  synthesize(text: string, options?: SpeechSynthesisOptions): Promise<SynthesizedAudio>;
}
