import { SynthesizedAudio } from '../domain/types';
import { TextGenerator } from '../llm/llm.provider';
import { TextGenerationOptions, TextGenerationRequest } from '../llm/llm.types';
import { SpeechSynthesisOptions, SpeechSynthesizer } from '../tts/tts.interfaces';

/** One scripted provider response. */
export type Step<T> = (signal?: AbortSignal) => Promise<T>;

export function succeed<T>(value: T): Step<T> {
  return async () => value;
}

export function fail<T>(error: Error): Step<T> {
  return async () => {
    throw error;
  };
}

/** Never settles on its own; rejects with the abort reason once `signal` fires. */
export function hang<T>(): Step<T> {
  return (signal) =>
    new Promise<T>((_, reject) => {
      signal?.addEventListener('abort', () => reject(signal.reason), { once: true });
    });
}

class Script<T> {
  private readonly steps: Step<T>[];

  constructor(steps: Step<T>[]) {
    this.steps = [...steps];
  }

  /** Plays steps in order; the last one repeats. */
  play(signal?: AbortSignal): Promise<T> {
    const next = this.steps.length > 1 ? this.steps.shift() : this.steps[0];
    if (!next) {
      return Promise.reject(new Error('No scripted step'));
    }
    return next(signal);
  }
}

export class FakeTextGenerator implements TextGenerator {
  readonly requests: TextGenerationRequest[] = [];
  readonly signals: (AbortSignal | undefined)[] = [];
  private readonly script: Script<string>;

  constructor(...steps: Step<string>[]) {
    this.script = new Script(steps);
  }

  get calls(): number {
    return this.requests.length;
  }

  generate(request: TextGenerationRequest, options: TextGenerationOptions = {}): Promise<string> {
    this.requests.push(request);
    this.signals.push(options.signal);
    return this.script.play(options.signal);
  }
}

export function fakeAudio(audioUrl = '<synthesized-ref>'): SynthesizedAudio {
  return { audioUrl, storageKey: 'audio/fake.mp3', contentType: 'audio/mpeg' };
}

export class FakeSpeechSynthesizer implements SpeechSynthesizer {
  readonly texts: string[] = [];
  private readonly script: Script<SynthesizedAudio>;

  constructor(...steps: Step<SynthesizedAudio>[]) {
    this.script = new Script(steps.length ? steps : [succeed(fakeAudio())]);
  }

  get calls(): number {
    return this.texts.length;
  }

  synthesize(text: string, options: SpeechSynthesisOptions = {}): Promise<SynthesizedAudio> {
    this.texts.push(text);
    return this.script.play(options.signal);
  }
}
