import { ConfigService } from '@nestjs/config';
import { buildAppConfig } from './app-config';
import { ConfigurationError } from './configuration.error';

const REQUIRED = { GOOGLE_API_KEY: 'test-google-key', YARNGPT_API_KEY: 'test-yarngpt-key' };

function build(env: Record<string, string>) {
  return buildAppConfig(new ConfigService(env));
}

describe('buildAppConfig', () => {
  it('applies defaults for Gemini text generation and YarnGPT speech', () => {
    const config = build(REQUIRED);

    expect(config.textGeneration).toEqual({
      provider: 'gemini',
      apiKey: 'test-google-key',
      model: 'gemini-2.0-flash',
      baseUrl: 'https://generativelanguage.googleapis.com/v1beta/openai/',
      temperature: 0.8,
      policy: { timeoutMs: 8000, maxAttempts: 2, backoff: 'exponential', baseDelayMs: 250, maxDelayMs: 2000 },
    });
    expect(config.speechSynthesis).toEqual({
      provider: 'yarngpt',
      apiKey: 'test-yarngpt-key',
      baseUrl: 'https://yarngpt.ai/api/v1',
      voice: 'Osagie',
      responseFormat: 'mp3',
      policy: { timeoutMs: 15000, maxAttempts: 2, backoff: 'exponential', baseDelayMs: 250, maxDelayMs: 2000 },
    });
    expect(config.debate).toEqual({ maxHistoryEntries: 20, timeLimitSeconds: 300, retentionSeconds: 3600 });
    expect(config.storage).toEqual({ driver: 'local', localDir: 'static', publicPath: '/static' });
  });

  it('takes the Gemini endpoint from GEMINI_BASE_URL', () => {
    const config = build({ ...REQUIRED, GEMINI_BASE_URL: 'https://gemini.test/openai/' });

    expect(config.textGeneration.baseUrl).toBe('https://gemini.test/openai/');
  });

  it('fails fast when the text generation key is missing', () => {
    expect(() => build({ YARNGPT_API_KEY: 'test-yarngpt-key' })).toThrow(
      new ConfigurationError('GOOGLE_API_KEY or GEMINI_API_KEY must be set for Gemini text generation'),
    );
  });

  it('fails fast when the speech synthesis key is missing', () => {
    expect(() => build({ GOOGLE_API_KEY: 'test-google-key' })).toThrow(
      'YARNGPT_API_KEY must be set for YarnGPT speech synthesis',
    );
  });

  it('treats unexpanded placeholders as missing', () => {
    expect(() => build({ ...REQUIRED, YARNGPT_API_KEY: '${YARNGPT_API_KEY}' })).toThrow(ConfigurationError);
  });

  it('uses the OpenAI key and model when the OpenAI providers are selected', () => {
    const config = build({
      LLM_PROVIDER: 'OpenAI',
      TTS_PROVIDER: 'openai',
      OPENAI_API_KEY: 'test-openai-key',
      OPENAI_TTS_VOICE: 'nova',
    });

    expect(config.textGeneration.provider).toBe('openai');
    expect(config.textGeneration.apiKey).toBe('test-openai-key');
    expect(config.textGeneration.model).toBe('gpt-4.1-mini');
    expect(config.speechSynthesis.provider).toBe('openai');
    expect(config.speechSynthesis.voice).toBe('nova');
    expect(config.speechSynthesis.model).toBe('gpt-4o-mini-tts');
  });

  it('rejects unsupported provider names', () => {
    expect(() => build({ ...REQUIRED, TTS_PROVIDER: 'elevenlabs' })).toThrow(
      'Unsupported TTS_PROVIDER: elevenlabs (expected one of yarngpt, openai)',
    );
  });

  it('reads retry policy tunables per provider', () => {
    const config = build({
      ...REQUIRED,
      LLM_TIMEOUT_MS: '3000',
      LLM_MAX_ATTEMPTS: '3',
      LLM_BACKOFF: 'fixed',
      TTS_BACKOFF_BASE_MS: '100',
      TTS_BACKOFF_MAX_MS: '400',
    });

    expect(config.textGeneration.policy).toEqual({
      timeoutMs: 3000,
      maxAttempts: 3,
      backoff: 'fixed',
      baseDelayMs: 250,
      maxDelayMs: 2000,
    });
    expect(config.speechSynthesis.policy.baseDelayMs).toBe(100);
    expect(config.speechSynthesis.policy.maxDelayMs).toBe(400);
  });

  it('rejects malformed numbers', () => {
    expect(() => build({ ...REQUIRED, LLM_TIMEOUT_MS: 'soon' })).toThrow('LLM_TIMEOUT_MS must be a number, got "soon"');
    expect(() => build({ ...REQUIRED, TTS_MAX_ATTEMPTS: '0' })).toThrow('TTS_MAX_ATTEMPTS must be at least 1, got 0');
    expect(() => build({ ...REQUIRED, DEBATE_MAX_HISTORY: '2.5' })).toThrow(
      'DEBATE_MAX_HISTORY must be an integer, got 2.5',
    );
  });

  it('rejects a backoff ceiling below the base delay', () => {
    expect(() => build({ ...REQUIRED, LLM_BACKOFF_BASE_MS: '500', LLM_BACKOFF_MAX_MS: '100' })).toThrow(
      'LLM_BACKOFF_MAX_MS must be greater than or equal to LLM_BACKOFF_BASE_MS',
    );
  });

  it('requires S3 settings when the s3 storage driver is selected', () => {
    expect(() => build({ ...REQUIRED, STORAGE_DRIVER: 's3' })).toThrow(
      'AUDIO_BUCKET_NAME or S3_BUCKET_NAME must be set for S3 audio storage',
    );
  });

  it('normalises the public audio path', () => {
    expect(build({ ...REQUIRED, PUBLIC_AUDIO_PATH: 'media/' }).storage.publicPath).toBe('/media');
  });

  it('returns a frozen object', () => {
    const config = build(REQUIRED);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.textGeneration.policy)).toBe(true);
  });
});
