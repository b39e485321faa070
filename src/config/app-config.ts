import { ConfigService } from '@nestjs/config';
import { ConfigurationError } from './configuration.error';

export const APP_CONFIG = 'APP_CONFIG';

export type BackoffShape = 'fixed' | 'exponential';
export type TextProviderName = 'gemini' | 'openai';
export type SpeechProviderName = 'yarngpt' | 'openai';
export type StorageDriver = 'local' | 's3';

export interface CallPolicyConfig {
  readonly timeoutMs: number;
  readonly maxAttempts: number;
  readonly backoff: BackoffShape;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
}

export interface TextGenerationConfig {
  readonly provider: TextProviderName;
  readonly apiKey: string;
  readonly model: string;
  readonly baseUrl?: string;
  readonly temperature: number;
  readonly policy: CallPolicyConfig;
}

export interface SpeechSynthesisConfig {
  readonly provider: SpeechProviderName;
  readonly apiKey: string;
  readonly baseUrl?: string;
  readonly model?: string;
  readonly voice: string;
  readonly responseFormat: string;
  readonly policy: CallPolicyConfig;
}

export interface DebateSettings {
  readonly maxHistoryEntries: number;
  readonly timeLimitSeconds: number;
  /** Idle debates older than this are dropped from the session store. */
  readonly retentionSeconds: number;
}

export interface S3StorageConfig {
  readonly bucket: string;
  readonly region: string;
  readonly accessKeyId: string;
  readonly secretAccessKey: string;
  readonly endpoint?: string;
  readonly urlExpirySeconds: number;
}

export interface StorageConfig {
  readonly driver: StorageDriver;
  readonly localDir: string;
  readonly publicPath: string;
  readonly s3?: S3StorageConfig;
}

export interface AppConfig {
  readonly textGeneration: TextGenerationConfig;
  readonly speechSynthesis: SpeechSynthesisConfig;
  readonly debate: DebateSettings;
  readonly storage: StorageConfig;
}

const GEMINI_OPENAI_COMPAT_URL = 'https://generativelanguage.googleapis.com/v1beta/openai/';
const YARNGPT_BASE_URL = 'https://yarngpt.ai/api/v1';

/**
 * Reads every setting the service needs once, at startup. Missing secrets and
 * malformed values throw {@link ConfigurationError} so the application never
 * boots half-configured.
 */
export function buildAppConfig(configService: ConfigService): AppConfig {
  const reader = new ConfigReader(configService);
  return Object.freeze({
    textGeneration: Object.freeze(buildTextGenerationConfig(reader)),
    speechSynthesis: Object.freeze(buildSpeechSynthesisConfig(reader)),
    debate: Object.freeze({
      maxHistoryEntries: reader.integer('DEBATE_MAX_HISTORY', 20, { min: 0 }),
      timeLimitSeconds: reader.integer('DEBATE_TIME_LIMIT_SECONDS', 300, { min: 1 }),
      retentionSeconds: reader.integer('DEBATE_RETENTION_SECONDS', 60 * 60, { min: 1 }),
    }),
    storage: Object.freeze(buildStorageConfig(reader)),
  });
}

function buildTextGenerationConfig(reader: ConfigReader): TextGenerationConfig {
  const provider = reader.oneOf('LLM_PROVIDER', ['gemini', 'openai'] as const, 'gemini');
  const policy = buildCallPolicy(reader, 'LLM', 8000);
  const temperature = reader.number('LLM_TEMPERATURE', 0.8, { min: 0, max: 2 });

  if (provider === 'gemini') {
    return {
      provider,
      apiKey: reader.requireFirst(['GOOGLE_API_KEY', 'GEMINI_API_KEY'], 'Gemini text generation'),
      model: reader.string('GEMINI_MODEL') ?? 'gemini-2.0-flash',
      baseUrl: reader.string('GEMINI_BASE_URL') ?? GEMINI_OPENAI_COMPAT_URL,
      temperature,
      policy,
    };
  }

  return {
    provider,
    apiKey: reader.requireFirst(['OPENAI_API_KEY'], 'OpenAI text generation'),
    model: reader.string('OPENAI_MODEL') ?? 'gpt-4.1-mini',
    baseUrl: reader.string('OPENAI_BASE_URL'),
    temperature,
    policy,
  };
}

function buildSpeechSynthesisConfig(reader: ConfigReader): SpeechSynthesisConfig {
  const provider = reader.oneOf('TTS_PROVIDER', ['yarngpt', 'openai'] as const, 'yarngpt');
  const policy = buildCallPolicy(reader, 'TTS', 15000);

  if (provider === 'yarngpt') {
    return {
      provider,
      apiKey: reader.requireFirst(['YARNGPT_API_KEY'], 'YarnGPT speech synthesis'),
      baseUrl: (reader.string('YARNGPT_BASE_URL') ?? YARNGPT_BASE_URL).replace(/\/+$/, ''),
      voice: reader.string('YARNGPT_VOICE') ?? 'Osagie',
      responseFormat: reader.string('YARNGPT_RESPONSE_FORMAT') ?? 'mp3',
      policy,
    };
  }

  return {
    provider,
    apiKey: reader.requireFirst(['OPENAI_API_KEY'], 'OpenAI speech synthesis'),
    baseUrl: reader.string('OPENAI_BASE_URL'),
    model: reader.string('OPENAI_TTS_MODEL') ?? 'gpt-4o-mini-tts',
    voice: reader.string('OPENAI_TTS_VOICE') ?? 'alloy',
    responseFormat: 'mp3',
    policy,
  };
}

function buildCallPolicy(reader: ConfigReader, prefix: 'LLM' | 'TTS', defaultTimeoutMs: number): CallPolicyConfig {
  const baseDelayMs = reader.integer(`${prefix}_BACKOFF_BASE_MS`, 250, { min: 0 });
  const maxDelayMs = reader.integer(`${prefix}_BACKOFF_MAX_MS`, 2000, { min: 0 });
  if (maxDelayMs < baseDelayMs) {
    throw new ConfigurationError(`${prefix}_BACKOFF_MAX_MS must be greater than or equal to ${prefix}_BACKOFF_BASE_MS`);
  }
  return Object.freeze({
    timeoutMs: reader.integer(`${prefix}_TIMEOUT_MS`, defaultTimeoutMs, { min: 1 }),
    maxAttempts: reader.integer(`${prefix}_MAX_ATTEMPTS`, 2, { min: 1 }),
    backoff: reader.oneOf(`${prefix}_BACKOFF`, ['fixed', 'exponential'] as const, 'exponential'),
    baseDelayMs,
    maxDelayMs,
  });
}

function buildStorageConfig(reader: ConfigReader): StorageConfig {
  const driver = reader.oneOf('STORAGE_DRIVER', ['local', 's3'] as const, 'local');
  const localDir = reader.string('LOCAL_AUDIO_DIR') ?? 'static';
  const publicPath = `/${(reader.string('PUBLIC_AUDIO_PATH') ?? '/static').replace(/^\/+|\/+$/g, '')}`;
  if (driver === 'local') {
    return { driver, localDir, publicPath };
  }

  const bucket = reader.requireFirst(['AUDIO_BUCKET_NAME', 'S3_BUCKET_NAME'], 'S3 audio storage');
  return {
    driver,
    localDir,
    publicPath,
    s3: Object.freeze({
      bucket,
      region: reader.requireFirst(['AUDIO_S3_REGION', 'S3_REGION'], 'S3 audio storage'),
      accessKeyId: reader.requireFirst(['S3_ACCESS_KEY_ID'], 'S3 audio storage'),
      secretAccessKey: reader.requireFirst(['S3_SECRET_ACCESS_KEY'], 'S3 audio storage'),
      endpoint: reader.string('S3_ENDPOINT'),
      urlExpirySeconds: reader.integer('AUDIO_URL_EXPIRY_SECONDS', 60 * 60, { min: 1 }),
    }),
  };
}

class ConfigReader {
  constructor(private readonly configService: ConfigService) {}

  string(key: string): string | undefined {
    const value = this.configService.get<string>(key);
    if (value === undefined || value === null) {
      return undefined;
    }
    const trimmed = String(value).trim();
    // Unexpanded placeholders such as ${GOOGLE_API_KEY} count as unset.
    if (!trimmed || /^\$\{[^}]+\}$/.test(trimmed)) {
      return undefined;
    }
    return trimmed;
  }

  requireFirst(keys: string[], purpose: string): string {
    for (const key of keys) {
      const value = this.string(key);
      if (value) {
        return value;
      }
    }
    throw new ConfigurationError(`${keys.join(' or ')} must be set for ${purpose}`);
  }

  oneOf<T extends string>(key: string, allowed: readonly T[], fallback: T): T {
    const raw = this.string(key);
    if (raw === undefined) {
      return fallback;
    }
    const normalized = raw.toLowerCase();
    const match = allowed.find((candidate) => candidate === normalized);
    if (!match) {
      throw new ConfigurationError(`Unsupported ${key}: ${raw} (expected one of ${allowed.join(', ')})`);
    }
    return match;
  }

  number(key: string, fallback: number, bounds: { min?: number; max?: number } = {}): number {
    const raw = this.string(key);
    if (raw === undefined) {
      return fallback;
    }
    const value = Number(raw);
    if (!Number.isFinite(value)) {
      throw new ConfigurationError(`${key} must be a number, got "${raw}"`);
    }
    if (bounds.min !== undefined && value < bounds.min) {
      throw new ConfigurationError(`${key} must be at least ${bounds.min}, got ${value}`);
    }
    if (bounds.max !== undefined && value > bounds.max) {
      throw new ConfigurationError(`${key} must be at most ${bounds.max}, got ${value}`);
    }
    return value;
  }

  integer(key: string, fallback: number, bounds: { min?: number; max?: number } = {}): number {
    const value = this.number(key, fallback, bounds);
    if (!Number.isInteger(value)) {
      throw new ConfigurationError(`${key} must be an integer, got ${value}`);
    }
    return value;
  }
}
