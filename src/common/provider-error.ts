import axios from 'axios';
import { APIConnectionTimeoutError, APIError } from 'openai';
import { TimeoutError } from './abort';

export type ProviderKind = 'text-generation' | 'speech-synthesis';

export type ProviderErrorKind = 'timeout' | 'auth_failure' | 'rate_limited' | 'upstream' | 'unknown';

const RETRYABLE_KINDS: ReadonlySet<ProviderErrorKind> = new Set<ProviderErrorKind>(['timeout', 'rate_limited']);

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ESOCKETTIMEDOUT']);

export interface ProviderErrorDetails {
  status?: number;
  code?: string;
  cause?: unknown;
}

/**
 * Failure of an outbound provider call, classified so the caller can decide
 * between retrying, degrading and surfacing it.
 */
export class ProviderError extends Error {
  override readonly name = 'ProviderError';
  readonly status?: number;
  readonly code?: string;

  constructor(
    readonly provider: ProviderKind,
    readonly kind: ProviderErrorKind,
    message: string,
    details: ProviderErrorDetails = {},
  ) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.status = details.status;
    this.code = details.code;
  }

  /** Only timeouts and rate limits are treated as transient. */
  get retryable(): boolean {
    return RETRYABLE_KINDS.has(this.kind);
  }
}

export function classifyProviderError(provider: ProviderKind, error: unknown): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);

  if (error instanceof TimeoutError || error instanceof APIConnectionTimeoutError) {
    return new ProviderError(provider, 'timeout', message, { code: 'TIMEOUT', cause: error });
  }

  const { status, code } = readTransportDetails(error);
  const details = { status, code, cause: error };

  if (status === 401 || status === 403) {
    return new ProviderError(provider, 'auth_failure', message, details);
  }
  if (status === 429) {
    return new ProviderError(provider, 'rate_limited', message, details);
  }
  if (status === 408 || status === 504 || (code !== undefined && TIMEOUT_CODES.has(code))) {
    return new ProviderError(provider, 'timeout', message, details);
  }
  if (status !== undefined && status >= 400) {
    return new ProviderError(provider, 'upstream', message, { ...details, code: code ?? `HTTP_${status}` });
  }
  return new ProviderError(provider, 'unknown', message, details);
}

function readTransportDetails(error: unknown): { status?: number; code?: string } {
  if (axios.isAxiosError(error)) {
    return { status: error.response?.status, code: error.code };
  }
  if (error instanceof APIError) {
    return { status: error.status, code: error.code ?? undefined };
  }
  return {};
}
