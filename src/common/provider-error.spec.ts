import { AxiosError, AxiosHeaders } from 'axios';
import { APIConnectionTimeoutError, APIError } from 'openai';
import { TimeoutError } from './abort';
import { classifyProviderError, ProviderError } from './provider-error';

function axiosFailure(status?: number, code?: string): AxiosError {
  const config = { headers: new AxiosHeaders() };
  const response =
    status === undefined
      ? undefined
      : { status, statusText: 'error', headers: {}, config, data: Buffer.from('{"error":"nope"}') };
  return new AxiosError(`Request failed${status ? ` with status code ${status}` : ''}`, code, config, undefined, response);
}

describe('classifyProviderError', () => {
  it.each([
    [401, 'auth_failure'],
    [403, 'auth_failure'],
    [429, 'rate_limited'],
    [408, 'timeout'],
    [504, 'timeout'],
    [500, 'upstream'],
    [422, 'upstream'],
  ])('maps an HTTP %i from axios to %s', (status, kind) => {
    const error = classifyProviderError('speech-synthesis', axiosFailure(status));
    expect(error.kind).toBe(kind);
    expect(error.status).toBe(status);
    expect(error.provider).toBe('speech-synthesis');
  });

  it('treats an axios connection timeout as a timeout', () => {
    expect(classifyProviderError('speech-synthesis', axiosFailure(undefined, 'ECONNABORTED')).kind).toBe('timeout');
  });

  it('maps OpenAI SDK errors by status', () => {
    expect(classifyProviderError('text-generation', new APIError(401, undefined, 'bad key', undefined)).kind).toBe(
      'auth_failure',
    );
    expect(classifyProviderError('text-generation', new APIError(429, undefined, 'slow down', undefined)).kind).toBe(
      'rate_limited',
    );
    expect(classifyProviderError('text-generation', new APIError(503, undefined, 'overloaded', undefined)).kind).toBe(
      'upstream',
    );
  });

  it('treats SDK and deadline timeouts as timeouts', () => {
    expect(classifyProviderError('text-generation', new APIConnectionTimeoutError()).kind).toBe('timeout');
    expect(classifyProviderError('text-generation', new TimeoutError(50)).kind).toBe('timeout');
  });

  it('classifies anything unrecognised as unknown', () => {
    const error = classifyProviderError('text-generation', new Error('socket hang up'));
    expect(error.kind).toBe('unknown');
    expect(error.message).toBe('socket hang up');
    expect(error.retryable).toBe(false);
  });

  it('labels upstream errors with the HTTP status when there is no transport code', () => {
    const error = classifyProviderError('text-generation', new APIError(500, undefined, 'boom', undefined));
    expect(error.code).toBe('HTTP_500');
  });

  it('returns an existing ProviderError unchanged', () => {
    const original = new ProviderError('text-generation', 'rate_limited', 'busy');
    expect(classifyProviderError('speech-synthesis', original)).toBe(original);
  });
});

describe('ProviderError.retryable', () => {
  it.each([
    ['timeout', true],
    ['rate_limited', true],
    ['auth_failure', false],
    ['upstream', false],
    ['unknown', false],
  ] as const)('%s -> %s', (kind, retryable) => {
    expect(new ProviderError('text-generation', kind, 'x').retryable).toBe(retryable);
  });
});
