import { ErrorClassificationService } from '../core/error-classification';
import { ProviderCallError } from '../core/errors';

describe('ErrorClassificationService', () => {
  const classification = new ErrorClassificationService();

  it('maps status codes to categories', () => {
    expect(classification.classifyStatusCode(401)).toBe('auth');
    expect(classification.classifyStatusCode(403)).toBe('auth');
    expect(classification.classifyStatusCode(429)).toBe('rate_limit');
    expect(classification.classifyStatusCode(502)).toBe('server');
    expect(classification.classifyStatusCode(404)).toBe('client');
    expect(classification.classifyStatusCode(302)).toBeUndefined();
  });

  it('classifies by message when no status is known', () => {
    expect(classification.classifyError(new Error('connect ECONNREFUSED 127.0.0.1:443'))).toMatchObject({
      category: 'network',
      isRetryable: true,
      matchedPattern: 'econnrefused'
    });
    expect(classification.classifyError(new Error('Too Many Requests'))).toMatchObject({ category: 'rate_limit' });
    expect(classification.classifyError(new SyntaxError("Unexpected token '<', \"<html>\" is not valid JSON"))).toMatchObject({
      category: 'auth',
      isRetryable: false
    });
    expect(classification.classifyError('something odd')).toEqual({ category: 'client', isRetryable: false });
  });

  it('prefers a status code found in the message', () => {
    expect(classification.classifyError(new Error('Request failed with status 503'))).toEqual({
      category: 'server',
      isRetryable: true,
      statusCode: 503
    });
  });

  it('treats aborts as timeouts', () => {
    const abort = new Error('This operation was aborted');
    abort.name = 'AbortError';

    expect(classification.classifyError(abort).category).toBe('timeout');
    expect(classification.classifyError(new Error('socket closed'), { aborted: true }).category).toBe('timeout');
  });

  it('keeps an already classified error and stamps the provider on it', () => {
    const original = new ProviderCallError('parse', 'Malformed response: missing choices');

    const stamped = classification.toProviderCallError(original, 'provider-1');

    expect(stamped).toMatchObject({ category: 'parse', providerId: 'provider-1', message: 'Malformed response: missing choices' });
    expect(classification.toProviderCallError(stamped, 'provider-1')).toBe(stamped);
  });

  it('rewrites the message of an error raised by an aborted call', () => {
    const failure = classification.toProviderCallError(new Error('socket closed'), 'provider-1', { aborted: true });

    expect(failure).toMatchObject({ category: 'timeout', message: 'Request aborted: deadline exceeded', providerId: 'provider-1' });
    expect(failure.isRetryable).toBe(true);
  });
});
