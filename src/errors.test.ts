import { describe, it, expect } from 'vitest';
import {
  AuthenticationError,
  classifyError,
  HttpStatusError,
  ImageSearchApiError,
  RateLimitError,
  SearchError,
} from './errors.js';

describe('classifyError', () => {
  it('should classify 401 as an authentication error with the API message', () => {
    const body = { error: { message: 'bad key' } };
    const error = classifyError(401, body);

    expect(error).toBeInstanceOf(AuthenticationError);
    expect(error).toBeInstanceOf(ImageSearchApiError);
    expect(error.message).toBe('Authentication failed: bad key');
    expect(error.statusCode).toBe(401);
    expect(error.response).toEqual(body);
  });

  it('should classify 429 without a body as a rate limit error', () => {
    const error = classifyError(429, null);

    expect(error).toBeInstanceOf(RateLimitError);
    expect(error.message).toBe('Rate limit exceeded: Unknown API error');
    expect(error.response).toBeNull();
  });

  it('should classify any other status as a search error', () => {
    const error = classifyError(500, { error: { code: 'InternalError', message: 'try later' } });

    expect(error).toBeInstanceOf(SearchError);
    expect(error.message).toBe('Search error (500): try later');
  });

  it('should fall back to the generic message for malformed bodies', () => {
    expect(classifyError(503, 'Service Unavailable').message).toBe('Search error (503): Unknown API error');
    expect(classifyError(400, { error: 'nope' }).message).toBe('Search error (400): Unknown API error');
    expect(classifyError(400, { error: { message: 12 } }).message).toBe('Search error (400): Unknown API error');
  });

  it('should set error names', () => {
    expect(classifyError(401, null).name).toBe('AuthenticationError');
    expect(classifyError(429, null).name).toBe('RateLimitError');
    expect(classifyError(404, null).name).toBe('SearchError');
  });
});

describe('HttpStatusError', () => {
  it('should carry status and body for later classification', () => {
    const error = new HttpStatusError(401, 'Unauthorized', { error: { message: 'bad key' } });

    expect(error.message).toBe('HTTP 401 Unauthorized');
    expect(classifyError(error.status, error.body).message).toBe('Authentication failed: bad key');
  });

  it('should omit an empty status text', () => {
    expect(new HttpStatusError(502, '', null).message).toBe('HTTP 502');
  });
});
