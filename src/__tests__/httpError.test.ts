import { describe, expect, it } from 'vitest';
import { ConflictError, getErrorStatus, truncateMessage } from '../errors/http-error';

describe('truncateMessage', () => {
  it('leaves short messages alone', () => {
    expect(truncateMessage('HTTP 500 Internal Server Error')).toBe('HTTP 500 Internal Server Error');
  });

  it('never splits a surrogate pair', () => {
    const message = `a${'😀'.repeat(250)}`;
    const truncated = truncateMessage(message);

    expect(truncated).toBe(`a${'😀'.repeat(199)}`);
    expect(Array.from(truncated)).toHaveLength(200);
  });
});

describe('getErrorStatus', () => {
  it('reads the status of an HttpError', () => {
    expect(getErrorStatus(new ConflictError('busy'))).toBe(409);
    expect(getErrorStatus(new Error('boom'))).toBeUndefined();
  });
});
