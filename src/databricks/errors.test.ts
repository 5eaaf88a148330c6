import { describe, it, expect } from 'vitest';
import { parseErrorBody, parseRetryAfter } from './errors.js';

describe('parseErrorBody', () => {
  it('reads error_code and message', () => {
    expect(
      parseErrorBody('{"error_code":"RESOURCE_DOES_NOT_EXIST","message":"Cluster c-1 does not exist"}')
    ).toEqual({ errorCode: 'RESOURCE_DOES_NOT_EXIST', message: 'Cluster c-1 does not exist' });
  });

  it('reads SCIM detail', () => {
    expect(parseErrorBody('{"detail":"User not found","status":"404"}')).toEqual({
      errorCode: undefined,
      message: 'User not found',
    });
  });

  it('uses non-JSON bodies as the message', () => {
    expect(parseErrorBody('<html>Bad Gateway</html>')).toEqual({ message: '<html>Bad Gateway</html>' });
  });

  it('returns nothing for an empty body', () => {
    expect(parseErrorBody('')).toEqual({});
  });
});

describe('parseRetryAfter', () => {
  it('reads delta-seconds', () => {
    expect(parseRetryAfter('3')).toBe(3000);
    expect(parseRetryAfter('1.5')).toBe(1500);
  });

  it('reads an HTTP date relative to now', () => {
    const now = Date.parse('2026-01-01T00:00:00Z');
    expect(parseRetryAfter('Thu, 01 Jan 2026 00:00:10 GMT', now)).toBe(10000);
  });

  it('ignores missing or unparseable values', () => {
    expect(parseRetryAfter(null)).toBeUndefined();
    expect(parseRetryAfter('soon')).toBeUndefined();
  });
});
