/**
 * Registry secrets must never reach error messages, run records or logs
 * in clear text.
 */

import { maskSecret, maskSecretsInMessage } from '../../src/domain/errors';

describe('maskSecret', () => {
  it('masks all but the last 4 characters of long secrets', () => {
    expect(maskSecret('test-secret')).toBe('*******cret');
  });

  it('fully masks secrets shorter than 8 characters', () => {
    expect(maskSecret('short')).toBe('****');
    expect(maskSecret('1234567')).toBe('****');
    expect(maskSecret('')).toBe('****');
  });

  it('keeps the last 4 characters of an 8-character secret', () => {
    expect(maskSecret('12345678')).toBe('****5678');
  });
});

describe('maskSecretsInMessage', () => {
  it('masks every occurrence', () => {
    expect(maskSecretsInMessage('login test-secret failed; retry with test-secret', ['test-secret'])).toBe(
      'login *******cret failed; retry with *******cret',
    );
  });

  it('masks several secrets', () => {
    expect(maskSecretsInMessage('user test-user token test-token', ['test-user', 'test-token'])).toBe(
      'user *****user token ******oken',
    );
  });

  it('treats secrets as literal text, not patterns', () => {
    expect(maskSecretsInMessage('value a.b*c+d(e)', ['a.b*c+d(e)'])).toBe('value ******d(e)');
  });

  it('ignores empty secrets', () => {
    expect(maskSecretsInMessage('nothing to hide', ['', 'absent-secret'])).toBe('nothing to hide');
  });
});
