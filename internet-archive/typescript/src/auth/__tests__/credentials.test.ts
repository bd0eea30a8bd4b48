import { describe, it, expect } from 'vitest';
import { Credentials, SecretString } from '../credentials.js';
import { ArchiveErrorKind, isErrorKind } from '../../errors/error.js';

describe('Credentials', () => {
  it('should build the LOW authorization header', () => {
    expect(new Credentials('AK', 'SK').authorizationHeader()).toBe('LOW AK:SK');
  });

  it.each([
    ['', 'SK'],
    ['AK', ''],
    ['   ', 'SK'],
    ['AK', '  '],
  ])('should reject empty keys (%j, %j)', (accessKey, secretKey) => {
    let thrown: unknown;
    try {
      new Credentials(accessKey, secretKey);
    } catch (error) {
      thrown = error;
    }
    expect(isErrorKind(thrown, ArchiveErrorKind.MissingCredentials)).toBe(true);
  });

  it('should expose the secret through secretKey only', () => {
    const credentials = new Credentials('AK', 'test-secret');
    expect(credentials.secretKey).toBe('test-secret');
    expect(String(credentials)).toBe('Credentials(accessKey=AK, secretKey=[REDACTED])');
    expect(JSON.stringify(credentials)).toBe('{"accessKey":"AK","secretKey":"[REDACTED]"}');
  });

  it('should compare by value', () => {
    expect(new Credentials('AK', 'SK').equals(new Credentials('AK', 'SK'))).toBe(true);
    expect(new Credentials('AK', 'SK').equals(new Credentials('AK', 'other'))).toBe(false);
  });

  describe('fromEnv', () => {
    it('should read both keys', () => {
      const credentials = Credentials.fromEnv({
        AWS_ACCESS_KEY_ID: ' AK ',
        AWS_SECRET_ACCESS_KEY: 'test-secret',
      });
      expect(credentials?.accessKey).toBe('AK');
      expect(credentials?.authorizationHeader()).toBe('LOW AK:test-secret');
    });

    it('should return undefined when a key is missing or empty', () => {
      expect(Credentials.fromEnv({ AWS_ACCESS_KEY_ID: 'AK' })).toBeUndefined();
      expect(Credentials.fromEnv({ AWS_ACCESS_KEY_ID: 'AK', AWS_SECRET_ACCESS_KEY: '' })).toBeUndefined();
      expect(Credentials.fromEnv({})).toBeUndefined();
    });
  });
});

describe('SecretString', () => {
  it('should redact when stringified', () => {
    const secret = new SecretString('test-secret');
    expect(`${secret}`).toBe('[REDACTED]');
    expect(JSON.stringify({ secret })).toBe('{"secret":"[REDACTED]"}');
    expect(secret.expose()).toBe('test-secret');
  });
});
