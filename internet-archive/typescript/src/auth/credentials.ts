/**
 * IAS3 access key credentials.
 * @module internet-archive-client/auth/credentials
 */

import { ArchiveError } from '../errors/error.js';

/** Environment variable holding the access key. */
export const ACCESS_KEY_ENV = 'AWS_ACCESS_KEY_ID';

/** Environment variable holding the secret key. */
export const SECRET_KEY_ENV = 'AWS_SECRET_ACCESS_KEY';

/**
 * Secret string wrapper to prevent accidental exposure.
 */
export class SecretString {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  /**
   * Exposes the secret value.
   * Use with caution - avoid logging or displaying.
   */
  expose(): string {
    return this.value;
  }

  toString(): string {
    return '[REDACTED]';
  }

  toJSON(): string {
    return '[REDACTED]';
  }
}

/**
 * Access key and secret key pair for the archive's S3-like API.
 *
 * Keys are issued at https://archive.org/account/s3.php.
 *
 * @example
 * ```typescript
 * const credentials = new Credentials('AK', 'SK');
 * credentials.authorizationHeader(); // 'LOW AK:SK'
 * ```
 */
export class Credentials {
  readonly accessKey: string;
  private readonly secret: SecretString;

  /**
   * @throws {ArchiveError} `MissingCredentials` when either key is empty
   */
  constructor(accessKey: string, secretKey: string) {
    if (typeof accessKey !== 'string' || accessKey.trim() === '') {
      throw ArchiveError.missingCredentials();
    }
    if (typeof secretKey !== 'string' || secretKey.trim() === '') {
      throw ArchiveError.missingCredentials();
    }

    this.accessKey = accessKey;
    this.secret = new SecretString(secretKey);
  }

  get secretKey(): string {
    return this.secret.expose();
  }

  /**
   * Value of the `authorization` header: `LOW <access>:<secret>`.
   */
  authorizationHeader(): string {
    return `LOW ${this.accessKey}:${this.secret.expose()}`;
  }

  equals(other: Credentials): boolean {
    return this.accessKey === other.accessKey && this.secretKey === other.secretKey;
  }

  /**
   * Loads credentials from `AWS_ACCESS_KEY_ID` and `AWS_SECRET_ACCESS_KEY`.
   *
   * Returns `undefined` if either variable is unset or empty.
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): Credentials | undefined {
    const accessKey = env[ACCESS_KEY_ENV]?.trim();
    const secretKey = env[SECRET_KEY_ENV]?.trim();

    if (!accessKey || !secretKey) {
      return undefined;
    }

    return new Credentials(accessKey, secretKey);
  }

  toString(): string {
    return `Credentials(accessKey=${this.accessKey}, secretKey=${this.secret.toString()})`;
  }

  toJSON(): Record<string, string> {
    return {
      accessKey: this.accessKey,
      secretKey: this.secret.toJSON(),
    };
  }
}
