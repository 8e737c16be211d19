import { hash, verify } from 'argon2';

/**
 * Password hashing using Argon2id with the library's default cost.
 */
export class Password {
  static readonly MIN_LENGTH = 8;

  /**
   * Hash a plain text password. A fresh salt is embedded in the result.
   */
  static async hash(plainPassword: string): Promise<string> {
    return await hash(plainPassword);
  }

  /**
   * Verify a plain password against a stored hash (constant-time compare).
   * Rejects when the stored value is not an Argon2 hash.
   */
  static async verify(plainPassword: string, passwordHash: string): Promise<boolean> {
    return await verify(passwordHash, plainPassword);
  }
}
