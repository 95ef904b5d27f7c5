import bcrypt from 'bcrypt';
import jwt from 'jsonwebtoken';
import { AppConfig } from '../config/env.validation';
import { UnauthorizedError, ValidationError } from '../errors/http.errors';
import { TokenClaims } from '../types';

const SALT_ROUNDS = 10;

// bcrypt only reads the first 72 bytes of its input.
export const MAX_PASSWORD_BYTES = 72;

export const fitsBcrypt = (password: string): boolean =>
  Buffer.byteLength(password, 'utf8') <= MAX_PASSWORD_BYTES;

type CredentialConfig = Pick<AppConfig, 'jwtSecret' | 'jwtAlgorithm' | 'accessTokenExpireMinutes'>;

export class CredentialService {
  private decoyHash?: Promise<string>;

  constructor(private readonly config: CredentialConfig) {}

  async hash(password: string): Promise<string> {
    if (!fitsBcrypt(password)) {
      throw new ValidationError(`password must be at most ${MAX_PASSWORD_BYTES} bytes`);
    }
    return await bcrypt.hash(password, SALT_ROUNDS);
  }

  /**
   * Compares in constant time. A stored hash that bcrypt cannot parse, or a
   * password longer than bcrypt reads, counts as a mismatch.
   */
  async verify(password: string, hash: string): Promise<boolean> {
    if (!fitsBcrypt(password)) return false;
    try {
      return await bcrypt.compare(password, hash);
    } catch (error) {
      console.warn('Rejected malformed password hash:', error instanceof Error ? error.message : error);
      return false;
    }
  }

  /**
   * Runs a full comparison against a throwaway hash and always fails, so a
   * login for an unknown account costs as much as one with a wrong password.
   */
  async verifyAgainstDecoy(password: string): Promise<false> {
    this.decoyHash ??= bcrypt.hash('decoy-password', SALT_ROUNDS);
    await this.verify(password, await this.decoyHash);
    return false;
  }

  issueToken(claims: Record<string, unknown>, ttlMinutes = this.config.accessTokenExpireMinutes): string {
    return jwt.sign(claims, this.config.jwtSecret, {
      algorithm: this.config.jwtAlgorithm,
      expiresIn: Math.round(ttlMinutes * 60),
    });
  }

  verifyToken(token: string): TokenClaims {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.config.jwtSecret, {
        algorithms: [this.config.jwtAlgorithm],
      });
    } catch {
      throw new UnauthorizedError('Please authenticate');
    }

    if (
      typeof decoded === 'string' ||
      typeof decoded.sub !== 'string' ||
      typeof decoded.iat !== 'number' ||
      typeof decoded.exp !== 'number'
    ) {
      throw new UnauthorizedError('Please authenticate');
    }
    return { sub: decoded.sub, iat: decoded.iat, exp: decoded.exp };
  }
}
