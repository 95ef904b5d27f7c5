import { QueryFailedError } from 'typeorm';
import { UserRepository } from '../repositories/UserRepository';
import { CredentialService } from './credential.service';
import { ConflictError, NotFoundError, UnauthorizedError } from '../errors/http.errors';
import { TokenOut, UserOut } from '../types';

const INVALID_CREDENTIALS = 'Incorrect email or password';

const isUniqueViolation = (error: unknown): boolean =>
  error instanceof QueryFailedError && /UNIQUE constraint failed/i.test(error.message);

export class AuthService {
  constructor(
    private readonly userRepository: UserRepository,
    private readonly credentials: CredentialService
  ) {}

  async register(email: string, password: string): Promise<UserOut> {
    const existing = await this.userRepository.findByEmail(email);
    if (existing) {
      throw new ConflictError('Email already registered');
    }

    const hashedPassword = await this.credentials.hash(password);
    try {
      const user = await this.userRepository.create({ email, hashedPassword });
      return { id: user.id, email: user.email };
    } catch (error) {
      // Another request registered the same email between the check and the insert.
      if (isUniqueViolation(error)) {
        throw new ConflictError('Email already registered');
      }
      throw error;
    }
  }

  async login(email: string, password: string): Promise<TokenOut> {
    const user = await this.userRepository.findByEmailWithPassword(email);
    const valid = user
      ? await this.credentials.verify(password, user.hashedPassword)
      : await this.credentials.verifyAgainstDecoy(password);
    if (!user || !valid) {
      throw new UnauthorizedError(INVALID_CREDENTIALS);
    }

    const accessToken = this.credentials.issueToken({ sub: user.email });
    return { access_token: accessToken, token_type: 'bearer' };
  }

  async me(email: string): Promise<UserOut & { createdAt: Date }> {
    const user = await this.userRepository.findByEmail(email);
    if (!user) {
      throw new NotFoundError('User not found');
    }
    return { id: user.id, email: user.email, createdAt: user.createdAt };
  }
}
