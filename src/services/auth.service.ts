import { SessionRepository } from '../repositories/session.repository';
import { UserRepository } from '../repositories/user.repository';
import { LoginResult } from '../types/auth.types';
import { User, UserWithCredentials } from '../types/user.types';
import { verifyPassword } from '../utils/password';
import { generateSessionToken, hashSessionToken } from '../utils/session-token';
import { TOKEN_TTL_MS } from '../config/environment';
import { logger } from '../config/logger';

/**
 * Auth Service
 *
 * Password login and opaque bearer sessions
 */
export class AuthService {
  constructor(
    private userRepo: UserRepository,
    private sessionRepo: SessionRepository,
    private tokenTtlMs: number = TOKEN_TTL_MS
  ) {}

  /**
   * Returns null for an unknown email or a wrong password; callers cannot
   * tell the two apart.
   */
  async login(email: string, password: string): Promise<LoginResult | null> {
    const account = await this.userRepo.findByEmail(email);

    if (!account || !(await verifyPassword(password, account.passwordHash))) {
      logger.warn('Failed login attempt');
      return null;
    }

    const now = new Date();
    const purged = await this.sessionRepo.deleteExpired(now);
    if (purged > 0) logger.debug('Expired sessions removed', { count: purged });

    const token = generateSessionToken();
    const expiresAt = new Date(now.getTime() + this.tokenTtlMs);

    await this.sessionRepo.create({
      userId: account.id,
      tokenHash: hashSessionToken(token),
      expiresAt,
    });

    logger.info('User logged in', { userId: account.id });

    return {
      token,
      tokenType: 'Bearer',
      expiresIn: Math.floor(this.tokenTtlMs / 1000),
      user: this.toPublicUser(account),
    };
  }

  /**
   * Resolve a bearer token to its user, or null when unknown or expired
   */
  async authenticate(token: string): Promise<User | null> {
    const session = await this.sessionRepo.findActiveByTokenHash(hashSessionToken(token), new Date());
    if (!session) return null;

    return this.userRepo.findById(session.userId);
  }

  async logout(token: string): Promise<boolean> {
    return this.sessionRepo.deleteByTokenHash(hashSessionToken(token));
  }

  private toPublicUser(account: UserWithCredentials): User {
    const { passwordHash: _passwordHash, ...user } = account;
    return user;
  }
}
