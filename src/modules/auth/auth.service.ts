import jwt from 'jsonwebtoken';
import type { User } from '../../connections/db/models';
import { appConfig } from '../../connections/config/app.config';
import type { AuthUser } from '../../types/request.types';
import { UnauthorizedError } from '../../utils/errors';
import { logger } from '../../utils/logging';
import type { AdminRepository } from '../admins/admins.repository';
import type { UserRepository } from '../users/users.repository';
import type { LoginInput, RegisterInput } from './auth.validation';

export interface AuthResult {
  user: User;
  token: string;
}

export class AuthService {
  constructor(
    private readonly users: UserRepository,
    private readonly admins: AdminRepository
  ) {}

  signToken(userId: number): string {
    return jwt.sign({ userId }, appConfig.jwtSecret, { expiresIn: appConfig.jwtExpiresIn });
  }

  async register(input: RegisterInput): Promise<AuthResult> {
    const user = await this.users.create(input);
    logger.info('User registered', { userId: user.id });
    return { user, token: this.signToken(user.id) };
  }

  async login(input: LoginInput): Promise<AuthResult> {
    const credentials = await this.users.findCredentialsByEmail(input.email);
    if (!credentials || !(await this.users.verifyPassword(credentials, input.password))) {
      throw new UnauthorizedError('Incorrect email or password');
    }

    const user = await this.users.get(credentials.id);
    return { user, token: this.signToken(user.id) };
  }

  /**
   * Verify a bearer token and load the caller it belongs to.
   * Throws JsonWebTokenError / TokenExpiredError for bad tokens.
   */
  async resolveToken(token: string): Promise<AuthUser> {
    const decoded = jwt.verify(token, appConfig.jwtSecret);
    if (typeof decoded !== 'object' || typeof decoded.userId !== 'number') {
      throw new UnauthorizedError('Invalid token');
    }

    const user = await this.users.findById(decoded.userId);
    if (!user) {
      throw new UnauthorizedError('User no longer exists');
    }

    const admin = await this.admins.findByUserId(user.id);
    return {
      id: user.id,
      email: user.email,
      role: user.role,
      is_admin: admin !== undefined,
      admin_level: admin?.access_level ?? null,
    };
  }
}
