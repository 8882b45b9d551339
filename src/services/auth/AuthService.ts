import { v4 as uuidv4 } from 'uuid';
import { User } from '../../database/models';
import { UserStore } from '../../database/stores';
import { Clock, systemClock } from '../../utils/clock';
import { NotFoundError, UnauthorizedError, ValidationError } from '../../utils/errors';
import { hashPassword, verifyPassword } from '../../utils/hash';
import { logger } from '../../utils/logger';
import { TokenIssuer } from './tokens';

const USERNAME = /^[a-zA-Z0-9_.-]{3,32}$/;
const MIN_PASSWORD_LENGTH = 8;

export interface LoginResult {
  token: string;
  userId: string;
  username: string;
}

export class AuthService {
  constructor(
    private readonly users: UserStore,
    private readonly tokens: TokenIssuer,
    private readonly signupBonus: number,
    private readonly clock: Clock = systemClock
  ) {}

  async register(username: string, password: string): Promise<User> {
    if (!USERNAME.test(username)) {
      throw new ValidationError('Username must be 3-32 characters of letters, digits, dot, dash or underscore');
    }
    if (password.length < MIN_PASSWORD_LENGTH) {
      throw new ValidationError(`Password must be at least ${MIN_PASSWORD_LENGTH} characters`);
    }

    const user = await this.users.create({
      id: uuidv4(),
      username,
      passwordHash: await hashPassword(password),
      createdAt: this.clock.now(),
      bonus:
        this.signupBonus > 0
          ? { transactionId: uuidv4(), amount: this.signupBonus, description: 'Welcome bonus' }
          : undefined,
    });

    logger.info('User registered', { userId: user.id, username, credits: user.credits });
    return user;
  }

  async login(username: string, password: string): Promise<LoginResult> {
    const user = await this.users.findByUsername(username);
    // Same error for unknown users and wrong passwords
    if (!user || !(await verifyPassword(password, user.passwordHash))) {
      throw new UnauthorizedError('Invalid credentials');
    }

    logger.info('User logged in', { userId: user.id });
    return {
      token: this.tokens.signUserToken(user.id, user.username),
      userId: user.id,
      username: user.username,
    };
  }

  async getUser(userId: string): Promise<User> {
    const user = await this.users.findById(userId);
    if (!user) {
      throw new NotFoundError('User');
    }
    return user;
  }
}
