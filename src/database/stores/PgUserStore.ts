import { Database } from '../postgres';
import { User } from '../models';
import { ConflictError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { NewUser, UserStore } from './types';
import { UserRow, isUniqueViolation, mapUser } from './rows';

export class PgUserStore implements UserStore {
  constructor(private readonly db: Database) {}

  async create(user: NewUser): Promise<User> {
    try {
      const { bonus } = user;
      if (!bonus) {
        const rows = await this.db.query<UserRow>(
          `INSERT INTO users (id, username, password_hash, credits, created_at)
           VALUES ($1, $2, $3, 0, $4)
           RETURNING *`,
          [user.id, user.username, user.passwordHash, user.createdAt]
        );
        return mapUser(rows[0]);
      }

      return await this.db.transaction(async (client) => {
        const result = await client.query<UserRow>(
          `INSERT INTO users (id, username, password_hash, credits, created_at)
           VALUES ($1, $2, $3, $4, $5)
           RETURNING *`,
          [user.id, user.username, user.passwordHash, bonus.amount, user.createdAt]
        );
        await client.query(
          `INSERT INTO credit_transactions (id, user_id, amount, transaction_type, description, session_id, created_at)
           VALUES ($1, $2, $3, 'BONUS', $4, NULL, $5)`,
          [bonus.transactionId, user.id, bonus.amount, bonus.description, user.createdAt]
        );
        return mapUser(result.rows[0]);
      });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError(`Username ${user.username} is already taken`);
      }
      logger.error('Failed to create user', { error, username: user.username });
      throw error;
    }
  }

  async findById(id: string): Promise<User | null> {
    const rows = await this.db.query<UserRow>('SELECT * FROM users WHERE id = $1', [id]);
    return rows.length > 0 ? mapUser(rows[0]) : null;
  }

  async findByUsername(username: string): Promise<User | null> {
    const rows = await this.db.query<UserRow>('SELECT * FROM users WHERE username = $1', [username]);
    return rows.length > 0 ? mapUser(rows[0]) : null;
  }
}
