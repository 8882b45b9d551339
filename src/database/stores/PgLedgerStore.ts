import { v4 as uuidv4 } from 'uuid';
import { Database, TransactionClient } from '../postgres';
import { CreditTransaction, SessionSettlement } from '../models';
import { LedgerInconsistencyError, NotFoundError } from '../../utils/errors';
import {
  BalanceMismatch,
  LedgerCommand,
  LedgerCommitResult,
  LedgerPlan,
  LedgerStore,
} from './types';
import { SettlementRow, TransactionRow, mapSettlement, mapTransaction } from './rows';

export class PgLedgerStore implements LedgerStore {
  constructor(private readonly db: Database) {}

  async commit(command: LedgerCommand): Promise<LedgerCommitResult> {
    return this.db.transaction(async (client) => {
      const balances = await this.lockBalances(client, command.userIds);

      if (command.settlementSessionId) {
        const existing = await client.query<SettlementRow>(
          'SELECT * FROM session_settlements WHERE session_id = $1',
          [command.settlementSessionId]
        );
        if (existing.rows.length > 0) {
          return {
            transactions: [],
            balances,
            settlement: mapSettlement(existing.rows[0]),
            replayed: true,
          };
        }
      }

      const plan = command.plan(new Map(balances));
      const next = applyPostings(balances, plan);

      for (const [userId, credits] of next) {
        if (credits !== balances.get(userId)) {
          await client.query('UPDATE users SET credits = $2 WHERE id = $1', [userId, credits]);
        }
      }

      const transactions: CreditTransaction[] = [];
      for (const posting of plan.postings) {
        const result = await client.query<TransactionRow>(
          `INSERT INTO credit_transactions (id, user_id, amount, transaction_type, description, session_id, created_at)
           VALUES ($1, $2, $3, $4, $5, $6, $7)
           RETURNING *`,
          [uuidv4(), posting.userId, posting.amount, posting.type, posting.description, posting.sessionId, command.at]
        );
        transactions.push(mapTransaction(result.rows[0]));
      }

      let settlement: SessionSettlement | null = null;
      if (plan.settlement) {
        const result = await client.query<SettlementRow>(
          `INSERT INTO session_settlements (session_id, client_charge, owner_credit, shortfall, settled_at)
           VALUES ($1, $2, $3, $4, $5)
           RETURNING *`,
          [
            plan.settlement.sessionId,
            plan.settlement.clientCharge,
            plan.settlement.ownerCredit,
            plan.settlement.shortfall,
            command.at,
          ]
        );
        settlement = mapSettlement(result.rows[0]);
        await this.verifySettlement(client, plan);
      }

      await this.verifyBalances(client, next);

      return { transactions, balances: next, settlement, replayed: false };
    });
  }

  async balance(userId: string): Promise<number | null> {
    const rows = await this.db.query<{ credits: string }>('SELECT credits FROM users WHERE id = $1', [userId]);
    return rows.length > 0 ? Number(rows[0].credits) : null;
  }

  async history(userId: string, limit: number): Promise<CreditTransaction[]> {
    const rows = await this.db.query<TransactionRow>(
      `SELECT * FROM credit_transactions
       WHERE user_id = $1
       ORDER BY created_at DESC, id
       LIMIT $2`,
      [userId, limit]
    );
    return rows.map(mapTransaction);
  }

  async getSettlement(sessionId: string): Promise<SessionSettlement | null> {
    const rows = await this.db.query<SettlementRow>(
      'SELECT * FROM session_settlements WHERE session_id = $1',
      [sessionId]
    );
    return rows.length > 0 ? mapSettlement(rows[0]) : null;
  }

  async audit(): Promise<BalanceMismatch[]> {
    const rows = await this.db.query<{ id: string; credits: string; total: string }>(
      `SELECT u.id, u.credits, COALESCE(SUM(t.amount), 0) AS total
       FROM users u
       LEFT JOIN credit_transactions t ON t.user_id = u.id
       GROUP BY u.id, u.credits
       HAVING u.credits <> COALESCE(SUM(t.amount), 0)
       ORDER BY u.id`
    );
    return rows.map((row) => ({
      userId: row.id,
      cachedBalance: Number(row.credits),
      transactionSum: Number(row.total),
    }));
  }

  // Rows are locked in id order so two commits touching the same users never deadlock
  private async lockBalances(client: TransactionClient, userIds: string[]): Promise<Map<string, number>> {
    const ids = [...new Set(userIds)].sort();
    const result = await client.query<{ id: string; credits: string }>(
      'SELECT id, credits FROM users WHERE id = ANY($1) ORDER BY id FOR UPDATE',
      [ids]
    );
    if (result.rows.length !== ids.length) {
      throw new NotFoundError('User');
    }
    return new Map(result.rows.map((row) => [row.id, Number(row.credits)]));
  }

  private async verifySettlement(client: TransactionClient, plan: LedgerPlan): Promise<void> {
    if (!plan.settlement) {
      return;
    }
    const sessionId = plan.settlement.sessionId;
    const expected = plan.postings
      .filter((posting) => posting.sessionId === sessionId)
      .reduce((sum, posting) => sum + posting.amount, 0);
    const expectedCount = plan.postings.filter((posting) => posting.sessionId === sessionId).length;

    const result = await client.query<{ total: string | null; count: string }>(
      'SELECT SUM(amount) AS total, COUNT(*) AS count FROM credit_transactions WHERE session_id = $1',
      [sessionId]
    );
    const total = Number(result.rows[0]?.total ?? 0);
    const count = Number(result.rows[0]?.count ?? 0);
    if (total !== expected || count !== expectedCount) {
      throw new LedgerInconsistencyError('Settlement postings did not read back as written', {
        sessionId,
        expectedTotal: expected,
        total,
        expectedCount,
        count,
      });
    }
  }

  private async verifyBalances(client: TransactionClient, expected: Map<string, number>): Promise<void> {
    const result = await client.query<{ id: string; credits: string }>(
      'SELECT id, credits FROM users WHERE id = ANY($1)',
      [[...expected.keys()]]
    );
    for (const row of result.rows) {
      if (Number(row.credits) !== expected.get(row.id)) {
        throw new LedgerInconsistencyError('Cached balance did not read back as written', {
          userId: row.id,
          expected: expected.get(row.id),
          actual: Number(row.credits),
        });
      }
    }
  }
}

/** Folds the plan's postings into the locked balances. */
export function applyPostings(balances: Map<string, number>, plan: LedgerPlan): Map<string, number> {
  const next = new Map(balances);
  for (const posting of plan.postings) {
    const current = next.get(posting.userId);
    if (current === undefined) {
      throw new LedgerInconsistencyError('Posting for a user whose balance was not locked', {
        userId: posting.userId,
      });
    }
    const updated = current + posting.amount;
    if (updated < 0) {
      throw new LedgerInconsistencyError('Posting would leave a negative balance', {
        userId: posting.userId,
        balance: current,
        amount: posting.amount,
      });
    }
    next.set(posting.userId, updated);
  }
  return next;
}
