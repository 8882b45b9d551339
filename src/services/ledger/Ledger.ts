import { CreditTransaction, SessionSettlement, TransactionType } from '../../database/models';
import { BalanceMismatch, LedgerStore, Posting } from '../../database/stores';
import { Clock, systemClock } from '../../utils/clock';
import {
  InsufficientCreditsError,
  LedgerInconsistencyError,
  NotFoundError,
  ValidationError,
} from '../../utils/errors';
import { logger } from '../../utils/logger';

const DEBIT_TYPES: ReadonlySet<TransactionType> = new Set<TransactionType>(['SPENT', 'PENALTY']);

export interface SettlementRequest {
  sessionId: string;
  clientUserId: string;
  /** Null for sessions served by PUBLIC gateways. */
  ownerUserId: string | null;
  credits: number;
}

export interface SettlementOutcome {
  settlement: SessionSettlement;
  /** True when the session had already been settled and nothing was posted. */
  replayed: boolean;
}

/**
 * Sole writer of credit balances. Every mutation is a set of postings
 * committed together with the cached balances they move.
 */
export class Ledger {
  constructor(
    private readonly store: LedgerStore,
    private readonly clock: Clock = systemClock
  ) {}

  async record(
    userId: string,
    amount: number,
    type: TransactionType,
    description: string,
    sessionId: string | null = null
  ): Promise<string> {
    if (!Number.isInteger(amount) || amount === 0) {
      throw new ValidationError('Transaction amount must be a non-zero integer');
    }
    const isDebit = DEBIT_TYPES.has(type);
    if (isDebit !== amount < 0) {
      throw new ValidationError(`${type} transactions must be ${isDebit ? 'negative' : 'positive'}`);
    }

    const result = await this.store.commit({
      userIds: [userId],
      at: this.clock.now(),
      plan: (balances) => {
        const balance = balances.get(userId) ?? 0;
        if (balance + amount < 0) {
          throw new InsufficientCreditsError(-amount, balance);
        }
        return { postings: [{ userId, amount, type, description, sessionId }] };
      },
    });

    const transaction = result.transactions[0];
    logger.info('Credit transaction recorded', { userId, amount, type, transactionId: transaction.id });
    return transaction.id;
  }

  async balance(userId: string): Promise<number> {
    const balance = await this.store.balance(userId);
    if (balance === null) {
      throw new NotFoundError('User');
    }
    return balance;
  }

  /**
   * Charges the client and pays the node owner for one session, exactly once.
   * The charge is capped at the client's balance and the remainder recorded
   * as shortfall on the settlement row.
   */
  async settleSession(request: SettlementRequest): Promise<SettlementOutcome> {
    const { sessionId, clientUserId, ownerUserId, credits } = request;
    if (!Number.isInteger(credits) || credits < 0) {
      throw new ValidationError('Settlement credits must be a non-negative integer');
    }

    const result = await this.store.commit({
      userIds: ownerUserId ? [clientUserId, ownerUserId] : [clientUserId],
      settlementSessionId: sessionId,
      at: this.clock.now(),
      plan: (balances) => {
        const available = balances.get(clientUserId) ?? 0;
        const charge = Math.min(credits, available);
        const ownerCredit = ownerUserId ? charge : 0;

        const postings: Posting[] = [];
        if (charge > 0) {
          postings.push({
            userId: clientUserId,
            amount: -charge,
            type: 'SPENT',
            description: `VPN session ${sessionId}`,
            sessionId,
          });
          if (ownerUserId) {
            postings.push({
              userId: ownerUserId,
              amount: ownerCredit,
              type: 'EARNED',
              description: `Bandwidth shared in session ${sessionId}`,
              sessionId,
            });
          }
        }

        const net = postings.reduce((sum, posting) => sum + posting.amount, 0);
        if (net !== ownerCredit - charge) {
          throw new LedgerInconsistencyError('Settlement postings do not balance', { sessionId, net });
        }

        return {
          postings,
          settlement: { sessionId, clientCharge: charge, ownerCredit, shortfall: credits - charge },
        };
      },
    });

    if (!result.settlement) {
      throw new LedgerInconsistencyError('Settlement commit returned no settlement row', { sessionId });
    }

    if (result.replayed) {
      logger.debug('Session already settled', { sessionId });
    } else if (result.settlement.shortfall > 0) {
      logger.warn('Session settled with shortfall', {
        sessionId,
        clientUserId,
        charged: result.settlement.clientCharge,
        shortfall: result.settlement.shortfall,
      });
    } else {
      logger.info('Session settled', { sessionId, charged: result.settlement.clientCharge });
    }

    return { settlement: result.settlement, replayed: result.replayed };
  }

  async history(userId: string, limit = 50): Promise<CreditTransaction[]> {
    return this.store.history(userId, Math.min(Math.max(limit, 1), 200));
  }

  async getSettlement(sessionId: string): Promise<SessionSettlement | null> {
    return this.store.getSettlement(sessionId);
  }

  /** Users whose cached balance no longer equals the sum of their transactions. */
  async audit(): Promise<BalanceMismatch[]> {
    const mismatches = await this.store.audit();
    for (const mismatch of mismatches) {
      logger.error('Ledger balance mismatch', { ...mismatch });
    }
    return mismatches;
  }
}
