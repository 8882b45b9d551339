import { db } from '../../../../src/database/postgres';
import { PgLedgerStore, applyPostings } from '../../../../src/database/stores/PgLedgerStore';
import { LedgerInconsistencyError } from '../../../../src/utils/errors';

jest.mock('../../../../src/database/postgres', () => ({
  db: {
    query: jest.fn(),
    transaction: jest.fn(),
  },
}));

const mockedDb = jest.mocked(db);

describe('applyPostings', () => {
  const balances = new Map([
    ['client', 10],
    ['owner', 5],
  ]);

  it('folds postings into the locked balances', () => {
    const next = applyPostings(balances, {
      postings: [
        { userId: 'client', amount: -4, type: 'SPENT', description: 'session', sessionId: 's-1' },
        { userId: 'owner', amount: 4, type: 'EARNED', description: 'session', sessionId: 's-1' },
      ],
    });

    expect([...next]).toEqual([
      ['client', 6],
      ['owner', 9],
    ]);
    expect(balances.get('client')).toBe(10);
  });

  it('refuses postings for users that were not locked', () => {
    expect(() =>
      applyPostings(balances, {
        postings: [{ userId: 'stranger', amount: 1, type: 'BONUS', description: 'gift', sessionId: null }],
      })
    ).toThrow(LedgerInconsistencyError);
  });

  it('refuses postings that overdraw', () => {
    expect(() =>
      applyPostings(balances, {
        postings: [{ userId: 'owner', amount: -6, type: 'PENALTY', description: 'abuse', sessionId: null }],
      })
    ).toThrow('Posting would leave a negative balance');
  });
});

describe('PgLedgerStore', () => {
  const store = new PgLedgerStore(db);

  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('reads balances as numbers', async () => {
    mockedDb.query.mockResolvedValueOnce([{ credits: '42' }]).mockResolvedValueOnce([]);

    await expect(store.balance('user-1')).resolves.toBe(42);
    await expect(store.balance('missing')).resolves.toBeNull();
  });

  it('reports users whose cached balance drifted from their transactions', async () => {
    mockedDb.query.mockResolvedValue([{ id: 'user-1', credits: '10', total: '12' }]);

    await expect(store.audit()).resolves.toEqual([{ userId: 'user-1', cachedBalance: 10, transactionSum: 12 }]);
  });
});
