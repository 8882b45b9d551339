import { db } from '../../../../src/database/postgres';
import { redis } from '../../../../src/database/redis';
import { PgNodeStore } from '../../../../src/database/stores/PgNodeStore';
import { NodeRow } from '../../../../src/database/stores/rows';

jest.mock('../../../../src/database/postgres', () => ({
  db: {
    query: jest.fn(),
    transaction: jest.fn(),
  },
}));

jest.mock('../../../../src/database/redis', () => ({
  redis: {
    get: jest.fn(),
    set: jest.fn(),
    del: jest.fn(),
  },
}));

const mockedDb = jest.mocked(db);
const mockedRedis = jest.mocked(redis);

function nodeRow(overrides: Partial<NodeRow> = {}): NodeRow {
  return {
    id: 'node-1',
    user_id: 'owner-1',
    public_ip_hash: 'hash',
    country_code: 'DE',
    city: null,
    available_bandwidth_mbps: 100,
    max_connections: 10,
    current_connections: 2,
    protocols: ['WIREGUARD', 'SOMETHING_ELSE'],
    uptime_percentage: 99.5,
    avg_latency_ms: 40,
    reputation_score: 87.5,
    is_online: true,
    is_disabled: false,
    last_heartbeat: new Date('2026-03-01T12:00:00.000Z'),
    missed_heartbeats: 0,
    allow_streaming: true,
    allow_torrents: false,
    allow_countries: ['*'],
    block_countries: ['XX'],
    max_daily_bytes: '53687091200',
    daily_bytes_used: '1024',
    daily_usage_date: '2026-03-01',
    node_group: 'COMMUNITY',
    public_config_data: null,
    created_at: new Date('2026-02-01T00:00:00.000Z'),
    updated_at: new Date('2026-03-01T12:00:00.000Z'),
    ...overrides,
  };
}

describe('PgNodeStore', () => {
  let store: PgNodeStore;

  beforeEach(() => {
    jest.clearAllMocks();
    store = new PgNodeStore(db, redis);
  });

  describe('get', () => {
    it('maps database rows and caches them', async () => {
      mockedRedis.get.mockResolvedValue(null);
      mockedDb.query.mockResolvedValue([nodeRow()]);

      const node = await store.get('node-1');

      expect(node).toMatchObject({
        id: 'node-1',
        ownerId: 'owner-1',
        protocols: ['WIREGUARD'],
        quality: { uptimePercentage: 99.5, avgLatencyMs: 40, reputationScore: 87.5 },
        policy: { blockCountries: ['XX'], maxDailyBytes: 53687091200 },
        dailyBytesUsed: 1024,
        group: 'COMMUNITY',
      });
      expect(mockedDb.query).toHaveBeenCalledWith('SELECT * FROM nodes WHERE id = $1', ['node-1']);
      expect(mockedRedis.set).toHaveBeenCalledWith('node:node-1', nodeRow(), 60);
    });

    it('serves cached nodes without a query', async () => {
      mockedRedis.get.mockImplementation(async (_key, revive) =>
        revive(JSON.parse(JSON.stringify(nodeRow({ current_connections: 7 }))))
      );

      const node = await store.get('node-1');

      expect(node?.currentConnections).toBe(7);
      expect(node?.lastHeartbeat).toEqual(new Date('2026-03-01T12:00:00.000Z'));
      expect(mockedDb.query).not.toHaveBeenCalled();
    });

    it('bypasses the cache for fresh reads', async () => {
      mockedDb.query.mockResolvedValue([nodeRow()]);

      await store.get('node-1', { fresh: true });

      expect(mockedRedis.get).not.toHaveBeenCalled();
      expect(mockedDb.query).toHaveBeenCalledTimes(1);
    });

    it('falls back to the database when the cache is down', async () => {
      mockedRedis.get.mockRejectedValue(new Error('Redis client not connected'));
      mockedRedis.set.mockRejectedValue(new Error('Redis client not connected'));
      mockedDb.query.mockResolvedValue([nodeRow()]);

      await expect(store.get('node-1')).resolves.toMatchObject({ id: 'node-1' });
    });

    it('returns null for unknown nodes', async () => {
      mockedRedis.get.mockResolvedValue(null);
      mockedDb.query.mockResolvedValue([]);

      await expect(store.get('missing')).resolves.toBeNull();
    });
  });

  describe('writes', () => {
    it('reserves a slot only on live nodes with spare capacity', async () => {
      mockedDb.query.mockResolvedValue([]);
      const cutoff = new Date('2026-03-01T11:58:30.000Z');

      await expect(store.tryReserveSlot('node-1', cutoff)).resolves.toBeNull();

      const [sql, params] = mockedDb.query.mock.calls[0];
      expect(sql).toContain('current_connections < max_connections');
      expect(sql).toContain('last_heartbeat >= $2');
      expect(params).toEqual(['node-1', cutoff]);
      expect(mockedRedis.del).toHaveBeenCalledWith('node:node-1');
    });

    it('guards capacity reductions in the update itself', async () => {
      mockedDb.query.mockResolvedValue([nodeRow({ max_connections: 5 })]);

      const node = await store.updateSettings('node-1', { city: 'Berlin', maxConnections: 5 });

      const [sql, params] = mockedDb.query.mock.calls[0];
      expect(sql).toContain('city = $2, max_connections = $3, updated_at = NOW()');
      expect(sql).toContain('AND current_connections <= $4');
      expect(params).toEqual(['node-1', 'Berlin', 5, 5]);
      expect(node?.maxConnections).toBe(5);
    });

    it('builds candidate filters in parameter order', async () => {
      mockedDb.query.mockResolvedValue([]);

      await store.listCandidates({ protocol: 'WIREGUARD', group: 'COMMUNITY', countryCode: 'DE' });

      const [sql, params] = mockedDb.query.mock.calls[0];
      expect(sql).toContain('protocols @> $1::jsonb AND node_group = $2 AND country_code = $3');
      expect(params).toEqual(['["WIREGUARD"]', 'COMMUNITY', 'DE']);
    });
  });

  it('counts online nodes per group', async () => {
    mockedDb.query.mockResolvedValue([{ node_group: 'PUBLIC', count: '4' }]);

    await expect(store.countOnlineByGroup()).resolves.toEqual({ COMMUNITY: 0, PUBLIC: 4 });
  });
});
