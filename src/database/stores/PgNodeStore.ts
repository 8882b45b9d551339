import { z } from 'zod';
import { Database } from '../postgres';
import { Cache } from '../redis';
import { NODE_GROUPS, Node, NodeGroup } from '../models';
import { logger } from '../../utils/logger';
import {
  CandidateQuery,
  LivenessPatch,
  LivenessSnapshot,
  NewNode,
  NodeSettingsPatch,
  NodeStore,
} from './types';
import { NodeRow, mapNode } from './rows';

const bigint = z.union([z.string(), z.number()]);

const cachedNodeRowSchema = z.object({
  id: z.string(),
  user_id: z.string().nullable(),
  public_ip_hash: z.string(),
  country_code: z.string(),
  city: z.string().nullable(),
  available_bandwidth_mbps: z.number(),
  max_connections: z.number(),
  current_connections: z.number(),
  protocols: z.array(z.string()),
  uptime_percentage: z.number(),
  avg_latency_ms: z.number(),
  reputation_score: z.number(),
  is_online: z.boolean(),
  is_disabled: z.boolean(),
  last_heartbeat: z.coerce.date(),
  missed_heartbeats: z.number(),
  allow_streaming: z.boolean(),
  allow_torrents: z.boolean(),
  allow_countries: z.array(z.string()),
  block_countries: z.array(z.string()),
  max_daily_bytes: bigint,
  daily_bytes_used: bigint,
  daily_usage_date: z.string(),
  node_group: z.string(),
  public_config_data: z.string().nullable(),
  created_at: z.coerce.date(),
  updated_at: z.coerce.date(),
});

const INSERT_COLUMNS = `id, user_id, public_ip_hash, country_code, city,
  available_bandwidth_mbps, max_connections, current_connections, protocols,
  uptime_percentage, avg_latency_ms, reputation_score,
  is_online, is_disabled, last_heartbeat, missed_heartbeats,
  allow_streaming, allow_torrents, allow_countries, block_countries, max_daily_bytes,
  daily_bytes_used, daily_usage_date, node_group, public_config_data`;

const INSERT_VALUES =
  '$1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17, $18, $19, $20, $21, $22, $23, $24, $25';

function insertParams(node: NewNode): unknown[] {
  return [
    node.id,
    node.ownerId,
    node.publicIdentityHash,
    node.countryCode,
    node.city,
    node.bandwidthMbps,
    node.maxConnections,
    node.currentConnections,
    JSON.stringify(node.protocols),
    node.quality.uptimePercentage,
    node.quality.avgLatencyMs,
    node.quality.reputationScore,
    node.isOnline,
    node.isDisabled,
    node.lastHeartbeat,
    node.missedHeartbeats,
    node.policy.allowStreaming,
    node.policy.allowTorrents,
    JSON.stringify(node.policy.allowCountries),
    JSON.stringify(node.policy.blockCountries),
    node.policy.maxDailyBytes,
    node.dailyBytesUsed,
    node.dailyUsageDate,
    node.group,
    node.publicConfig,
  ];
}

export class PgNodeStore implements NodeStore {
  private readonly CACHE_TTL = 60; // seconds

  constructor(
    private readonly db: Database,
    private readonly cache: Cache
  ) {}

  async insert(node: NewNode): Promise<Node> {
    const rows = await this.db.query<NodeRow>(
      `INSERT INTO nodes (${INSERT_COLUMNS}) VALUES (${INSERT_VALUES}) RETURNING *`,
      insertParams(node)
    );
    return mapNode(rows[0]);
  }

  async get(id: string, options: { fresh?: boolean } = {}): Promise<Node | null> {
    try {
      const cached = options.fresh
        ? null
        : await this.cache.get(this.cacheKey(id), (value) => mapNode(cachedNodeRowSchema.parse(value)));
      if (cached) {
        return cached;
      }
    } catch (error) {
      logger.warn('Node cache unavailable, reading from database', { error, nodeId: id });
    }

    const rows = await this.db.query<NodeRow>('SELECT * FROM nodes WHERE id = $1', [id]);
    if (rows.length === 0) {
      return null;
    }
    return this.remember(rows[0]);
  }

  async listForOwner(ownerId: string): Promise<Node[]> {
    const rows = await this.db.query<NodeRow>(
      'SELECT * FROM nodes WHERE user_id = $1 AND NOT is_disabled ORDER BY created_at',
      [ownerId]
    );
    return rows.map(mapNode);
  }

  async listCandidates(query: CandidateQuery): Promise<Node[]> {
    const conditions = ['is_online', 'NOT is_disabled', 'current_connections < max_connections'];
    const params: unknown[] = [];

    if (query.protocol) {
      params.push(JSON.stringify([query.protocol]));
      conditions.push(`protocols @> $${params.length}::jsonb`);
    }
    if (query.group) {
      params.push(query.group);
      conditions.push(`node_group = $${params.length}`);
    }
    if (query.countryCode) {
      params.push(query.countryCode);
      conditions.push(`country_code = $${params.length}`);
    }

    const rows = await this.db.query<NodeRow>(
      `SELECT * FROM nodes WHERE ${conditions.join(' AND ')} ORDER BY reputation_score DESC, id`,
      params
    );
    return rows.map(mapNode);
  }

  async listOnline(): Promise<Node[]> {
    const rows = await this.db.query<NodeRow>(
      'SELECT * FROM nodes WHERE is_online AND NOT is_disabled ORDER BY id'
    );
    return rows.map(mapNode);
  }

  async countOnlineByGroup(): Promise<Record<NodeGroup, number>> {
    const rows = await this.db.query<{ node_group: string; count: string }>(
      `SELECT node_group, COUNT(*) AS count FROM nodes
       WHERE is_online AND NOT is_disabled
       GROUP BY node_group`
    );
    const counts: Record<NodeGroup, number> = { COMMUNITY: 0, PUBLIC: 0 };
    for (const row of rows) {
      const group = NODE_GROUPS.find((candidate) => candidate === row.node_group);
      if (group) {
        counts[group] = Number(row.count);
      }
    }
    return counts;
  }

  async updateSettings(id: string, patch: NodeSettingsPatch): Promise<Node | null> {
    const assignments: string[] = [];
    const params: unknown[] = [id];
    const set = (column: string, value: unknown): void => {
      params.push(value);
      assignments.push(`${column} = $${params.length}`);
    };

    if (patch.city !== undefined) set('city', patch.city);
    if (patch.bandwidthMbps !== undefined) set('available_bandwidth_mbps', patch.bandwidthMbps);
    if (patch.maxConnections !== undefined) set('max_connections', patch.maxConnections);
    if (patch.protocols !== undefined) set('protocols', JSON.stringify(patch.protocols));
    if (patch.policy !== undefined) {
      set('allow_streaming', patch.policy.allowStreaming);
      set('allow_torrents', patch.policy.allowTorrents);
      set('allow_countries', JSON.stringify(patch.policy.allowCountries));
      set('block_countries', JSON.stringify(patch.policy.blockCountries));
      set('max_daily_bytes', patch.policy.maxDailyBytes);
    }

    // The capacity guard lives in the WHERE clause so a concurrent reservation
    // cannot slip between the check and the write.
    const capacityGuard =
      patch.maxConnections !== undefined ? ` AND current_connections <= $${params.push(patch.maxConnections)}` : '';

    const rows = await this.db.query<NodeRow>(
      `UPDATE nodes SET ${[...assignments, 'updated_at = NOW()'].join(', ')}
       WHERE id = $1 AND NOT is_disabled${capacityGuard}
       RETURNING *`,
      params
    );
    return this.refresh(id, rows);
  }

  async tryReserveSlot(id: string, heartbeatAfter: Date): Promise<Node | null> {
    const rows = await this.db.query<NodeRow>(
      `UPDATE nodes SET current_connections = current_connections + 1, updated_at = NOW()
       WHERE id = $1
         AND is_online AND NOT is_disabled
         AND last_heartbeat >= $2
         AND current_connections < max_connections
       RETURNING *`,
      [id, heartbeatAfter]
    );
    return this.refresh(id, rows);
  }

  async releaseSlot(id: string): Promise<void> {
    const rows = await this.db.query<NodeRow>(
      `UPDATE nodes SET current_connections = current_connections - 1, updated_at = NOW()
       WHERE id = $1 AND current_connections > 0
       RETURNING *`,
      [id]
    );
    await this.refresh(id, rows);
  }

  async updateLiveness(id: string, expected: LivenessSnapshot, patch: LivenessPatch): Promise<Node | null> {
    const rows = await this.db.query<NodeRow>(
      `UPDATE nodes SET
         is_online = $5, last_heartbeat = $6, missed_heartbeats = $7,
         uptime_percentage = $8, avg_latency_ms = $9, reputation_score = $10,
         updated_at = NOW()
       WHERE id = $1 AND NOT is_disabled
         AND is_online = $2 AND last_heartbeat = $3 AND missed_heartbeats = $4
       RETURNING *`,
      [
        id,
        expected.isOnline,
        expected.lastHeartbeat,
        expected.missedHeartbeats,
        patch.isOnline,
        patch.lastHeartbeat,
        patch.missedHeartbeats,
        patch.quality.uptimePercentage,
        Math.round(patch.quality.avgLatencyMs),
        patch.quality.reputationScore,
      ]
    );
    return this.refresh(id, rows);
  }

  async setOffline(id: string): Promise<Node | null> {
    const rows = await this.db.query<NodeRow>(
      `UPDATE nodes SET is_online = FALSE, updated_at = NOW()
       WHERE id = $1 AND is_online
       RETURNING *`,
      [id]
    );
    return this.refresh(id, rows);
  }

  async addDailyUsage(id: string, bytes: number, day: string): Promise<Node | null> {
    const rows = await this.db.query<NodeRow>(
      `UPDATE nodes SET
         daily_bytes_used = CASE WHEN daily_usage_date = $3 THEN daily_bytes_used + $2 ELSE $2 END,
         daily_usage_date = $3,
         updated_at = NOW()
       WHERE id = $1
       RETURNING *`,
      [id, bytes, day]
    );
    return this.refresh(id, rows);
  }

  async disable(id: string): Promise<Node | null> {
    const rows = await this.db.query<NodeRow>(
      `UPDATE nodes SET is_disabled = TRUE, is_online = FALSE, updated_at = NOW()
       WHERE id = $1 AND NOT is_disabled
       RETURNING *`,
      [id]
    );
    return this.refresh(id, rows);
  }

  async upsertGateway(node: NewNode): Promise<Node | null> {
    const rows = await this.db.query<NodeRow>(
      `INSERT INTO nodes (${INSERT_COLUMNS}) VALUES (${INSERT_VALUES})
       ON CONFLICT (id) DO UPDATE SET
         public_ip_hash = EXCLUDED.public_ip_hash,
         country_code = EXCLUDED.country_code,
         available_bandwidth_mbps = EXCLUDED.available_bandwidth_mbps,
         avg_latency_ms = EXCLUDED.avg_latency_ms,
         is_online = TRUE,
         last_heartbeat = EXCLUDED.last_heartbeat,
         missed_heartbeats = 0,
         public_config_data = EXCLUDED.public_config_data,
         updated_at = NOW()
       WHERE NOT nodes.is_disabled
       RETURNING *`,
      insertParams(node)
    );
    return this.refresh(node.id, rows);
  }

  private cacheKey(id: string): string {
    return `node:${id}`;
  }

  private async remember(row: NodeRow): Promise<Node> {
    const node = mapNode(row);
    try {
      await this.cache.set(this.cacheKey(node.id), row, this.CACHE_TTL);
    } catch (error) {
      logger.warn('Failed to cache node', { error, nodeId: node.id });
    }
    return node;
  }

  // Writes invalidate rather than re-cache; the next read repopulates
  private async refresh(id: string, rows: NodeRow[]): Promise<Node | null> {
    try {
      await this.cache.del(this.cacheKey(id));
    } catch (error) {
      logger.warn('Failed to invalidate node cache', { error, nodeId: id });
    }
    return rows.length > 0 ? mapNode(rows[0]) : null;
  }
}
