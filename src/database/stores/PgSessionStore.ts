import { Database } from '../postgres';
import { CloseReason, PeerSession } from '../models';
import { Cache } from '../redis';
import { ConfigurationError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import {
  CountryUsage,
  OwnerTotals,
  SessionStore,
  StaleSessionQuery,
  TrafficPatch,
} from './types';
import { SessionRow, isUniqueViolation, mapSession } from './rows';

export class PgSessionStore implements SessionStore {
  constructor(
    private readonly db: Database,
    private readonly cache: Cache
  ) {}

  async insert(session: PeerSession, maxActivePerClient: number): Promise<PeerSession | null> {
    try {
      return await this.db.transaction(async (client) => {
        // Serializes connects of one client so the count below stays true until commit
        await client.query('SELECT id FROM users WHERE id = $1 FOR UPDATE', [session.clientUserId]);
        const result = await client.query<SessionRow>(
          `INSERT INTO peer_sessions (
             id, node_id, node_owner_id, client_user_id, client_country, client_id_hash,
             protocol, virtual_ip, server_endpoint, traffic_type,
             bytes_transferred, weighted_bytes, credits_earned,
             state, close_reason, is_active, started_at, last_report_at, ended_at
           )
           SELECT $1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17, $18, $19
           WHERE (
             SELECT COUNT(*) FROM peer_sessions WHERE is_active AND client_user_id = $4
           ) < $20
           RETURNING *`,
          [
            session.id,
            session.nodeId,
            session.nodeOwnerId,
            session.clientUserId,
            session.clientCountry,
            session.clientIdHash,
            session.protocol,
            session.virtualIp,
            session.serverEndpoint,
            session.trafficType,
            session.bytesTransferred,
            session.weightedBytes,
            session.creditsEarned,
            session.state,
            session.closeReason,
            session.isActive,
            session.startedAt,
            session.lastReportAt,
            session.endedAt,
            maxActivePerClient,
          ]
        );
        return result.rows.length > 0 ? mapSession(result.rows[0]) : null;
      });
    } catch (error) {
      if (isUniqueViolation(error)) {
        // Only the virtual IP index can collide on a fresh uuid
        throw new ConfigurationError(
          `Virtual IP ${session.virtualIp} is already held by an active session; check for overlapping pools`
        );
      }
      throw error;
    }
  }

  async get(id: string): Promise<PeerSession | null> {
    const rows = await this.db.query<SessionRow>('SELECT * FROM peer_sessions WHERE id = $1', [id]);
    return rows.length > 0 ? mapSession(rows[0]) : null;
  }

  async listActiveVirtualIps(): Promise<string[]> {
    const rows = await this.db.query<{ virtual_ip: string }>(
      'SELECT virtual_ip FROM peer_sessions WHERE is_active'
    );
    return rows.map((row) => row.virtual_ip);
  }

  async listActiveForNode(nodeId: string): Promise<PeerSession[]> {
    const rows = await this.db.query<SessionRow>(
      'SELECT * FROM peer_sessions WHERE is_active AND node_id = $1 ORDER BY started_at',
      [nodeId]
    );
    return rows.map(mapSession);
  }

  async countActiveForClient(clientUserId: string): Promise<number> {
    const rows = await this.db.query<{ count: string }>(
      'SELECT COUNT(*) AS count FROM peer_sessions WHERE is_active AND client_user_id = $1',
      [clientUserId]
    );
    return Number(rows[0]?.count ?? 0);
  }

  async sumActiveCreditsForClient(clientUserId: string, excludeSessionId: string): Promise<number> {
    const rows = await this.db.query<{ total: string | null }>(
      `SELECT SUM(credits_earned) AS total FROM peer_sessions
       WHERE is_active AND client_user_id = $1 AND id <> $2`,
      [clientUserId, excludeSessionId]
    );
    return Number(rows[0]?.total ?? 0);
  }

  async countActive(): Promise<number> {
    const rows = await this.db.query<{ count: string }>(
      'SELECT COUNT(*) AS count FROM peer_sessions WHERE is_active'
    );
    return Number(rows[0]?.count ?? 0);
  }

  async recordTraffic(id: string, expectedBytes: number, patch: TrafficPatch): Promise<PeerSession | null> {
    const rows = await this.db.query<SessionRow>(
      `UPDATE peer_sessions SET
         state = 'ACTIVE',
         bytes_transferred = $3, weighted_bytes = $4, credits_earned = $5,
         traffic_type = $6, last_report_at = $7
       WHERE id = $1 AND bytes_transferred = $2 AND state IN ('MATCHED', 'ACTIVE')
       RETURNING *`,
      [
        id,
        expectedBytes,
        patch.bytesTransferred,
        patch.weightedBytes,
        patch.creditsEarned,
        patch.trafficType,
        patch.lastReportAt,
      ]
    );
    return rows.length > 0 ? mapSession(rows[0]) : null;
  }

  async beginClose(id: string, reason: CloseReason, at: Date): Promise<PeerSession | null> {
    const rows = await this.db.query<SessionRow>(
      `UPDATE peer_sessions SET state = 'CLOSING', close_reason = $2, ended_at = $3
       WHERE id = $1 AND state IN ('MATCHED', 'ACTIVE')
       RETURNING *`,
      [id, reason, at]
    );
    return rows.length > 0 ? mapSession(rows[0]) : null;
  }

  async finishClose(id: string, at: Date, reason?: CloseReason): Promise<PeerSession | null> {
    const closed = await this.db.transaction(async (client) => {
      const result = await client.query<SessionRow>(
        `UPDATE peer_sessions SET
           state = 'CLOSED', is_active = FALSE,
           close_reason = COALESCE($3, close_reason),
           ended_at = COALESCE(ended_at, $2)
         WHERE id = $1 AND state = 'CLOSING'
         RETURNING *`,
        [id, at, reason ?? null]
      );
      if (result.rows.length === 0) {
        return null;
      }
      const session = mapSession(result.rows[0]);
      await client.query(
        `UPDATE nodes SET current_connections = current_connections - 1, updated_at = NOW()
         WHERE id = $1 AND current_connections > 0`,
        [session.nodeId]
      );
      return session;
    });

    if (closed) {
      try {
        await this.cache.del(`node:${closed.nodeId}`);
      } catch (error) {
        logger.warn('Failed to invalidate node cache', { error, nodeId: closed.nodeId });
      }
    }
    return closed;
  }

  async listStale(query: StaleSessionQuery): Promise<PeerSession[]> {
    const rows = await this.db.query<SessionRow>(
      `SELECT * FROM peer_sessions
       WHERE (state = 'MATCHED' AND started_at < $1)
          OR (state = 'ACTIVE' AND COALESCE(last_report_at, started_at) < $2)
          OR (state = 'CLOSING' AND COALESCE(ended_at, started_at) < $3)
       ORDER BY started_at`,
      [query.matchedBefore, query.idleBefore, query.closingBefore]
    );
    return rows.map(mapSession);
  }

  async listActiveForOwner(ownerId: string, limit: number): Promise<PeerSession[]> {
    const rows = await this.db.query<SessionRow>(
      `SELECT * FROM peer_sessions
       WHERE node_owner_id = $1 AND is_active
       ORDER BY started_at DESC
       LIMIT $2`,
      [ownerId, limit]
    );
    return rows.map(mapSession);
  }

  async listHistoryForOwner(ownerId: string, since: Date, limit: number): Promise<PeerSession[]> {
    const rows = await this.db.query<SessionRow>(
      `SELECT * FROM peer_sessions
       WHERE node_owner_id = $1 AND started_at >= $2
       ORDER BY started_at DESC
       LIMIT $3`,
      [ownerId, since, limit]
    );
    return rows.map(mapSession);
  }

  async ownerTotals(ownerId: string): Promise<OwnerTotals> {
    const rows = await this.db.query<{
      total_sessions: string;
      active_sessions: string;
      total_bytes: string | null;
      total_credits: string | null;
    }>(
      `SELECT
         COUNT(*) AS total_sessions,
         COUNT(*) FILTER (WHERE is_active) AS active_sessions,
         SUM(bytes_transferred) AS total_bytes,
         SUM(credits_earned) AS total_credits
       FROM peer_sessions
       WHERE node_owner_id = $1`,
      [ownerId]
    );
    const row = rows[0];
    return {
      totalSessions: Number(row?.total_sessions ?? 0),
      activeSessions: Number(row?.active_sessions ?? 0),
      totalBytes: Number(row?.total_bytes ?? 0),
      totalCredits: Number(row?.total_credits ?? 0),
    };
  }

  async ownerCountryBreakdown(ownerId: string, limit: number): Promise<CountryUsage[]> {
    const rows = await this.db.query<{ client_country: string; sessions: string; bytes: string | null }>(
      `SELECT client_country, COUNT(*) AS sessions, SUM(bytes_transferred) AS bytes
       FROM peer_sessions
       WHERE node_owner_id = $1
       GROUP BY client_country
       ORDER BY SUM(bytes_transferred) DESC NULLS LAST, client_country
       LIMIT $2`,
      [ownerId, limit]
    );
    return rows.map((row) => ({
      countryCode: row.client_country,
      sessions: Number(row.sessions),
      bytes: Number(row.bytes ?? 0),
    }));
  }
}
