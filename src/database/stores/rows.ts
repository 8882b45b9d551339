import { DatabaseError } from 'pg';
import {
  CLOSE_REASONS,
  CreditTransaction,
  NODE_GROUPS,
  Node,
  PERSISTED_SESSION_STATES,
  PeerSession,
  SessionSettlement,
  TRAFFIC_TYPES,
  TRANSACTION_TYPES,
  User,
  isProtocol,
} from '../models';

// pg returns BIGINT columns as strings
type BigIntColumn = string | number;

export interface UserRow {
  id: string;
  username: string;
  password_hash: string;
  credits: BigIntColumn;
  created_at: Date;
}

export interface NodeRow {
  id: string;
  user_id: string | null;
  public_ip_hash: string;
  country_code: string;
  city: string | null;
  available_bandwidth_mbps: number;
  max_connections: number;
  current_connections: number;
  protocols: string[];
  uptime_percentage: number;
  avg_latency_ms: number;
  reputation_score: number;
  is_online: boolean;
  is_disabled: boolean;
  last_heartbeat: Date;
  missed_heartbeats: number;
  allow_streaming: boolean;
  allow_torrents: boolean;
  allow_countries: string[];
  block_countries: string[];
  max_daily_bytes: BigIntColumn;
  daily_bytes_used: BigIntColumn;
  daily_usage_date: string;
  node_group: string;
  public_config_data: string | null;
  created_at: Date;
  updated_at: Date;
}

export interface SessionRow {
  id: string;
  node_id: string;
  node_owner_id: string | null;
  client_user_id: string;
  client_country: string;
  client_id_hash: string;
  protocol: string;
  virtual_ip: string;
  server_endpoint: string;
  traffic_type: string;
  bytes_transferred: BigIntColumn;
  weighted_bytes: BigIntColumn;
  credits_earned: number;
  state: string;
  close_reason: string | null;
  is_active: boolean;
  started_at: Date;
  last_report_at: Date | null;
  ended_at: Date | null;
}

export interface TransactionRow {
  id: string;
  user_id: string;
  amount: BigIntColumn;
  transaction_type: string;
  description: string;
  session_id: string | null;
  created_at: Date;
}

export interface SettlementRow {
  session_id: string;
  client_charge: BigIntColumn;
  owner_credit: BigIntColumn;
  shortfall: BigIntColumn;
  settled_at: Date;
}

function oneOf<T extends string>(allowed: readonly T[], value: string, column: string): T {
  const found = allowed.find((item) => item === value);
  if (found === undefined) {
    throw new Error(`Unexpected ${column} value: ${value}`);
  }
  return found;
}

export function isUniqueViolation(error: unknown): boolean {
  return error instanceof DatabaseError && error.code === '23505';
}

export function mapUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    passwordHash: row.password_hash,
    credits: Number(row.credits),
    createdAt: new Date(row.created_at),
  };
}

export function mapNode(row: NodeRow): Node {
  return {
    id: row.id,
    ownerId: row.user_id,
    publicIdentityHash: row.public_ip_hash,
    countryCode: row.country_code,
    city: row.city,
    bandwidthMbps: row.available_bandwidth_mbps,
    maxConnections: row.max_connections,
    currentConnections: row.current_connections,
    protocols: row.protocols.filter(isProtocol),
    quality: {
      uptimePercentage: row.uptime_percentage,
      avgLatencyMs: row.avg_latency_ms,
      reputationScore: row.reputation_score,
    },
    isOnline: row.is_online,
    isDisabled: row.is_disabled,
    lastHeartbeat: new Date(row.last_heartbeat),
    missedHeartbeats: row.missed_heartbeats,
    policy: {
      allowCountries: row.allow_countries,
      blockCountries: row.block_countries,
      allowStreaming: row.allow_streaming,
      allowTorrents: row.allow_torrents,
      maxDailyBytes: Number(row.max_daily_bytes),
    },
    dailyBytesUsed: Number(row.daily_bytes_used),
    dailyUsageDate: row.daily_usage_date,
    group: oneOf(NODE_GROUPS, row.node_group, 'node_group'),
    publicConfig: row.public_config_data,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

export function mapSession(row: SessionRow): PeerSession {
  if (!isProtocol(row.protocol)) {
    throw new Error(`Unexpected protocol value: ${row.protocol}`);
  }
  return {
    id: row.id,
    nodeId: row.node_id,
    nodeOwnerId: row.node_owner_id,
    clientUserId: row.client_user_id,
    clientCountry: row.client_country,
    clientIdHash: row.client_id_hash,
    protocol: row.protocol,
    virtualIp: row.virtual_ip,
    serverEndpoint: row.server_endpoint,
    trafficType: oneOf(TRAFFIC_TYPES, row.traffic_type, 'traffic_type'),
    bytesTransferred: Number(row.bytes_transferred),
    weightedBytes: Number(row.weighted_bytes),
    creditsEarned: row.credits_earned,
    state: oneOf(PERSISTED_SESSION_STATES, row.state, 'state'),
    closeReason: row.close_reason === null ? null : oneOf(CLOSE_REASONS, row.close_reason, 'close_reason'),
    isActive: row.is_active,
    startedAt: new Date(row.started_at),
    lastReportAt: row.last_report_at ? new Date(row.last_report_at) : null,
    endedAt: row.ended_at ? new Date(row.ended_at) : null,
  };
}

export function mapTransaction(row: TransactionRow): CreditTransaction {
  return {
    id: row.id,
    userId: row.user_id,
    amount: Number(row.amount),
    type: oneOf(TRANSACTION_TYPES, row.transaction_type, 'transaction_type'),
    description: row.description,
    sessionId: row.session_id,
    createdAt: new Date(row.created_at),
  };
}

export function mapSettlement(row: SettlementRow): SessionSettlement {
  return {
    sessionId: row.session_id,
    clientCharge: Number(row.client_charge),
    ownerCredit: Number(row.owner_credit),
    shortfall: Number(row.shortfall),
    settledAt: new Date(row.settled_at),
  };
}
