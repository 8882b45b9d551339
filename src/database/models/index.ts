export const NODE_GROUPS = ['COMMUNITY', 'PUBLIC'] as const;
export type NodeGroup = (typeof NODE_GROUPS)[number];

export const BUILTIN_PROTOCOLS = [
  'WIREGUARD',
  'WIREGUARD_OBFUSCATED',
  'SHADOWSOCKS',
  'OPENVPN_TCP',
  'OPENVPN_UDP',
  'IKEV2',
  'HYSTERIA2',
  'TROJAN',
  'VLESS',
] as const;
export type BuiltinProtocol = (typeof BUILTIN_PROTOCOLS)[number];

/**
 * Deployments may declare extra transports through EXTRA_PROTOCOLS; they are
 * namespaced with an `X_` prefix so they never shadow a built-in one.
 */
export type Protocol = BuiltinProtocol | `X_${string}`;

export function isProtocol(value: string): value is Protocol {
  return BUILTIN_PROTOCOLS.some((protocol) => protocol === value) || /^X_[A-Z0-9_]+$/.test(value);
}

export const TRAFFIC_TYPES = ['BROWSING', 'STREAMING', 'GAMING', 'TORRENT', 'BULK'] as const;
export type TrafficType = (typeof TRAFFIC_TYPES)[number];

export const TRANSACTION_TYPES = ['EARNED', 'SPENT', 'BONUS', 'PENALTY'] as const;
export type TransactionType = (typeof TRANSACTION_TYPES)[number];

export const PERSISTED_SESSION_STATES = ['MATCHED', 'ACTIVE', 'CLOSING', 'CLOSED'] as const;
export type PersistedSessionState = (typeof PERSISTED_SESSION_STATES)[number];
// REQUESTED only exists in memory, before a node slot is reserved
export type SessionState = 'REQUESTED' | PersistedSessionState;

export const CLOSE_REASONS = [
  'CLIENT_DISCONNECT',
  'NODE_UNRESPONSIVE',
  'NODE_DEREGISTERED',
  'NODE_OFFLINE',
  'QUOTA_EXCEEDED',
  'POLICY_VIOLATION',
  'INSUFFICIENT_CREDITS',
  'LEDGER_FAULT',
  'TIMEOUT',
  'IDLE',
] as const;
export type CloseReason = (typeof CLOSE_REASONS)[number];

export interface User {
  id: string;
  username: string;
  passwordHash: string;
  credits: number;
  createdAt: Date;
}

export interface TrafficPolicy {
  allowCountries: string[];
  blockCountries: string[];
  allowStreaming: boolean;
  allowTorrents: boolean;
  maxDailyBytes: number;
}

export interface NodeQuality {
  uptimePercentage: number;
  avgLatencyMs: number;
  reputationScore: number;
}

export interface Node {
  id: string;
  ownerId: string | null;
  publicIdentityHash: string;
  countryCode: string;
  city: string | null;
  bandwidthMbps: number;
  maxConnections: number;
  currentConnections: number;
  protocols: Protocol[];
  quality: NodeQuality;
  isOnline: boolean;
  isDisabled: boolean;
  lastHeartbeat: Date;
  missedHeartbeats: number;
  policy: TrafficPolicy;
  dailyBytesUsed: number;
  dailyUsageDate: string;
  group: NodeGroup;
  // Client configuration published by PUBLIC gateways
  publicConfig: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface PeerSession {
  id: string;
  nodeId: string;
  nodeOwnerId: string | null;
  clientUserId: string;
  clientCountry: string;
  clientIdHash: string;
  protocol: Protocol;
  virtualIp: string;
  serverEndpoint: string;
  trafficType: TrafficType;
  bytesTransferred: number;
  weightedBytes: number;
  creditsEarned: number;
  state: PersistedSessionState;
  closeReason: CloseReason | null;
  isActive: boolean;
  startedAt: Date;
  lastReportAt: Date | null;
  endedAt: Date | null;
}

export interface CreditTransaction {
  id: string;
  userId: string;
  amount: number;
  type: TransactionType;
  description: string;
  sessionId: string | null;
  createdAt: Date;
}

export interface SessionSettlement {
  sessionId: string;
  clientCharge: number;
  ownerCredit: number;
  shortfall: number;
  settledAt: Date;
}
