import {
  CloseReason,
  CreditTransaction,
  Node,
  NodeGroup,
  PeerSession,
  Protocol,
  SessionSettlement,
  TrafficPolicy,
  TrafficType,
  User,
} from '../models';

export interface OpeningBonus {
  transactionId: string;
  amount: number;
  description: string;
}

export interface NewUser {
  id: string;
  username: string;
  passwordHash: string;
  createdAt: Date;
  /** Posted as a BONUS transaction in the same commit as the user row. */
  bonus?: OpeningBonus;
}

export interface UserStore {
  /** Fails with ConflictError when the username is taken. */
  create(user: NewUser): Promise<User>;
  findById(id: string): Promise<User | null>;
  findByUsername(username: string): Promise<User | null>;
}

export type NewNode = Omit<Node, 'createdAt' | 'updatedAt'>;

export interface NodeSettingsPatch {
  city?: string | null;
  bandwidthMbps?: number;
  maxConnections?: number;
  protocols?: Protocol[];
  policy?: TrafficPolicy;
}

export interface CandidateQuery {
  protocol?: Protocol;
  group?: NodeGroup;
  countryCode?: string;
}

export interface LivenessSnapshot {
  isOnline: boolean;
  lastHeartbeat: Date;
  missedHeartbeats: number;
}

export interface LivenessPatch extends LivenessSnapshot {
  quality: Node['quality'];
}

export interface NodeStore {
  insert(node: NewNode): Promise<Node>;
  /** `fresh` skips any read-through cache. */
  get(id: string, options?: { fresh?: boolean }): Promise<Node | null>;
  listForOwner(ownerId: string): Promise<Node[]>;
  /** Online, enabled nodes with at least one free slot. */
  listCandidates(query: CandidateQuery): Promise<Node[]>;
  /** Online, enabled nodes, for liveness reconciliation. */
  listOnline(): Promise<Node[]>;
  countOnlineByGroup(): Promise<Record<NodeGroup, number>>;
  /** Returns null when the patch would put max_connections below current_connections. */
  updateSettings(id: string, patch: NodeSettingsPatch): Promise<Node | null>;
  /**
   * Compare-and-increment of current_connections. Null when the node is full,
   * offline, disabled or has not been heard from since `heartbeatAfter`.
   */
  tryReserveSlot(id: string, heartbeatAfter: Date): Promise<Node | null>;
  /** Gives back a slot whose reservation never became a session. */
  releaseSlot(id: string): Promise<void>;
  /** Applies the patch only if liveness still matches `expected`. */
  updateLiveness(id: string, expected: LivenessSnapshot, patch: LivenessPatch): Promise<Node | null>;
  /** ONLINE -> OFFLINE; null when the node was not online. */
  setOffline(id: string): Promise<Node | null>;
  /** Adds to the node's usage for `day`, restarting the counter on a new day. */
  addDailyUsage(id: string, bytes: number, day: string): Promise<Node | null>;
  disable(id: string): Promise<Node | null>;
  /** Null when a node with that id was disabled by an operator. */
  upsertGateway(node: NewNode): Promise<Node | null>;
}

export interface TrafficPatch {
  bytesTransferred: number;
  weightedBytes: number;
  creditsEarned: number;
  trafficType: TrafficType;
  lastReportAt: Date;
}

export interface StaleSessionQuery {
  matchedBefore: Date;
  idleBefore: Date;
  closingBefore: Date;
}

export interface OwnerTotals {
  totalSessions: number;
  activeSessions: number;
  totalBytes: number;
  totalCredits: number;
}

export interface CountryUsage {
  countryCode: string;
  sessions: number;
  bytes: number;
}

export interface SessionStore {
  /**
   * Inserts only while the client holds fewer than `maxActivePerClient` live
   * sessions, checked and written as one step; null when the cap is reached.
   * A duplicate active virtual IP fails with ConfigurationError.
   */
  insert(session: PeerSession, maxActivePerClient: number): Promise<PeerSession | null>;
  get(id: string): Promise<PeerSession | null>;
  listActiveVirtualIps(): Promise<string[]>;
  listActiveForNode(nodeId: string): Promise<PeerSession[]>;
  countActiveForClient(clientUserId: string): Promise<number>;
  /** Credits accrued by the client's other live sessions. */
  sumActiveCreditsForClient(clientUserId: string, excludeSessionId: string): Promise<number>;
  countActive(): Promise<number>;
  /**
   * Applies a traffic report if the byte counter still equals `expectedBytes`
   * and the session is MATCHED or ACTIVE. Moves the session to ACTIVE.
   */
  recordTraffic(id: string, expectedBytes: number, patch: TrafficPatch): Promise<PeerSession | null>;
  /** MATCHED|ACTIVE -> CLOSING. Null for every caller but the first. */
  beginClose(id: string, reason: CloseReason, at: Date): Promise<PeerSession | null>;
  /**
   * CLOSING -> CLOSED together with the node slot release, in one transaction.
   * `reason` overrides the recorded close reason when given.
   */
  finishClose(id: string, at: Date, reason?: CloseReason): Promise<PeerSession | null>;
  listStale(query: StaleSessionQuery): Promise<PeerSession[]>;
  listActiveForOwner(ownerId: string, limit: number): Promise<PeerSession[]>;
  listHistoryForOwner(ownerId: string, since: Date, limit: number): Promise<PeerSession[]>;
  ownerTotals(ownerId: string): Promise<OwnerTotals>;
  ownerCountryBreakdown(ownerId: string, limit: number): Promise<CountryUsage[]>;
}

export type Posting = Omit<CreditTransaction, 'id' | 'createdAt'>;

export interface LedgerPlan {
  postings: Posting[];
  settlement?: Omit<SessionSettlement, 'settledAt'>;
}

export interface LedgerCommand {
  /** Users whose rows are locked for the duration of the commit. */
  userIds: string[];
  /** Idempotency key; a second commit with the same key replays the first. */
  settlementSessionId?: string;
  at: Date;
  /** Computes postings from the locked balances. Throwing aborts the commit. */
  plan(balances: Map<string, number>): LedgerPlan;
}

export interface LedgerCommitResult {
  transactions: CreditTransaction[];
  balances: Map<string, number>;
  settlement: SessionSettlement | null;
  replayed: boolean;
}

export interface BalanceMismatch {
  userId: string;
  cachedBalance: number;
  transactionSum: number;
}

export interface LedgerStore {
  commit(command: LedgerCommand): Promise<LedgerCommitResult>;
  balance(userId: string): Promise<number | null>;
  history(userId: string, limit: number): Promise<CreditTransaction[]>;
  getSettlement(sessionId: string): Promise<SessionSettlement | null>;
  audit(): Promise<BalanceMismatch[]>;
}

export interface Stores {
  users: UserStore;
  nodes: NodeStore;
  sessions: SessionStore;
  ledger: LedgerStore;
}
