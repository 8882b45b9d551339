import { v4 as uuidv4 } from 'uuid';
import {
  CloseReason,
  CreditTransaction,
  Node,
  NodeGroup,
  PeerSession,
  SessionSettlement,
  User,
} from '../../src/database/models';
import {
  BalanceMismatch,
  CandidateQuery,
  CountryUsage,
  LedgerCommand,
  LedgerCommitResult,
  LedgerStore,
  LivenessPatch,
  LivenessSnapshot,
  NewNode,
  NewUser,
  NodeSettingsPatch,
  NodeStore,
  OwnerTotals,
  SessionStore,
  StaleSessionQuery,
  Stores,
  TrafficPatch,
  UserStore,
  applyPostings,
} from '../../src/database/stores';
import { ConfigurationError, ConflictError, NotFoundError } from '../../src/utils/errors';

/*
 * In-process stand-ins for the Postgres stores. Every check-and-write runs
 * without an await in between, so each call is atomic the way the
 * conditional UPDATEs are. Each call first yields once so that concurrent
 * callers interleave.
 */

const tick = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

export class MemoryState {
  users = new Map<string, User>();
  nodes = new Map<string, Node>();
  sessions = new Map<string, PeerSession>();
  transactions: CreditTransaction[] = [];
  settlements = new Map<string, SessionSettlement>();
}

export class MemoryUserStore implements UserStore {
  constructor(private readonly state: MemoryState) {}

  async create(user: NewUser): Promise<User> {
    await tick();
    for (const existing of this.state.users.values()) {
      if (existing.username === user.username) {
        throw new ConflictError(`Username ${user.username} is already taken`);
      }
    }
    const { bonus, ...fields } = user;
    const created: User = { ...fields, credits: bonus ? bonus.amount : 0 };
    this.state.users.set(user.id, created);
    if (bonus) {
      this.state.transactions.push({
        id: bonus.transactionId,
        userId: user.id,
        amount: bonus.amount,
        type: 'BONUS',
        description: bonus.description,
        sessionId: null,
        createdAt: new Date(user.createdAt.getTime()),
      });
    }
    return { ...created };
  }

  async findById(id: string): Promise<User | null> {
    await tick();
    const user = this.state.users.get(id);
    return user ? { ...user } : null;
  }

  async findByUsername(username: string): Promise<User | null> {
    await tick();
    for (const user of this.state.users.values()) {
      if (user.username === username) {
        return { ...user };
      }
    }
    return null;
  }
}

export class MemoryNodeStore implements NodeStore {
  constructor(private readonly state: MemoryState) {}

  async insert(node: NewNode): Promise<Node> {
    await tick();
    if (this.state.nodes.has(node.id)) {
      throw new ConflictError(`Node ${node.id} already exists`);
    }
    const now = new Date();
    const created: Node = { ...structuredClone(node), createdAt: now, updatedAt: now };
    this.state.nodes.set(node.id, created);
    return structuredClone(created);
  }

  async get(id: string): Promise<Node | null> {
    await tick();
    const node = this.state.nodes.get(id);
    return node ? structuredClone(node) : null;
  }

  async listForOwner(ownerId: string): Promise<Node[]> {
    await tick();
    return this.all()
      .filter((node) => node.ownerId === ownerId && !node.isDisabled)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  }

  async listCandidates(query: CandidateQuery): Promise<Node[]> {
    await tick();
    return this.all()
      .filter(
        (node) =>
          node.isOnline &&
          !node.isDisabled &&
          node.currentConnections < node.maxConnections &&
          (query.protocol === undefined || node.protocols.includes(query.protocol)) &&
          (query.group === undefined || node.group === query.group) &&
          (query.countryCode === undefined || node.countryCode === query.countryCode)
      )
      .sort((a, b) => b.quality.reputationScore - a.quality.reputationScore || a.id.localeCompare(b.id));
  }

  async listOnline(): Promise<Node[]> {
    await tick();
    return this.all()
      .filter((node) => node.isOnline && !node.isDisabled)
      .sort((a, b) => a.id.localeCompare(b.id));
  }

  async countOnlineByGroup(): Promise<Record<NodeGroup, number>> {
    await tick();
    const counts: Record<NodeGroup, number> = { COMMUNITY: 0, PUBLIC: 0 };
    for (const node of this.state.nodes.values()) {
      if (node.isOnline && !node.isDisabled) {
        counts[node.group]++;
      }
    }
    return counts;
  }

  async updateSettings(id: string, patch: NodeSettingsPatch): Promise<Node | null> {
    await tick();
    return this.mutate(id, (node) => {
      if (node.isDisabled) return false;
      if (patch.maxConnections !== undefined && node.currentConnections > patch.maxConnections) return false;
      if (patch.city !== undefined) node.city = patch.city;
      if (patch.bandwidthMbps !== undefined) node.bandwidthMbps = patch.bandwidthMbps;
      if (patch.maxConnections !== undefined) node.maxConnections = patch.maxConnections;
      if (patch.protocols !== undefined) node.protocols = [...patch.protocols];
      if (patch.policy !== undefined) node.policy = structuredClone(patch.policy);
      return true;
    });
  }

  async tryReserveSlot(id: string, heartbeatAfter: Date): Promise<Node | null> {
    await tick();
    return this.mutate(id, (node) => {
      if (
        !node.isOnline ||
        node.isDisabled ||
        node.lastHeartbeat.getTime() < heartbeatAfter.getTime() ||
        node.currentConnections >= node.maxConnections
      ) {
        return false;
      }
      node.currentConnections++;
      return true;
    });
  }

  async releaseSlot(id: string): Promise<void> {
    await tick();
    this.mutate(id, (node) => {
      if (node.currentConnections <= 0) return false;
      node.currentConnections--;
      return true;
    });
  }

  async updateLiveness(id: string, expected: LivenessSnapshot, patch: LivenessPatch): Promise<Node | null> {
    await tick();
    return this.mutate(id, (node) => {
      if (
        node.isDisabled ||
        node.isOnline !== expected.isOnline ||
        node.lastHeartbeat.getTime() !== expected.lastHeartbeat.getTime() ||
        node.missedHeartbeats !== expected.missedHeartbeats
      ) {
        return false;
      }
      node.isOnline = patch.isOnline;
      node.lastHeartbeat = new Date(patch.lastHeartbeat.getTime());
      node.missedHeartbeats = patch.missedHeartbeats;
      node.quality = { ...patch.quality, avgLatencyMs: Math.round(patch.quality.avgLatencyMs) };
      return true;
    });
  }

  async setOffline(id: string): Promise<Node | null> {
    await tick();
    return this.mutate(id, (node) => {
      if (!node.isOnline) return false;
      node.isOnline = false;
      return true;
    });
  }

  async addDailyUsage(id: string, bytes: number, day: string): Promise<Node | null> {
    await tick();
    return this.mutate(id, (node) => {
      node.dailyBytesUsed = node.dailyUsageDate === day ? node.dailyBytesUsed + bytes : bytes;
      node.dailyUsageDate = day;
      return true;
    });
  }

  async disable(id: string): Promise<Node | null> {
    await tick();
    return this.mutate(id, (node) => {
      if (node.isDisabled) return false;
      node.isDisabled = true;
      node.isOnline = false;
      return true;
    });
  }

  async upsertGateway(node: NewNode): Promise<Node | null> {
    await tick();
    const existing = this.state.nodes.get(node.id);
    if (!existing) {
      const now = new Date();
      const created: Node = { ...structuredClone(node), createdAt: now, updatedAt: now };
      this.state.nodes.set(node.id, created);
      return structuredClone(created);
    }
    return this.mutate(node.id, (current) => {
      if (current.isDisabled) return false;
      current.publicIdentityHash = node.publicIdentityHash;
      current.countryCode = node.countryCode;
      current.bandwidthMbps = node.bandwidthMbps;
      current.quality.avgLatencyMs = node.quality.avgLatencyMs;
      current.isOnline = true;
      current.lastHeartbeat = new Date(node.lastHeartbeat.getTime());
      current.missedHeartbeats = 0;
      current.publicConfig = node.publicConfig;
      return true;
    });
  }

  /** Test helper: overwrite fields directly. */
  patch(id: string, fields: Partial<Node>): void {
    const node = this.state.nodes.get(id);
    if (!node) {
      throw new NotFoundError('Node');
    }
    Object.assign(node, fields);
  }

  private all(): Node[] {
    return [...this.state.nodes.values()].map((node) => structuredClone(node));
  }

  private mutate(id: string, apply: (node: Node) => boolean): Node | null {
    const current = this.state.nodes.get(id);
    if (!current) {
      return null;
    }
    const draft = structuredClone(current);
    if (!apply(draft)) {
      return null;
    }
    draft.updatedAt = new Date();
    this.state.nodes.set(id, draft);
    return structuredClone(draft);
  }
}

const LIVE_STATES = new Set<PeerSession['state']>(['MATCHED', 'ACTIVE']);

export class MemorySessionStore implements SessionStore {
  constructor(private readonly state: MemoryState) {}

  async insert(session: PeerSession, maxActivePerClient: number): Promise<PeerSession | null> {
    await tick();
    if (this.state.sessions.has(session.id)) {
      throw new ConflictError(`Session ${session.id} already exists`);
    }
    const held = this.active().filter((existing) => existing.clientUserId === session.clientUserId).length;
    if (held >= maxActivePerClient) {
      return null;
    }
    for (const existing of this.state.sessions.values()) {
      if (existing.isActive && session.isActive && existing.virtualIp === session.virtualIp) {
        throw new ConfigurationError(
          `Virtual IP ${session.virtualIp} is already held by an active session; check for overlapping pools`
        );
      }
    }
    this.state.sessions.set(session.id, structuredClone(session));
    return structuredClone(session);
  }

  async get(id: string): Promise<PeerSession | null> {
    await tick();
    const session = this.state.sessions.get(id);
    return session ? structuredClone(session) : null;
  }

  async listActiveVirtualIps(): Promise<string[]> {
    await tick();
    return this.active().map((session) => session.virtualIp);
  }

  async listActiveForNode(nodeId: string): Promise<PeerSession[]> {
    await tick();
    return this.active()
      .filter((session) => session.nodeId === nodeId)
      .sort((a, b) => a.startedAt.getTime() - b.startedAt.getTime());
  }

  async countActiveForClient(clientUserId: string): Promise<number> {
    await tick();
    return this.active().filter((session) => session.clientUserId === clientUserId).length;
  }

  async sumActiveCreditsForClient(clientUserId: string, excludeSessionId: string): Promise<number> {
    await tick();
    return this.active()
      .filter((session) => session.clientUserId === clientUserId && session.id !== excludeSessionId)
      .reduce((sum, session) => sum + session.creditsEarned, 0);
  }

  async countActive(): Promise<number> {
    await tick();
    return this.active().length;
  }

  async recordTraffic(id: string, expectedBytes: number, patch: TrafficPatch): Promise<PeerSession | null> {
    await tick();
    return this.mutate(id, (session) => {
      if (session.bytesTransferred !== expectedBytes || !LIVE_STATES.has(session.state)) return false;
      session.state = 'ACTIVE';
      session.bytesTransferred = patch.bytesTransferred;
      session.weightedBytes = patch.weightedBytes;
      session.creditsEarned = patch.creditsEarned;
      session.trafficType = patch.trafficType;
      session.lastReportAt = new Date(patch.lastReportAt.getTime());
      return true;
    });
  }

  async beginClose(id: string, reason: CloseReason, at: Date): Promise<PeerSession | null> {
    await tick();
    return this.mutate(id, (session) => {
      if (!LIVE_STATES.has(session.state)) return false;
      session.state = 'CLOSING';
      session.closeReason = reason;
      session.endedAt = new Date(at.getTime());
      return true;
    });
  }

  async finishClose(id: string, at: Date, reason?: CloseReason): Promise<PeerSession | null> {
    await tick();
    const closed = this.mutate(id, (session) => {
      if (session.state !== 'CLOSING') return false;
      session.state = 'CLOSED';
      session.isActive = false;
      session.closeReason = reason ?? session.closeReason;
      session.endedAt = session.endedAt ?? new Date(at.getTime());
      return true;
    });
    if (closed) {
      const node = this.state.nodes.get(closed.nodeId);
      if (node && node.currentConnections > 0) {
        node.currentConnections--;
      }
    }
    return closed;
  }

  async listStale(query: StaleSessionQuery): Promise<PeerSession[]> {
    await tick();
    return this.all()
      .filter((session) => {
        if (session.state === 'MATCHED') {
          return session.startedAt < query.matchedBefore;
        }
        if (session.state === 'ACTIVE') {
          return (session.lastReportAt ?? session.startedAt) < query.idleBefore;
        }
        if (session.state === 'CLOSING') {
          return (session.endedAt ?? session.startedAt) < query.closingBefore;
        }
        return false;
      })
      .sort((a, b) => a.startedAt.getTime() - b.startedAt.getTime());
  }

  async listActiveForOwner(ownerId: string, limit: number): Promise<PeerSession[]> {
    await tick();
    return this.active()
      .filter((session) => session.nodeOwnerId === ownerId)
      .sort((a, b) => b.startedAt.getTime() - a.startedAt.getTime())
      .slice(0, limit);
  }

  async listHistoryForOwner(ownerId: string, since: Date, limit: number): Promise<PeerSession[]> {
    await tick();
    return this.all()
      .filter((session) => session.nodeOwnerId === ownerId && session.startedAt >= since)
      .sort((a, b) => b.startedAt.getTime() - a.startedAt.getTime())
      .slice(0, limit);
  }

  async ownerTotals(ownerId: string): Promise<OwnerTotals> {
    await tick();
    const owned = this.all().filter((session) => session.nodeOwnerId === ownerId);
    return {
      totalSessions: owned.length,
      activeSessions: owned.filter((session) => session.isActive).length,
      totalBytes: owned.reduce((sum, session) => sum + session.bytesTransferred, 0),
      totalCredits: owned.reduce((sum, session) => sum + session.creditsEarned, 0),
    };
  }

  async ownerCountryBreakdown(ownerId: string, limit: number): Promise<CountryUsage[]> {
    await tick();
    const byCountry = new Map<string, CountryUsage>();
    for (const session of this.all()) {
      if (session.nodeOwnerId !== ownerId) continue;
      const usage = byCountry.get(session.clientCountry) ?? {
        countryCode: session.clientCountry,
        sessions: 0,
        bytes: 0,
      };
      usage.sessions++;
      usage.bytes += session.bytesTransferred;
      byCountry.set(session.clientCountry, usage);
    }
    return [...byCountry.values()]
      .sort((a, b) => b.bytes - a.bytes || a.countryCode.localeCompare(b.countryCode))
      .slice(0, limit);
  }

  private all(): PeerSession[] {
    return [...this.state.sessions.values()].map((session) => structuredClone(session));
  }

  private active(): PeerSession[] {
    return this.all().filter((session) => session.isActive);
  }

  private mutate(id: string, apply: (session: PeerSession) => boolean): PeerSession | null {
    const current = this.state.sessions.get(id);
    if (!current) {
      return null;
    }
    const draft = structuredClone(current);
    if (!apply(draft)) {
      return null;
    }
    this.state.sessions.set(id, draft);
    return structuredClone(draft);
  }
}

export class MemoryLedgerStore implements LedgerStore {
  private pendingFault: Error | null = null;

  constructor(private readonly state: MemoryState) {}

  /** Makes the next commit fail with `error` before anything is written. */
  failNextCommit(error: Error): void {
    this.pendingFault = error;
  }

  async commit(command: LedgerCommand): Promise<LedgerCommitResult> {
    await tick();
    if (this.pendingFault) {
      const fault = this.pendingFault;
      this.pendingFault = null;
      throw fault;
    }

    const balances = new Map<string, number>();
    for (const userId of [...new Set(command.userIds)].sort()) {
      const user = this.state.users.get(userId);
      if (!user) {
        throw new NotFoundError('User');
      }
      balances.set(userId, user.credits);
    }

    if (command.settlementSessionId) {
      const existing = this.state.settlements.get(command.settlementSessionId);
      if (existing) {
        return { transactions: [], balances, settlement: { ...existing }, replayed: true };
      }
    }

    const plan = command.plan(new Map(balances));
    const next = applyPostings(balances, plan);

    for (const [userId, credits] of next) {
      const user = this.state.users.get(userId);
      if (user) {
        user.credits = credits;
      }
    }
    const transactions = plan.postings.map((posting) => ({
      ...posting,
      id: uuidv4(),
      createdAt: new Date(command.at.getTime()),
    }));
    this.state.transactions.push(...transactions);

    let settlement: SessionSettlement | null = null;
    if (plan.settlement) {
      settlement = { ...plan.settlement, settledAt: new Date(command.at.getTime()) };
      this.state.settlements.set(settlement.sessionId, settlement);
    }

    return {
      transactions: transactions.map((transaction) => ({ ...transaction })),
      balances: next,
      settlement: settlement ? { ...settlement } : null,
      replayed: false,
    };
  }

  async balance(userId: string): Promise<number | null> {
    await tick();
    return this.state.users.get(userId)?.credits ?? null;
  }

  async history(userId: string, limit: number): Promise<CreditTransaction[]> {
    await tick();
    return this.state.transactions
      .filter((transaction) => transaction.userId === userId)
      .map((transaction, index) => ({ transaction, index }))
      .sort((a, b) => b.transaction.createdAt.getTime() - a.transaction.createdAt.getTime() || b.index - a.index)
      .slice(0, limit)
      .map(({ transaction }) => ({ ...transaction }));
  }

  async getSettlement(sessionId: string): Promise<SessionSettlement | null> {
    await tick();
    const settlement = this.state.settlements.get(sessionId);
    return settlement ? { ...settlement } : null;
  }

  async audit(): Promise<BalanceMismatch[]> {
    await tick();
    const mismatches: BalanceMismatch[] = [];
    for (const user of [...this.state.users.values()].sort((a, b) => a.id.localeCompare(b.id))) {
      const transactionSum = this.transactionSum(user.id);
      if (transactionSum !== user.credits) {
        mismatches.push({ userId: user.id, cachedBalance: user.credits, transactionSum });
      }
    }
    return mismatches;
  }

  transactionSum(userId: string): number {
    return this.state.transactions
      .filter((transaction) => transaction.userId === userId)
      .reduce((sum, transaction) => sum + transaction.amount, 0);
  }
}

export interface MemoryStores extends Stores {
  state: MemoryState;
  users: MemoryUserStore;
  nodes: MemoryNodeStore;
  sessions: MemorySessionStore;
  ledger: MemoryLedgerStore;
}

export function createMemoryStores(): MemoryStores {
  const state = new MemoryState();
  return {
    state,
    users: new MemoryUserStore(state),
    nodes: new MemoryNodeStore(state),
    sessions: new MemorySessionStore(state),
    ledger: new MemoryLedgerStore(state),
  };
}
