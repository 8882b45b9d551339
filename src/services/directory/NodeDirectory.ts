import { v4 as uuidv4 } from 'uuid';
import { CloseReason, Node, NodeGroup, Protocol, TrafficPolicy } from '../../database/models';
import { LivenessPatch, LivenessSnapshot, NewNode, NodeSettingsPatch, NodeStore } from '../../database/stores';
import { Clock, systemClock, utcDay } from '../../utils/clock';
import {
  CapacityRaceError,
  ConflictError,
  ForbiddenError,
  NotFoundError,
  ValidationError,
} from '../../utils/errors';
import { identityHash } from '../../utils/hash';
import { logger } from '../../utils/logger';
import { TokenIssuer } from '../auth/tokens';
import { NodeRanker, RankedNode } from '../matching/NodeRanker';
import { EligibilityFilter, dailyQuotaExhausted, ineligibilityReason } from './eligibility';
import { LivenessPolicy, livenessCutoffs } from './liveness';
import { ProtocolCatalog } from './protocols';

const COUNTRY_CODE = /^[A-Z]{2}$/;
const MAX_DISCOVER_LIMIT = 50;

export const DEFAULT_TRAFFIC_POLICY: TrafficPolicy = {
  allowCountries: ['*'],
  blockCountries: [],
  allowStreaming: true,
  allowTorrents: false,
  maxDailyBytes: 50 * 1024 * 1024 * 1024,
};

export const INITIAL_QUALITY: Node['quality'] = {
  uptimePercentage: 100,
  avgLatencyMs: 50,
  reputationScore: 100,
};

export interface RegisterNodeInput {
  ownerId: string;
  /** Raw public address; only its salted hash is stored. */
  address?: string;
  countryCode: string;
  city?: string | null;
  bandwidthMbps: number;
  maxConnections: number;
  protocols: string[];
  policy?: Partial<TrafficPolicy>;
}

export interface RegisteredNode {
  node: Node;
  nodeToken: string;
}

export interface NodeUpdate {
  city?: string | null;
  bandwidthMbps?: number;
  maxConnections?: number;
  protocols?: string[];
  policy?: Partial<TrafficPolicy>;
}

export interface DiscoverFilter {
  countryCode?: string;
  group?: NodeGroup;
  protocol?: string;
  limit?: number;
}

/** Implemented by the session supervisor; set after construction. */
export interface SessionCloser {
  closeSessionsForNode(nodeId: string, reason: CloseReason): Promise<number>;
}

export interface DirectoryOptions {
  identitySalt: string;
  liveness: LivenessPolicy;
}

export class NodeDirectory {
  private sessionCloser: SessionCloser | null = null;

  constructor(
    private readonly store: NodeStore,
    private readonly tokens: TokenIssuer,
    private readonly protocols: ProtocolCatalog,
    private readonly options: DirectoryOptions,
    private readonly clock: Clock = systemClock,
    private readonly ranker: NodeRanker = new NodeRanker()
  ) {}

  setSessionCloser(closer: SessionCloser): void {
    this.sessionCloser = closer;
  }

  get livenessPolicy(): LivenessPolicy {
    return this.options.liveness;
  }

  async register(input: RegisterNodeInput): Promise<RegisteredNode> {
    const countryCode = this.parseCountry(input.countryCode, 'country_code');
    this.requireNonNegative(input.bandwidthMbps, 'bandwidth_mbps');
    this.requireCapacity(input.maxConnections);
    const protocols = this.parseProtocols(input.protocols);
    const policy = this.parsePolicy({ ...DEFAULT_TRAFFIC_POLICY, ...input.policy });

    const id = uuidv4();
    const now = this.clock.now();
    const newNode: NewNode = {
      id,
      ownerId: input.ownerId,
      publicIdentityHash: identityHash(input.address ?? id, this.options.identitySalt),
      countryCode,
      city: input.city ?? null,
      bandwidthMbps: input.bandwidthMbps,
      maxConnections: input.maxConnections,
      currentConnections: 0,
      protocols,
      quality: { ...INITIAL_QUALITY },
      isOnline: true,
      isDisabled: false,
      lastHeartbeat: now,
      missedHeartbeats: 0,
      policy,
      dailyBytesUsed: 0,
      dailyUsageDate: utcDay(now),
      group: 'COMMUNITY',
      publicConfig: null,
    };

    const node = await this.store.insert(newNode);
    logger.info('Node registered', { nodeId: node.id, ownerId: input.ownerId, country: countryCode });
    return { node, nodeToken: this.tokens.signNodeToken(node.id, input.ownerId) };
  }

  async update(nodeId: string, ownerId: string, delta: NodeUpdate): Promise<Node> {
    const node = await this.ownedNode(nodeId, ownerId);
    const patch: NodeSettingsPatch = {};

    if (delta.city !== undefined) {
      patch.city = delta.city;
    }
    if (delta.bandwidthMbps !== undefined) {
      this.requireNonNegative(delta.bandwidthMbps, 'bandwidth_mbps');
      patch.bandwidthMbps = delta.bandwidthMbps;
    }
    if (delta.maxConnections !== undefined) {
      this.requireCapacity(delta.maxConnections);
      if (delta.maxConnections < node.currentConnections) {
        throw new ConflictError(
          `max_connections ${delta.maxConnections} is below the ${node.currentConnections} active connections`
        );
      }
      patch.maxConnections = delta.maxConnections;
    }
    if (delta.protocols !== undefined) {
      patch.protocols = this.parseProtocols(delta.protocols);
    }
    if (delta.policy !== undefined) {
      patch.policy = this.parsePolicy({ ...node.policy, ...delta.policy });
    }

    const updated = await this.store.updateSettings(nodeId, patch);
    if (!updated) {
      throw new ConflictError('Node changed while updating; max_connections is below active connections');
    }
    logger.info('Node updated', { nodeId, fields: Object.keys(patch) });
    return updated;
  }

  async getNode(nodeId: string, options: { fresh?: boolean } = {}): Promise<Node> {
    const node = await this.store.get(nodeId, options);
    if (!node) {
      throw new NotFoundError('Node');
    }
    return node;
  }

  async listForOwner(ownerId: string): Promise<Node[]> {
    return this.store.listForOwner(ownerId);
  }

  async listOnline(): Promise<Node[]> {
    return this.store.listOnline();
  }

  async countOnlineByGroup(): Promise<Record<NodeGroup, number>> {
    return this.store.countOnlineByGroup();
  }

  async listEligible(filter: EligibilityFilter): Promise<Node[]> {
    const now = this.clock.now();
    const cutoffs = livenessCutoffs(this.options.liveness, now);
    const today = utcDay(now);

    const candidates = await this.store.listCandidates({
      protocol: filter.protocol,
      group: filter.group,
      countryCode: filter.countryPreference,
    });

    return candidates.filter((node) => {
      const reason = ineligibilityReason(node, filter, cutoffs, today);
      if (reason) {
        logger.debug('Node not eligible', { nodeId: node.id, reason });
      }
      return reason === null;
    });
  }

  /** Public listing, best nodes first. */
  async discover(filter: DiscoverFilter): Promise<RankedNode[]> {
    const limit = Math.min(Math.max(filter.limit ?? 20, 1), MAX_DISCOVER_LIMIT);
    const now = this.clock.now();
    const cutoffs = livenessCutoffs(this.options.liveness, now);
    const today = utcDay(now);

    const candidates = await this.store.listCandidates({
      protocol: filter.protocol ? this.protocols.parse(filter.protocol) : undefined,
      group: filter.group,
      countryCode: filter.countryCode ? this.parseCountry(filter.countryCode, 'country') : undefined,
    });
    const live = candidates.filter(
      (node) => node.lastHeartbeat >= cutoffs[node.group] && !dailyQuotaExhausted(node, today)
    );
    return this.ranker.rank(live).slice(0, limit);
  }

  /** Takes one slot on the node or fails with CapacityRaceError. */
  async reserveSlot(nodeId: string): Promise<Node> {
    const node = await this.store.get(nodeId);
    const group = node?.group ?? 'COMMUNITY';
    const cutoff = livenessCutoffs(this.options.liveness, this.clock.now())[group];
    const reserved = await this.store.tryReserveSlot(nodeId, cutoff);
    if (!reserved) {
      throw new CapacityRaceError(nodeId);
    }
    return reserved;
  }

  /** Only for reservations that never became a persisted session. */
  async releaseSlot(nodeId: string): Promise<void> {
    await this.store.releaseSlot(nodeId);
  }

  async applyLiveness(nodeId: string, expected: LivenessSnapshot, patch: LivenessPatch): Promise<Node | null> {
    return this.store.updateLiveness(nodeId, expected, patch);
  }

  async recordUsage(nodeId: string, bytes: number): Promise<Node | null> {
    if (bytes <= 0) {
      return this.store.get(nodeId);
    }
    return this.store.addDailyUsage(nodeId, bytes, utcDay(this.clock.now()));
  }

  /**
   * ONLINE -> OFFLINE. Returns whether this call made the transition; only
   * that caller closes the node's sessions.
   */
  async markOffline(nodeId: string, reason: CloseReason = 'NODE_OFFLINE'): Promise<boolean> {
    const node = await this.store.setOffline(nodeId);
    if (!node) {
      return false;
    }
    logger.info('Node marked offline', { nodeId, reason });
    await this.closeSessions(nodeId, reason);
    return true;
  }

  async goOffline(nodeId: string, ownerId: string): Promise<boolean> {
    await this.ownedNode(nodeId, ownerId);
    return this.markOffline(nodeId, 'NODE_OFFLINE');
  }

  /** Soft-disables the node and force-closes its sessions. */
  async deregister(nodeId: string, ownerId: string): Promise<number> {
    await this.ownedNode(nodeId, ownerId);
    const disabled = await this.store.disable(nodeId);
    if (!disabled) {
      throw new NotFoundError('Node');
    }
    const closed = await this.closeSessions(nodeId, 'NODE_DEREGISTERED');
    logger.info('Node deregistered', { nodeId, closedSessions: closed });
    return closed;
  }

  async upsertGateway(node: NewNode): Promise<Node | null> {
    return this.store.upsertGateway(node);
  }

  private async closeSessions(nodeId: string, reason: CloseReason): Promise<number> {
    if (!this.sessionCloser) {
      logger.warn('No session closer attached; sessions left for the sweep', { nodeId, reason });
      return 0;
    }
    return this.sessionCloser.closeSessionsForNode(nodeId, reason);
  }

  private async ownedNode(nodeId: string, ownerId: string): Promise<Node> {
    const node = await this.store.get(nodeId, { fresh: true });
    if (!node || node.isDisabled) {
      throw new NotFoundError('Node');
    }
    if (node.ownerId !== ownerId) {
      throw new ForbiddenError('Node belongs to another user');
    }
    return node;
  }

  private parseCountry(value: string, field: string): string {
    if (!COUNTRY_CODE.test(value)) {
      throw new ValidationError(`${field} must be an upper-case ISO 3166-1 alpha-2 code`);
    }
    return value;
  }

  private parseProtocols(values: string[]): Protocol[] {
    if (values.length === 0) {
      throw new ValidationError('At least one protocol is required');
    }
    return [...new Set(values.map((value) => this.protocols.parse(value)))];
  }

  private parsePolicy(policy: TrafficPolicy): TrafficPolicy {
    for (const code of policy.allowCountries) {
      if (code !== '*') {
        this.parseCountry(code, 'allow_countries');
      }
    }
    for (const code of policy.blockCountries) {
      this.parseCountry(code, 'block_countries');
    }
    this.requireNonNegative(policy.maxDailyBytes, 'max_daily_bytes');
    return {
      allowCountries: policy.allowCountries.length > 0 ? policy.allowCountries : ['*'],
      blockCountries: policy.blockCountries,
      allowStreaming: policy.allowStreaming,
      allowTorrents: policy.allowTorrents,
      maxDailyBytes: Math.floor(policy.maxDailyBytes),
    };
  }

  private requireNonNegative(value: number, field: string): void {
    if (!Number.isFinite(value) || value < 0) {
      throw new ValidationError(`${field} must be a non-negative number`);
    }
  }

  private requireCapacity(value: number): void {
    if (!Number.isInteger(value) || value < 1) {
      throw new ValidationError('max_connections must be an integer of at least 1');
    }
  }
}
