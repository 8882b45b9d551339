import { TrafficType } from '../../database/models';
import { CountryUsage, NodeStore, SessionStore } from '../../database/stores';
import { Clock, secondsBetween, systemClock } from '../../utils/clock';
import { NotFoundError } from '../../utils/errors';
import { formatBytes, impactMessage } from '../../utils/format';

const ACTIVE_LIMIT = 50;
const HISTORY_LIMIT = 200;
const MAX_HISTORY_DAYS = 30;
const DEFAULT_HISTORY_DAYS = 7;
const TOP_COUNTRIES = 10;

export interface ActiveSessionSummary {
  sessionId: string;
  clientCountry: string;
  trafficType: TrafficType;
  bytesTransferred: number;
  durationSeconds: number;
  creditsEarned: number;
}

export interface ActiveSessionsReport {
  sessions: ActiveSessionSummary[];
  count: number;
  totalBytes: number;
  totalCredits: number;
  formattedBandwidth: string;
}

export interface HistoryEntry {
  country: string;
  trafficType: TrafficType;
  bytes: number;
  credits: number;
  startedAt: Date;
  endedAt: Date | null;
}

export interface HistoryReport {
  entries: HistoryEntry[];
  periodDays: number;
  totalSessions: number;
  totalBytes: number;
  totalCredits: number;
  formattedTotal: string;
}

export interface OwnerStats {
  nodeStatus: 'online' | 'offline';
  nodes: number;
  reputationScore: number;
  activeConnections: number;
  lifetimeSessions: number;
  lifetimeBytes: number;
  lifetimeFormatted: string;
  topCountries: CountryUsage[];
  impactMessage: string;
}

/**
 * What node operators may see about traffic through their nodes: client
 * country, traffic class and volume. Client identities never leave the store.
 */
export class TransparencyService {
  constructor(
    private readonly sessions: SessionStore,
    private readonly nodes: NodeStore,
    private readonly clock: Clock = systemClock
  ) {}

  async activeSessions(ownerId: string): Promise<ActiveSessionsReport> {
    const now = this.clock.now();
    const active = await this.sessions.listActiveForOwner(ownerId, ACTIVE_LIMIT);
    const sessions = active.map((session) => ({
      sessionId: session.id,
      clientCountry: session.clientCountry,
      trafficType: session.trafficType,
      bytesTransferred: session.bytesTransferred,
      durationSeconds: Math.max(0, Math.floor(secondsBetween(session.startedAt, now))),
      creditsEarned: session.creditsEarned,
    }));

    const totalBytes = sessions.reduce((sum, session) => sum + session.bytesTransferred, 0);
    return {
      sessions,
      count: sessions.length,
      totalBytes,
      totalCredits: sessions.reduce((sum, session) => sum + session.creditsEarned, 0),
      formattedBandwidth: formatBytes(totalBytes),
    };
  }

  async history(ownerId: string, days: number = DEFAULT_HISTORY_DAYS): Promise<HistoryReport> {
    const periodDays = Math.min(Math.max(Math.floor(days), 1), MAX_HISTORY_DAYS);
    const since = new Date(this.clock.now().getTime() - periodDays * 24 * 60 * 60 * 1000);
    const sessions = await this.sessions.listHistoryForOwner(ownerId, since, HISTORY_LIMIT);

    const entries = sessions.map((session) => ({
      country: session.clientCountry,
      trafficType: session.trafficType,
      bytes: session.bytesTransferred,
      credits: session.creditsEarned,
      startedAt: session.startedAt,
      endedAt: session.endedAt,
    }));
    const totalBytes = entries.reduce((sum, entry) => sum + entry.bytes, 0);

    return {
      entries,
      periodDays,
      totalSessions: entries.length,
      totalBytes,
      totalCredits: entries.reduce((sum, entry) => sum + entry.credits, 0),
      formattedTotal: formatBytes(totalBytes),
    };
  }

  async stats(ownerId: string): Promise<OwnerStats> {
    const nodes = await this.nodes.listForOwner(ownerId);
    if (nodes.length === 0) {
      throw new NotFoundError('Node');
    }

    const [totals, topCountries] = await Promise.all([
      this.sessions.ownerTotals(ownerId),
      this.sessions.ownerCountryBreakdown(ownerId, TOP_COUNTRIES),
    ]);
    const reputation = nodes.reduce((sum, node) => sum + node.quality.reputationScore, 0) / nodes.length;

    return {
      nodeStatus: nodes.some((node) => node.isOnline) ? 'online' : 'offline',
      nodes: nodes.length,
      reputationScore: Math.round(reputation * 100) / 100,
      activeConnections: nodes.reduce((sum, node) => sum + node.currentConnections, 0),
      lifetimeSessions: totals.totalSessions,
      lifetimeBytes: totals.totalBytes,
      lifetimeFormatted: formatBytes(totals.totalBytes),
      topCountries,
      impactMessage: impactMessage(totals.totalBytes),
    };
  }
}
