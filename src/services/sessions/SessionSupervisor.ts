import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { CloseReason, Node, NodeGroup, PeerSession, TrafficType } from '../../database/models';
import { SessionStore, UserStore } from '../../database/stores';
import { Clock, secondsBefore, systemClock } from '../../utils/clock';
import {
  ConfigurationError,
  ConflictError,
  ForbiddenError,
  InsufficientCreditsError,
  LedgerInconsistencyError,
  NoEligibleNodeError,
  NotFoundError,
  SessionClosedError,
  ValidationError,
} from '../../utils/errors';
import { identityHash } from '../../utils/hash';
import { VirtualIpPool } from '../../utils/ipPool';
import { logger } from '../../utils/logger';
import { NodeDirectory, SessionCloser } from '../directory/NodeDirectory';
import { ProtocolCatalog } from '../directory/protocols';
import { Ledger } from '../ledger/Ledger';
import { Matcher } from '../matching/Matcher';
import { CreditRateCalculator } from './CreditRateCalculator';

const COUNTRY_CODE = /^[A-Z]{2}$/;
const UNKNOWN_COUNTRY = 'ZZ';
const REPORT_ATTEMPTS = 3;

export interface SupervisorOptions {
  relayHost: string;
  identitySalt: string;
  minimumCreditsToConnect: number;
  maxSessionsPerUser: number;
  firstReportGraceSec: number;
  idleTimeoutSec: number;
  closingRetrySec: number;
  sweepIntervalMs: number;
}

export interface ConnectRequest {
  userId: string;
  protocol: string;
  clientCountry?: string;
  /** Raw client address; only its salted hash is stored. */
  clientAddress?: string;
  group?: NodeGroup;
  countryPreference?: string;
}

export interface ConnectResult {
  session: PeerSession;
  node: Node;
}

export interface TrafficReport {
  /** Cumulative bytes since the session started. */
  bytesTransferred: number;
  trafficType?: TrafficType;
}

export interface SweepResult {
  timedOut: number;
  idle: number;
  finished: number;
}

/**
 * Owns sessions from match to teardown:
 * REQUESTED -> MATCHED -> ACTIVE -> CLOSING -> CLOSED.
 *
 * Emits `sessionOpened`, `sessionClosed`, `settled`, `settlementFailed`
 * and `matchFailed`.
 */
export class SessionSupervisor extends EventEmitter implements SessionCloser {
  private sweepInterval: NodeJS.Timeout | null = null;

  constructor(
    private readonly sessions: SessionStore,
    private readonly users: UserStore,
    private readonly directory: NodeDirectory,
    private readonly matcher: Matcher,
    private readonly ledger: Ledger,
    private readonly rates: CreditRateCalculator,
    private readonly ipPool: VirtualIpPool,
    private readonly protocols: ProtocolCatalog,
    private readonly options: SupervisorOptions,
    private readonly clock: Clock = systemClock
  ) {
    super();
  }

  async connect(request: ConnectRequest): Promise<ConnectResult> {
    const user = await this.users.findById(request.userId);
    if (!user) {
      throw new NotFoundError('User');
    }

    const protocol = this.protocols.parse(request.protocol);
    const clientCountry = request.clientCountry ?? UNKNOWN_COUNTRY;
    if (!COUNTRY_CODE.test(clientCountry)) {
      throw new ValidationError('client_country must be an upper-case ISO 3166-1 alpha-2 code');
    }

    const balance = await this.ledger.balance(user.id);
    if (balance < this.options.minimumCreditsToConnect) {
      throw new InsufficientCreditsError(this.options.minimumCreditsToConnect, balance);
    }

    // Early refusal; the insert below enforces the cap atomically
    const active = await this.sessions.countActiveForClient(user.id);
    if (active >= this.options.maxSessionsPerUser) {
      throw this.sessionCapError();
    }

    let node: Node;
    try {
      node = await this.matcher.match({
        userId: user.id,
        protocol,
        clientCountry,
        group: request.group,
        countryPreference: request.countryPreference,
      });
    } catch (error) {
      if (error instanceof NoEligibleNodeError) {
        this.emit('matchFailed', error);
      }
      throw error;
    }

    let virtualIp: string | null = null;
    try {
      virtualIp = this.ipPool.allocate();
      const now = this.clock.now();
      const draft: PeerSession = {
        id: uuidv4(),
        nodeId: node.id,
        nodeOwnerId: node.ownerId,
        clientUserId: user.id,
        clientCountry,
        clientIdHash: identityHash(request.clientAddress ?? user.id, this.options.identitySalt),
        protocol,
        virtualIp,
        serverEndpoint: `${this.options.relayHost}:${this.protocols.portFor(protocol)}`,
        trafficType: 'BROWSING',
        bytesTransferred: 0,
        weightedBytes: 0,
        creditsEarned: 0,
        state: 'MATCHED',
        closeReason: null,
        isActive: true,
        startedAt: now,
        lastReportAt: null,
        endedAt: null,
      };
      const session = await this.sessions.insert(draft, this.options.maxSessionsPerUser);
      if (!session) {
        logger.info('Concurrent connect hit the session cap', { userId: user.id, nodeId: node.id });
        throw this.sessionCapError();
      }
      this.ipPool.confirm(virtualIp);

      logger.info('Session matched', {
        sessionId: session.id,
        nodeId: node.id,
        protocol,
        virtualIp,
      });
      this.emit('sessionOpened', session);
      return { session, node };
    } catch (error) {
      if (virtualIp) {
        if (error instanceof ConfigurationError) {
          // Another live session holds this address; keep it out of circulation
          this.ipPool.confirm(virtualIp);
          logger.error('Virtual IP collision', { virtualIp, error });
        } else {
          this.ipPool.release(virtualIp);
        }
      }
      await this.directory.releaseSlot(node.id);
      throw error;
    }
  }

  async getSession(sessionId: string): Promise<PeerSession> {
    const session = await this.sessions.get(sessionId);
    if (!session) {
      throw new NotFoundError('Session');
    }
    return session;
  }

  /** Client-initiated teardown; clients may only close their own sessions. */
  async disconnect(sessionId: string, userId: string): Promise<PeerSession> {
    const session = await this.sessions.get(sessionId);
    if (!session || session.clientUserId !== userId) {
      throw new NotFoundError('Session');
    }
    return this.close(sessionId, 'CLIENT_DISCONNECT');
  }

  async reportTraffic(sessionId: string, report: TrafficReport, reporterNodeId?: string): Promise<PeerSession> {
    if (!Number.isSafeInteger(report.bytesTransferred) || report.bytesTransferred < 0) {
      throw new ValidationError('bytes_transferred must be a non-negative integer');
    }

    for (let attempt = 0; attempt < REPORT_ATTEMPTS; attempt++) {
      const session = await this.getSession(sessionId);
      if (reporterNodeId !== undefined && session.nodeId !== reporterNodeId) {
        throw new ForbiddenError('Session is served by another node');
      }
      if (session.state === 'CLOSING' || session.state === 'CLOSED') {
        throw new SessionClosedError(sessionId);
      }
      if (report.bytesTransferred < session.bytesTransferred) {
        throw new ValidationError(
          `bytes_transferred went backwards (${report.bytesTransferred} < ${session.bytesTransferred})`
        );
      }

      const trafficType = report.trafficType ?? session.trafficType;
      const node = await this.directory.getNode(session.nodeId);

      if (
        (trafficType === 'STREAMING' && !node.policy.allowStreaming) ||
        (trafficType === 'TORRENT' && !node.policy.allowTorrents)
      ) {
        logger.warn('Traffic class not permitted by node policy', { sessionId, nodeId: node.id, trafficType });
        return this.close(sessionId, 'POLICY_VIOLATION');
      }

      const delta = report.bytesTransferred - session.bytesTransferred;
      const weightedBytes = session.weightedBytes + this.rates.weigh(delta, trafficType, node.quality.reputationScore);
      const updated = await this.sessions.recordTraffic(sessionId, session.bytesTransferred, {
        bytesTransferred: report.bytesTransferred,
        weightedBytes,
        creditsEarned: this.rates.toCredits(weightedBytes),
        trafficType,
        lastReportAt: this.clock.now(),
      });
      if (!updated) {
        logger.debug('Traffic report raced another write, retrying', { sessionId, attempt });
        continue;
      }

      const usage = await this.directory.recordUsage(node.id, delta);
      if (usage && usage.policy.maxDailyBytes > 0 && usage.dailyBytesUsed > usage.policy.maxDailyBytes) {
        logger.info('Node daily quota exceeded', { sessionId, nodeId: node.id, used: usage.dailyBytesUsed });
        return this.close(sessionId, 'QUOTA_EXCEEDED');
      }

      const balance = await this.ledger.balance(updated.clientUserId);
      const committedElsewhere = await this.sessions.sumActiveCreditsForClient(updated.clientUserId, sessionId);
      if (updated.creditsEarned + committedElsewhere > balance) {
        logger.info('Projected spend exceeds balance', {
          sessionId,
          projected: updated.creditsEarned + committedElsewhere,
          balance,
        });
        return this.close(sessionId, 'INSUFFICIENT_CREDITS');
      }

      return updated;
    }

    throw new ConflictError('Session is being updated concurrently, retry the report');
  }

  /**
   * Idempotent. Only the caller that moves the session to CLOSING settles it;
   * everyone else gets the session as it stands.
   */
  async close(sessionId: string, reason: CloseReason): Promise<PeerSession> {
    const closing = await this.sessions.beginClose(sessionId, reason, this.clock.now());
    if (!closing) {
      return this.getSession(sessionId);
    }
    logger.info('Closing session', { sessionId, reason });
    return this.finalize(closing);
  }

  async closeSessionsForNode(nodeId: string, reason: CloseReason): Promise<number> {
    const active = await this.sessions.listActiveForNode(nodeId);
    const results = await Promise.allSettled(active.map((session) => this.close(session.id, reason)));

    let closed = 0;
    results.forEach((result, index) => {
      if (result.status === 'fulfilled') {
        if (result.value.state === 'CLOSED') {
          closed++;
        }
      } else {
        logger.error('Failed to close session for node', {
          nodeId,
          sessionId: active[index].id,
          error: result.reason,
        });
      }
    });

    if (active.length > 0) {
      logger.info('Closed sessions for node', { nodeId, reason, closed, total: active.length });
    }
    return closed;
  }

  /**
   * Times out sessions that never reported, closes idle ones and finishes
   * sessions whose settlement failed earlier.
   */
  async sweep(): Promise<SweepResult> {
    const now = this.clock.now();
    const stale = await this.sessions.listStale({
      matchedBefore: secondsBefore(now, this.options.firstReportGraceSec),
      idleBefore: secondsBefore(now, this.options.idleTimeoutSec),
      closingBefore: secondsBefore(now, this.options.closingRetrySec),
    });

    const result: SweepResult = { timedOut: 0, idle: 0, finished: 0 };
    for (const session of stale) {
      try {
        if (session.state === 'MATCHED') {
          const closed = await this.close(session.id, 'TIMEOUT');
          if (closed.state === 'CLOSED') result.timedOut++;
        } else if (session.state === 'ACTIVE') {
          const closed = await this.close(session.id, 'IDLE');
          if (closed.state === 'CLOSED') result.idle++;
        } else if (session.state === 'CLOSING') {
          const closed = await this.finalize(session);
          if (closed.state === 'CLOSED') result.finished++;
        }
      } catch (error) {
        logger.error('Session sweep failed for session', { sessionId: session.id, error });
      }
    }

    await this.restore();
    if (result.timedOut + result.idle + result.finished > 0) {
      logger.info('Session sweep completed', { ...result });
    }
    return result;
  }

  /** Rebuilds the virtual IP pool from live sessions. */
  async restore(): Promise<void> {
    const snapshot = this.ipPool.mark();
    this.ipPool.resync(await this.sessions.listActiveVirtualIps(), snapshot);
  }

  startSweepTask(): void {
    if (this.sweepInterval) {
      return;
    }

    this.sweepInterval = setInterval(async () => {
      try {
        await this.sweep();
      } catch (error) {
        logger.error('Session sweep task failed', { error });
      }
    }, this.options.sweepIntervalMs);

    logger.info('Session sweep task started');
  }

  stopSweepTask(): void {
    if (this.sweepInterval) {
      clearInterval(this.sweepInterval);
      this.sweepInterval = null;
      logger.info('Session sweep task stopped');
    }
  }

  private sessionCapError(): ConflictError {
    return new ConflictError(`At most ${this.options.maxSessionsPerUser} concurrent sessions are allowed`);
  }

  private async finalize(session: PeerSession): Promise<PeerSession> {
    let reasonOverride: CloseReason | undefined;
    try {
      const outcome = await this.ledger.settleSession({
        sessionId: session.id,
        clientUserId: session.clientUserId,
        ownerUserId: session.nodeOwnerId,
        credits: session.creditsEarned,
      });
      this.emit('settled', outcome);
    } catch (error) {
      if (!(error instanceof LedgerInconsistencyError)) {
        logger.error('Settlement failed; session stays CLOSING until the next sweep', {
          sessionId: session.id,
          error,
        });
        return session;
      }
      logger.error('Ledger inconsistency while settling session', {
        sessionId: session.id,
        details: error.details,
      });
      this.emit('settlementFailed', error);
      reasonOverride = 'LEDGER_FAULT';
    }

    const closed = await this.sessions.finishClose(session.id, this.clock.now(), reasonOverride);
    if (!closed) {
      return this.getSession(session.id);
    }

    this.ipPool.release(closed.virtualIp);
    logger.info('Session closed', {
      sessionId: closed.id,
      nodeId: closed.nodeId,
      reason: closed.closeReason,
      bytes: closed.bytesTransferred,
      credits: closed.creditsEarned,
    });
    this.emit('sessionClosed', closed);
    return closed;
  }
}
