import { Counter, Gauge, Registry, collectDefaultMetrics } from 'prom-client';
import { CloseReason, NODE_GROUPS, PeerSession } from '../../database/models';
import { logger } from '../../utils/logger';
import { NodeDirectory } from '../directory/NodeDirectory';
import { SettlementOutcome } from '../ledger/Ledger';
import { SessionSupervisor } from '../sessions/SessionSupervisor';
import { SessionStore } from '../../database/stores';

export interface BrokerMetricsOptions {
  collectDefaults?: boolean;
  updateIntervalMs?: number;
}

export class BrokerMetrics {
  private readonly registry: Registry;
  private readonly onlineNodesGauge: Gauge<'group'>;
  private readonly activeSessionsGauge: Gauge;
  private readonly matchesCounter: Counter<'outcome'>;
  private readonly sessionsClosedCounter: Counter<'reason'>;
  private readonly settlementsCounter: Counter<'result'>;
  private readonly settledCreditsCounter: Counter;
  private readonly apiRequestsCounter: Counter<'method' | 'endpoint' | 'status'>;
  private updateInterval: NodeJS.Timeout | null = null;

  constructor(
    private readonly directory: NodeDirectory,
    private readonly sessions: SessionStore,
    private readonly options: BrokerMetricsOptions = {}
  ) {
    this.registry = new Registry();
    this.registry.setDefaultLabels({ app: 'relay-broker' });
    const registers = [this.registry];

    this.onlineNodesGauge = new Gauge({
      name: 'broker_online_nodes',
      help: 'Online nodes by group',
      labelNames: ['group'],
      registers,
    });

    this.activeSessionsGauge = new Gauge({
      name: 'broker_active_sessions',
      help: 'Sessions not yet closed',
      registers,
    });

    this.matchesCounter = new Counter({
      name: 'broker_matches_total',
      help: 'Connect requests by match outcome',
      labelNames: ['outcome'],
      registers,
    });

    this.sessionsClosedCounter = new Counter({
      name: 'broker_sessions_closed_total',
      help: 'Closed sessions by close reason',
      labelNames: ['reason'],
      registers,
    });

    this.settlementsCounter = new Counter({
      name: 'broker_settlements_total',
      help: 'Session settlements by result',
      labelNames: ['result'],
      registers,
    });

    this.settledCreditsCounter = new Counter({
      name: 'broker_settled_credits_total',
      help: 'Credits charged to clients by settlements',
      registers,
    });

    this.apiRequestsCounter = new Counter({
      name: 'broker_api_requests_total',
      help: 'Total number of API requests',
      labelNames: ['method', 'endpoint', 'status'],
      registers,
    });

    if (options.collectDefaults) {
      collectDefaultMetrics({ register: this.registry });
    }
  }

  attach(supervisor: SessionSupervisor): void {
    supervisor.on('sessionOpened', () => {
      this.matchesCounter.inc({ outcome: 'matched' });
    });
    supervisor.on('matchFailed', () => {
      this.matchesCounter.inc({ outcome: 'no_eligible_node' });
    });
    supervisor.on('sessionClosed', (session: PeerSession) => {
      const reason: CloseReason | 'UNKNOWN' = session.closeReason ?? 'UNKNOWN';
      this.sessionsClosedCounter.inc({ reason });
    });
    supervisor.on('settled', (outcome: SettlementOutcome) => {
      this.settlementsCounter.inc({ result: outcome.replayed ? 'replayed' : 'settled' });
      if (!outcome.replayed) {
        this.settledCreditsCounter.inc(outcome.settlement.clientCharge);
      }
    });
    supervisor.on('settlementFailed', () => {
      this.settlementsCounter.inc({ result: 'inconsistent' });
    });
  }

  async update(): Promise<void> {
    const [byGroup, active] = await Promise.all([
      this.directory.countOnlineByGroup(),
      this.sessions.countActive(),
    ]);
    for (const group of NODE_GROUPS) {
      this.onlineNodesGauge.set({ group }, byGroup[group]);
    }
    this.activeSessionsGauge.set(active);
  }

  startUpdateTask(): void {
    if (this.updateInterval) {
      return;
    }
    this.updateInterval = setInterval(async () => {
      try {
        await this.update();
      } catch (error) {
        logger.error('Failed to update broker metrics', { error });
      }
    }, this.options.updateIntervalMs ?? 15000);
  }

  stopUpdateTask(): void {
    if (this.updateInterval) {
      clearInterval(this.updateInterval);
      this.updateInterval = null;
    }
  }

  recordApiRequest(method: string, endpoint: string, status: number): void {
    this.apiRequestsCounter.inc({ method, endpoint, status: status.toString() });
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  get contentType(): string {
    return this.registry.contentType;
  }
}
