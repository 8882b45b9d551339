import { Node, TrafficType } from '../../database/models';
import { LivenessSnapshot } from '../../database/stores';
import { Clock, secondsBetween, systemClock } from '../../utils/clock';
import {
  ConflictError,
  NodeUnresponsiveError,
  NotFoundError,
  SessionClosedError,
} from '../../utils/errors';
import { logger } from '../../utils/logger';
import { NodeDirectory } from '../directory/NodeDirectory';
import { SessionSupervisor } from '../sessions/SessionSupervisor';
import { MAX_DECAY_STEPS, decayReputation, recoverReputation, smoothQuality } from './reputation';

const HEARTBEAT_ATTEMPTS = 3;

export interface SessionTrafficReport {
  sessionId: string;
  bytesTransferred: number;
  trafficType?: TrafficType;
}

export interface HeartbeatInput {
  currentConnections: number;
  /** Uptime observed by the node agent since its last heartbeat, 0..100. */
  uptimeSample: number;
  latencyMs?: number;
  sessions?: SessionTrafficReport[];
}

export interface HeartbeatAction {
  type: 'closeSession';
  payload: { sessionId: string; reason: string };
}

export interface HeartbeatResponse {
  status: 'ok';
  nextHeartbeat: number;
  actions: HeartbeatAction[];
}

export interface ReconcileResult {
  checked: number;
  decayed: number;
  offline: number;
  sessionsClosed: number;
}

export interface HeartbeatMonitorOptions {
  reconcileIntervalMs: number;
}

function snapshot(node: Node): LivenessSnapshot {
  return {
    isOnline: node.isOnline,
    lastHeartbeat: node.lastHeartbeat,
    missedHeartbeats: node.missedHeartbeats,
  };
}

export class HeartbeatMonitor {
  private reconcileInterval: NodeJS.Timeout | null = null;

  constructor(
    private readonly directory: NodeDirectory,
    private readonly supervisor: SessionSupervisor,
    private readonly options: HeartbeatMonitorOptions,
    private readonly clock: Clock = systemClock
  ) {}

  async processHeartbeat(nodeId: string, input: HeartbeatInput): Promise<HeartbeatResponse> {
    let previous: Node | null = null;
    let updated: Node | null = null;

    for (let attempt = 0; attempt < HEARTBEAT_ATTEMPTS && !updated; attempt++) {
      const node = await this.directory.getNode(nodeId, { fresh: true });
      if (node.isDisabled) {
        throw new ConflictError('Node has been deregistered');
      }

      const now = this.clock.now();
      const policy = this.directory.livenessPolicy[node.group];
      const wasRecent = secondsBetween(node.lastHeartbeat, now) <= policy.windowSec;
      const smoothed = smoothQuality(node.quality, input.uptimeSample, input.latencyMs);

      previous = node;
      updated = await this.directory.applyLiveness(nodeId, snapshot(node), {
        isOnline: true,
        lastHeartbeat: now,
        missedHeartbeats: 0,
        quality: {
          ...smoothed,
          reputationScore: wasRecent
            ? recoverReputation(node.quality.reputationScore)
            : node.quality.reputationScore,
        },
      });
    }

    if (!updated || !previous) {
      throw new ConflictError('Node liveness is being updated concurrently, retry the heartbeat');
    }

    if (!previous.isOnline) {
      logger.info('Node back online', { nodeId });
    }
    if (input.currentConnections !== updated.currentConnections) {
      // The broker's count is authoritative; the agent's view is only logged
      logger.warn('Node reported a different connection count', {
        nodeId,
        reported: input.currentConnections,
        tracked: updated.currentConnections,
      });
    }

    const actions = await this.forwardSessionReports(nodeId, input.sessions ?? []);
    const nextHeartbeat = this.directory.livenessPolicy[updated.group].periodSec;

    logger.debug('Heartbeat processed', { nodeId, reputation: updated.quality.reputationScore, nextHeartbeat });

    return { status: 'ok', nextHeartbeat, actions };
  }

  /**
   * Decays reputation for missed heartbeats and takes silent nodes offline,
   * force-closing their sessions.
   */
  async reconcile(): Promise<ReconcileResult> {
    const now = this.clock.now();
    const nodes = await this.directory.listOnline();
    const result: ReconcileResult = { checked: nodes.length, decayed: 0, offline: 0, sessionsClosed: 0 };

    for (const node of nodes) {
      try {
        const policy = this.directory.livenessPolicy[node.group];
        const gap = secondsBetween(node.lastHeartbeat, now);
        const missed = Math.max(0, Math.floor(gap / policy.periodSec));
        const newSteps = Math.min(missed, MAX_DECAY_STEPS) - Math.min(node.missedHeartbeats, MAX_DECAY_STEPS);
        const goesOffline = gap > policy.windowSec;

        if (newSteps <= 0 && !goesOffline && missed === node.missedHeartbeats) {
          continue;
        }

        const updated = await this.directory.applyLiveness(node.id, snapshot(node), {
          isOnline: !goesOffline,
          lastHeartbeat: node.lastHeartbeat,
          missedHeartbeats: missed,
          quality: {
            ...node.quality,
            reputationScore:
              newSteps > 0 ? decayReputation(node.quality.reputationScore, newSteps) : node.quality.reputationScore,
          },
        });
        if (!updated) {
          // A heartbeat arrived meanwhile
          continue;
        }
        if (newSteps > 0) {
          result.decayed++;
        }

        if (goesOffline) {
          result.offline++;
          const unresponsive = new NodeUnresponsiveError(node.id, Math.floor(gap));
          logger.warn(unresponsive.message, { nodeId: node.id, code: unresponsive.code, missed });
          result.sessionsClosed += await this.supervisor.closeSessionsForNode(node.id, 'NODE_UNRESPONSIVE');
        }
      } catch (error) {
        logger.error('Liveness reconciliation failed for node', { nodeId: node.id, error });
      }
    }

    if (result.decayed > 0 || result.offline > 0) {
      logger.info('Liveness reconciliation completed', { ...result });
    }
    return result;
  }

  startReconcileTask(): void {
    if (this.reconcileInterval) {
      return;
    }

    this.reconcileInterval = setInterval(async () => {
      try {
        await this.reconcile();
      } catch (error) {
        logger.error('Liveness reconciliation task failed', { error });
      }
    }, this.options.reconcileIntervalMs);

    logger.info('Liveness reconciliation task started');
  }

  stopReconcileTask(): void {
    if (this.reconcileInterval) {
      clearInterval(this.reconcileInterval);
      this.reconcileInterval = null;
      logger.info('Liveness reconciliation task stopped');
    }
  }

  private async forwardSessionReports(nodeId: string, reports: SessionTrafficReport[]): Promise<HeartbeatAction[]> {
    const actions: HeartbeatAction[] = [];
    for (const report of reports) {
      try {
        const session = await this.supervisor.reportTraffic(
          report.sessionId,
          { bytesTransferred: report.bytesTransferred, trafficType: report.trafficType },
          nodeId
        );
        if (session.state === 'CLOSING' || session.state === 'CLOSED') {
          actions.push({
            type: 'closeSession',
            payload: { sessionId: session.id, reason: session.closeReason ?? 'CLOSED' },
          });
        }
      } catch (error) {
        if (error instanceof SessionClosedError || error instanceof NotFoundError) {
          actions.push({ type: 'closeSession', payload: { sessionId: report.sessionId, reason: error.code } });
        } else {
          logger.warn('Rejected session report in heartbeat', { nodeId, sessionId: report.sessionId, error });
        }
      }
    }
    return actions;
  }
}
