import { NodeGroup } from '../../database/models';
import { secondsBefore } from '../../utils/clock';
import { ConfigurationError } from '../../utils/errors';

export interface GroupLiveness {
  /** A node silent for longer than this is offline. */
  windowSec: number;
  /** Expected gap between two heartbeats. */
  periodSec: number;
}

export type LivenessPolicy = Record<NodeGroup, GroupLiveness>;

/**
 * COMMUNITY nodes heartbeat on their own. PUBLIC gateways are only refreshed
 * by the feed sync, so one sync may be missed before they go offline.
 */
export function buildLivenessPolicy(
  livenessWindowSec: number,
  heartbeatPeriodSec: number,
  gatewaySyncIntervalMs: number
): LivenessPolicy {
  if (heartbeatPeriodSec <= 0 || livenessWindowSec <= heartbeatPeriodSec) {
    throw new ConfigurationError(
      `Liveness window (${livenessWindowSec}s) must exceed the heartbeat period (${heartbeatPeriodSec}s)`
    );
  }
  const syncPeriodSec = Math.max(1, Math.ceil(gatewaySyncIntervalMs / 1000));
  return {
    COMMUNITY: { windowSec: livenessWindowSec, periodSec: heartbeatPeriodSec },
    PUBLIC: { windowSec: syncPeriodSec * 2, periodSec: syncPeriodSec },
  };
}

/** Oldest acceptable heartbeat per group at `now`. */
export function livenessCutoffs(policy: LivenessPolicy, now: Date): Record<NodeGroup, Date> {
  return {
    COMMUNITY: secondsBefore(now, policy.COMMUNITY.windowSec),
    PUBLIC: secondsBefore(now, policy.PUBLIC.windowSec),
  };
}
