import { NodeQuality } from '../../database/models';

export const REPUTATION_DECAY_FACTOR = 0.9;
export const REPUTATION_RECOVERY_RATE = 0.02;
export const UPTIME_SMOOTHING = 0.1;
export const LATENCY_SMOOTHING = 0.2;
/** Decay steps applied for one outage, however long it lasts. */
export const MAX_DECAY_STEPS = 10;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function clampScore(value: number): number {
  return Math.min(Math.max(value, 0), 100);
}

/** Exponential decay, one factor per missed heartbeat. */
export function decayReputation(score: number, missedSteps: number): number {
  const steps = Math.min(Math.max(missedSteps, 0), MAX_DECAY_STEPS);
  return round2(clampScore(score * REPUTATION_DECAY_FACTOR ** steps));
}

/** Moves the score 2% of the remaining distance towards 100. */
export function recoverReputation(score: number): number {
  return round2(clampScore(score + (100 - score) * REPUTATION_RECOVERY_RATE));
}

export function smoothQuality(
  quality: NodeQuality,
  uptimeSample: number,
  latencyMs: number | undefined
): Omit<NodeQuality, 'reputationScore'> {
  return {
    uptimePercentage: round2(
      clampScore(quality.uptimePercentage + (uptimeSample - quality.uptimePercentage) * UPTIME_SMOOTHING)
    ),
    avgLatencyMs:
      latencyMs === undefined
        ? quality.avgLatencyMs
        : Math.round(quality.avgLatencyMs + (latencyMs - quality.avgLatencyMs) * LATENCY_SMOOTHING),
  };
}
