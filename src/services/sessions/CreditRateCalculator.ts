import { readFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { TrafficType } from '../../database/models';
import { ConfigurationError, zodMessage } from '../../utils/errors';
import { logger } from '../../utils/logger';

export const DEFAULT_RATE_POLICY_PATH = join(__dirname, '../../../config/rate-policy.json');

const multiplier = z.number().positive();

const ratePolicySchema = z.object({
  bytesPerCredit: z.number().int().positive(),
  trafficMultipliers: z.object({
    BROWSING: multiplier,
    STREAMING: multiplier,
    GAMING: multiplier,
    TORRENT: multiplier,
    BULK: multiplier,
  }),
  qualityBonus: z.object({
    minReputation: z.number().min(0).max(100),
    multiplier,
  }),
});

export type RatePolicy = z.infer<typeof ratePolicySchema>;

export function parseRatePolicy(raw: unknown): RatePolicy {
  const result = ratePolicySchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid rate policy: ${zodMessage(result.error)}`);
  }
  return result.data;
}

export function loadRatePolicy(path: string = DEFAULT_RATE_POLICY_PATH): RatePolicy {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read rate policy at ${path}: ${String(error)}`);
  }
  const policy = parseRatePolicy(raw);
  logger.info('Rate policy loaded', { path, bytesPerCredit: policy.bytesPerCredit });
  return policy;
}

/**
 * Converts relayed bytes into credits. Each byte delta is weighted by its
 * traffic class and, on nodes at or above the reputation threshold, by the
 * quality bonus; credits are the floor of the weighted total.
 */
export class CreditRateCalculator {
  constructor(private readonly policy: RatePolicy) {}

  weigh(deltaBytes: number, trafficType: TrafficType, reputationScore: number): number {
    if (deltaBytes <= 0) {
      return 0;
    }
    const bonus =
      reputationScore >= this.policy.qualityBonus.minReputation ? this.policy.qualityBonus.multiplier : 1;
    return Math.round(deltaBytes * this.policy.trafficMultipliers[trafficType] * bonus);
  }

  toCredits(weightedBytes: number): number {
    return Math.floor(weightedBytes / this.policy.bytesPerCredit);
  }
}
