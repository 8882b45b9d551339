import { Node, User } from '../../src/database/models';
import { BrokerServices, BrokerSettings, createServices } from '../../src/services';
import { RegisterNodeInput } from '../../src/services/directory/NodeDirectory';
import { RatePolicy } from '../../src/services/sessions/CreditRateCalculator';
import { Clock } from '../../src/utils/clock';
import { MemoryStores, createMemoryStores } from './memoryStores';

export const START = new Date('2026-03-01T12:00:00.000Z');

export class FakeClock implements Clock {
  private current: Date;

  constructor(start: Date = START) {
    this.current = new Date(start.getTime());
  }

  now(): Date {
    return new Date(this.current.getTime());
  }

  advance(seconds: number): void {
    this.current = new Date(this.current.getTime() + seconds * 1000);
  }
}

// One credit per megabyte of browsing, no quality bonus
export const TEST_RATE_POLICY: RatePolicy = {
  bytesPerCredit: 1_000_000,
  trafficMultipliers: {
    BROWSING: 1,
    STREAMING: 1.5,
    GAMING: 1.2,
    TORRENT: 2,
    BULK: 0.8,
  },
  qualityBonus: { minReputation: 90, multiplier: 1 },
};

export function testSettings(overrides: Partial<BrokerSettings['broker']> = {}): BrokerSettings {
  return {
    jwt: { secret: 'test-secret', expiresInSeconds: 3600, nodeTokenExpiresInSeconds: 86400 },
    broker: {
      livenessWindowSec: 90,
      heartbeatPeriodSec: 30,
      reconcileIntervalMs: 15000,
      sweepIntervalMs: 30000,
      firstReportGraceSec: 120,
      idleTimeoutSec: 300,
      closingRetrySec: 60,
      matchRetryLimit: 3,
      maxSessionsPerUser: 3,
      virtualIpCidr: '10.8.0.0/24',
      relayHost: 'relay.test',
      identitySalt: 'test-salt',
      extraProtocols: [],
      ...overrides,
    },
    credits: { signupBonus: 100, minimumToConnect: 10 },
    publicGateways: {
      feedUrl: undefined,
      syncIntervalMs: 3600000,
      maxNodes: 100,
      defaultMaxConnections: 50,
    },
  };
}

export interface Harness {
  stores: MemoryStores;
  clock: FakeClock;
  services: BrokerServices;
  createUser(username: string, credits?: number): Promise<User>;
  registerNode(ownerId: string, overrides?: Partial<RegisterNodeInput>): Promise<{ node: Node; nodeToken: string }>;
}

export function createHarness(overrides: Partial<BrokerSettings['broker']> = {}): Harness {
  const stores = createMemoryStores();
  const clock = new FakeClock();
  const services = createServices(stores, testSettings(overrides), { clock, ratePolicy: TEST_RATE_POLICY });

  let userCount = 0;
  return {
    stores,
    clock,
    services,
    async createUser(username: string, credits = 100): Promise<User> {
      userCount++;
      const user = await stores.users.create({
        id: `user-${String(userCount).padStart(3, '0')}-${username}`,
        username,
        passwordHash: 'unused',
        createdAt: clock.now(),
      });
      if (credits > 0) {
        await services.ledger.record(user.id, credits, 'BONUS', 'Test grant');
      }
      return { ...user, credits };
    },
    async registerNode(ownerId: string, input: Partial<RegisterNodeInput> = {}) {
      return services.directory.register({
        ownerId,
        countryCode: 'DE',
        bandwidthMbps: 100,
        maxConnections: 10,
        protocols: ['WIREGUARD'],
        ...input,
      });
    },
  };
}

/** A node value for pure functions; nothing is stored. */
export function buildNode(overrides: Partial<Node> = {}): Node {
  return {
    id: 'node-a',
    ownerId: 'owner-1',
    publicIdentityHash: 'hash',
    countryCode: 'DE',
    city: null,
    bandwidthMbps: 100,
    maxConnections: 10,
    currentConnections: 0,
    protocols: ['WIREGUARD'],
    quality: { uptimePercentage: 100, avgLatencyMs: 50, reputationScore: 100 },
    isOnline: true,
    isDisabled: false,
    lastHeartbeat: START,
    missedHeartbeats: 0,
    policy: {
      allowCountries: ['*'],
      blockCountries: [],
      allowStreaming: true,
      allowTorrents: false,
      maxDailyBytes: 0,
    },
    dailyBytesUsed: 0,
    dailyUsageDate: '2026-03-01',
    group: 'COMMUNITY',
    publicConfig: null,
    createdAt: START,
    updatedAt: START,
    ...overrides,
  };
}
