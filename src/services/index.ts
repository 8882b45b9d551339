import { Config } from '../config/config';
import { Stores } from '../database/stores';
import { Clock, systemClock } from '../utils/clock';
import { VirtualIpPool } from '../utils/ipPool';
import { AuthService } from './auth/AuthService';
import { TokenIssuer } from './auth/tokens';
import { NodeDirectory } from './directory/NodeDirectory';
import { buildLivenessPolicy } from './directory/liveness';
import { ProtocolCatalog } from './directory/protocols';
import { PublicGatewaySync } from './gateways/PublicGatewaySync';
import { HeartbeatMonitor } from './heartbeat/HeartbeatMonitor';
import { Ledger } from './ledger/Ledger';
import { Matcher } from './matching/Matcher';
import { BrokerMetrics } from './metrics/BrokerMetrics';
import { CreditRateCalculator, RatePolicy, loadRatePolicy } from './sessions/CreditRateCalculator';
import { SessionSupervisor } from './sessions/SessionSupervisor';
import { TransparencyService } from './transparency/TransparencyService';

export interface BrokerServices {
  tokens: TokenIssuer;
  auth: AuthService;
  ledger: Ledger;
  directory: NodeDirectory;
  matcher: Matcher;
  supervisor: SessionSupervisor;
  heartbeat: HeartbeatMonitor;
  transparency: TransparencyService;
  gateways: PublicGatewaySync;
  metrics: BrokerMetrics;
}

export type BrokerSettings = Pick<Config, 'jwt' | 'broker' | 'credits' | 'publicGateways'>;

export interface ServiceOverrides {
  clock?: Clock;
  /** Skips reading the policy file. */
  ratePolicy?: RatePolicy;
  collectDefaultMetrics?: boolean;
}

/** Wires the broker's services over the given stores. */
export function createServices(
  stores: Stores,
  settings: BrokerSettings,
  overrides: ServiceOverrides = {}
): BrokerServices {
  const clock = overrides.clock ?? systemClock;
  const { broker, credits, publicGateways } = settings;

  const liveness = buildLivenessPolicy(
    broker.livenessWindowSec,
    broker.heartbeatPeriodSec,
    publicGateways.syncIntervalMs
  );
  const protocols = new ProtocolCatalog(broker.extraProtocols);
  const tokens = new TokenIssuer(settings.jwt);
  const rates = new CreditRateCalculator(overrides.ratePolicy ?? loadRatePolicy(broker.ratePolicyPath));

  const ledger = new Ledger(stores.ledger, clock);
  const auth = new AuthService(stores.users, tokens, credits.signupBonus, clock);
  const directory = new NodeDirectory(
    stores.nodes,
    tokens,
    protocols,
    { identitySalt: broker.identitySalt, liveness },
    clock
  );
  const matcher = new Matcher(directory, { retryLimit: broker.matchRetryLimit });
  const supervisor = new SessionSupervisor(
    stores.sessions,
    stores.users,
    directory,
    matcher,
    ledger,
    rates,
    new VirtualIpPool(broker.virtualIpCidr),
    protocols,
    {
      relayHost: broker.relayHost,
      identitySalt: broker.identitySalt,
      minimumCreditsToConnect: credits.minimumToConnect,
      maxSessionsPerUser: broker.maxSessionsPerUser,
      firstReportGraceSec: broker.firstReportGraceSec,
      idleTimeoutSec: broker.idleTimeoutSec,
      closingRetrySec: broker.closingRetrySec,
      sweepIntervalMs: broker.sweepIntervalMs,
    },
    clock
  );
  directory.setSessionCloser(supervisor);

  const heartbeat = new HeartbeatMonitor(
    directory,
    supervisor,
    { reconcileIntervalMs: broker.reconcileIntervalMs },
    clock
  );
  const transparency = new TransparencyService(stores.sessions, stores.nodes, clock);
  const gateways = new PublicGatewaySync(
    directory,
    { ...publicGateways, identitySalt: broker.identitySalt },
    clock
  );
  const metrics = new BrokerMetrics(directory, stores.sessions, {
    collectDefaults: overrides.collectDefaultMetrics ?? false,
  });
  metrics.attach(supervisor);

  return { tokens, auth, ledger, directory, matcher, supervisor, heartbeat, transparency, gateways, metrics };
}
