import axios from 'axios';
import { NewNode } from '../../database/stores';
import { Clock, systemClock, utcDay } from '../../utils/clock';
import { identityHash } from '../../utils/hash';
import { logger } from '../../utils/logger';
import { DEFAULT_TRAFFIC_POLICY, NodeDirectory } from '../directory/NodeDirectory';

// #HostName,IP,Score,Ping,Speed,CountryLong,CountryShort,NumVpnSessions,Uptime,
// TotalUsers,TotalTraffic,LogType,Operator,Message,OpenVPN_ConfigData_Base64
const MIN_COLUMNS = 15;
const COL_IP = 1;
const COL_PING = 3;
const COL_SPEED = 4;
const COL_COUNTRY = 6;

export interface GatewayEntry {
  address: string;
  countryCode: string;
  pingMs: number | null;
  bandwidthMbps: number;
  config: string;
}

export interface GatewaySyncOptions {
  feedUrl?: string;
  syncIntervalMs: number;
  maxNodes: number;
  defaultMaxConnections: number;
  identitySalt: string;
}

export interface GatewaySyncResult {
  parsed: number;
  upserted: number;
  skipped: number;
}

/**
 * Parses the CSV gateway feed. Lines starting with `*` or `#` are markers
 * or headers; rows with too few columns or a malformed country are dropped.
 */
export function parseGatewayFeed(csv: string): GatewayEntry[] {
  const entries: GatewayEntry[] = [];
  for (const rawLine of csv.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line === '' || line.startsWith('*') || line.startsWith('#')) {
      continue;
    }
    const columns = line.split(',');
    if (columns.length < MIN_COLUMNS) {
      continue;
    }

    const countryCode = columns[COL_COUNTRY].trim().toUpperCase();
    const address = columns[COL_IP].trim();
    if (!/^[A-Z]{2}$/.test(countryCode) || address === '') {
      continue;
    }

    const ping = parseInt(columns[COL_PING], 10);
    const speed = parseInt(columns[COL_SPEED], 10);
    entries.push({
      address,
      countryCode,
      pingMs: Number.isNaN(ping) ? null : ping,
      bandwidthMbps: Number.isNaN(speed) ? 0 : Math.floor(speed / 1_000_000),
      // The config is the last column; free-text columns before it may contain commas
      config: columns[columns.length - 1].trim(),
    });
  }
  return entries;
}

/** Imports operator-published PUBLIC gateways into the directory. */
export class PublicGatewaySync {
  private syncInterval: NodeJS.Timeout | null = null;

  constructor(
    private readonly directory: NodeDirectory,
    private readonly options: GatewaySyncOptions,
    private readonly clock: Clock = systemClock
  ) {}

  async sync(): Promise<GatewaySyncResult> {
    if (!this.options.feedUrl) {
      return { parsed: 0, upserted: 0, skipped: 0 };
    }

    logger.info('Fetching public gateway feed', { url: this.options.feedUrl });
    const response = await axios.get<string>(this.options.feedUrl, {
      responseType: 'text',
      timeout: 30000,
    });

    const entries = parseGatewayFeed(String(response.data)).slice(0, this.options.maxNodes);
    const result: GatewaySyncResult = { parsed: entries.length, upserted: 0, skipped: 0 };

    for (const entry of entries) {
      try {
        const node = await this.directory.upsertGateway(this.toNode(entry));
        if (node) {
          result.upserted++;
        } else {
          result.skipped++;
        }
      } catch (error) {
        result.skipped++;
        logger.warn('Failed to import public gateway', { country: entry.countryCode, error });
      }
    }

    logger.info('Public gateway sync completed', { ...result });
    return result;
  }

  startSyncTask(): void {
    if (this.syncInterval || !this.options.feedUrl) {
      return;
    }

    const run = async (): Promise<void> => {
      try {
        await this.sync();
      } catch (error) {
        logger.error('Public gateway sync failed', { error });
      }
    };

    void run();
    this.syncInterval = setInterval(run, this.options.syncIntervalMs);
    logger.info('Public gateway sync task started');
  }

  stopSyncTask(): void {
    if (this.syncInterval) {
      clearInterval(this.syncInterval);
      this.syncInterval = null;
      logger.info('Public gateway sync task stopped');
    }
  }

  private toNode(entry: GatewayEntry): NewNode {
    const hash = identityHash(entry.address, this.options.identitySalt);
    const now = this.clock.now();
    return {
      id: `gw-${hash.slice(0, 16)}`,
      ownerId: null,
      publicIdentityHash: hash,
      countryCode: entry.countryCode,
      city: null,
      bandwidthMbps: entry.bandwidthMbps,
      maxConnections: this.options.defaultMaxConnections,
      currentConnections: 0,
      protocols: ['OPENVPN_TCP', 'OPENVPN_UDP'],
      quality: {
        uptimePercentage: 100,
        avgLatencyMs: entry.pingMs ?? 50,
        reputationScore: 100,
      },
      isOnline: true,
      isDisabled: false,
      lastHeartbeat: now,
      missedHeartbeats: 0,
      policy: { ...DEFAULT_TRAFFIC_POLICY },
      dailyBytesUsed: 0,
      dailyUsageDate: utcDay(now),
      group: 'PUBLIC',
      publicConfig: entry.config,
    };
  }
}
