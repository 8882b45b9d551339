import axios, { AxiosHeaders, AxiosResponse } from 'axios';
import { PublicGatewaySync, parseGatewayFeed } from '../../../../src/services/gateways/PublicGatewaySync';
import { identityHash } from '../../../../src/utils/hash';
import { Harness, createHarness } from '../../../support/fixtures';

jest.mock('axios');

const mockedAxios = jest.mocked(axios);

const FEED = [
  '*vpn_servers',
  '#HostName,IP,Score,Ping,Speed,CountryLong,CountryShort,NumVpnSessions,Uptime,TotalUsers,TotalTraffic,LogType,Operator,Message,OpenVPN_ConfigData_Base64',
  'public-vpn-1,192.0.2.10,1000,12,150000000,Japan,JP,5,1000,10,100,2weeks,operator-a,hello,Y29uZmlnLWE=',
  'public-vpn-2,192.0.2.11,900,-,fast,Germany,de,1,1,1,1,2weeks,operator-b,hi,Y29uZmlnLWI=',
  'public-vpn-3,192.0.2.12,800,5,1000000,Nowhere,XYZ,1,1,1,1,2weeks,operator-c,hi,Y29uZmlnLWM=',
  'truncated,192.0.2.13,1',
  '*',
  '',
].join('\r\n');

function feedResponse(data: string): AxiosResponse<string> {
  return { data, status: 200, statusText: 'OK', headers: {}, config: { headers: new AxiosHeaders() } };
}

describe('parseGatewayFeed', () => {
  it('keeps well-formed rows only', () => {
    expect(parseGatewayFeed(FEED)).toEqual([
      { address: '192.0.2.10', countryCode: 'JP', pingMs: 12, bandwidthMbps: 150, config: 'Y29uZmlnLWE=' },
      { address: '192.0.2.11', countryCode: 'DE', pingMs: null, bandwidthMbps: 0, config: 'Y29uZmlnLWI=' },
    ]);
  });

  it('takes the config from the last column when free text contains commas', () => {
    const row = 'vpn,192.0.2.20,1,7,2000000,France,FR,1,1,1,1,2weeks,op,hello, world,Y29uZmln';

    expect(parseGatewayFeed(row)).toEqual([
      { address: '192.0.2.20', countryCode: 'FR', pingMs: 7, bandwidthMbps: 2, config: 'Y29uZmln' },
    ]);
  });
});

describe('PublicGatewaySync', () => {
  let h: Harness;

  const options = {
    feedUrl: 'https://gateways.test/feed.csv',
    syncIntervalMs: 3600000,
    maxNodes: 100,
    defaultMaxConnections: 50,
    identitySalt: 'test-salt',
  };

  beforeEach(() => {
    h = createHarness();
    jest.clearAllMocks();
  });

  it('imports gateways as PUBLIC nodes', async () => {
    mockedAxios.get.mockResolvedValue(feedResponse(FEED));
    const sync = new PublicGatewaySync(h.services.directory, options, h.clock);

    const result = await sync.sync();

    expect(result).toEqual({ parsed: 2, upserted: 2, skipped: 0 });
    expect(mockedAxios.get).toHaveBeenCalledWith('https://gateways.test/feed.csv', {
      responseType: 'text',
      timeout: 30000,
    });

    const id = `gw-${identityHash('192.0.2.10', 'test-salt').slice(0, 16)}`;
    await expect(h.services.directory.getNode(id)).resolves.toMatchObject({
      ownerId: null,
      group: 'PUBLIC',
      countryCode: 'JP',
      bandwidthMbps: 150,
      maxConnections: 50,
      protocols: ['OPENVPN_TCP', 'OPENVPN_UDP'],
      quality: { avgLatencyMs: 12 },
      publicConfig: 'Y29uZmlnLWE=',
      isOnline: true,
    });
  });

  it('caps the number of imported gateways', async () => {
    mockedAxios.get.mockResolvedValue(feedResponse(FEED));
    const sync = new PublicGatewaySync(h.services.directory, { ...options, maxNodes: 1 }, h.clock);

    await expect(sync.sync()).resolves.toEqual({ parsed: 1, upserted: 1, skipped: 0 });
  });

  it('skips gateways that were disabled', async () => {
    mockedAxios.get.mockResolvedValue(feedResponse(FEED));
    const sync = new PublicGatewaySync(h.services.directory, options, h.clock);
    await sync.sync();
    h.stores.nodes.patch(`gw-${identityHash('192.0.2.11', 'test-salt').slice(0, 16)}`, { isDisabled: true });

    await expect(sync.sync()).resolves.toEqual({ parsed: 2, upserted: 1, skipped: 1 });
  });

  it('does nothing without a feed URL', async () => {
    const sync = new PublicGatewaySync(h.services.directory, { ...options, feedUrl: undefined }, h.clock);

    await expect(sync.sync()).resolves.toEqual({ parsed: 0, upserted: 0, skipped: 0 });
    expect(mockedAxios.get).not.toHaveBeenCalled();
  });
});
