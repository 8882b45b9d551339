import { BUILTIN_PROTOCOLS, BuiltinProtocol, Protocol, isProtocol } from '../../database/models';
import { ConfigurationError, ValidationError } from '../../utils/errors';

const DEFAULT_PORTS: Record<BuiltinProtocol, number> = {
  WIREGUARD: 51820,
  WIREGUARD_OBFUSCATED: 51820,
  SHADOWSOCKS: 8388,
  OPENVPN_TCP: 443,
  OPENVPN_UDP: 1194,
  IKEV2: 500,
  HYSTERIA2: 32400,
  TROJAN: 443,
  VLESS: 443,
};

const EXTRA_PROTOCOL_PORT = 443;

function isBuiltin(value: string): value is BuiltinProtocol {
  return BUILTIN_PROTOCOLS.some((protocol) => protocol === value);
}

/** Built-in transports plus those a deployment declares in EXTRA_PROTOCOLS. */
export class ProtocolCatalog {
  private readonly known: Set<Protocol>;

  constructor(extraProtocols: string[] = []) {
    this.known = new Set<Protocol>(BUILTIN_PROTOCOLS);
    for (const extra of extraProtocols) {
      if (isBuiltin(extra) || !isProtocol(extra)) {
        throw new ConfigurationError(`Extra protocol ${extra} must match X_[A-Z0-9_]+`);
      }
      this.known.add(extra);
    }
  }

  isKnown(value: string): boolean {
    return this.find(value) !== undefined;
  }

  parse(value: string): Protocol {
    const protocol = this.find(value);
    if (protocol === undefined) {
      throw new ValidationError(`Unknown protocol: ${value}`);
    }
    return protocol;
  }

  list(): Protocol[] {
    return [...this.known];
  }

  portFor(protocol: Protocol): number {
    return isBuiltin(protocol) ? DEFAULT_PORTS[protocol] : EXTRA_PROTOCOL_PORT;
  }

  private find(value: string): Protocol | undefined {
    const normalized = value.trim().toUpperCase();
    return [...this.known].find((protocol) => protocol === normalized);
  }
}
