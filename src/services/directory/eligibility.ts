import { Node, NodeGroup, Protocol } from '../../database/models';

export interface EligibilityFilter {
  protocol: Protocol;
  clientCountry: string;
  /** Users are never matched to their own nodes. */
  requesterId?: string;
  group?: NodeGroup;
  countryPreference?: string;
}

export type IneligibilityReason =
  | 'offline'
  | 'disabled'
  | 'stale_heartbeat'
  | 'group'
  | 'country'
  | 'client_country_blocked'
  | 'full'
  | 'protocol'
  | 'daily_quota'
  | 'own_node';

export function dailyQuotaExhausted(node: Node, today: string): boolean {
  // A cap of 0 means unlimited
  if (node.policy.maxDailyBytes <= 0 || node.dailyUsageDate !== today) {
    return false;
  }
  return node.dailyBytesUsed >= node.policy.maxDailyBytes;
}

export function clientCountryAllowed(node: Node, clientCountry: string): boolean {
  const { allowCountries, blockCountries } = node.policy;
  if (blockCountries.includes(clientCountry)) {
    return false;
  }
  return allowCountries.length === 0 || allowCountries.includes('*') || allowCountries.includes(clientCountry);
}

/**
 * First rule the node fails for this request, or null when it may serve it.
 */
export function ineligibilityReason(
  node: Node,
  filter: EligibilityFilter,
  heartbeatCutoffs: Record<NodeGroup, Date>,
  today: string
): IneligibilityReason | null {
  if (node.isDisabled) return 'disabled';
  if (!node.isOnline) return 'offline';
  if (node.lastHeartbeat < heartbeatCutoffs[node.group]) return 'stale_heartbeat';
  if (filter.group && node.group !== filter.group) return 'group';
  if (filter.countryPreference && node.countryCode !== filter.countryPreference) return 'country';
  if (!clientCountryAllowed(node, filter.clientCountry)) return 'client_country_blocked';
  if (node.currentConnections >= node.maxConnections) return 'full';
  if (!node.protocols.includes(filter.protocol)) return 'protocol';
  if (dailyQuotaExhausted(node, today)) return 'daily_quota';
  if (filter.requesterId && node.ownerId === filter.requesterId) return 'own_node';
  return null;
}

export function isEligible(
  node: Node,
  filter: EligibilityFilter,
  heartbeatCutoffs: Record<NodeGroup, Date>,
  today: string
): boolean {
  return ineligibilityReason(node, filter, heartbeatCutoffs, today) === null;
}
