import { CreditTransaction, Node, PeerSession } from '../database/models';

// Response bodies use snake_case keys

export function nodeToJson(node: Node) {
  return {
    node_id: node.id,
    country_code: node.countryCode,
    city: node.city,
    group: node.group,
    bandwidth_mbps: node.bandwidthMbps,
    max_connections: node.maxConnections,
    current_connections: node.currentConnections,
    protocols: node.protocols,
    uptime_percentage: node.quality.uptimePercentage,
    avg_latency_ms: node.quality.avgLatencyMs,
    reputation_score: node.quality.reputationScore,
    is_online: node.isOnline,
    last_heartbeat: node.lastHeartbeat.toISOString(),
    policy: {
      allow_countries: node.policy.allowCountries,
      block_countries: node.policy.blockCountries,
      allow_streaming: node.policy.allowStreaming,
      allow_torrents: node.policy.allowTorrents,
      max_daily_bytes: node.policy.maxDailyBytes,
    },
    daily_bytes_used: node.dailyBytesUsed,
  };
}

/** Listing view: no policy or usage details. */
export function publicNodeToJson(node: Node, score: number) {
  return {
    node_id: node.id,
    country_code: node.countryCode,
    city: node.city,
    group: node.group,
    protocols: node.protocols,
    bandwidth_mbps: node.bandwidthMbps,
    free_slots: Math.max(node.maxConnections - node.currentConnections, 0),
    avg_latency_ms: node.quality.avgLatencyMs,
    reputation_score: node.quality.reputationScore,
    score: Math.round(score * 100) / 100,
  };
}

/** The client's user id is never serialized. */
export function sessionToJson(session: PeerSession) {
  return {
    session_id: session.id,
    node_id: session.nodeId,
    protocol: session.protocol,
    assigned_ip: session.virtualIp,
    server_endpoint: session.serverEndpoint,
    traffic_type: session.trafficType,
    bytes_transferred: session.bytesTransferred,
    credits: session.creditsEarned,
    state: session.state,
    close_reason: session.closeReason,
    started_at: session.startedAt.toISOString(),
    last_report_at: session.lastReportAt ? session.lastReportAt.toISOString() : null,
    ended_at: session.endedAt ? session.endedAt.toISOString() : null,
  };
}

export function transactionToJson(transaction: CreditTransaction) {
  return {
    id: transaction.id,
    amount: transaction.amount,
    type: transaction.type,
    description: transaction.description,
    session_id: transaction.sessionId,
    created_at: transaction.createdAt.toISOString(),
  };
}
