import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { NODE_GROUPS, TRAFFIC_TYPES, TrafficPolicy } from '../../database/models';
import { NodeDirectory } from '../../services/directory/NodeDirectory';
import { HeartbeatMonitor } from '../../services/heartbeat/HeartbeatMonitor';
import { SessionSupervisor } from '../../services/sessions/SessionSupervisor';
import { ForbiddenError } from '../../utils/errors';
import { AuthMiddleware, AuthRequest, nodeClaims, userClaims } from '../middleware/auth';
import { nodeRateLimiter } from '../middleware/rateLimit';
import { nodeToJson, publicNodeToJson, sessionToJson } from '../serializers';

const policySchema = z.object({
  allow_countries: z.array(z.string()).optional(),
  block_countries: z.array(z.string()).optional(),
  allow_streaming: z.boolean().optional(),
  allow_torrents: z.boolean().optional(),
  max_daily_bytes: z.number().int().min(0).optional(),
});

const registerNodeSchema = z.object({
  country_code: z.string(),
  city: z.string().max(100).nullable().optional(),
  bandwidth_mbps: z.number().min(0),
  max_connections: z.number().int().min(1),
  protocols: z.array(z.string()).min(1),
  policy: policySchema.optional(),
});

const updateNodeSchema = z.object({
  city: z.string().max(100).nullable().optional(),
  bandwidth_mbps: z.number().min(0).optional(),
  max_connections: z.number().int().min(1).optional(),
  protocols: z.array(z.string()).min(1).optional(),
  policy: policySchema.optional(),
});

const heartbeatSchema = z.object({
  current_connections: z.number().int().min(0),
  uptime_sample: z.number().min(0).max(100),
  latency_ms: z.number().min(0).optional(),
  sessions: z
    .array(
      z.object({
        session_id: z.string().min(1),
        bytes_transferred: z.number().int().min(0),
        traffic_type: z.enum(TRAFFIC_TYPES).optional(),
      })
    )
    .optional(),
});

const trafficSchema = z.object({
  bytes_transferred: z.number().int().min(0),
  traffic_type: z.enum(TRAFFIC_TYPES).optional(),
});

const discoverSchema = z.object({
  country: z.string().optional(),
  group: z.enum(NODE_GROUPS).optional(),
  protocol: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(50).optional(),
});

function toPolicy(policy: z.infer<typeof policySchema> | undefined): Partial<TrafficPolicy> | undefined {
  if (!policy) {
    return undefined;
  }
  const result: Partial<TrafficPolicy> = {};
  if (policy.allow_countries !== undefined) result.allowCountries = policy.allow_countries;
  if (policy.block_countries !== undefined) result.blockCountries = policy.block_countries;
  if (policy.allow_streaming !== undefined) result.allowStreaming = policy.allow_streaming;
  if (policy.allow_torrents !== undefined) result.allowTorrents = policy.allow_torrents;
  if (policy.max_daily_bytes !== undefined) result.maxDailyBytes = policy.max_daily_bytes;
  return result;
}

function requireOwnNode(req: AuthRequest): string {
  const claims = nodeClaims(req);
  if (claims.nodeId !== req.params.nodeId) {
    throw new ForbiddenError('Token was issued for another node');
  }
  return claims.nodeId;
}

export interface NodeRouterDeps {
  directory: NodeDirectory;
  heartbeat: HeartbeatMonitor;
  supervisor: SessionSupervisor;
}

export function createNodesRouter(deps: NodeRouterDeps, middleware: AuthMiddleware): Router {
  const { directory, heartbeat, supervisor } = deps;
  const router = Router();

  // POST /nodes/register
  router.post('/register', middleware.authenticateUser, async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const claims = userClaims(req);
      const body = registerNodeSchema.parse(req.body);
      const { node, nodeToken } = await directory.register({
        ownerId: claims.sub,
        address: req.ip,
        countryCode: body.country_code,
        city: body.city,
        bandwidthMbps: body.bandwidth_mbps,
        maxConnections: body.max_connections,
        protocols: body.protocols,
        policy: toPolicy(body.policy),
      });

      res.status(201).json({
        node_id: node.id,
        node_token: nodeToken,
        status: node.isOnline ? 'online' : 'offline',
        heartbeat_interval: directory.livenessPolicy.COMMUNITY.periodSec,
      });
    } catch (error) {
      next(error);
    }
  });

  // GET /nodes/discover
  router.get('/discover', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = discoverSchema.parse(req.query);
      const ranked = await directory.discover({
        countryCode: query.country?.toUpperCase(),
        group: query.group,
        protocol: query.protocol,
        limit: query.limit,
      });
      res.json({ nodes: ranked.map(({ node, score }) => publicNodeToJson(node, score)), count: ranked.length });
    } catch (error) {
      next(error);
    }
  });

  // GET /nodes/my
  router.get('/my', middleware.authenticateUser, async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const nodes = await directory.listForOwner(userClaims(req).sub);
      res.json({ nodes: nodes.map(nodeToJson), count: nodes.length });
    } catch (error) {
      next(error);
    }
  });

  // PATCH /nodes/:nodeId
  router.patch('/:nodeId', middleware.authenticateUser, async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const body = updateNodeSchema.parse(req.body);
      const node = await directory.update(req.params.nodeId, userClaims(req).sub, {
        city: body.city,
        bandwidthMbps: body.bandwidth_mbps,
        maxConnections: body.max_connections,
        protocols: body.protocols,
        policy: toPolicy(body.policy),
      });
      res.json(nodeToJson(node));
    } catch (error) {
      next(error);
    }
  });

  // POST /nodes/:nodeId/heartbeat
  router.post(
    '/:nodeId/heartbeat',
    nodeRateLimiter,
    middleware.authenticateNode,
    async (req: AuthRequest, res: Response, next: NextFunction) => {
      try {
        const nodeId = requireOwnNode(req);
        const body = heartbeatSchema.parse(req.body);
        const response = await heartbeat.processHeartbeat(nodeId, {
          currentConnections: body.current_connections,
          uptimeSample: body.uptime_sample,
          latencyMs: body.latency_ms,
          sessions: body.sessions?.map((report) => ({
            sessionId: report.session_id,
            bytesTransferred: report.bytes_transferred,
            trafficType: report.traffic_type,
          })),
        });
        res.json({
          status: response.status,
          next_heartbeat: response.nextHeartbeat,
          actions: response.actions,
        });
      } catch (error) {
        next(error);
      }
    }
  );

  // POST /nodes/:nodeId/sessions/:sessionId/traffic
  router.post(
    '/:nodeId/sessions/:sessionId/traffic',
    nodeRateLimiter,
    middleware.authenticateNode,
    async (req: AuthRequest, res: Response, next: NextFunction) => {
      try {
        const nodeId = requireOwnNode(req);
        const body = trafficSchema.parse(req.body);
        const session = await supervisor.reportTraffic(
          req.params.sessionId,
          { bytesTransferred: body.bytes_transferred, trafficType: body.traffic_type },
          nodeId
        );
        res.json(sessionToJson(session));
      } catch (error) {
        next(error);
      }
    }
  );

  // POST /nodes/:nodeId/offline
  router.post('/:nodeId/offline', middleware.authenticateUser, async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const changed = await directory.goOffline(req.params.nodeId, userClaims(req).sub);
      res.json({ node_id: req.params.nodeId, status: 'offline', changed });
    } catch (error) {
      next(error);
    }
  });

  // DELETE /nodes/:nodeId
  router.delete('/:nodeId', middleware.authenticateUser, async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const closed = await directory.deregister(req.params.nodeId, userClaims(req).sub);
      res.json({ node_id: req.params.nodeId, status: 'deregistered', closed_sessions: closed });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
