import { Router, Response, NextFunction } from 'express';
import { z } from 'zod';
import { NODE_GROUPS } from '../../database/models';
import { SessionSupervisor } from '../../services/sessions/SessionSupervisor';
import { ForbiddenError } from '../../utils/errors';
import { AuthMiddleware, AuthRequest, userClaims } from '../middleware/auth';
import { sessionToJson } from '../serializers';

const connectSchema = z.object({
  protocol: z.string().min(1),
  username: z.string().optional(),
  public_key: z.string().optional(),
  group: z.enum(NODE_GROUPS).optional(),
  country: z.string().length(2).optional(),
  client_country: z.string().length(2).optional(),
});

const disconnectSchema = z.object({
  session_id: z.string().min(1),
});

export function createVpnRouter(supervisor: SessionSupervisor, middleware: AuthMiddleware): Router {
  const router = Router();
  router.use(middleware.authenticateUser);

  // POST /vpn/connect
  router.post('/connect', async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const claims = userClaims(req);
      const body = connectSchema.parse(req.body);
      if (body.username !== undefined && body.username !== claims.username) {
        throw new ForbiddenError('Token does not belong to this username');
      }

      const { session, node } = await supervisor.connect({
        userId: claims.sub,
        protocol: body.protocol,
        clientCountry: body.client_country?.toUpperCase(),
        clientAddress: req.ip,
        group: body.group,
        countryPreference: body.country?.toUpperCase(),
      });

      res.json({
        session_id: session.id,
        assigned_ip: session.virtualIp,
        server_endpoint: session.serverEndpoint,
        protocol: session.protocol,
        node_id: node.id,
        node_country: node.countryCode,
        ...(node.publicConfig ? { public_config: node.publicConfig } : {}),
      });
    } catch (error) {
      next(error);
    }
  });

  // POST /vpn/disconnect
  router.post('/disconnect', async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const claims = userClaims(req);
      const { session_id } = disconnectSchema.parse(req.body);
      const session = await supervisor.disconnect(session_id, claims.sub);
      res.json(sessionToJson(session));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
