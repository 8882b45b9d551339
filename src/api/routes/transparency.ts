import { Router, Response, NextFunction } from 'express';
import { z } from 'zod';
import { TransparencyService } from '../../services/transparency/TransparencyService';
import { AuthMiddleware, AuthRequest, userClaims } from '../middleware/auth';

const historyQuerySchema = z.object({
  days: z.coerce.number().int().min(1).optional(),
});

export function createTransparencyRouter(transparency: TransparencyService, middleware: AuthMiddleware): Router {
  const router = Router();
  router.use(middleware.authenticateUser);

  // GET /transparency/sessions
  router.get('/sessions', async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const report = await transparency.activeSessions(userClaims(req).sub);
      res.json({
        sessions: report.sessions.map((session) => ({
          session_id: session.sessionId,
          client_country: session.clientCountry,
          traffic_type: session.trafficType,
          bytes_transferred: session.bytesTransferred,
          duration_seconds: session.durationSeconds,
          credits_earned: session.creditsEarned,
        })),
        count: report.count,
        total_bytes: report.totalBytes,
        total_credits: report.totalCredits,
        formatted_bandwidth: report.formattedBandwidth,
      });
    } catch (error) {
      next(error);
    }
  });

  // GET /transparency/history?days=7
  router.get('/history', async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { days } = historyQuerySchema.parse(req.query);
      const report = await transparency.history(userClaims(req).sub, days);
      res.json({
        history: report.entries.map((entry) => ({
          country: entry.country,
          traffic_type: entry.trafficType,
          bytes: entry.bytes,
          credits: entry.credits,
          started_at: entry.startedAt.toISOString(),
          ended_at: entry.endedAt ? entry.endedAt.toISOString() : null,
        })),
        period_days: report.periodDays,
        total_sessions: report.totalSessions,
        total_bytes: report.totalBytes,
        total_credits: report.totalCredits,
        formatted_total: report.formattedTotal,
      });
    } catch (error) {
      next(error);
    }
  });

  // GET /transparency/stats
  router.get('/stats', async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const stats = await transparency.stats(userClaims(req).sub);
      res.json({
        node_status: stats.nodeStatus,
        nodes: stats.nodes,
        reputation_score: stats.reputationScore,
        active_connections: stats.activeConnections,
        lifetime_sessions: stats.lifetimeSessions,
        lifetime_bytes: stats.lifetimeBytes,
        lifetime_formatted: stats.lifetimeFormatted,
        top_countries: stats.topCountries.map((country) => ({
          country_code: country.countryCode,
          sessions: country.sessions,
          bytes: country.bytes,
        })),
        impact_message: stats.impactMessage,
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
