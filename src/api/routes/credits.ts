import { Router, Response, NextFunction } from 'express';
import { z } from 'zod';
import { Ledger } from '../../services/ledger/Ledger';
import { AuthMiddleware, AuthRequest, userClaims } from '../middleware/auth';
import { transactionToJson } from '../serializers';

const historyQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).optional(),
});

export function createCreditsRouter(ledger: Ledger, middleware: AuthMiddleware): Router {
  const router = Router();
  router.use(middleware.authenticateUser);

  // GET /credits/balance
  router.get('/balance', async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const claims = userClaims(req);
      const balance = await ledger.balance(claims.sub);
      res.json({ user_id: claims.sub, balance });
    } catch (error) {
      next(error);
    }
  });

  // GET /credits/history
  router.get('/history', async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const claims = userClaims(req);
      const { limit } = historyQuerySchema.parse(req.query);
      const transactions = await ledger.history(claims.sub, limit);
      res.json({ transactions: transactions.map(transactionToJson), count: transactions.length });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
