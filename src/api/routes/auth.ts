import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { AuthService } from '../../services/auth/AuthService';
import { authRateLimiter } from '../middleware/rateLimit';

const credentialsSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
});

export function createAuthRouter(auth: AuthService): Router {
  const router = Router();

  // POST /auth/register
  router.post('/register', authRateLimiter, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { username, password } = credentialsSchema.parse(req.body);
      const user = await auth.register(username, password);
      res.status(201).json({ user_id: user.id, username: user.username, credits: user.credits });
    } catch (error) {
      next(error);
    }
  });

  // POST /auth/login
  router.post('/login', authRateLimiter, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { username, password } = credentialsSchema.parse(req.body);
      const result = await auth.login(username, password);
      res.json({ token: result.token, user_id: result.userId, username: result.username });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
