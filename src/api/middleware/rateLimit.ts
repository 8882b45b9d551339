import rateLimit from 'express-rate-limit';
import { config } from '../../config/config';

// Paths with their own limiter, or that must stay reachable for probes and scrapes
const NODE_AGENT_PATH = /^\/nodes\/[^/]+\/(heartbeat|sessions\/[^/]+\/traffic)$/;
const UNLIMITED_PATH = /^\/(health|metrics)(\/|$)/;

export const apiRateLimiter = rateLimit({
  windowMs: config.rateLimit.windowMs,
  max: config.rateLimit.maxRequests,
  message: { error: 'Too many requests from this IP, please try again later.', code: 'RATE_LIMITED' },
  standardHeaders: true,
  legacyHeaders: false,
  skip: (req) => {
    const path = req.path;
    return NODE_AGENT_PATH.test(path) || UNLIMITED_PATH.test(path);
  },
});

// Node agents heartbeat every 30 seconds and may report traffic in between
export const nodeRateLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 120,
  message: { error: 'Too many requests from this node, please try again later.', code: 'RATE_LIMITED' },
  standardHeaders: true,
  legacyHeaders: false,
});

export const authRateLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 10,
  message: { error: 'Too many authentication attempts, please try again later.', code: 'RATE_LIMITED' },
  standardHeaders: true,
  legacyHeaders: false,
  skip: () => config.server.nodeEnv === 'test',
});
