import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { logger } from './logger';

export class AppError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode = 500,
    public isOperational = true
  ) {
    super(message);
    Object.setPrototypeOf(this, AppError.prototype);
    Error.captureStackTrace(this, this.constructor);
  }

  get retryable(): boolean {
    return false;
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR', 400);
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Unauthorized') {
    super(message, 'UNAUTHORIZED', 401);
    Object.setPrototypeOf(this, UnauthorizedError.prototype);
  }
}

export class ForbiddenError extends AppError {
  constructor(message = 'Forbidden') {
    super(message, 'FORBIDDEN', 403);
    Object.setPrototypeOf(this, ForbiddenError.prototype);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(`${resource} not found`, 'NOT_FOUND', 404);
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 'CONFLICT', 409);
    Object.setPrototypeOf(this, ConflictError.prototype);
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR', 500, false);
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * No node passed the eligibility filters. Clients should try again later.
 */
export class NoEligibleNodeError extends AppError {
  constructor(message = 'No eligible node available, try again later') {
    super(message, 'NO_ELIGIBLE_NODE', 503);
    Object.setPrototypeOf(this, NoEligibleNodeError.prototype);
  }

  get retryable(): boolean {
    return true;
  }
}

/**
 * Another request took the last free slot between ranking and reservation.
 * The matcher retries the next candidate, so this rarely reaches a client.
 */
export class CapacityRaceError extends AppError {
  constructor(public nodeId: string) {
    super(`Lost capacity reservation race on node ${nodeId}`, 'CAPACITY_RACE', 503);
    Object.setPrototypeOf(this, CapacityRaceError.prototype);
  }

  get retryable(): boolean {
    return true;
  }
}

export class InsufficientCreditsError extends AppError {
  constructor(
    public required: number,
    public available: number
  ) {
    super(
      `Insufficient credits: ${required} required, ${available} available`,
      'INSUFFICIENT_CREDITS',
      402
    );
    Object.setPrototypeOf(this, InsufficientCreditsError.prototype);
  }
}

export class NodeUnresponsiveError extends AppError {
  constructor(public nodeId: string, public silentForSec: number) {
    super(`Node ${nodeId} missed heartbeats for ${silentForSec}s`, 'NODE_UNRESPONSIVE', 503);
    Object.setPrototypeOf(this, NodeUnresponsiveError.prototype);
  }
}

export class LedgerInconsistencyError extends AppError {
  constructor(message: string, public details: Record<string, unknown> = {}) {
    super(message, 'LEDGER_INCONSISTENCY', 500, false);
    Object.setPrototypeOf(this, LedgerInconsistencyError.prototype);
  }
}

export class PoolExhaustedError extends AppError {
  constructor(cidr: string) {
    super(`Virtual IP pool ${cidr} is exhausted`, 'VIRTUAL_IP_POOL_EXHAUSTED', 503);
    Object.setPrototypeOf(this, PoolExhaustedError.prototype);
  }

  get retryable(): boolean {
    return true;
  }
}

export class SessionClosedError extends AppError {
  constructor(sessionId: string) {
    super(`Session ${sessionId} is closed`, 'SESSION_CLOSED', 410);
    Object.setPrototypeOf(this, SessionClosedError.prototype);
  }
}

export function zodMessage(error: ZodError): string {
  return error.errors
    .map((e) => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message))
    .join(', ');
}

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  // Express recognises error handlers by arity
  _next: NextFunction
): void {
  if (err instanceof ZodError) {
    res.status(400).json({ error: zodMessage(err), code: 'VALIDATION_ERROR' });
    return;
  }

  if (err instanceof AppError) {
    if (err.statusCode >= 500) {
      logger.error(err.message, { code: err.code, path: req.path, method: req.method });
    } else {
      logger.warn(err.message, { code: err.code, path: req.path, method: req.method });
    }

    // Internal faults keep their code but not their details
    const message = err.isOperational ? err.message : 'Internal server error';
    res.status(err.statusCode).json({
      error: message,
      code: err.code,
      ...(err.retryable ? { retryable: true } : {}),
    });
    return;
  }

  logger.error('Unhandled error', { error: err, path: req.path, method: req.method });
  res.status(500).json({ error: 'Internal server error', code: 'INTERNAL_ERROR' });
}
