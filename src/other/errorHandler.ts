import { NextFunction, Request, Response } from 'express';
import logger from 'jet-logger';
import { z, ZodError, type ZodTypeAny } from 'zod';
import HttpStatusCodes from '../constants/HttpStatusCodes';
import { AI_CONFIG } from '../lib/ai/config';
import {
  AgentError,
  ConfigurationError,
  MatchingUnavailableError,
  SessionNotFoundError,
  TurnCancelledError,
  TurnFailedError,
  errorMessage
} from '../lib/ai/core/errors';

/**
 * Error with an HTTP status, thrown by controllers
 */
export class RouteError extends Error {
  constructor(
    public readonly status: HttpStatusCodes,
    message: string
  ) {
    super(message);
    this.name = 'RouteError';
  }
}

// Parse a request payload or fail with 400
export function parseRequest<S extends ZodTypeAny>(schema: S, payload: unknown): z.infer<S> {
  const result = schema.safeParse(payload);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`);
    throw new RouteError(HttpStatusCodes.BAD_REQUEST, `Bad Request: ${issues.join('; ')}`);
  }
  return result.data;
}

interface ErrorBody {
  error: string;
  code?: string;
  retryable?: boolean;
  reply?: string;
}

function toResponse(error: unknown): { status: HttpStatusCodes; body: ErrorBody } {
  if (error instanceof RouteError) {
    return { status: error.status, body: { error: error.message } };
  }
  if (error instanceof SessionNotFoundError) {
    return { status: HttpStatusCodes.NOT_FOUND, body: { error: error.message, code: error.code } };
  }
  if (error instanceof MatchingUnavailableError) {
    return {
      status: HttpStatusCodes.SERVICE_UNAVAILABLE,
      body: { error: 'Matching is temporarily unavailable', code: error.code, retryable: true, reply: AI_CONFIG.DEFLECTION_MESSAGE }
    };
  }
  if (error instanceof TurnCancelledError) {
    return { status: HttpStatusCodes.CLIENT_CLOSED_REQUEST, body: { error: error.message, code: error.code } };
  }
  if (error instanceof TurnFailedError) {
    return {
      status: HttpStatusCodes.INTERNAL_SERVER_ERROR,
      body: { error: 'Internal Server Error', code: error.code, retryable: false, reply: AI_CONFIG.DEFLECTION_MESSAGE }
    };
  }
  if (error instanceof ConfigurationError || error instanceof ZodError) {
    return { status: HttpStatusCodes.BAD_REQUEST, body: { error: errorMessage(error) } };
  }
  if (error instanceof AgentError) {
    return { status: HttpStatusCodes.INTERNAL_SERVER_ERROR, body: { error: 'Internal Server Error', code: error.code, retryable: error.retryable } };
  }
  return { status: HttpStatusCodes.INTERNAL_SERVER_ERROR, body: { error: 'Internal Server Error' } };
}

/**
 * Express error middleware; stack traces stay in the logs
 */
export function errorHandler(error: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(error);
    return;
  }
  const { status, body } = toResponse(error);
  if (status >= HttpStatusCodes.INTERNAL_SERVER_ERROR) {
    logger.err(`[API] ${req.method} ${req.originalUrl} failed: ${error instanceof Error ? error.stack ?? error.message : String(error)}`);
  } else {
    logger.warn(`[API] ${req.method} ${req.originalUrl} -> ${status}: ${body.error}`);
  }
  res.status(status).json(body);
}
