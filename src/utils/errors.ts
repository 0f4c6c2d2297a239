// Standardized error handling utilities
// Every error that reaches a client goes through formatErrorResponse

import type { FastifyReply } from 'fastify';
import type { ZodError } from 'zod';
import { moduleLogger } from '../logger.js';

const log = moduleLogger('errors');

export enum ErrorCode {
  NOT_FOUND = 'not_found',
  UNAUTHORIZED = 'unauthorized',
  FORBIDDEN = 'forbidden',
  BAD_REQUEST = 'bad_request',
  INTERNAL_ERROR = 'internal_error',
  RATE_LIMITED = 'rate_limited',
  INVALID_TOKEN = 'invalid_token',
  VALIDATION_ERROR = 'validation_error',
  SERVICE_BUSY = 'service_busy',
  QUOTA_EXCEEDED = 'quota_exceeded',
  MALFORMED_CALL = 'malformed_call',
  GENERATION_FAILED = 'generation_failed',
  DEADLINE_EXCEEDED = 'deadline_exceeded',
}

export class AppError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public statusCode: number = 500,
    public details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
  }

  static notFound(message: string = 'Resource not found', details?: unknown): AppError {
    return new AppError(ErrorCode.NOT_FOUND, message, 404, details);
  }

  static unauthorized(message: string = 'Unauthorized', details?: unknown): AppError {
    return new AppError(ErrorCode.UNAUTHORIZED, message, 401, details);
  }

  static forbidden(message: string = 'Access denied', details?: unknown): AppError {
    return new AppError(ErrorCode.FORBIDDEN, message, 403, details);
  }

  static badRequest(message: string = 'Bad request', details?: unknown): AppError {
    return new AppError(ErrorCode.BAD_REQUEST, message, 400, details);
  }

  static rateLimited(retryAfter: number, message: string = 'Too many requests'): AppError {
    return new AppError(ErrorCode.RATE_LIMITED, message, 429, { retryAfter });
  }

  static invalidToken(message: string = 'Invalid token'): AppError {
    return new AppError(ErrorCode.INVALID_TOKEN, message, 401);
  }

  static validationError(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.VALIDATION_ERROR, message, 400, details);
  }

  static serviceBusy(
    message: string = 'Our AI service is currently busy. Please try again in a few minutes.'
  ): AppError {
    return new AppError(ErrorCode.SERVICE_BUSY, message, 503);
  }

  static quotaExceeded(message: string = 'AI service quota exceeded. Please try again later.'): AppError {
    return new AppError(ErrorCode.QUOTA_EXCEEDED, message, 503);
  }

  static malformedCall(
    message: string = 'Unable to create itinerary with current parameters. Please try different dates or destination.'
  ): AppError {
    return new AppError(ErrorCode.MALFORMED_CALL, message, 422);
  }

  static generationFailed(
    message: string = 'An error occurred while creating your itinerary. Please try again.'
  ): AppError {
    return new AppError(ErrorCode.GENERATION_FAILED, message, 502);
  }

  static deadlineExceeded(
    message: string = 'Planning took too long. Please try again.'
  ): AppError {
    return new AppError(ErrorCode.DEADLINE_EXCEEDED, message, 504);
  }

  static internal(message: string = 'An unexpected error occurred', details?: unknown): AppError {
    return new AppError(ErrorCode.INTERNAL_ERROR, message, 500, details);
  }
}

export interface ErrorResponse {
  error: ErrorCode;
  message: string;
  statusCode: number;
  details?: unknown;
  retry_after_seconds?: number;
}

export function formatErrorResponse(error: AppError, includeDetails: boolean = false): ErrorResponse {
  const response: ErrorResponse = {
    error: error.code,
    message: error.message,
    statusCode: error.statusCode,
  };

  if (includeDetails && error.details) {
    response.details = error.details;
  }

  if (error.code === ErrorCode.RATE_LIMITED && isRetryDetails(error.details)) {
    response.retry_after_seconds = error.details.retryAfter;
  }

  return response;
}

function isRetryDetails(details: unknown): details is { retryAfter: number } {
  return typeof details === 'object'
    && details !== null
    && 'retryAfter' in details
    && typeof details.retryAfter === 'number';
}

export function invalidBody(error: ZodError, message: string = 'Invalid request body'): AppError {
  return AppError.validationError(
    message,
    error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message })),
  );
}

// Sends a sanitized error body; unknown errors never leak their message
export function sendError(reply: FastifyReply, error: unknown): FastifyReply {
  if (error instanceof AppError) {
    const includeDetails = error.code === ErrorCode.VALIDATION_ERROR;
    return reply.code(error.statusCode).send(formatErrorResponse(error, includeDetails));
  }

  log.error({ err: error }, 'Unhandled route error');
  const internal = AppError.internal();
  return reply.code(internal.statusCode).send(formatErrorResponse(internal));
}
