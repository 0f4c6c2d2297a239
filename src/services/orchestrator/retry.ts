// Retry Controller
// Re-runs a conversation attempt on upstream rate limiting and maps every
// other failure to a client-facing AppError

import { AppError } from '../../utils/errors.js';
import { sleep as abortableSleep } from '../../utils/deadline.js';
import { moduleLogger, type Logger } from '../../logger.js';
import type { RetryBackoff } from '../../env.js';
import {
  DeadlineExceededError,
  MalformedCallError,
  MalformedOutputError,
  RateLimitedError,
} from './errors.js';

export interface RetryOptions {
  maxAttempts: number;
  delayMs: number;
  backoff?: RetryBackoff;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  logger?: Logger;
}

const QUOTA_PATTERN = /quota|resource exhausted|resource_exhausted|\b429\b/i;

export class RetryController {
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly log: Logger;

  constructor(private readonly options: RetryOptions) {
    this.sleep = options.sleep ?? abortableSleep;
    this.log = options.logger ?? moduleLogger('retry');
  }

  delayFor(attempt: number): number {
    if (this.options.backoff === 'exponential') {
      return this.options.delayMs * 2 ** (attempt - 1);
    }
    return this.options.delayMs;
  }

  async execute<T>(operation: (attempt: number) => Promise<T>, opts: { signal?: AbortSignal } = {}): Promise<T> {
    const maxAttempts = Math.max(1, this.options.maxAttempts);

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        return await operation(attempt);
      } catch (err) {
        if (!(err instanceof RateLimitedError)) {
          throw this.classify(err);
        }
        if (attempt === maxAttempts) break;

        const delay = this.delayFor(attempt);
        this.log.warn({ attempt, maxAttempts, delay }, 'Model rate limited, retrying');
        try {
          await this.sleep(delay, opts.signal);
        } catch (sleepErr) {
          throw this.classify(sleepErr);
        }
      }
    }

    this.log.error({ maxAttempts }, 'Model still rate limited after all attempts');
    throw AppError.serviceBusy();
  }

  classify(err: unknown): AppError {
    if (err instanceof AppError) return err;

    if (err instanceof DeadlineExceededError) {
      this.log.warn({ err }, 'Planning deadline exceeded');
      return AppError.deadlineExceeded();
    }

    const message = err instanceof Error ? err.message : String(err);

    if (err instanceof MalformedCallError || /malformed function call/i.test(message)) {
      this.log.warn({ err }, 'Model produced a malformed function call');
      return AppError.malformedCall();
    }

    if (QUOTA_PATTERN.test(message)) {
      this.log.error({ err }, 'Model quota exhausted');
      return AppError.quotaExceeded();
    }

    if (err instanceof MalformedOutputError) {
      this.log.error({ err, fragment: err.fragment }, 'Model output could not be parsed');
    } else {
      this.log.error({ err }, 'Itinerary generation failed');
    }
    return AppError.generationFailed();
  }
}
