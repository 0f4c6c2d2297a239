// Failures raised inside one conversation attempt.
// The retry controller classifies these; none of them reach a client directly.

export class PlannerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Upstream model signalled quota exhaustion (HTTP 429 / RESOURCE_EXHAUSTED). Retryable. */
export class RateLimitedError extends PlannerError {}

/** The model asked for a tool call that cannot be fulfilled as requested. */
export class MalformedCallError extends PlannerError {
  constructor(message: string, public readonly toolName?: string) {
    super(message);
  }
}

/** No parsable structured document could be recovered from the model's answer. */
export class MalformedOutputError extends PlannerError {
  constructor(message: string, public readonly fragment: string) {
    super(message);
  }
}

export class DeadlineExceededError extends PlannerError {}
