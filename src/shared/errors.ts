// ============================================================================
// Base Error Classes
// ============================================================================

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly code: string;

  constructor(
    message: string,
    statusCode: number = 500,
    code: string = 'INTERNAL_ERROR',
    isOperational: boolean = true
  ) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;

    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

// ============================================================================
// HTTP Errors
// ============================================================================

export class UnauthorizedError extends AppError {
  constructor(message: string = 'Unauthorized') {
    super(message, 401, 'UNAUTHORIZED');
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string = 'Forbidden') {
    super(message, 403, 'FORBIDDEN');
  }
}

// ============================================================================
// Validation Errors
// ============================================================================

export class ValidationError extends AppError {
  public readonly errors: Record<string, string[]>;

  constructor(errors: Record<string, string[]>, code: string = 'VALIDATION_ERROR') {
    const message = Object.entries(errors)
      .map(([field, messages]) => `${field}: ${messages.join(', ')}`)
      .join('; ');

    super(message, 400, code);
    this.errors = errors;
  }
}

/**
 * Raised by the outbound queue when a recipient or body fails admission.
 */
export class InvalidMessageError extends ValidationError {
  constructor(errors: Record<string, string[]>) {
    super(errors, 'INVALID_MESSAGE');
  }
}

// ============================================================================
// External Service Errors
// ============================================================================

export class ExternalServiceError extends AppError {
  public readonly service: string;
  public readonly originalError?: Error;

  constructor(service: string, message: string, originalError?: Error) {
    super(`${service} error: ${message}`, 502, 'EXTERNAL_SERVICE_ERROR');
    this.service = service;
    this.originalError = originalError;
  }
}

export class AppleScriptError extends ExternalServiceError {
  public readonly stderr: string;

  constructor(message: string, stderr: string = '', originalError?: Error) {
    super('osascript', message, originalError);
    this.stderr = stderr;
  }
}

/**
 * The Messages sender rejected or failed to deliver a message.
 */
export class SendFailure extends ExternalServiceError {
  public readonly recipient: string;

  constructor(recipient: string, message: string, originalError?: Error) {
    super('Messages', message, originalError);
    this.recipient = recipient;
  }
}

/**
 * A call action (decline, restart, auto-reply) failed or ran past its timeout.
 */
export class AutomationFailure extends ExternalServiceError {
  public readonly action: string;
  public readonly timedOut: boolean;

  constructor(action: string, message: string, options: { timedOut?: boolean; cause?: Error } = {}) {
    super('Automation', `${action}: ${message}`, options.cause);
    this.action = action;
    this.timedOut = options.timedOut ?? false;
  }
}

export class WebhookError extends ExternalServiceError {
  constructor(message: string, originalError?: Error) {
    super('Webhook', message, originalError);
  }
}

export class EventSourceError extends ExternalServiceError {
  constructor(message: string, originalError?: Error) {
    super('log stream', message, originalError);
  }
}

// ============================================================================
// Pipeline Errors
// ============================================================================

export class StreamEndedError extends AppError {
  constructor(message: string = 'Event stream ended') {
    super(message, 500, 'STREAM_ENDED');
  }
}

export class QueueClosedError extends AppError {
  constructor(message: string = 'Outbound queue is closed') {
    super(message, 503, 'QUEUE_CLOSED');
  }
}

// ============================================================================
// Error Utilities
// ============================================================================

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Run `fn` with an AbortSignal that fires after `timeoutMs`. The returned
 * promise rejects with `onTimeout()` as soon as the timer fires, whether or
 * not `fn` honours the signal.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = onTimeout();
      // Settle first so work that stops on abort cannot win the race
      reject(error);
      controller.abort(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
