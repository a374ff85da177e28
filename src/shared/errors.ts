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

export class BadRequestError extends AppError {
  constructor(message: string = 'Bad request') {
    super(message, 400, 'BAD_REQUEST');
  }
}

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

export class NotFoundError extends AppError {
  constructor(message: string = 'Not found') {
    super(message, 404, 'NOT_FOUND');
  }
}

export class ConflictError extends AppError {
  constructor(message: string = 'Conflict') {
    super(message, 409, 'CONFLICT');
  }
}

// ============================================================================
// Business Logic Errors
// ============================================================================

export class InvalidPhoneError extends AppError {
  constructor(phone: string) {
    super(`Invalid phone number: ${phone}`, 400, 'INVALID_PHONE');
  }
}

export class TicketNotFoundError extends AppError {
  constructor(ticketNumber: string) {
    super(`Ticket not found: ${ticketNumber}`, 404, 'TICKET_NOT_FOUND');
  }
}

export class InvalidTicketTransitionError extends AppError {
  public readonly from: string;
  public readonly to: string;

  constructor(ticketNumber: string, from: string, to: string) {
    super(
      `Ticket ${ticketNumber} cannot move from ${from} to ${to}`,
      409,
      'INVALID_TICKET_TRANSITION'
    );
    this.from = from;
    this.to = to;
  }
}

// ============================================================================
// External Service Errors
// ============================================================================

export class ExternalServiceError extends AppError {
  public readonly service: string;
  public readonly originalError?: Error;

  constructor(service: string, message: string, originalError?: Error, statusCode: number = 502) {
    super(`${service} error: ${message}`, statusCode, 'EXTERNAL_SERVICE_ERROR');
    this.service = service;
    this.originalError = originalError;
  }
}

/** Outbound messaging transport failed (WhatsApp Cloud API). */
export class WhatsAppError extends ExternalServiceError {
  public readonly upstreamStatus?: number;

  constructor(message: string, originalError?: Error, upstreamStatus?: number) {
    super('WhatsApp', message, originalError);
    this.upstreamStatus = upstreamStatus;
  }
}

// ============================================================================
// Persistence Errors
// ============================================================================

/** Session or ticket store unavailable. Surfaced to the caller, retried by the queue. */
export class PersistenceError extends AppError {
  public readonly originalError?: Error;

  constructor(message: string, originalError?: Error) {
    super(`Persistence error: ${message}`, 503, 'PERSISTENCE_ERROR', false);
    this.originalError = originalError;
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

/** Message catalogue or routing rules failed validation at startup. */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 500, 'CONFIGURATION_ERROR', false);
  }
}

// ============================================================================
// Error Utilities
// ============================================================================

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Check if error is retryable (transient)
 */
export function isRetryableError(error: unknown): boolean {
  if (isAppError(error)) {
    if (error.statusCode === 429 || error.statusCode === 503) {
      return true;
    }
    // 4xx from WhatsApp means the request itself is wrong
    if (error instanceof WhatsAppError) {
      return error.upstreamStatus === undefined || error.upstreamStatus >= 500 || error.upstreamStatus === 429;
    }
    if (error instanceof ExternalServiceError) {
      return true;
    }
    return false;
  }

  // Check for common transient error messages
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    const retryablePatterns = [
      'timeout',
      'econnreset',
      'econnrefused',
      'network',
      'temporarily unavailable',
      'rate limit',
      'too many requests',
    ];
    return retryablePatterns.some(pattern => message.includes(pattern));
  }

  return false;
}

/**
 * Retry a function with exponential backoff
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: {
    maxRetries?: number;
    initialDelayMs?: number;
    maxDelayMs?: number;
    shouldRetry?: (error: unknown) => boolean;
  } = {}
): Promise<T> {
  const {
    maxRetries = 3,
    initialDelayMs = 1000,
    maxDelayMs = 10000,
    shouldRetry = isRetryableError,
  } = options;

  let lastError: unknown;
  let delay = initialDelayMs;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt === maxRetries || !shouldRetry(error)) {
        throw error;
      }

      await new Promise(resolve => setTimeout(resolve, delay));

      // Exponential backoff with jitter
      delay = Math.min(delay * 2 + Math.random() * 1000, maxDelayMs);
    }
  }

  throw lastError;
}
