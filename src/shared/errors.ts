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

export class ConflictError extends AppError {
  constructor(message: string = 'Conflict') {
    super(message, 409, 'CONFLICT');
  }
}

export class TooManyRequestsError extends AppError {
  public readonly retryAfter?: number;

  constructor(message: string = 'Too many requests', retryAfter?: number) {
    super(message, 429, 'RATE_LIMITED');
    this.retryAfter = retryAfter;
  }
}

// ============================================================================
// Intake Errors
// ============================================================================

/**
 * The caller referenced a conversation that has no intake record.
 * This is a caller bug, never a patient error.
 */
export class UnknownConversationError extends AppError {
  public readonly conversationId: string;

  constructor(conversationId: string) {
    super(`Unknown conversation: ${conversationId}`, 404, 'UNKNOWN_CONVERSATION_ID');
    this.conversationId = conversationId;
  }
}

export class InvalidConversationIdError extends AppError {
  constructor(conversationId: string) {
    super(`Invalid conversation id: ${conversationId.substring(0, 64)}`, 400, 'INVALID_CONVERSATION_ID');
  }
}

/**
 * Raised by a session store when the stored revision moved on since the
 * record was loaded. The engine retries the whole cycle.
 */
export class RevisionConflictError extends AppError {
  constructor(conversationId: string, expected: number, actual: number | null) {
    super(
      `Revision conflict for ${conversationId}: expected ${expected}, found ${actual ?? 'none'}`,
      409,
      'REVISION_CONFLICT'
    );
  }
}

export class SessionCorruptError extends AppError {
  constructor(conversationId: string, detail: string) {
    super(`Stored intake record for ${conversationId} is unreadable: ${detail}`, 500, 'SESSION_CORRUPT', false);
  }
}

export class CatalogLoadError extends AppError {
  constructor(message: string) {
    super(`Symptom catalog error: ${message}`, 500, 'CATALOG_LOAD_FAILED', false);
  }
}

// ============================================================================
// Extraction Errors (recovered locally by the engine)
// ============================================================================

export class ExtractionError extends AppError {
  public readonly originalError?: Error;

  constructor(message: string, code: string, originalError?: Error) {
    super(message, 502, code);
    this.originalError = originalError;
  }
}

export class ExtractionTimeoutError extends ExtractionError {
  constructor(timeoutMs: number) {
    super(`Extraction timed out after ${timeoutMs}ms`, 'EXTRACTION_TIMEOUT');
  }
}

export class ExtractionMalformedError extends ExtractionError {
  constructor(message: string, originalError?: Error) {
    super(`Malformed extraction response: ${message}`, 'EXTRACTION_MALFORMED', originalError);
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

export class TelegramError extends ExternalServiceError {
  constructor(message: string, originalError?: Error) {
    super('Telegram', message, originalError);
  }
}

// ============================================================================
// Database Errors
// ============================================================================

export class DatabaseError extends AppError {
  public readonly originalError?: Error;

  constructor(message: string, originalError?: Error) {
    super(`Database error: ${message}`, 500, 'DATABASE_ERROR', false);
    this.originalError = originalError;
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
    if (error instanceof ExternalServiceError) {
      return true;
    }
    if (error instanceof DatabaseError) {
      return true;
    }
    return false;
  }

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
