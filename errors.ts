/**
 * Strava Error Classes
 * Error kinds raised by the API client and the website session
 */

// ============================================================================
// Error Response Interface
// ============================================================================

/**
 * The parts of a failed HTTP response needed to classify it
 */
export interface StravaErrorResponse {
  status: number;
  data?: { message?: string; errors?: unknown };
  headers: Headers;
  context?: string;
}

// ============================================================================
// Base Error Class
// ============================================================================

/**
 * Base error class for all Strava errors
 */
export class StravaError extends Error {
  public readonly statusCode?: number;
  public readonly code: string;

  constructor(message: string, code: string = "STRAVA_ERROR", statusCode?: number) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
    // Capture stack trace if available (V8 engines like Node.js)
    const errorConstructor = Error as typeof Error & {
      captureStackTrace?: (
        target: object,
        constructor: new (...args: never[]) => unknown
      ) => void;
    };
    if (typeof errorConstructor.captureStackTrace === "function") {
      errorConstructor.captureStackTrace(this, new.target);
    }
  }
}

// ============================================================================
// Specific Error Classes
// ============================================================================

/**
 * Bad credentials, an expired session token, or a session that could not be
 * re-established
 */
export class StravaAuthenticationError extends StravaError {
  constructor(message: string = "Authentication failed") {
    super(message, "STRAVA_AUTH_ERROR", 401);
  }
}

/**
 * Resource not found error (404)
 */
export class StravaNotFoundError extends StravaError {
  constructor(message: string = "Resource not found") {
    super(message, "STRAVA_NOT_FOUND", 404);
  }
}

/**
 * Non-2xx response from the website or the API
 */
export class StravaRequestError extends StravaError {
  constructor(
    message: string = "Request failed",
    statusCode: number = 500,
    code: string = "STRAVA_REQUEST_ERROR"
  ) {
    super(message, code, statusCode);
  }
}

/**
 * Rate limit exceeded error (429)
 */
export class StravaRateLimitError extends StravaRequestError {
  public readonly retryAfter?: number;
  public readonly limit?: string;
  public readonly usage?: string;

  constructor(
    message: string = "Rate limit exceeded",
    retryAfter?: number,
    limit?: string,
    usage?: string
  ) {
    super(message, 429, "STRAVA_RATE_LIMIT");
    this.retryAfter = retryAfter;
    this.limit = limit;
    this.usage = usage;
  }
}

/**
 * A response body did not have the structure the scraper expects.
 * Usually means the website layout changed.
 */
export class StravaParseError extends StravaError {
  public readonly context?: string;

  constructor(message: string = "Failed to parse response", context?: string) {
    super(context ? `${context}: ${message}` : message, "STRAVA_PARSE_ERROR");
    this.context = context;
  }
}

/**
 * Token refresh error
 */
export class StravaTokenRefreshError extends StravaError {
  constructor(message: string = "Failed to refresh access token") {
    super(message, "STRAVA_TOKEN_REFRESH_ERROR", 401);
  }
}

/**
 * Invalid arguments or configuration
 */
export class StravaValidationError extends StravaError {
  constructor(message: string = "Invalid request parameters") {
    super(message, "STRAVA_VALIDATION_ERROR", 400);
  }
}

/**
 * Network error
 */
export class StravaNetworkError extends StravaError {
  constructor(message: string = "Network request failed") {
    super(message, "STRAVA_NETWORK_ERROR");
  }
}

// ============================================================================
// Error Parser
// ============================================================================

/**
 * Parse an error or failed response into the matching StravaError
 */
export function parseStravaError(error: unknown): StravaError {
  if (error instanceof StravaError) {
    return error;
  }

  if (isStravaErrorResponse(error)) {
    const { status, data, headers, context } = error;
    const message = data?.message || `Request failed with status ${status}`;

    if (status === 429) {
      const retryAfterHeader = headers.get("retry-after");
      return new StravaRateLimitError(
        message,
        retryAfterHeader ? parseInt(retryAfterHeader, 10) : undefined,
        headers.get("x-ratelimit-limit") ?? undefined,
        headers.get("x-ratelimit-usage") ?? undefined
      );
    }

    if (status === 401) {
      return new StravaAuthenticationError(message);
    }

    if (status === 404) {
      return new StravaNotFoundError(context ? `${context}: ${message}` : message);
    }

    return new StravaRequestError(context ? `${context}: ${message}` : message, status);
  }

  if (error instanceof Error) {
    return new StravaError(error.message, "STRAVA_ERROR");
  }

  return new StravaError(String(error), "STRAVA_UNKNOWN_ERROR");
}

/**
 * Type guard for StravaErrorResponse
 */
function isStravaErrorResponse(error: unknown): error is StravaErrorResponse {
  return (
    typeof error === "object" &&
    error !== null &&
    "status" in error &&
    typeof error.status === "number" &&
    "headers" in error &&
    error.headers instanceof Headers
  );
}

/**
 * Check if error is a specific type
 */
export function isStravaErrorType<T extends StravaError>(
  error: unknown,
  ErrorClass: abstract new (...args: never[]) => T
): error is T {
  return error instanceof ErrorClass;
}
