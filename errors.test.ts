import { describe, it, expect } from "vitest";
import {
  StravaError,
  StravaAuthenticationError,
  StravaNotFoundError,
  StravaRequestError,
  StravaRateLimitError,
  StravaParseError,
  StravaTokenRefreshError,
  StravaValidationError,
  StravaNetworkError,
  parseStravaError,
  isStravaErrorType,
} from "./errors";

describe("Error Classes", () => {
  describe("StravaError", () => {
    it("should create base error with message and code", () => {
      const error = new StravaError("Test error", "TEST_CODE", 500);

      expect(error.message).toBe("Test error");
      expect(error.code).toBe("TEST_CODE");
      expect(error.statusCode).toBe(500);
      expect(error.name).toBe("StravaError");
      expect(error).toBeInstanceOf(Error);
    });

    it("should use default code when not provided", () => {
      const error = new StravaError("Test error");

      expect(error.code).toBe("STRAVA_ERROR");
      expect(error.statusCode).toBeUndefined();
    });
  });

  describe("StravaAuthenticationError", () => {
    it("should have correct properties", () => {
      const error = new StravaAuthenticationError();

      expect(error.message).toBe("Authentication failed");
      expect(error.statusCode).toBe(401);
      expect(error.code).toBe("STRAVA_AUTH_ERROR");
      expect(error.name).toBe("StravaAuthenticationError");
    });

    it("should accept custom message", () => {
      const error = new StravaAuthenticationError("Session token has expired");

      expect(error.message).toBe("Session token has expired");
    });
  });

  describe("StravaNotFoundError", () => {
    it("should have correct properties", () => {
      const error = new StravaNotFoundError();

      expect(error.statusCode).toBe(404);
      expect(error.code).toBe("STRAVA_NOT_FOUND");
    });
  });

  describe("StravaRequestError", () => {
    it("should carry the response status", () => {
      const error = new StravaRequestError("Failed to delete activity (status code: 200)", 200);

      expect(error.statusCode).toBe(200);
      expect(error.code).toBe("STRAVA_REQUEST_ERROR");
    });
  });

  describe("StravaRateLimitError", () => {
    it("should have correct properties", () => {
      const error = new StravaRateLimitError("Rate limited", 900, "100,1000", "100,500");

      expect(error).toBeInstanceOf(StravaRequestError);
      expect(error.statusCode).toBe(429);
      expect(error.code).toBe("STRAVA_RATE_LIMIT");
      expect(error.retryAfter).toBe(900);
      expect(error.limit).toBe("100,1000");
      expect(error.usage).toBe("100,500");
    });
  });

  describe("StravaParseError", () => {
    it("should prefix the message with its context", () => {
      const error = new StravaParseError("CSRF meta tags not found", "CSRF token");

      expect(error.message).toBe("CSRF token: CSRF meta tags not found");
      expect(error.context).toBe("CSRF token");
      expect(error.code).toBe("STRAVA_PARSE_ERROR");
      expect(error.statusCode).toBeUndefined();
    });

    it("should use the message alone without context", () => {
      expect(new StravaParseError().message).toBe("Failed to parse response");
    });
  });

  describe("StravaTokenRefreshError", () => {
    it("should have correct properties", () => {
      const error = new StravaTokenRefreshError();

      expect(error.statusCode).toBe(401);
      expect(error.code).toBe("STRAVA_TOKEN_REFRESH_ERROR");
    });
  });

  describe("StravaValidationError", () => {
    it("should have correct properties", () => {
      const error = new StravaValidationError();

      expect(error.statusCode).toBe(400);
      expect(error.code).toBe("STRAVA_VALIDATION_ERROR");
    });
  });

  describe("StravaNetworkError", () => {
    it("should have correct properties", () => {
      const error = new StravaNetworkError();

      expect(error.statusCode).toBeUndefined();
      expect(error.code).toBe("STRAVA_NETWORK_ERROR");
    });
  });
});

describe("parseStravaError", () => {
  it("should return StravaError as-is", () => {
    const original = new StravaAuthenticationError("Original");

    expect(parseStravaError(original)).toBe(original);
  });

  it("should parse 401 response", () => {
    const error = parseStravaError({
      status: 401,
      data: { message: "Invalid token" },
      headers: new Headers(),
      context: "Bike details",
    });

    expect(error).toBeInstanceOf(StravaAuthenticationError);
    expect(error.message).toBe("Invalid token");
  });

  it("should parse 404 response with context", () => {
    const error = parseStravaError({
      status: 404,
      data: {},
      headers: new Headers(),
      context: "Download activity",
    });

    expect(error).toBeInstanceOf(StravaNotFoundError);
    expect(error.message).toBe("Download activity: Request failed with status 404");
  });

  it("should parse 429 response with rate limit headers", () => {
    const headers = new Headers({
      "retry-after": "900",
      "x-ratelimit-limit": "100,1000",
      "x-ratelimit-usage": "100,500",
    });

    const error = parseStravaError({
      status: 429,
      data: { message: "Rate limit exceeded" },
      headers,
    });

    expect(error).toBeInstanceOf(StravaRateLimitError);
    if (error instanceof StravaRateLimitError) {
      expect(error.retryAfter).toBe(900);
      expect(error.limit).toBe("100,1000");
      expect(error.usage).toBe("100,500");
    }
  });

  it("should parse 403 and 5xx responses as request errors", () => {
    const forbidden = parseStravaError({ status: 403, headers: new Headers() });
    const unavailable = parseStravaError({
      status: 503,
      data: { message: "Service unavailable" },
      headers: new Headers(),
      context: "Feed",
    });

    expect(forbidden).toBeInstanceOf(StravaRequestError);
    expect(forbidden.statusCode).toBe(403);
    expect(forbidden.message).toBe("Request failed with status 403");
    expect(unavailable).toBeInstanceOf(StravaRequestError);
    expect(unavailable.statusCode).toBe(503);
    expect(unavailable.message).toBe("Feed: Service unavailable");
  });

  it("should wrap standard Error", () => {
    const error = parseStravaError(new Error("Something went wrong"));

    expect(error).toBeInstanceOf(StravaError);
    expect(error.message).toBe("Something went wrong");
    expect(error.code).toBe("STRAVA_ERROR");
  });

  it("should handle unknown error types", () => {
    const error = parseStravaError("string error");

    expect(error.message).toBe("string error");
    expect(error.code).toBe("STRAVA_UNKNOWN_ERROR");
  });
});

describe("isStravaErrorType", () => {
  it("should correctly identify error types", () => {
    const authError = new StravaAuthenticationError();
    const rateLimitError = new StravaRateLimitError();

    expect(isStravaErrorType(authError, StravaAuthenticationError)).toBe(true);
    expect(isStravaErrorType(authError, StravaNetworkError)).toBe(false);
    expect(isStravaErrorType(rateLimitError, StravaRequestError)).toBe(true);
  });

  it("should return false for non-StravaError", () => {
    expect(isStravaErrorType(new Error("test"), StravaAuthenticationError)).toBe(false);
    expect(isStravaErrorType(null, StravaAuthenticationError)).toBe(false);
  });
});
