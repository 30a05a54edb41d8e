import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { StravaClient } from "./client";
import {
  StravaAuthenticationError,
  StravaRateLimitError,
  StravaNotFoundError,
  StravaNetworkError,
  StravaTokenRefreshError,
  StravaValidationError,
} from "./errors";

// Mock fetch globally
const mockFetch = vi.fn();
vi.stubGlobal("fetch", mockFetch);

function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json", ...headers },
  });
}

function validTokens() {
  return {
    accessToken: "access-123",
    refreshToken: "refresh-456",
    expiresAt: Math.floor(Date.now() / 1000) + 3600,
  };
}

describe("StravaClient", () => {
  let client: StravaClient;

  beforeEach(() => {
    vi.clearAllMocks();
    client = new StravaClient({
      clientId: "test-client-id",
      clientSecret: "test-secret",
    });
  });

  afterEach(() => {
    mockFetch.mockReset();
  });

  describe("Token Management", () => {
    it("should store and retrieve tokens", () => {
      const tokens = validTokens();

      client.setTokens(tokens);
      expect(client.getTokens()).toEqual(tokens);
    });

    it("should take initial tokens from config", () => {
      const tokens = validTokens();
      const configured = new StravaClient({ tokens });

      expect(configured.getTokens()).toEqual(tokens);
    });

    it("should clear tokens", () => {
      client.setTokens(validTokens());

      client.clearTokens();
      expect(client.getTokens()).toBeNull();
    });

    it("should validate tokens correctly", () => {
      expect(client.hasValidTokens()).toBe(false);

      client.setTokens({ ...validTokens(), expiresAt: Math.floor(Date.now() / 1000) - 100 });
      expect(client.hasValidTokens()).toBe(false);

      client.setTokens(validTokens());
      expect(client.hasValidTokens()).toBe(true);
    });
  });

  describe("API Requests", () => {
    beforeEach(() => {
      client.setTokens(validTokens());
    });

    it("should fetch the authenticated athlete", async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ id: 12345, firstname: "Test" }));

      const athlete = await client.getAthlete();

      expect(athlete).toEqual({ id: 12345, firstname: "Test" });
      expect(mockFetch).toHaveBeenCalledWith(
        "https://www.strava.com/api/v3/athlete",
        expect.objectContaining({
          method: "GET",
          headers: {
            "Content-Type": "application/json",
            Authorization: "Bearer access-123",
          },
        })
      );
    });

    it("should fetch gear by id", async () => {
      mockFetch.mockResolvedValueOnce(
        jsonResponse({ id: "b123", primary: true, name: "Road", distance: 1000 })
      );

      const gear = await client.getGear("b123");

      expect(gear.name).toBe("Road");
      expect(mockFetch.mock.calls[0][0]).toBe("https://www.strava.com/api/v3/gear/b123");
    });

    it("should pass activity query parameters", async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse([]));

      await client.getActivities({ after: 1700000000, per_page: 50 });

      expect(mockFetch.mock.calls[0][0]).toBe(
        "https://www.strava.com/api/v3/athlete/activities?after=1700000000&page=1&per_page=50"
      );
    });

    it("should iterate activities across pages", async () => {
      mockFetch
        .mockResolvedValueOnce(jsonResponse([{ id: 1 }, { id: 2 }]))
        .mockResolvedValueOnce(jsonResponse([{ id: 3 }]));

      const ids: number[] = [];
      for await (const activity of client.iterateActivities({ per_page: 2 })) {
        ids.push(activity.id);
      }

      expect(ids).toEqual([1, 2, 3]);
      expect(mockFetch).toHaveBeenCalledTimes(2);
      expect(mockFetch.mock.calls[1][0]).toBe(
        "https://www.strava.com/api/v3/athlete/activities?page=2&per_page=2"
      );
    });

    it("should track rate limit headers", async () => {
      mockFetch.mockResolvedValueOnce(
        jsonResponse({ id: 1 }, 200, {
          "x-ratelimit-limit": "200,2000",
          "x-ratelimit-usage": "10,100",
        })
      );

      await client.getAthlete();

      expect(client.getRateLimitInfo()).toEqual({
        shortTerm: { usage: 10, limit: 200 },
        longTerm: { usage: 100, limit: 2000 },
      });
    });

    it("should redact the authorization header in request logs", async () => {
      const onRequest = vi.fn();
      const onResponse = vi.fn();
      const logged = new StravaClient({ tokens: validTokens(), onRequest, onResponse });
      mockFetch.mockResolvedValueOnce(jsonResponse({ id: 1 }));

      await logged.getAthlete();

      expect(onRequest).toHaveBeenCalledWith({
        method: "GET",
        url: "https://www.strava.com/api/v3/athlete",
        headers: { "Content-Type": "application/json", Authorization: "[redacted]" },
      });
      expect(onResponse).toHaveBeenCalledWith(
        expect.objectContaining({ method: "GET", status: 200 })
      );
    });
  });

  describe("Error Handling", () => {
    beforeEach(() => {
      client.setTokens(validTokens());
    });

    it("should require an access token", async () => {
      client.clearTokens();

      await expect(client.getAthlete()).rejects.toThrow(StravaValidationError);
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it("should throw StravaAuthenticationError on 401", async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ message: "Unauthorized" }, 401));

      await expect(client.getAthlete()).rejects.toThrow(StravaAuthenticationError);
    });

    it("should throw StravaNotFoundError on 404", async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ message: "Record Not Found" }, 404));

      await expect(client.getRoute(999)).rejects.toThrow(StravaNotFoundError);
    });

    it("should throw StravaRateLimitError on 429", async () => {
      mockFetch.mockResolvedValueOnce(
        jsonResponse({ message: "Rate limit exceeded" }, 429, { "retry-after": "60" })
      );

      const error = await client.getAthlete().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(StravaRateLimitError);
      if (error instanceof StravaRateLimitError) {
        expect(error.retryAfter).toBe(60);
      }
    });

    it("should throw StravaNetworkError when fetch fails", async () => {
      mockFetch.mockRejectedValueOnce(new TypeError("fetch failed"));

      await expect(client.getAthlete()).rejects.toThrow(StravaNetworkError);
    });

    it("should report timeouts", async () => {
      const abortError = new Error("This operation was aborted");
      abortError.name = "AbortError";
      mockFetch.mockRejectedValueOnce(abortError);

      await expect(client.getAthlete()).rejects.toThrow("Request timed out");
    });
  });

  describe("Token Refresh", () => {
    it("should refresh expired tokens before a request", async () => {
      const onTokenRefresh = vi.fn();
      const refreshing = new StravaClient({
        clientId: "test-client-id",
        clientSecret: "test-secret",
        tokens: { ...validTokens(), expiresAt: Math.floor(Date.now() / 1000) - 10 },
        onTokenRefresh,
      });
      mockFetch
        .mockResolvedValueOnce(
          jsonResponse({
            token_type: "Bearer",
            access_token: "new-access",
            refresh_token: "new-refresh",
            expires_at: 2000000000,
            expires_in: 21600,
          })
        )
        .mockResolvedValueOnce(jsonResponse({ id: 1 }));

      await refreshing.getAthlete();

      expect(mockFetch.mock.calls[0][0]).toBe("https://www.strava.com/oauth/token");
      expect(JSON.parse(mockFetch.mock.calls[0][1].body)).toEqual({
        client_id: "test-client-id",
        client_secret: "test-secret",
        grant_type: "refresh_token",
        refresh_token: "refresh-456",
      });
      expect(mockFetch.mock.calls[1][1].headers.Authorization).toBe("Bearer new-access");
      expect(onTokenRefresh).toHaveBeenCalledWith({
        accessToken: "new-access",
        refreshToken: "new-refresh",
        expiresAt: 2000000000,
      });
    });

    it("should share one refresh between concurrent requests", async () => {
      const refreshing = new StravaClient({
        clientId: "test-client-id",
        clientSecret: "test-secret",
        tokens: { ...validTokens(), expiresAt: 0 },
      });
      mockFetch.mockImplementation((url: string) =>
        Promise.resolve(
          url.endsWith("/oauth/token")
            ? jsonResponse({
                token_type: "Bearer",
                access_token: "new-access",
                refresh_token: "new-refresh",
                expires_at: 2000000000,
                expires_in: 21600,
              })
            : jsonResponse({ id: 1 })
        )
      );

      await Promise.all([refreshing.getAthlete(), refreshing.getAthlete()]);

      const tokenCalls = mockFetch.mock.calls.filter(([url]) => url.endsWith("/oauth/token"));
      expect(tokenCalls).toHaveLength(1);
      expect(mockFetch).toHaveBeenCalledTimes(3);
    });

    it("should require client credentials to refresh", async () => {
      const bare = new StravaClient({ tokens: validTokens() });

      await expect(bare.refreshAccessToken()).rejects.toThrow(StravaTokenRefreshError);
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it("should not refresh when autoRefresh is off", async () => {
      const manual = new StravaClient({
        clientId: "test-client-id",
        clientSecret: "test-secret",
        tokens: { ...validTokens(), expiresAt: 0 },
        autoRefresh: false,
      });
      mockFetch.mockResolvedValueOnce(jsonResponse({ id: 1 }));

      await manual.getAthlete();

      expect(mockFetch).toHaveBeenCalledTimes(1);
      expect(mockFetch.mock.calls[0][0]).toBe("https://www.strava.com/api/v3/athlete");
    });
  });
});
