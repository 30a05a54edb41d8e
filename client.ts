/**
 * Strava API Client
 * The OAuth-authenticated API collaborator the website client builds on.
 *
 * Features:
 * - Automatic token refresh when tokens expire
 * - Rate limit tracking from response headers
 * - Typed errors from errors.ts
 */

import {
  StravaTokenResponse,
  StravaTokens,
  StravaAthlete,
  StravaActivity,
  StravaGear,
  StravaRoute,
  StravaRateLimitInfo,
  StravaClientConfig,
  GetActivitiesOptions,
} from "./types";
import { StravaTokenRefreshError, StravaValidationError } from "./errors";
import { DEFAULT_TIMEOUT, HttpMethod, TransportOptions, buildUrl, ensureOk, send } from "./http";

const STRAVA_API_BASE_URL = "https://www.strava.com/api/v3";
const STRAVA_OAUTH_BASE_URL = "https://www.strava.com/oauth";
const DEFAULT_REFRESH_BUFFER = 600; // 10 minutes

type ResolvedClientConfig = Required<Omit<StravaClientConfig, "tokens" | "onRequest" | "onResponse">>;

export class StravaClient {
  private config: ResolvedClientConfig;
  private transport: TransportOptions;
  private tokens: StravaTokens | null;
  private rateLimitInfo: StravaRateLimitInfo | null = null;
  private refreshPromise: Promise<StravaTokenResponse> | null = null;

  constructor(config: StravaClientConfig = {}) {
    this.config = {
      clientId: config.clientId ?? "",
      clientSecret: config.clientSecret ?? "",
      autoRefresh: config.autoRefresh ?? true,
      refreshBuffer: config.refreshBuffer ?? DEFAULT_REFRESH_BUFFER,
      timeout: config.timeout ?? DEFAULT_TIMEOUT,
      onTokenRefresh: config.onTokenRefresh ?? (() => {}),
    };
    this.transport = {
      timeout: this.config.timeout,
      onRequest: config.onRequest,
      onResponse: config.onResponse,
    };
    this.tokens = config.tokens ?? null;
  }

  // ============================================================================
  // HTTP Helpers
  // ============================================================================

  /**
   * Make an authenticated JSON request to the Strava API
   */
  private async request<T>(
    method: HttpMethod,
    path: string,
    params?: Record<string, string | number | boolean | undefined>
  ): Promise<T> {
    if (this.config.autoRefresh && this.tokens) {
      await this.refreshTokenIfNeeded();
    }

    const response = await send(
      {
        method,
        url: buildUrl(STRAVA_API_BASE_URL, path, params),
        headers: {
          "Content-Type": "application/json",
          ...this.getAuthHeaders(),
        },
      },
      this.transport
    );

    this.updateRateLimitInfo(response.headers);
    await ensureOk(response);

    return (await response.json()) as T;
  }

  private getAuthHeaders(): Record<string, string> {
    if (!this.tokens?.accessToken) {
      throw new StravaValidationError("No access token available. Please authenticate first.");
    }

    return {
      Authorization: `Bearer ${this.tokens.accessToken}`,
    };
  }

  /**
   * Update rate limit info from response headers
   */
  private updateRateLimitInfo(headers: Headers): void {
    const limitHeader = headers.get("x-ratelimit-limit");
    const usageHeader = headers.get("x-ratelimit-usage");

    if (limitHeader && usageHeader) {
      const [shortTermLimit, longTermLimit] = limitHeader.split(",").map(Number);
      const [shortTermUsage, longTermUsage] = usageHeader.split(",").map(Number);

      this.rateLimitInfo = {
        shortTerm: { usage: shortTermUsage, limit: shortTermLimit },
        longTerm: { usage: longTermUsage, limit: longTermLimit },
      };
    }
  }

  // ============================================================================
  // Token Management
  // ============================================================================

  public setTokens(tokens: StravaTokens): void {
    this.tokens = tokens;
  }

  public getTokens(): StravaTokens | null {
    return this.tokens;
  }

  public clearTokens(): void {
    this.tokens = null;
  }

  /**
   * Check if client has unexpired tokens
   */
  public hasValidTokens(): boolean {
    if (!this.tokens) return false;

    const now = Math.floor(Date.now() / 1000);
    return this.tokens.expiresAt > now;
  }

  /**
   * Refresh access token using refresh token
   */
  public async refreshAccessToken(refreshToken?: string): Promise<StravaTokenResponse> {
    const tokenToRefresh = refreshToken || this.tokens?.refreshToken;

    if (!tokenToRefresh) {
      throw new StravaTokenRefreshError("No refresh token available");
    }
    if (!this.config.clientId || !this.config.clientSecret) {
      throw new StravaTokenRefreshError("clientId and clientSecret are required to refresh tokens");
    }

    const response = await send(
      {
        method: "POST",
        url: `${STRAVA_OAUTH_BASE_URL}/token`,
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          client_id: this.config.clientId,
          client_secret: this.config.clientSecret,
          grant_type: "refresh_token",
          refresh_token: tokenToRefresh,
        }),
      },
      this.transport
    );
    await ensureOk(response, "Refresh Access Token");
    const data = (await response.json()) as StravaTokenResponse;

    this.tokens = {
      accessToken: data.access_token,
      refreshToken: data.refresh_token,
      expiresAt: data.expires_at,
    };

    await this.config.onTokenRefresh(this.tokens);

    return data;
  }

  /**
   * Refresh the token if it's expired or expiring soon.
   * Concurrent callers share one refresh request.
   */
  private async refreshTokenIfNeeded(): Promise<void> {
    if (!this.tokens) return;

    const now = Math.floor(Date.now() / 1000);
    const shouldRefresh = this.tokens.expiresAt < now + this.config.refreshBuffer;

    if (shouldRefresh) {
      if (this.refreshPromise) {
        await this.refreshPromise;
        return;
      }

      this.refreshPromise = this.refreshAccessToken();
      try {
        await this.refreshPromise;
      } finally {
        this.refreshPromise = null;
      }
    }
  }

  public getRateLimitInfo(): StravaRateLimitInfo | null {
    return this.rateLimitInfo;
  }

  // ============================================================================
  // Athlete Endpoints
  // ============================================================================

  /**
   * Get the currently authenticated athlete
   */
  public async getAthlete(): Promise<StravaAthlete> {
    return this.request<StravaAthlete>("GET", "/athlete");
  }

  // ============================================================================
  // Activity Endpoints
  // ============================================================================

  public async getActivities(options: GetActivitiesOptions = {}): Promise<StravaActivity[]> {
    return this.request<StravaActivity[]>("GET", "/athlete/activities", {
      before: options.before,
      after: options.after,
      page: options.page || 1,
      per_page: options.per_page || 30,
    });
  }

  /**
   * Iterate over athlete activities, one page at a time.
   *
   * @example
   * for await (const activity of client.iterateActivities()) {
   *   if (activity.manual) continue;
   * }
   */
  public async *iterateActivities(
    options: Omit<GetActivitiesOptions, "page"> = {}
  ): AsyncGenerator<StravaActivity, void, undefined> {
    const perPage = options.per_page || 200;
    let page = 1;

    while (true) {
      const activities = await this.getActivities({ ...options, page, per_page: perPage });
      yield* activities;

      if (activities.length < perPage) {
        return;
      }
      page++;
    }
  }

  // ============================================================================
  // Gear & Route Endpoints
  // ============================================================================

  /**
   * Get gear by ID ("b123" for bikes, "g123" for shoes)
   */
  public async getGear(gearId: string): Promise<StravaGear> {
    return this.request<StravaGear>("GET", `/gear/${gearId}`);
  }

  public async getRoute(routeId: number): Promise<StravaRoute> {
    return this.request<StravaRoute>("GET", `/routes/${routeId}`);
  }
}
