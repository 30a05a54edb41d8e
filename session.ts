/**
 * Website session: logs in with credentials or adopts a session token,
 * keeps the session cookies, and signs requests to the site.
 */

import { Cookie, CookieJar } from "tough-cookie";

import { StravaCsrfToken, StravaSessionOptions, StravaWebCredentials } from "./types";
import { StravaAuthenticationError } from "./errors";
import {
  DEFAULT_TIMEOUT,
  HttpMethod,
  TransportOptions,
  buildUrl,
  discardBody,
  ensureOk,
  send,
} from "./http";
import { parseCsrfToken } from "./scrapers";

export const STRAVA_WEB_BASE_URL = "https://www.strava.com";
export const SESSION_TOKEN_COOKIE = "strava_remember_token";
export const ATHLETE_ID_COOKIE = "strava_remember_id";

const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (X11; Linux x86_64; rv:128.0) Gecko/20100101 Firefox/128.0";
const HTML_ACCEPT = "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8";
const XHR_ACCEPT = "application/json, text/javascript, */*; q=0.01";

type ResolvedSessionOptions = Required<
  Pick<StravaSessionOptions, "baseUrl" | "timeout" | "userAgent" | "onSessionChange">
>;

export interface SessionRequestOptions {
  params?: Record<string, string | number | boolean | undefined>;
  /** Sent as application/x-www-form-urlencoded */
  form?: Record<string, string>;
  headers?: Record<string, string>;
  /** Ask for JSON the way the site's own scripts do */
  xhr?: boolean;
  /** Attach the CSRF token as a form field or as the X-CSRF-Token header */
  csrf?: "form" | "header";
}

interface SessionTokenClaims {
  athleteId: string;
  expiresAt: number;
}

export function isRedirect(response: Response): boolean {
  return response.status >= 300 && response.status < 400;
}

/**
 * Decode the claims of a session token (a JWT) without verifying it
 */
export function decodeSessionToken(sessionToken: string): SessionTokenClaims {
  const payload = sessionToken.split(".")[1];
  if (!payload) {
    throw new StravaAuthenticationError("Failed to parse session token");
  }

  let claims: unknown;
  try {
    claims = JSON.parse(Buffer.from(payload, "base64url").toString("utf8"));
  } catch {
    throw new StravaAuthenticationError("Failed to parse session token");
  }

  if (
    typeof claims !== "object" ||
    claims === null ||
    !("sub" in claims) ||
    !("exp" in claims) ||
    (typeof claims.sub !== "string" && typeof claims.sub !== "number") ||
    typeof claims.exp !== "number"
  ) {
    throw new StravaAuthenticationError("Failed to extract required data from the session token");
  }

  return { athleteId: String(claims.sub), expiresAt: claims.exp };
}

export class WebSession {
  private jar = new CookieJar();
  private csrf: StravaCsrfToken | null;
  private readonly presetCsrf: StravaCsrfToken | null;
  private readonly credentials: StravaWebCredentials | null;
  private readonly options: ResolvedSessionOptions;
  private readonly transport: TransportOptions;

  private constructor(credentials: StravaWebCredentials | null, options: StravaSessionOptions) {
    this.credentials = credentials;
    this.options = {
      baseUrl: (options.baseUrl ?? STRAVA_WEB_BASE_URL).replace(/\/+$/, ""),
      timeout: options.timeout ?? DEFAULT_TIMEOUT,
      userAgent: options.userAgent ?? DEFAULT_USER_AGENT,
      onSessionChange: options.onSessionChange ?? (() => {}),
    };
    this.transport = {
      timeout: this.options.timeout,
      onRequest: options.onRequest,
      onResponse: options.onResponse,
    };
    this.presetCsrf = options.csrf ?? null;
    this.csrf = this.presetCsrf;
  }

  /**
   * Log into the website with an email and password
   */
  public static async login(
    credentials: StravaWebCredentials,
    options: StravaSessionOptions = {}
  ): Promise<WebSession> {
    const session = new WebSession(credentials, options);
    await session.logIn();
    return session;
  }

  /**
   * Resume a session from a session token without contacting the site.
   * Credentials, when given, are used to log in again if the token is rejected.
   */
  public static fromToken(
    sessionToken: string,
    options: StravaSessionOptions = {},
    credentials: StravaWebCredentials | null = null
  ): WebSession {
    const claims = decodeSessionToken(sessionToken);
    if (claims.expiresAt < Date.now() / 1000) {
      throw new StravaAuthenticationError("Session token has expired");
    }

    const session = new WebSession(credentials, options);
    session.setCookie(ATHLETE_ID_COOKIE, claims.athleteId);
    session.setCookie(SESSION_TOKEN_COOKIE, sessionToken);
    return session;
  }

  // ============================================================================
  // Session State
  // ============================================================================

  /**
   * The current session token, for persisting and resuming later
   */
  public getSessionToken(): string | null {
    return this.getCookie(SESSION_TOKEN_COOKIE);
  }

  public getAthleteId(): number | null {
    const id = this.getCookie(ATHLETE_ID_COOKIE);
    const athleteId = id ? parseInt(id, 10) : NaN;
    return Number.isNaN(athleteId) ? null : athleteId;
  }

  /**
   * CSRF token for form posts. Read from the about page, which is small and
   * does not redirect whether logged in or not.
   */
  public async getCsrf(): Promise<StravaCsrfToken> {
    if (!this.csrf) {
      const response = await this.send("GET", "/about");
      await ensureOk(response, "CSRF token");
      this.csrf = parseCsrfToken(await response.text());
    }
    return this.csrf;
  }

  /**
   * Path of a redirect's target, relative to the site
   */
  public redirectPath(response: Response): string | null {
    const location = response.headers.get("location");
    if (!isRedirect(response) || !location) {
      return null;
    }
    return new URL(location, this.options.baseUrl).pathname;
  }

  // ============================================================================
  // Requests
  // ============================================================================

  /**
   * Send an authenticated request to the site. Redirects are not followed.
   *
   * If the site rejects the session and credentials are known, logs in again
   * once and repeats the request.
   */
  public async request(
    method: HttpMethod,
    path: string,
    options: SessionRequestOptions = {}
  ): Promise<Response> {
    const response = await this.sendSigned(method, path, options);
    if (!this.isAuthFailure(response)) {
      return response;
    }
    await discardBody(response);

    if (!this.credentials) {
      throw new StravaAuthenticationError(
        "Session was rejected and no credentials are available to log in again"
      );
    }

    await this.logIn();
    const retried = await this.sendSigned(method, path, options);
    if (this.isAuthFailure(retried)) {
      await discardBody(retried);
      throw new StravaAuthenticationError("Session was rejected again after logging in");
    }
    return retried;
  }

  private async sendSigned(
    method: HttpMethod,
    path: string,
    options: SessionRequestOptions
  ): Promise<Response> {
    const headers: Record<string, string> = { ...options.headers };
    let form = options.form;

    if (options.xhr) {
      headers["Accept"] = headers["Accept"] ?? XHR_ACCEPT;
      headers["X-Requested-With"] = "XMLHttpRequest";
    }

    if (options.csrf) {
      const csrf = await this.getCsrf();
      if (options.csrf === "form") {
        form = { ...form, [csrf.param]: csrf.token };
      } else {
        headers["X-CSRF-Token"] = csrf.token;
      }
    }

    return this.send(method, path, { params: options.params, form, headers });
  }

  private async send(
    method: HttpMethod,
    path: string,
    options: Pick<SessionRequestOptions, "params" | "form" | "headers"> = {}
  ): Promise<Response> {
    const url = buildUrl(this.options.baseUrl, path, options.params);
    const headers: Record<string, string> = {
      "User-Agent": this.options.userAgent,
      Accept: HTML_ACCEPT,
      ...options.headers,
    };

    const cookie = await this.jar.getCookieString(url);
    if (cookie) {
      headers["Cookie"] = cookie;
    }

    const response = await send(
      {
        method,
        url,
        headers,
        body: options.form ? new URLSearchParams(options.form) : undefined,
        redirect: "manual",
      },
      this.transport
    );

    for (const setCookie of response.headers.getSetCookie()) {
      await this.jar.setCookie(setCookie, url, { ignoreError: true });
    }

    return response;
  }

  private isAuthFailure(response: Response): boolean {
    return response.status === 401 || this.redirectPath(response) === "/login";
  }

  // ============================================================================
  // Login
  // ============================================================================

  /**
   * Log in with the stored credentials, replacing any previous session.
   * On failure no cookies from the attempt are kept.
   */
  private async logIn(): Promise<void> {
    if (!this.credentials) {
      throw new StravaAuthenticationError("No credentials available to log in");
    }

    this.jar = new CookieJar();
    this.csrf = this.presetCsrf;

    try {
      const loginPage = await this.send("GET", "/login");
      await ensureOk(loginPage, "Login page");
      const csrf = parseCsrfToken(await loginPage.text());

      const response = await this.send("POST", "/session", {
        form: {
          email: this.credentials.email,
          password: this.credentials.password,
          remember_me: "on",
          [csrf.param]: csrf.token,
        },
      });
      await discardBody(response);

      const location = this.redirectPath(response);
      if (location === null || location === "/login") {
        throw new StravaAuthenticationError("Couldn't log in to website, check credentials");
      }
    } catch (error) {
      this.jar = new CookieJar();
      throw error;
    }

    const sessionToken = this.getSessionToken();
    if (!sessionToken) {
      this.jar = new CookieJar();
      throw new StravaAuthenticationError("Login did not return a session token");
    }

    await this.options.onSessionChange(sessionToken);
  }

  // ============================================================================
  // Cookies
  // ============================================================================

  private setCookie(key: string, value: string): void {
    const cookie = new Cookie({
      key,
      value,
      path: "/",
      secure: this.options.baseUrl.startsWith("https:"),
    });
    this.jar.setCookieSync(cookie, this.options.baseUrl);
  }

  private getCookie(key: string): string | null {
    const cookie = this.jar
      .getCookiesSync(this.options.baseUrl)
      .find((candidate) => candidate.key === key);
    return cookie ? cookie.value : null;
  }
}
