/**
 * Shared fetch wrapper used by the API client and the website session
 */

import { StravaLoggingHooks } from "./types";
import { StravaNetworkError, parseStravaError } from "./errors";

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export const DEFAULT_TIMEOUT = 30000; // 30 seconds

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  body?: string | URLSearchParams | FormData;
  redirect?: RequestRedirect;
}

export interface TransportOptions extends StravaLoggingHooks {
  timeout: number;
}

const REDACTED_HEADERS = new Set(["authorization", "cookie"]);

/**
 * Build a URL from a base, a path and optional query parameters.
 * Undefined parameters are left out.
 */
export function buildUrl(
  baseUrl: string,
  path: string,
  params?: Record<string, string | number | boolean | undefined>
): string {
  let url = `${baseUrl}${path}`;

  if (params) {
    const searchParams = new URLSearchParams();
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) {
        searchParams.append(key, String(value));
      }
    }
    const queryString = searchParams.toString();
    if (queryString) {
      url += `?${queryString}`;
    }
  }

  return url;
}

/**
 * Send a request with a timeout on the response headers.
 *
 * The response is returned whatever its status; the body is left unread so
 * callers can stream it.
 */
export async function send(request: HttpRequest, options: TransportOptions): Promise<Response> {
  const headers = request.headers ?? {};

  options.onRequest?.({
    method: request.method,
    url: request.url,
    headers: redactHeaders(headers),
  });

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeout);
  const startedAt = Date.now();

  try {
    const response = await fetch(request.url, {
      method: request.method,
      headers,
      body: request.body,
      redirect: request.redirect ?? "follow",
      signal: controller.signal,
    });

    clearTimeout(timeoutId);

    options.onResponse?.({
      method: request.method,
      url: request.url,
      status: response.status,
      duration: Date.now() - startedAt,
    });

    return response;
  } catch (error) {
    clearTimeout(timeoutId);

    if (error instanceof Error && error.name === "AbortError") {
      throw new StravaNetworkError("Request timed out");
    }

    if (error instanceof TypeError && error.message.includes("fetch")) {
      throw new StravaNetworkError("Network error - unable to reach Strava");
    }

    throw error;
  }
}

/**
 * Throw the matching StravaError when the response is not 2xx
 */
export async function ensureOk(response: Response, context?: string): Promise<Response> {
  if (response.ok) {
    return response;
  }

  const errorData = await readErrorBody(response);
  throw parseStravaError({
    status: response.status,
    data: errorData,
    headers: response.headers,
    context,
  });
}

/**
 * Release a response body that will not be read
 */
export async function discardBody(response: Response): Promise<void> {
  if (response.body && !response.bodyUsed) {
    await response.body.cancel();
  }
}

async function readErrorBody(response: Response): Promise<{ message?: string }> {
  const contentType = response.headers.get("content-type") ?? "";
  if (!contentType.includes("json")) {
    await discardBody(response);
    return {};
  }

  const data: unknown = await response.json().catch(() => ({}));
  if (typeof data === "object" && data !== null && "message" in data) {
    return typeof data.message === "string" ? { message: data.message } : {};
  }
  return {};
}

function redactHeaders(headers: Record<string, string>): Record<string, string> {
  const redacted: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    redacted[key] = REDACTED_HEADERS.has(key.toLowerCase()) ? "[redacted]" : value;
  }
  return redacted;
}
