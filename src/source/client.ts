import { sourceLogger } from "../logger.js";

import type { RawRecord, SourceFilter } from "../types/index.js";

// ============================================================================
// Source Client Contract
// ============================================================================

export type SourceErrorKind =
  | "unauthorized"
  | "rate_limited"
  | "not_found"
  | "invalid_request"
  | "transport";

/**
 * Typed failure surfaced by every source client implementation.
 */
export class SourceError extends Error {
  kind: SourceErrorKind;
  status?: number;
  retryAfterMs?: number;

  constructor(
    kind: SourceErrorKind,
    message: string,
    options?: { status?: number; retryAfterMs?: number; cause?: unknown }
  ) {
    super(message, { cause: options?.cause });
    this.name = "SourceError";
    this.kind = kind;
    this.status = options?.status;
    this.retryAfterMs = options?.retryAfterMs;
  }
}

export interface FetchPageRequest {
  entityType: string;
  /** Module name on the source side */
  module: string;
  fields: string[];
  filter?: SourceFilter;
  offset: number;
  limit: number;
}

/**
 * Capability consumed by the sync engine. Adding a vendor means implementing
 * this interface; credential refresh stays inside the implementation.
 */
export interface SourceClient {
  readonly name: string;
  fetchPage(request: FetchPageRequest, signal?: AbortSignal): Promise<RawRecord[]>;
  checkConnection(): Promise<boolean>;
}

// ============================================================================
// HTTP Implementation
// ============================================================================

export interface HttpSourceClientOptions {
  baseUrl: string;
  authUrl: string;
  clientId: string;
  clientSecret: string;
  refreshToken: string;
  timeoutMs: number;
  name?: string;
}

// Refresh a minute before the token actually expires
const TOKEN_EXPIRY_SKEW_MS = 60_000;

/**
 * REST client for a CRM exposing `GET {baseUrl}/{module}?offset&limit&fields`
 * and answering `{ "data": [...] }`, authenticated through the OAuth2
 * refresh-token flow.
 */
export class HttpSourceClient implements SourceClient {
  readonly name: string;
  private accessToken: string | null = null;
  private tokenExpiresAt = 0;

  constructor(private readonly options: HttpSourceClientOptions) {
    this.name = options.name ?? "crm";
  }

  async fetchPage(
    request: FetchPageRequest,
    signal?: AbortSignal
  ): Promise<RawRecord[]> {
    const url = this.buildPageUrl(request);
    let response = await this.send(url, signal);

    // The access token may have been revoked before its advertised expiry
    if (response.status === 401) {
      sourceLogger.info(
        { module: request.module },
        "Access token rejected, refreshing once"
      );
      this.accessToken = null;
      response = await this.send(url, signal);
    }

    if (response.status === 204) {
      return [];
    }

    if (!response.ok) {
      throw toSourceError(response, `Failed to fetch ${request.module}`);
    }

    const body: unknown = await response.json();
    const records = extractRecords(body);

    sourceLogger.debug(
      {
        module: request.module,
        offset: request.offset,
        limit: request.limit,
        recordCount: records.length,
      },
      "Fetched page from source"
    );

    return records;
  }

  async checkConnection(): Promise<boolean> {
    try {
      await this.getAccessToken();
      return true;
    } catch (error) {
      sourceLogger.warn(
        { error: error instanceof Error ? error.message : String(error) },
        "Source connection check failed"
      );
      return false;
    }
  }

  buildPageUrl(request: FetchPageRequest): string {
    const url = new URL(
      `${this.options.baseUrl.replace(/\/+$/, "")}/${encodeURIComponent(request.module)}`
    );
    url.searchParams.set("offset", String(request.offset));
    url.searchParams.set("limit", String(request.limit));
    if (request.fields.length > 0) {
      url.searchParams.set("fields", request.fields.join(","));
    }
    for (const [key, value] of Object.entries(request.filter ?? {})) {
      url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  private async send(url: string, signal?: AbortSignal): Promise<Response> {
    const token = await this.getAccessToken();
    const startTime = performance.now();

    const response = await this.request(url, {
      headers: {
        Authorization: `Bearer ${token}`,
        Accept: "application/json",
      },
      signal: this.combineSignal(signal),
    });

    sourceLogger.debug(
      {
        url,
        status: response.status,
        duration: `${String(Math.round(performance.now() - startTime))}ms`,
      },
      "Received response from source"
    );

    return response;
  }

  private async getAccessToken(): Promise<string> {
    if (this.accessToken !== null && Date.now() < this.tokenExpiresAt) {
      return this.accessToken;
    }

    sourceLogger.info("Refreshing source access token");

    const response = await this.request(this.options.authUrl, {
      method: "POST",
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
      body: new URLSearchParams({
        grant_type: "refresh_token",
        client_id: this.options.clientId,
        client_secret: this.options.clientSecret,
        refresh_token: this.options.refreshToken,
      }).toString(),
      signal: AbortSignal.timeout(this.options.timeoutMs),
    });

    if (!response.ok) {
      throw new SourceError(
        response.status >= 500 ? "transport" : "unauthorized",
        `Token refresh failed: ${String(response.status)} ${response.statusText}`,
        { status: response.status }
      );
    }

    const body: unknown = await response.json();
    const token = readTokenResponse(body);
    if (token === null) {
      throw new SourceError(
        "unauthorized",
        "Token refresh response carried no access_token"
      );
    }

    this.accessToken = token.accessToken;
    this.tokenExpiresAt =
      Date.now() + token.expiresInSeconds * 1000 - TOKEN_EXPIRY_SKEW_MS;

    return token.accessToken;
  }

  private async request(url: string, init: RequestInit): Promise<Response> {
    try {
      return await fetch(url, init);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new SourceError("transport", `Request to ${url} failed: ${reason}`, {
        cause: error,
      });
    }
  }

  private combineSignal(signal?: AbortSignal): AbortSignal {
    const timeout = AbortSignal.timeout(this.options.timeoutMs);
    return signal === undefined ? timeout : AbortSignal.any([signal, timeout]);
  }
}

// ============================================================================
// Helpers
// ============================================================================

function toSourceError(response: Response, context: string): SourceError {
  const message = `${context}: ${String(response.status)} ${response.statusText}`;
  const status = response.status;

  if (status === 401 || status === 403) {
    return new SourceError("unauthorized", message, { status });
  }
  if (status === 404) {
    return new SourceError("not_found", message, { status });
  }
  if (status === 429) {
    return new SourceError("rate_limited", message, {
      status,
      retryAfterMs: parseRetryAfter(response.headers.get("retry-after")),
    });
  }
  if (status >= 500) {
    return new SourceError("transport", message, { status });
  }
  return new SourceError("invalid_request", message, { status });
}

/**
 * Retry-After is either delta-seconds or an HTTP date.
 */
export function parseRetryAfter(
  value: string | null,
  now: number = Date.now()
): number | undefined {
  if (value === null || value.trim() === "") {
    return undefined;
  }
  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return Math.max(0, Math.round(seconds * 1000));
  }
  const date = Date.parse(value);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Records of a page body: a bare array or a `{ data: [...] }` envelope.
 * Anything else would read as an exhausted source, so it is rejected.
 */
export function extractRecords(body: unknown): RawRecord[] {
  if (Array.isArray(body)) {
    return body;
  }
  if (isObject(body) && Array.isArray(body.data)) {
    return body.data;
  }
  throw new SourceError(
    "invalid_request",
    `Unexpected page body: expected an array or a data array, got ${describeBody(body)}`
  );
}

function describeBody(body: unknown): string {
  if (body === null) return "null";
  if (!isObject(body)) return typeof body;
  const keys = Object.keys(body);
  return keys.length === 0 ? "an empty object" : `an object with keys ${keys.join(", ")}`;
}

function readTokenResponse(
  body: unknown
): { accessToken: string; expiresInSeconds: number } | null {
  if (!isObject(body) || typeof body.access_token !== "string") {
    return null;
  }
  const expiresIn =
    typeof body.expires_in === "number" && body.expires_in > 0
      ? body.expires_in
      : 3600;
  return { accessToken: body.access_token, expiresInSeconds: expiresIn };
}
