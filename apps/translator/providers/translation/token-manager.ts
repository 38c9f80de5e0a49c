import { logServerEvent } from "../../lib/logging/server";
import type { AccessTokenSource, Clock, FetchLike, TokenEndpointResponse } from "./base";
import { AuthenticationError, ConfigurationError, describeCause } from "./errors";

export const TOKEN_SAFETY_MARGIN_SECONDS = 60;
export const DEFAULT_TOKEN_LIFETIME_SECONDS = 3600;

export interface TokenCredentials {
  apiKey: string;
  apiSecret: string;
  tokenUrl: string;
}

export interface TokenManagerOptions {
  cache?: TokenCache;
  clock?: Clock;
  fetch?: FetchLike;
  requestTimeoutMs?: number;
}

export const monotonicClock: Clock = () => performance.now() / 1000;

/**
 * Holds one access token and the moment it stops being served. Value and
 * expiry are only ever written together.
 */
export class TokenCache {
  private value: string | null = null;
  private expiry = 0;

  get token(): string | null {
    return this.value;
  }

  get expiresAt(): number {
    return this.expiry;
  }

  read(now: number): string | null {
    return this.value && now < this.expiry ? this.value : null;
  }

  store(value: string, expiresAt: number): void {
    this.value = value;
    this.expiry = expiresAt;
  }

  clear(): void {
    this.value = null;
    this.expiry = 0;
  }
}

const readExpiresIn = (value: TokenEndpointResponse["expires_in"]): number => {
  if (value === undefined || value === "") {
    return DEFAULT_TOKEN_LIFETIME_SECONDS;
  }
  const parsed = typeof value === "number" ? value : Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : DEFAULT_TOKEN_LIFETIME_SECONDS;
};

const isTokenEndpointResponse = (value: unknown): value is TokenEndpointResponse =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export class TokenManager implements AccessTokenSource {
  readonly cache: TokenCache;
  private readonly clock: Clock;
  private readonly fetchImpl: FetchLike;
  private readonly requestTimeoutMs?: number;
  private inFlight: Promise<string> | null = null;

  constructor(
    private readonly credentials: TokenCredentials,
    options: TokenManagerOptions = {}
  ) {
    this.cache = options.cache ?? new TokenCache();
    this.clock = options.clock ?? monotonicClock;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.requestTimeoutMs = options.requestTimeoutMs;
  }

  async getToken(): Promise<string> {
    const { apiKey, apiSecret, tokenUrl } = this.credentials;
    if (!apiKey || !apiSecret || !tokenUrl) {
      void logServerEvent({
        level: "error",
        category: "translation:token",
        message: "API key, secret, or token URL is not configured",
      });
      throw new ConfigurationError("API key, secret, and token URL must be configured");
    }

    const now = this.clock();
    const cached = this.cache.read(now);
    if (cached) {
      return cached;
    }

    // Concurrent misses wait on the same exchange instead of starting their own.
    if (!this.inFlight) {
      this.inFlight = this.refresh(now).finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private async refresh(fetchStartedAt: number): Promise<string> {
    void logServerEvent({
      level: "info",
      category: "translation:token",
      message: "Cached token expired or missing; fetching a new one",
    });

    let body: TokenEndpointResponse;
    try {
      body = await this.exchange();
    } catch (error) {
      this.cache.clear();
      void logServerEvent({
        level: "error",
        category: "translation:token",
        message: "Failed to fetch access token",
        details: { error },
      });
      throw new AuthenticationError(`Failed to fetch access token: ${describeCause(error)}`, {
        cause: error,
      });
    }

    const token = body.access_token;
    if (typeof token !== "string" || !token) {
      this.cache.clear();
      void logServerEvent({
        level: "error",
        category: "translation:token",
        message: "Failed to retrieve access token from response",
      });
      throw new AuthenticationError("Failed to retrieve access token from response");
    }

    const expiresAt = fetchStartedAt + readExpiresIn(body.expires_in) - TOKEN_SAFETY_MARGIN_SECONDS;
    this.cache.store(token, expiresAt);
    void logServerEvent({
      level: "info",
      category: "translation:token",
      message: "Obtained new access token",
      details: { expiresAt },
    });
    return token;
  }

  private async exchange(): Promise<TokenEndpointResponse> {
    const { apiKey, apiSecret, tokenUrl } = this.credentials;
    const form = new URLSearchParams({
      grant_type: "client_credentials",
      client_id: apiKey,
      client_secret: apiSecret,
    });

    const response = await this.fetchImpl(tokenUrl, {
      method: "POST",
      headers: {
        "Content-Type": "application/x-www-form-urlencoded",
        Accept: "application/json",
      },
      body: form.toString(),
      signal: this.requestTimeoutMs ? AbortSignal.timeout(this.requestTimeoutMs) : undefined,
    });

    const responseText = await response.text();
    if (!response.ok) {
      throw new Error(`Token endpoint responded ${response.status} ${responseText}`.trim());
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(responseText);
    } catch (parseError) {
      throw new Error(`Token response is not valid JSON: ${describeCause(parseError)}`, {
        cause: parseError,
      });
    }
    if (!isTokenEndpointResponse(parsed)) {
      throw new Error("Token response is not a JSON object");
    }
    return parsed;
  }
}
