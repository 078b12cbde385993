import * as fs from "fs";
import { z } from "zod";
import type { FleetCredentials } from "@/sync/types/api";
import { AuthenticationError, errorMessage } from "@/sync/errors";
import { createChildLogger } from "@/sync/logger";

const log = createChildLogger("fleet-auth");

/** Tokens are treated as expired this long before the server says they are. */
const TOKEN_REFRESH_BUFFER_MS = 60_000;

export interface TokenProvider {
  getToken(): Promise<string>;
  /** Drop the current token so the next getToken() fetches a new one. */
  invalidate(): void;
}

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive(),
});

const cacheEntrySchema = z.object({
  token: z.string().min(1),
  tokenExpiryTime: z.number(),
});

const cacheFileSchema = z.record(z.string(), cacheEntrySchema);

type TokenCache = z.infer<typeof cacheFileSchema>;

export interface FleetAuthOptions {
  /** JSON file shared by all clients, keyed by client id. null disables it. */
  cachePath?: string | null;
  now?: () => number;
}

/**
 * Client-credentials login against the fleet API's token endpoint.
 * Tokens are kept in memory and in an on-disk cache so repeated runs inside
 * the token lifetime do not log in again.
 */
export class FleetAuth implements TokenProvider {
  private credentials: Pick<FleetCredentials, "clientId" | "clientSecret" | "authUrl">;
  private cachePath: string | null;
  private now: () => number;
  private token: string | null = null;
  private tokenExpiryTime = 0;

  constructor(
    credentials: Pick<FleetCredentials, "clientId" | "clientSecret" | "authUrl">,
    options?: FleetAuthOptions,
  ) {
    this.credentials = credentials;
    this.cachePath = options?.cachePath ?? null;
    this.now = options?.now ?? Date.now;
  }

  async getToken(): Promise<string> {
    if (this.token && this.now() < this.tokenExpiryTime) return this.token;

    this.loadCachedToken();
    if (this.token && this.now() < this.tokenExpiryTime) return this.token;

    const token = await this.fetchToken();
    this.saveCachedToken();
    return token;
  }

  invalidate(): void {
    this.token = null;
    this.tokenExpiryTime = 0;
    if (!this.cachePath) return;
    try {
      const cache = this.readCacheFile();
      if (this.credentials.clientId in cache) {
        delete cache[this.credentials.clientId];
        fs.writeFileSync(this.cachePath, JSON.stringify(cache, null, 2));
      }
    } catch (error) {
      log.warn("Could not clear cached token", { error: errorMessage(error) });
    }
  }

  private async fetchToken(): Promise<string> {
    const { clientId, clientSecret, authUrl } = this.credentials;
    const encoded = Buffer.from(`${clientId}:${clientSecret}`).toString("base64");

    log.info("Requesting API token", { clientId });
    let response: Response;
    try {
      response = await fetch(authUrl, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Basic ${encoded}`,
        },
      });
    } catch (error) {
      throw new AuthenticationError(
        "network",
        `Could not reach token endpoint ${authUrl}: ${errorMessage(error)}`,
      );
    }

    if (response.status === 401 || response.status === 403) {
      throw new AuthenticationError(
        "invalid_credentials",
        `Token request for client ${clientId} was rejected (${response.status}); the client id or secret is invalid or expired`,
      );
    }
    if (!response.ok) {
      const body = await response.text();
      throw new AuthenticationError(
        "unexpected_response",
        `Fetching API token failed: ${response.status} ${body}`,
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new AuthenticationError("unexpected_response", `Token response is not JSON: ${errorMessage(error)}`);
    }

    const parsed = tokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new AuthenticationError("unexpected_response", "Token response has no access_token/expires_in");
    }

    this.token = parsed.data.access_token;
    this.tokenExpiryTime = this.now() + parsed.data.expires_in * 1000 - TOKEN_REFRESH_BUFFER_MS;
    log.debug("Fetched new API token", { clientId, expiresAt: new Date(this.tokenExpiryTime).toISOString() });
    return this.token;
  }

  private readCacheFile(): TokenCache {
    if (!this.cachePath || !fs.existsSync(this.cachePath)) return {};
    const parsed = cacheFileSchema.safeParse(JSON.parse(fs.readFileSync(this.cachePath, "utf8")));
    return parsed.success ? parsed.data : {};
  }

  private loadCachedToken(): void {
    if (!this.cachePath) return;
    try {
      const entry = this.readCacheFile()[this.credentials.clientId];
      if (entry && this.now() < entry.tokenExpiryTime) {
        this.token = entry.token;
        this.tokenExpiryTime = entry.tokenExpiryTime;
        log.debug("Loaded cached token", { expiresAt: new Date(entry.tokenExpiryTime).toISOString() });
      }
    } catch (error) {
      log.warn("Failed to read cached token", { error: errorMessage(error) });
    }
  }

  private saveCachedToken(): void {
    if (!this.cachePath || !this.token) return;
    try {
      const cache = this.readCacheFile();
      cache[this.credentials.clientId] = { token: this.token, tokenExpiryTime: this.tokenExpiryTime };
      fs.writeFileSync(this.cachePath, JSON.stringify(cache, null, 2));
      log.debug("Token cached locally", { clientId: this.credentials.clientId });
    } catch (error) {
      log.error("Could not write token cache", { error: errorMessage(error) });
    }
  }
}
