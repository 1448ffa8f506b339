import { Logger } from "../lib/logger";
import { RequestHeaders } from "../types/http";
import { TokenResponse } from "../types/models";

// Tokens this close to expiry are replaced before use
const EXPIRY_MARGIN_MS = 60_000;

interface HeldToken {
  accessToken: string;
  expiresAt: number;
}

/**
 * Anything that can mint an application token (normally AuthAPI)
 */
export interface TokenSource {
  createAppToken(): Promise<TokenResponse>;
}

/**
 * Holds the application's bearer token and renews it when it runs out
 */
export class TokenManager {
  private token?: HeldToken;
  private pending?: Promise<string>;
  // Bumped by invalidate() so a renewal started earlier cannot store its token
  private generation = 0;

  constructor(
    private readonly auth: TokenSource,
    private readonly logger: Logger,
  ) {}

  async getAccessToken(): Promise<string> {
    if (this.token && Date.now() < this.token.expiresAt - EXPIRY_MARGIN_MS) {
      return this.token.accessToken;
    }

    // Concurrent callers wait on the same token request
    if (!this.pending) {
      const pending = this.renew(this.generation).finally(() => {
        if (this.pending === pending) {
          this.pending = undefined;
        }
      });
      this.pending = pending;
    }
    return await this.pending;
  }

  /**
   * Headers that authorize a resource call
   */
  async getAuthHeaders(): Promise<RequestHeaders> {
    return { Authorization: `Bearer ${await this.getAccessToken()}` };
  }

  /**
   * Drop the held token so the next call requests a new one
   */
  invalidate(): void {
    this.generation += 1;
    this.token = undefined;
    this.pending = undefined;
  }

  private async renew(generation: number): Promise<string> {
    const token = await this.auth.createAppToken();
    if (generation !== this.generation) {
      return token.access_token;
    }
    this.token = {
      accessToken: token.access_token,
      expiresAt: Date.now() + token.expires_in * 1000,
    };
    this.logger.debug("Obtained access token", { expiresIn: token.expires_in });
    return token.access_token;
  }
}
