import { ApiClient } from "../client/ApiClient";
import { TokenManager } from "../client/TokenManager";
import { silentLogger } from "../lib/logger";
import { StubTransport } from "./StubTransport";

export const API = "https://api-sandbox.dwolla.com";
export const AUTH_HEADERS = { Authorization: "Bearer test-token" };

/**
 * ApiClient over a StubTransport, with a token manager that always hands out
 * "test-token"
 */
export function createTestApi(): {
  transport: StubTransport;
  client: ApiClient;
  tokens: TokenManager;
} {
  const transport = new StubTransport();
  const client = new ApiClient({ transport, environment: "sandbox", logger: silentLogger });
  const tokens = new TokenManager(
    {
      createAppToken: async () => ({
        access_token: "test-token",
        token_type: "bearer",
        expires_in: 3600,
      }),
    },
    silentLogger,
  );
  return { transport, client, tokens };
}

export function links(self: string): { _links: { self: { href: string } } } {
  return { _links: { self: { href: self } } };
}
