import { ApiException } from "../errors/ApiException";
import { TokenResponseError } from "../errors/TokenResponseError";
import { silentLogger } from "../lib/logger";
import { StubTransport } from "../test-utils/StubTransport";
import { ApiClient } from "./ApiClient";
import { AuthAPI } from "./AuthAPI";

describe("AuthAPI", () => {
  let transport: StubTransport;
  let auth: AuthAPI;

  beforeEach(() => {
    transport = new StubTransport();
    const client = new ApiClient({ transport, environment: "sandbox", logger: silentLogger });
    auth = new AuthAPI(client, { key: "test-key", secret: "test-secret" });
  });

  it("should post client credentials to the token endpoint", async () => {
    transport.reply(200, { access_token: "test-token", token_type: "bearer", expires_in: 3600 });

    const token = await auth.createAppToken();

    expect(token).toEqual({ access_token: "test-token", token_type: "bearer", expires_in: 3600 });
    expect(transport.lastRequest()).toEqual({
      method: "POST",
      url: "https://sandbox.dwolla.com/oauth/v2/token",
      headers: { "Content-Type": "application/json; charset=utf-8" },
      body: '{"client_id":"test-key","client_secret":"test-secret","grant_type":"client_credentials"}',
    });
  });

  it("should reject a body that is not a token", async () => {
    transport.reply(200, { token: "test-token" });

    await expect(auth.createAppToken()).rejects.toBeInstanceOf(TokenResponseError);
  });

  it("should surface a rejected token request as ApiException", async () => {
    transport.fail(401, '{"code":"InvalidCredentials","message":"Invalid credentials."}', {
      "x-request-id": "auth-id",
    });

    const error = await auth.createAppToken().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ApiException);
    expect(error).toMatchObject({
      message: 'API Error, Resource="POST https://sandbox.dwolla.com/oauth/v2/token", RequestId="auth-id"',
      error: { code: "InvalidCredentials", message: "Invalid credentials." },
    });
  });
});
