import { z } from "zod";

import { TokenResponseError } from "../errors/TokenResponseError";
import { AppTokenRequest, TokenResponse } from "../types/models";
import type { ApiClient } from "./ApiClient";

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string(),
  expires_in: z.number(),
});

export interface AppCredentials {
  key: string;
  secret: string;
}

export class AuthAPI {
  constructor(
    private readonly client: ApiClient,
    private readonly credentials: AppCredentials,
  ) {}

  /**
   * Exchange the application key and secret for a bearer token
   * (OAuth2 client-credentials grant)
   * @throws ApiException when the token endpoint rejects the request
   * @throws TokenResponseError when it answers with something other than a token
   */
  async createAppToken(): Promise<TokenResponse> {
    const response = await this.client.postAuth<AppTokenRequest, unknown>(
      `${this.client.authBaseAddress}/token`,
      {
        client_id: this.credentials.key,
        client_secret: this.credentials.secret,
        grant_type: "client_credentials",
      },
    );

    const result = tokenResponseSchema.safeParse(response.content);
    if (!result.success) {
      throw new TokenResponseError(
        "Token endpoint returned an unexpected body",
        response.rawContent,
      );
    }
    return result.data;
  }
}
