import { RootResponse } from "../types/resources";
import type { ApiClient } from "./ApiClient";
import { contentOf } from "./responses";
import type { TokenManager } from "./TokenManager";

export class RootAPI {
  constructor(
    private readonly client: ApiClient,
    private readonly tokens: TokenManager,
  ) {}

  /**
   * Get the API root: links to the account and its top-level collections
   */
  async get(): Promise<RootResponse> {
    const response = await this.client.get<RootResponse>(
      `${this.client.apiBaseAddress}/`,
      await this.tokens.getAuthHeaders(),
    );
    return contentOf(response);
  }
}
