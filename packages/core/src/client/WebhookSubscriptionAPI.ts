import {
  CreateWebhookSubscriptionRequest,
  GetWebhookSubscriptionsResponse,
  WebhookSubscription,
} from "../types/resources";
import type { ApiClient } from "./ApiClient";
import { contentOf, requireLocation, resourceUrl } from "./responses";
import type { TokenManager } from "./TokenManager";

export class WebhookSubscriptionAPI {
  constructor(
    private readonly client: ApiClient,
    private readonly tokens: TokenManager,
  ) {}

  /**
   * Subscribe a URL to webhook events
   * @returns URL of the created subscription
   */
  async create(request: CreateWebhookSubscriptionRequest): Promise<string> {
    const response = await this.client.post<CreateWebhookSubscriptionRequest>(
      `${this.client.apiBaseAddress}/webhook-subscriptions`,
      request,
      await this.tokens.getAuthHeaders(),
    );
    return requireLocation(response);
  }

  async list(): Promise<GetWebhookSubscriptionsResponse> {
    const response = await this.client.get<GetWebhookSubscriptionsResponse>(
      `${this.client.apiBaseAddress}/webhook-subscriptions`,
      await this.tokens.getAuthHeaders(),
    );
    return contentOf(response);
  }

  async get(idOrUrl: string): Promise<WebhookSubscription> {
    const response = await this.client.get<WebhookSubscription>(
      resourceUrl(this.client.apiBaseAddress, "webhook-subscriptions", idOrUrl),
      await this.tokens.getAuthHeaders(),
    );
    return contentOf(response);
  }

  async delete(idOrUrl: string): Promise<void> {
    await this.client.delete<null>(
      resourceUrl(this.client.apiBaseAddress, "webhook-subscriptions", idOrUrl),
      null,
      await this.tokens.getAuthHeaders(),
    );
  }
}
