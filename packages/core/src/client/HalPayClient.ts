import { ConfigurationError } from "../errors/ConfigurationError";
import { FetchTransport } from "../http/transports/fetch";
import { ConsoleLogger, Logger } from "../lib/logger";
import { HalPayClientConfig } from "../types/config";
import { ApiClient } from "./ApiClient";
import { AuthAPI } from "./AuthAPI";
import { CustomerAPI } from "./CustomerAPI";
import { DocumentAPI } from "./DocumentAPI";
import { RootAPI } from "./RootAPI";
import { TokenManager } from "./TokenManager";
import { WebhookSubscriptionAPI } from "./WebhookSubscriptionAPI";

/**
 * Main client for interacting with the platform API
 *
 * Obtains and renews the application's bearer token on its own and exposes
 * the resource APIs. Drop down to `client.api` for endpoints without a
 * dedicated wrapper.
 *
 * @example
 * ```typescript
 * import { HalPayClient } from '@halpay/core';
 *
 * const client = new HalPayClient({
 *   key: process.env.HALPAY_KEY!,
 *   secret: process.env.HALPAY_SECRET!,
 *   environment: 'sandbox',
 * });
 *
 * const customerUrl = await client.customers.create({
 *   firstName: 'Jane',
 *   lastName: 'Doe',
 *   email: 'jane@example.com',
 * });
 *
 * const customer = await client.customers.get(customerUrl);
 * ```
 */
export class HalPayClient {
  public readonly api: ApiClient;
  public readonly auth: AuthAPI;
  public readonly tokens: TokenManager;
  public readonly root: RootAPI;
  public readonly customers: CustomerAPI;
  public readonly documents: DocumentAPI;
  public readonly webhookSubscriptions: WebhookSubscriptionAPI;
  private readonly logger: Logger;

  constructor(config: HalPayClientConfig) {
    if (!config.key || !config.secret) {
      throw new ConfigurationError("Application key and secret are required");
    }

    this.logger = config.logger ?? new ConsoleLogger();

    if (config.transport && (config.timeout !== undefined || config.headers)) {
      this.logger.warn(
        "Both a transport and timeout/headers were provided. " +
          "Configure the transport directly; timeout and headers are ignored.",
      );
    }

    const transport =
      config.transport ??
      new FetchTransport({ timeout: config.timeout, headers: config.headers });

    this.api = new ApiClient({
      transport,
      environment: config.environment,
      apiBaseAddress: config.apiBaseAddress,
      authBaseAddress: config.authBaseAddress,
      logger: this.logger,
    });

    this.auth = new AuthAPI(this.api, { key: config.key, secret: config.secret });
    this.tokens = new TokenManager(this.auth, this.logger);

    // Initialize API modules
    this.root = new RootAPI(this.api, this.tokens);
    this.customers = new CustomerAPI(this.api, this.tokens);
    this.documents = new DocumentAPI(this.api, this.tokens);
    this.webhookSubscriptions = new WebhookSubscriptionAPI(this.api, this.tokens);
  }
}
