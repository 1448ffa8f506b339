import { HalPayClient } from "../client/HalPayClient";
import { ConfigurationError } from "../errors/ConfigurationError";
import { Environment, HalPayClientConfig, isEnvironment } from "../types/config";

/**
 * Configuration accepted by initializeHalPayClient; every field may come
 * from the environment instead
 */
export interface HalPayIntegrationConfig extends Partial<HalPayClientConfig> {
  /**
   * Existing HalPayClient instance (takes precedence over other config)
   */
  client?: HalPayClient;
}

/**
 * Helper to initialize HalPayClient from config or environment
 *
 * Reads HALPAY_KEY, HALPAY_SECRET, HALPAY_ENVIRONMENT, HALPAY_API_URL,
 * HALPAY_AUTH_URL and HALPAY_TIMEOUT for anything the config leaves out.
 *
 * @throws ConfigurationError if key or secret is missing, or the environment
 * or timeout cannot be understood
 *
 * @example
 * ```typescript
 * // Initialize from environment (requires HALPAY_KEY and HALPAY_SECRET)
 * const client = initializeHalPayClient();
 *
 * // Initialize with explicit config
 * const client = initializeHalPayClient({ key: 'test-key', secret: 'test-secret' });
 * ```
 */
export function initializeHalPayClient(
  config: HalPayIntegrationConfig = {},
  env: NodeJS.ProcessEnv = process.env,
): HalPayClient {
  if (config.client) {
    return config.client;
  }

  const key = config.key ?? env.HALPAY_KEY;
  const secret = config.secret ?? env.HALPAY_SECRET;
  if (!key || !secret) {
    throw new ConfigurationError(
      "HALPAY_KEY and HALPAY_SECRET environment variables are required when no config is provided. " +
        "Set them in your environment or pass config.key and config.secret explicitly.",
    );
  }

  return new HalPayClient({
    ...config,
    key,
    secret,
    environment: config.environment ?? parseEnvironment(env.HALPAY_ENVIRONMENT),
    apiBaseAddress: config.apiBaseAddress ?? env.HALPAY_API_URL,
    authBaseAddress: config.authBaseAddress ?? env.HALPAY_AUTH_URL,
    timeout: config.timeout ?? parseTimeout(env.HALPAY_TIMEOUT),
  });
}

function parseEnvironment(value: string | undefined): Environment | undefined {
  if (value === undefined || value === "") {
    return undefined;
  }
  if (!isEnvironment(value)) {
    throw new ConfigurationError(
      `HALPAY_ENVIRONMENT must be "sandbox" or "production", got "${value}"`,
    );
  }
  return value;
}

/**
 * Read a HALPAY_TIMEOUT value
 * @returns The timeout in milliseconds, or undefined when unset
 * @throws ConfigurationError if the value is not a positive integer
 */
export function parseTimeout(value: string | undefined): number | undefined {
  if (value === undefined || value === "") {
    return undefined;
  }
  const timeout = Number.parseInt(value, 10);
  if (!Number.isFinite(timeout) || timeout <= 0) {
    throw new ConfigurationError(`HALPAY_TIMEOUT must be a positive integer, got "${value}"`);
  }
  return timeout;
}
