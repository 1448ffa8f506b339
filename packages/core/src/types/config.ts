import { Logger } from "../lib/logger";
import { Transport } from "./http";

export type Environment = "sandbox" | "production";

export interface EnvironmentAddresses {
  apiBaseAddress: string;
  authBaseAddress: string;
}

export const ENVIRONMENTS: Readonly<Record<Environment, EnvironmentAddresses>> = {
  sandbox: {
    apiBaseAddress: "https://api-sandbox.dwolla.com",
    authBaseAddress: "https://sandbox.dwolla.com/oauth/v2",
  },
  production: {
    apiBaseAddress: "https://api.dwolla.com",
    authBaseAddress: "https://www.dwolla.com/oauth/v2",
  },
};

export function isEnvironment(value: string): value is Environment {
  return value === "sandbox" || value === "production";
}

/**
 * Configuration options for the low-level ApiClient
 */
export interface ApiClientConfig {
  /**
   * Transport that sends the prepared requests
   */
  transport: Transport;

  /**
   * Which platform environment to address
   * @default "sandbox"
   */
  environment?: Environment;

  /**
   * Override the environment's API base address
   */
  apiBaseAddress?: string;

  /**
   * Override the environment's OAuth base address
   */
  authBaseAddress?: string;

  logger?: Logger;
}

/**
 * Configuration options for initializing a HalPayClient
 */
export interface HalPayClientConfig {
  /**
   * Application key (OAuth client id)
   */
  key: string;

  /**
   * Application secret (OAuth client secret)
   */
  secret: string;

  /**
   * @default "sandbox"
   */
  environment?: Environment;

  apiBaseAddress?: string;
  authBaseAddress?: string;

  /**
   * Request timeout in milliseconds, used by the default fetch transport
   * @default 30000
   */
  timeout?: number;

  /**
   * Additional headers to include with all requests
   */
  headers?: Record<string, string>;

  /**
   * Custom transport (takes precedence over timeout and headers)
   */
  transport?: Transport;

  /**
   * @default ConsoleLogger with debug output disabled
   */
  logger?: Logger;
}
