/**
 * HalPay CLI Client
 *
 * Builds the HalPayClient used by the example tasks from `.env`:
 * - HALPAY_KEY / HALPAY_SECRET (required)
 * - HALPAY_ENVIRONMENT (sandbox | production)
 * - HALPAY_TRANSPORT (fetch | axios, defaults to fetch)
 * - HALPAY_DEBUG (set to print each request)
 */
import { AxiosTransport, createHttpClient } from "@halpay/axios";
import { ConsoleLogger, HalPayClient, initializeHalPayClient, parseTimeout } from "@halpay/core";
import dotenv from "dotenv";

export function createClient(env: NodeJS.ProcessEnv = process.env): HalPayClient {
  const logger = new ConsoleLogger({ debug: Boolean(env.HALPAY_DEBUG) });

  if (env.HALPAY_TRANSPORT === "axios") {
    // The axios instance owns the timeout
    const { HALPAY_TIMEOUT, ...rest } = env;
    const timeout = parseTimeout(HALPAY_TIMEOUT);
    return initializeHalPayClient(
      { transport: new AxiosTransport(createHttpClient({ timeout })), logger },
      rest,
    );
  }

  return initializeHalPayClient({ logger }, env);
}

export function loadEnv(): void {
  dotenv.config();
}
