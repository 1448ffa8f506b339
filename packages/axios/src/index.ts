/**
 * @halpay/axios - axios transport for the HalPay SDK
 *
 * Sends platform API requests through an axios instance instead of the
 * native fetch transport that ships with @halpay/core.
 */

export { AxiosTransport, createAxiosTransport, createHttpClient } from "./axios";
export type { HttpClientOptions } from "./axios";

// Re-export commonly used types from core
export type {
  HalPayClientConfig,
  RestRequest,
  RestResponse,
  Transport,
} from "@halpay/core";
