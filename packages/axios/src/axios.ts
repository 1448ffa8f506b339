import axios, { AxiosInstance, AxiosResponse } from "axios";

import {
  DEFAULT_HEADERS,
  DEFAULT_TIMEOUT_MS,
  RestRequest,
  RestResponse,
  Transport,
  describeFailure,
  normalizeHeaders,
  toFailedResponse,
  toRestResponse,
} from "@halpay/core";

export interface HttpClientOptions {
  /**
   * Request timeout in milliseconds
   * @default 30000
   */
  timeout?: number;

  /**
   * Headers sent with every request, after the SDK defaults
   */
  headers?: Record<string, string>;
}

/**
 * Create an axios instance configured for the platform API
 * Defaults carry the SDK user agent and the HAL+JSON Accept header
 *
 * @example
 * ```typescript
 * import { AxiosTransport, createHttpClient } from '@halpay/axios';
 *
 * const transport = new AxiosTransport(createHttpClient({ timeout: 10000 }));
 * ```
 */
export function createHttpClient(options: HttpClientOptions = {}): AxiosInstance {
  return axios.create({
    timeout: options.timeout ?? DEFAULT_TIMEOUT_MS,
    headers: { ...DEFAULT_HEADERS, ...options.headers },
  });
}

/**
 * Axios transport
 * Wraps an axios instance to provide the Transport interface
 *
 * Status validation and JSON parsing are taken away from axios so every
 * outcome, error bodies included, reaches the caller as raw text.
 */
export class AxiosTransport implements Transport {
  constructor(private readonly axiosInstance: AxiosInstance = createHttpClient()) {}

  async send<T>(request: RestRequest): Promise<RestResponse<T>> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.axiosInstance.request<unknown>({
        method: request.method,
        url: request.url,
        headers: request.headers,
        data: request.body,
        responseType: "text",
        transformResponse: [(data: unknown) => data],
        validateStatus: () => true,
      });
    } catch (error) {
      return toFailedResponse<T>(request, this.describe(error));
    }

    return toRestResponse<T>(
      {
        status: response.status,
        statusText: response.statusText,
        headers: normalizeHeaders(Object.entries(response.headers)),
        request: { method: request.method, url: request.url },
      },
      toText(response.data),
    );
  }

  private describe(error: unknown): string {
    const timeout = this.axiosInstance.defaults.timeout ?? DEFAULT_TIMEOUT_MS;
    if (axios.isAxiosError(error) && (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT")) {
      return `Request timeout after ${timeout}ms`;
    }
    return describeFailure(error, timeout);
  }
}

function toText(data: unknown): string {
  if (data === undefined || data === null) {
    return "";
  }
  return typeof data === "string" ? data : JSON.stringify(data);
}

/**
 * Convenience function to create an axios transport
 * @param axiosInstance The axios instance to wrap (defaults to createHttpClient())
 */
export function createAxiosTransport(axiosInstance?: AxiosInstance): Transport {
  return new AxiosTransport(axiosInstance);
}
