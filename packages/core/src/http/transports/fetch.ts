import { RestRequest, RestResponse, Transport } from "../../types/http";
import { DEFAULT_HEADERS, DEFAULT_TIMEOUT_MS } from "../constants";
import {
  describeFailure,
  mergeHeaders,
  normalizeHeaders,
  toFailedResponse,
  toRestResponse,
} from "./shared";

export interface FetchTransportOptions {
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
 * Transport backed by the native fetch API
 */
export class FetchTransport implements Transport {
  private readonly timeout: number;
  private readonly defaultHeaders: Record<string, string>;

  constructor(options: FetchTransportOptions = {}) {
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT_MS;
    this.defaultHeaders = mergeHeaders(DEFAULT_HEADERS, options.headers ?? {});
  }

  /**
   * Get the default headers (for testing)
   */
  getDefaults(): { timeout: number; headers: Record<string, string> } {
    return { timeout: this.timeout, headers: { ...this.defaultHeaders } };
  }

  async send<T>(request: RestRequest): Promise<RestResponse<T>> {
    let response: Response;
    let rawContent: string;

    try {
      response = await fetch(request.url, {
        method: request.method,
        headers: mergeHeaders(this.defaultHeaders, request.headers),
        body: request.body,
        signal: AbortSignal.timeout(this.timeout),
      });
      rawContent = await response.text();
    } catch (error) {
      return toFailedResponse<T>(request, describeFailure(error, this.timeout));
    }

    const headers: Array<[string, string]> = [];
    response.headers.forEach((value, name) => headers.push([name, value]));

    return toRestResponse<T>(
      {
        status: response.status,
        statusText: response.statusText,
        headers: normalizeHeaders(headers),
        request: { method: request.method, url: request.url },
      },
      rawContent,
    );
  }
}

/**
 * Convenience function to create a fetch transport
 */
export function createFetchTransport(options?: FetchTransportOptions): Transport {
  return new FetchTransport(options);
}
