/**
 * HTTP methods used by the platform API
 */
export type HttpMethod = "GET" | "POST" | "DELETE";

/**
 * Ordered key/value headers merged into an outgoing request
 */
export type RequestHeaders = Record<string, string>;

/**
 * Transport-agnostic request representation
 *
 * `body` is either a serialized JSON string (its content type is already
 * present in `headers`) or a `FormData` for multipart uploads, in which case
 * the transport lets the runtime write the boundary.
 */
export interface RestRequest {
  method: HttpMethod;
  url: string;
  headers: RequestHeaders;
  body?: string | FormData;
}

/**
 * What the transport observed about the exchange, whether or not it succeeded
 */
export interface ResponseInfo {
  status?: number;
  statusText?: string;
  headers: Record<string, string>; // Lower-cased header names
  request: {
    method: HttpMethod;
    url: string;
  };
}

/**
 * Transport-level failure: a non-2xx status, an unreadable body or a
 * request that never completed
 */
export class RestError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly content?: string,
  ) {
    super(message);
    this.name = "RestError";
  }
}

/**
 * Uniform result of a transport call
 */
export interface RestResponse<T> {
  response: ResponseInfo;
  content?: T;
  rawContent?: string;
  error?: RestError;
}

/**
 * Transport interface
 * Sends prepared requests and wraps every outcome in a RestResponse
 *
 * Implementations must:
 * - Resolve (never reject), reporting failures through `error`
 * - Keep the raw body text of failed responses in `error.content`
 * - Lower-case response header names
 */
export interface Transport {
  send<T>(request: RestRequest): Promise<RestResponse<T>>;
}
