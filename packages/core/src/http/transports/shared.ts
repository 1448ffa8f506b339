import { ResponseInfo, RestError, RestRequest, RestResponse } from "../../types/http";

/**
 * Wrap a completed exchange in a RestResponse
 * 2xx bodies are parsed as JSON; anything else is kept raw on the error
 */
export function toRestResponse<T>(
  response: ResponseInfo,
  rawContent: string,
): RestResponse<T> {
  const status = response.status ?? 0;

  if (status < 200 || status >= 300) {
    return {
      response,
      rawContent,
      error: new RestError(`Request failed with status ${status}`, status, rawContent),
    };
  }

  if (!rawContent) {
    return { response, rawContent };
  }

  try {
    const content: T = JSON.parse(rawContent);
    return { response, content, rawContent };
  } catch {
    return {
      response,
      rawContent,
      error: new RestError("Unable to parse response body", status, rawContent),
    };
  }
}

/**
 * Wrap a request that never produced a response (network error, timeout)
 */
export function toFailedResponse<T>(request: RestRequest, message: string): RestResponse<T> {
  return {
    response: {
      headers: {},
      request: { method: request.method, url: request.url },
    },
    error: new RestError(message),
  };
}

/**
 * Message for a request that never produced a response
 */
export function describeFailure(error: unknown, timeoutMs: number): string {
  if (error instanceof Error) {
    if (error.name === "TimeoutError" || error.name === "AbortError") {
      return `Request timeout after ${timeoutMs}ms`;
    }
    return error.message;
  }
  return String(error);
}

/**
 * Lower-case header names, joining repeated values with ", "
 */
export function normalizeHeaders(
  entries: Iterable<[string, unknown]>,
): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [name, value] of entries) {
    if (value === undefined || value === null) continue;
    const text = Array.isArray(value) ? value.join(", ") : String(value);
    const key = name.toLowerCase();
    headers[key] = headers[key] ? `${headers[key]}, ${text}` : text;
  }
  return headers;
}

/**
 * Overlay request headers on the defaults, matching names case-insensitively
 */
export function mergeHeaders(
  defaults: Record<string, string>,
  overrides: Record<string, string>,
): Record<string, string> {
  const overridden = new Set(Object.keys(overrides).map((name) => name.toLowerCase()));
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(defaults)) {
    if (!overridden.has(name.toLowerCase())) {
      headers[name] = value;
    }
  }
  return { ...headers, ...overrides };
}
