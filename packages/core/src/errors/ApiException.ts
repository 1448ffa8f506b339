import { z } from "zod";

import { REQUEST_ID_HEADER } from "../http/constants";
import { ResponseInfo, RestResponse } from "../types/http";
import { ErrorResponse } from "../types/models";

const halLinkSchema = z.object({
  href: z.string(),
  type: z.string().optional(),
  "resource-type": z.string().optional(),
});

const errorDetailSchema = z.object({
  code: z.string(),
  message: z.string(),
  path: z.string().optional(),
  _links: z.record(halLinkSchema).optional(),
});

// Only code and message are required; embedded details are dropped when malformed
const errorResponseSchema = z.object({
  code: z.string(),
  message: z.string(),
  _embedded: z
    .object({
      errors: z.array(errorDetailSchema),
    })
    .optional()
    .catch(undefined),
});

/**
 * Parse an API error body
 * @returns The error, or undefined when the body is not a `{ code, message }` document
 */
export function parseErrorResponse(content: string | undefined): ErrorResponse | undefined {
  if (!content) {
    return undefined;
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch {
    return undefined;
  }

  const result = errorResponseSchema.safeParse(json);
  return result.success ? result.data : undefined;
}

/**
 * Raised for every failed API call
 *
 * Carries the request correlation id, what the transport saw of the response,
 * the raw response body and, when the body is an API error document, the
 * parsed `code` and `message`.
 */
export class ApiException extends Error {
  constructor(
    message: string,
    public readonly requestId: string,
    public readonly response: ResponseInfo,
    public readonly content?: string,
    public readonly error?: ErrorResponse,
  ) {
    super(message);
    this.name = "ApiException";
  }

  /**
   * HTTP status of the failed call (undefined when no response arrived)
   */
  get status(): number | undefined {
    return this.response.status;
  }

  static fromResponse<T>(restResponse: RestResponse<T>): ApiException {
    const { response } = restResponse;
    const requestId = response.headers[REQUEST_ID_HEADER] ?? "";
    const content = restResponse.error?.content ?? restResponse.rawContent;
    const message =
      `API Error, Resource="${response.request.method} ${response.request.url}", ` +
      `RequestId="${requestId}"`;

    return new ApiException(message, requestId, response, content, parseErrorResponse(content));
  }
}

export function isApiException(error: unknown): error is ApiException {
  return error instanceof ApiException;
}
