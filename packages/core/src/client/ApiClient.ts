import { ApiException } from "../errors/ApiException";
import {
  createAuthRequest,
  createContentRequest,
  createRequest,
  createUploadRequest,
} from "../http/requests";
import { ConsoleLogger, Logger } from "../lib/logger";
import { ApiClientConfig, ENVIRONMENTS } from "../types/config";
import { RequestHeaders, RestRequest, RestResponse, Transport } from "../types/http";
import { EmptyResponse, UploadDocumentRequest } from "../types/models";

/**
 * Low-level client for the platform API
 *
 * Builds requests for each verb, hands them to the transport and turns every
 * failed exchange into an ApiException.
 *
 * @example
 * ```typescript
 * import { ApiClient, FetchTransport } from '@halpay/core';
 *
 * const client = new ApiClient({ transport: new FetchTransport(), environment: 'sandbox' });
 * const root = await client.get<RootResponse>(`${client.apiBaseAddress}/`, {
 *   Authorization: `Bearer ${token}`,
 * });
 * console.log(root.content?._links);
 * ```
 */
export class ApiClient {
  public readonly apiBaseAddress: string;
  public readonly authBaseAddress: string;
  private readonly transport: Transport;
  private readonly logger: Logger;

  constructor(config: ApiClientConfig) {
    const addresses = ENVIRONMENTS[config.environment ?? "sandbox"];
    this.apiBaseAddress = trimTrailingSlash(config.apiBaseAddress ?? addresses.apiBaseAddress);
    this.authBaseAddress = trimTrailingSlash(config.authBaseAddress ?? addresses.authBaseAddress);
    this.transport = config.transport;
    this.logger = config.logger ?? new ConsoleLogger();
  }

  /**
   * POST to the OAuth endpoint with a plain JSON body
   */
  async postAuth<TReq, TRes>(url: string, content: TReq): Promise<RestResponse<TRes>> {
    return await this.send<TRes>(createAuthRequest(url, content));
  }

  async get<TRes>(url: string, headers: RequestHeaders = {}): Promise<RestResponse<TRes>> {
    return await this.send<TRes>(createRequest("GET", url, headers));
  }

  /**
   * POST a HAL+JSON body
   * Leave TRes as EmptyResponse for calls answered with 201 Created and a Location header
   */
  async post<TReq, TRes = EmptyResponse>(
    url: string,
    content: TReq,
    headers: RequestHeaders = {},
  ): Promise<RestResponse<TRes>> {
    return await this.send<TRes>(createContentRequest("POST", url, content, headers));
  }

  /**
   * DELETE, with an optional HAL+JSON body
   */
  async delete<TReq, TRes = EmptyResponse>(
    url: string,
    content?: TReq | null,
    headers: RequestHeaders = {},
  ): Promise<RestResponse<TRes>> {
    return await this.send<TRes>(createContentRequest("DELETE", url, content, headers));
  }

  /**
   * POST a document as multipart/form-data
   */
  async upload(
    url: string,
    request: UploadDocumentRequest,
    headers: RequestHeaders = {},
  ): Promise<RestResponse<EmptyResponse>> {
    return await this.send<EmptyResponse>(createUploadRequest(url, request, headers));
  }

  private async send<TRes>(request: RestRequest): Promise<RestResponse<TRes>> {
    this.logger.debug(`${request.method} ${request.url}`);

    const response = await this.transport.send<TRes>(request);
    if (!response.error) {
      return response;
    }

    const exception = ApiException.fromResponse(response);
    this.logger.debug(exception.message, {
      status: response.response.status,
      reason: response.error.message,
      code: exception.error?.code,
    });
    throw exception;
  }
}

function trimTrailingSlash(address: string): string {
  return address.endsWith("/") ? address.slice(0, -1) : address;
}
