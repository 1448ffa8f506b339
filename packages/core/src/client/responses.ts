import { ApiException } from "../errors/ApiException";
import { RestResponse } from "../types/http";

/**
 * Read the Location header of a 201 Created response
 * @returns The created resource's URL, or undefined when the header is missing
 */
export function locationOf<T>(response: RestResponse<T>): string | undefined {
  return response.response.headers["location"];
}

/**
 * Same as locationOf, for calls whose only useful result is the Location
 * @throws ApiException when the header is missing
 */
export function requireLocation<T>(response: RestResponse<T>): string {
  const location = locationOf(response);
  if (location === undefined) {
    throw ApiException.fromResponse(response);
  }
  return location;
}

/**
 * Return the parsed body of a successful response
 * @throws ApiException when the response had no body
 */
export function contentOf<T>(response: RestResponse<T>): T {
  if (response.content === undefined) {
    throw ApiException.fromResponse(response);
  }
  return response.content;
}

/**
 * Resolve an id or an absolute resource URL to an absolute URL
 */
export function resourceUrl(baseAddress: string, collection: string, idOrUrl: string): string {
  if (/^https?:\/\//.test(idOrUrl)) {
    return idOrUrl;
  }
  return `${baseAddress}/${collection}/${encodeURIComponent(idOrUrl)}`;
}
