import { SDK_VERSION } from "../version";

export const HAL_JSON_V1 = "application/vnd.dwolla.v1.hal+json";
export const JSON_MEDIA_TYPE = "application/json";
export const USER_AGENT = `halpay-node/${SDK_VERSION}`;
export const REQUEST_ID_HEADER = "x-request-id";
export const DEFAULT_TIMEOUT_MS = 30000;

/**
 * Headers every transport sends unless the request overrides them
 */
export const DEFAULT_HEADERS: Readonly<Record<string, string>> = {
  "User-Agent": USER_AGENT,
  Accept: HAL_JSON_V1,
};
