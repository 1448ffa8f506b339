// Main client
export { HalPayClient } from "./client/HalPayClient";
export { ApiClient } from "./client/ApiClient";
export { AuthAPI } from "./client/AuthAPI";
export type { AppCredentials } from "./client/AuthAPI";
export { TokenManager } from "./client/TokenManager";
export type { TokenSource } from "./client/TokenManager";
export { RootAPI } from "./client/RootAPI";
export { CustomerAPI } from "./client/CustomerAPI";
export { DocumentAPI } from "./client/DocumentAPI";
export { WebhookSubscriptionAPI } from "./client/WebhookSubscriptionAPI";
export { contentOf, locationOf, requireLocation, resourceUrl } from "./client/responses";

// Configuration
export { initializeHalPayClient, parseTimeout } from "./lib/config";
export type { HalPayIntegrationConfig } from "./lib/config";
export { ENVIRONMENTS, isEnvironment } from "./types/config";
export type {
  ApiClientConfig,
  Environment,
  EnvironmentAddresses,
  HalPayClientConfig,
} from "./types/config";

// Logging
export { ConsoleLogger, silentLogger } from "./lib/logger";
export type { ConsoleLoggerOptions, Logger } from "./lib/logger";

// Errors
export {
  ApiException,
  ConfigurationError,
  TokenResponseError,
  isApiException,
  parseErrorResponse,
} from "./errors";

// HTTP (needed by transport packages)
export {
  DEFAULT_HEADERS,
  DEFAULT_TIMEOUT_MS,
  HAL_JSON_V1,
  JSON_MEDIA_TYPE,
  REQUEST_ID_HEADER,
  USER_AGENT,
} from "./http/constants";
export {
  createAuthRequest,
  createContentRequest,
  createRequest,
  createUploadRequest,
} from "./http/requests";
export {
  FetchTransport,
  createFetchTransport,
  describeFailure,
  mergeHeaders,
  normalizeHeaders,
  toFailedResponse,
  toRestResponse,
} from "./http/transports";
export type { FetchTransportOptions } from "./http/transports";
export { RestError } from "./types/http";
export type {
  HttpMethod,
  RequestHeaders,
  ResponseInfo,
  RestRequest,
  RestResponse,
  Transport,
} from "./types/http";

// Types
export { CustomerStatus, DocumentType } from "./types/resources";
export type {
  AppTokenRequest,
  DocumentFile,
  EmptyResponse,
  ErrorDetail,
  ErrorResponse,
  HalLink,
  HalResource,
  TokenResponse,
  UploadDocumentRequest,
} from "./types/models";
export type {
  CreateCustomerRequest,
  CreateWebhookSubscriptionRequest,
  Customer,
  Document,
  GetCustomersResponse,
  GetDocumentsResponse,
  GetWebhookSubscriptionsResponse,
  ListCustomersParams,
  RootResponse,
  UpdateCustomerRequest,
  WebhookSubscription,
} from "./types/resources";

export { SDK_VERSION } from "./version";

// Default export for convenience
export { HalPayClient as default } from "./client/HalPayClient";
