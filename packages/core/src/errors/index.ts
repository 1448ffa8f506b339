export { ApiException, isApiException, parseErrorResponse } from "./ApiException";
export { ConfigurationError } from "./ConfigurationError";
export { TokenResponseError } from "./TokenResponseError";
