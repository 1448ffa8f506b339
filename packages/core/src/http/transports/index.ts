/**
 * Transports
 *
 * The core package ships the fetch transport; `@halpay/axios` provides one
 * backed by an axios instance. Both implement the Transport interface.
 */

export { FetchTransport, createFetchTransport } from "./fetch";
export type { FetchTransportOptions } from "./fetch";
export {
  describeFailure,
  mergeHeaders,
  normalizeHeaders,
  toFailedResponse,
  toRestResponse,
} from "./shared";
