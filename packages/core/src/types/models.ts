/**
 * HAL hypermedia link
 */
export interface HalLink {
  href: string;
  type?: string;
  "resource-type"?: string;
}

/**
 * Base shape of every HAL+JSON resource representation
 */
export interface HalResource {
  _links: Record<string, HalLink>;
  _embedded?: Record<string, unknown>;
}

/**
 * Marker for calls whose success carries no body (201 Created, 200 with an
 * empty payload). Read the response headers instead.
 */
export type EmptyResponse = Record<string, never>;

export interface ErrorDetail {
  code: string;
  message: string;
  path?: string;
  _links?: Record<string, HalLink>;
}

/**
 * Error body returned by the API on failed calls
 */
export interface ErrorResponse {
  code: string;
  message: string;
  _embedded?: {
    errors: ErrorDetail[];
  };
}

/**
 * OAuth2 client-credentials token request
 */
export interface AppTokenRequest {
  client_id: string;
  client_secret: string;
  grant_type: "client_credentials";
}

export interface TokenResponse {
  access_token: string;
  token_type: string;
  expires_in: number;
}

/**
 * File part of a document upload
 */
export interface DocumentFile {
  contentType: string;
  filename: string;
  data: Blob | Uint8Array;
}

export interface UploadDocumentRequest {
  documentType: string;
  document: DocumentFile;
}
