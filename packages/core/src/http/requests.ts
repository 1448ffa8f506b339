import { HttpMethod, RequestHeaders, RestRequest } from "../types/http";
import { UploadDocumentRequest } from "../types/models";
import { HAL_JSON_V1, JSON_MEDIA_TYPE } from "./constants";

/**
 * Build a body-less request carrying exactly the supplied headers
 */
export function createRequest(
  method: HttpMethod,
  url: string,
  headers: RequestHeaders = {},
): RestRequest {
  return {
    method,
    url,
    headers: { ...headers },
  };
}

/**
 * Build a request whose body is `content` serialized as UTF-8 JSON
 *
 * `null` and `undefined` content produce a body-less request.
 */
export function createContentRequest<TReq>(
  method: HttpMethod,
  url: string,
  content: TReq | null | undefined,
  headers: RequestHeaders = {},
  mediaType: string = HAL_JSON_V1,
): RestRequest {
  const request = createRequest(method, url, headers);
  if (content === null || content === undefined) {
    return request;
  }

  request.headers["Content-Type"] = `${mediaType}; charset=utf-8`;
  request.body = JSON.stringify(content);
  return request;
}

/**
 * Build a token request: plain JSON, no caller headers
 */
export function createAuthRequest<TReq>(url: string, content: TReq): RestRequest {
  return createContentRequest("POST", url, content, {}, JSON_MEDIA_TYPE);
}

/**
 * Build a multipart/form-data document upload
 *
 * The form holds a `documentType` field and a `file` part named after the
 * document's filename and typed with its content type.
 */
export function createUploadRequest(
  url: string,
  upload: UploadDocumentRequest,
  headers: RequestHeaders = {},
): RestRequest {
  const { document } = upload;
  const blob = new Blob([document.data], { type: document.contentType });

  const form = new FormData();
  form.append("documentType", upload.documentType);
  form.append("file", blob, document.filename);

  const request = createRequest("POST", url, headers);
  request.body = form;
  return request;
}
