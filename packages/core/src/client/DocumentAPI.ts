import { UploadDocumentRequest } from "../types/models";
import { Document, GetDocumentsResponse } from "../types/resources";
import type { ApiClient } from "./ApiClient";
import { contentOf, requireLocation, resourceUrl } from "./responses";
import type { TokenManager } from "./TokenManager";

export class DocumentAPI {
  constructor(
    private readonly client: ApiClient,
    private readonly tokens: TokenManager,
  ) {}

  /**
   * Upload an identity document for a customer
   * @returns URL of the created document
   */
  async upload(customerIdOrUrl: string, request: UploadDocumentRequest): Promise<string> {
    const customerUrl = resourceUrl(this.client.apiBaseAddress, "customers", customerIdOrUrl);
    const response = await this.client.upload(
      `${customerUrl}/documents`,
      request,
      await this.tokens.getAuthHeaders(),
    );
    return requireLocation(response);
  }

  async list(customerIdOrUrl: string): Promise<GetDocumentsResponse> {
    const customerUrl = resourceUrl(this.client.apiBaseAddress, "customers", customerIdOrUrl);
    const response = await this.client.get<GetDocumentsResponse>(
      `${customerUrl}/documents`,
      await this.tokens.getAuthHeaders(),
    );
    return contentOf(response);
  }

  async get(idOrUrl: string): Promise<Document> {
    const response = await this.client.get<Document>(
      resourceUrl(this.client.apiBaseAddress, "documents", idOrUrl),
      await this.tokens.getAuthHeaders(),
    );
    return contentOf(response);
  }
}
