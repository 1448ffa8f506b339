import {
  CreateCustomerRequest,
  Customer,
  GetCustomersResponse,
  ListCustomersParams,
  UpdateCustomerRequest,
} from "../types/resources";
import type { ApiClient } from "./ApiClient";
import { contentOf, requireLocation, resourceUrl } from "./responses";
import type { TokenManager } from "./TokenManager";

export class CustomerAPI {
  constructor(
    private readonly client: ApiClient,
    private readonly tokens: TokenManager,
  ) {}

  /**
   * List customers, newest first
   * @param params Optional paging and search filters
   */
  async list(params: ListCustomersParams = {}): Promise<GetCustomersResponse> {
    const url = new URL(`${this.client.apiBaseAddress}/customers`);
    if (params.limit !== undefined) url.searchParams.set("limit", String(params.limit));
    if (params.offset !== undefined) url.searchParams.set("offset", String(params.offset));
    if (params.search) url.searchParams.set("search", params.search);

    const response = await this.client.get<GetCustomersResponse>(
      url.toString(),
      await this.tokens.getAuthHeaders(),
    );
    return contentOf(response);
  }

  /**
   * Get a customer by id or URL
   */
  async get(idOrUrl: string): Promise<Customer> {
    const response = await this.client.get<Customer>(
      resourceUrl(this.client.apiBaseAddress, "customers", idOrUrl),
      await this.tokens.getAuthHeaders(),
    );
    return contentOf(response);
  }

  /**
   * Create a customer
   * @returns URL of the created customer
   */
  async create(request: CreateCustomerRequest): Promise<string> {
    const response = await this.client.post<CreateCustomerRequest>(
      `${this.client.apiBaseAddress}/customers`,
      request,
      await this.tokens.getAuthHeaders(),
    );
    return requireLocation(response);
  }

  /**
   * Update a customer's details or status
   * @returns The updated customer
   */
  async update(idOrUrl: string, request: UpdateCustomerRequest): Promise<Customer> {
    const response = await this.client.post<UpdateCustomerRequest, Customer>(
      resourceUrl(this.client.apiBaseAddress, "customers", idOrUrl),
      request,
      await this.tokens.getAuthHeaders(),
    );
    return contentOf(response);
  }
}
