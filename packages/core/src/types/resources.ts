import { HalResource } from "./models";

export enum CustomerStatus {
  UNVERIFIED = "unverified",
  RETRY = "retry",
  DOCUMENT = "document",
  VERIFIED = "verified",
  SUSPENDED = "suspended",
  DEACTIVATED = "deactivated",
}

export interface Customer extends HalResource {
  id: string;
  firstName: string;
  lastName: string;
  email: string;
  type: string;
  status: CustomerStatus | string;
  created: string;
  businessName?: string;
}

export interface CreateCustomerRequest {
  firstName: string;
  lastName: string;
  email: string;
  type?: "receive-only" | "personal" | "business";
  ipAddress?: string;
  businessName?: string;
  address1?: string;
  address2?: string;
  city?: string;
  state?: string;
  postalCode?: string;
  dateOfBirth?: string;
  ssn?: string;
  phone?: string;
}

export type UpdateCustomerRequest = Partial<CreateCustomerRequest> & {
  status?: "deactivated" | "suspended" | "reactivated";
};

export interface ListCustomersParams {
  limit?: number;
  offset?: number;
  search?: string;
}

export interface GetCustomersResponse extends HalResource {
  _embedded: {
    customers: Customer[];
  };
  total: number;
}

export enum DocumentType {
  PASSPORT = "passport",
  LICENSE = "license",
  ID_CARD = "idCard",
  OTHER = "other",
}

export interface Document extends HalResource {
  id: string;
  status: string;
  type: DocumentType | string;
  created: string;
  failureReason?: string;
}

export interface GetDocumentsResponse extends HalResource {
  _embedded: {
    documents: Document[];
  };
  total: number;
}

export interface WebhookSubscription extends HalResource {
  id: string;
  url: string;
  paused: boolean;
  created: string;
}

export interface CreateWebhookSubscriptionRequest {
  url: string;
  secret: string;
}

export interface GetWebhookSubscriptionsResponse extends HalResource {
  _embedded: {
    "webhook-subscriptions": WebhookSubscription[];
  };
  total: number;
}

export type RootResponse = HalResource;
