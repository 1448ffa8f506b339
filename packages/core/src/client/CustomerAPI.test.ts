import { ApiException } from "../errors/ApiException";
import { API, AUTH_HEADERS, createTestApi, links } from "../test-utils/fixtures";
import { StubTransport } from "../test-utils/StubTransport";
import { Customer, CustomerStatus } from "../types/resources";
import { CustomerAPI } from "./CustomerAPI";

const CUSTOMER_ID = "ce7a5b4e-4d1a-4c5f-9f7f-0f0f0f0f0f01";
const CUSTOMER_URL = `${API}/customers/${CUSTOMER_ID}`;

const customer: Customer = {
  ...links(CUSTOMER_URL),
  id: CUSTOMER_ID,
  firstName: "Jane",
  lastName: "Doe",
  email: "jane@example.com",
  type: "personal",
  status: CustomerStatus.VERIFIED,
  created: "2024-01-01T00:00:00.000Z",
};

describe("CustomerAPI", () => {
  let transport: StubTransport;
  let customers: CustomerAPI;

  beforeEach(() => {
    const api = createTestApi();
    transport = api.transport;
    customers = new CustomerAPI(api.client, api.tokens);
  });

  describe("list", () => {
    it("should GET the collection with the bearer token", async () => {
      transport.reply(200, { ...links(`${API}/customers`), _embedded: { customers: [customer] }, total: 1 });

      const result = await customers.list();

      expect(result.total).toBe(1);
      expect(result._embedded.customers[0].email).toBe("jane@example.com");
      expect(transport.lastRequest()).toEqual({
        method: "GET",
        url: `${API}/customers`,
        headers: AUTH_HEADERS,
      });
    });

    it("should add paging and search parameters", async () => {
      transport.reply(200, { ...links(`${API}/customers`), _embedded: { customers: [] }, total: 0 });

      await customers.list({ limit: 10, offset: 20, search: "jane doe" });

      expect(transport.lastRequest().url).toBe(`${API}/customers?limit=10&offset=20&search=jane+doe`);
    });
  });

  describe("get", () => {
    it("should GET a customer by id", async () => {
      transport.reply(200, customer);

      await expect(customers.get(CUSTOMER_ID)).resolves.toEqual(customer);
      expect(transport.lastRequest().url).toBe(CUSTOMER_URL);
    });

    it("should GET a customer by URL", async () => {
      transport.reply(200, customer);

      await customers.get(CUSTOMER_URL);

      expect(transport.lastRequest().url).toBe(CUSTOMER_URL);
    });

    it("should throw when a successful response has no body", async () => {
      transport.reply(200, undefined, { "x-request-id": "empty-id" });

      await expect(customers.get(CUSTOMER_ID)).rejects.toBeInstanceOf(ApiException);
    });
  });

  describe("create", () => {
    it("should POST the customer and return its location", async () => {
      transport.reply(201, undefined, { location: CUSTOMER_URL });

      const location = await customers.create({
        firstName: "Jane",
        lastName: "Doe",
        email: "jane@example.com",
      });

      expect(location).toBe(CUSTOMER_URL);
      expect(transport.lastRequest()).toEqual({
        method: "POST",
        url: `${API}/customers`,
        headers: {
          ...AUTH_HEADERS,
          "Content-Type": "application/vnd.dwolla.v1.hal+json; charset=utf-8",
        },
        body: '{"firstName":"Jane","lastName":"Doe","email":"jane@example.com"}',
      });
    });

    it("should throw when the Location header is missing", async () => {
      transport.reply(201, undefined, { "x-request-id": "no-location" });

      const error = await customers
        .create({ firstName: "Jane", lastName: "Doe", email: "jane@example.com" })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ApiException);
      expect(error).toMatchObject({ requestId: "no-location" });
    });

    it("should expose validation errors", async () => {
      transport.fail(
        400,
        JSON.stringify({
          code: "ValidationError",
          message: "Validation error(s) present.",
          _embedded: { errors: [{ code: "Duplicate", message: "A customer with the specified email already exists.", path: "/email" }] },
        }),
        { "x-request-id": "validation-id" },
      );

      const error = await customers
        .create({ firstName: "Jane", lastName: "Doe", email: "jane@example.com" })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ApiException);
      expect(error).toMatchObject({
        message: `API Error, Resource="POST ${API}/customers", RequestId="validation-id"`,
        error: {
          code: "ValidationError",
          _embedded: { errors: [{ code: "Duplicate", path: "/email" }] },
        },
      });
    });
  });

  describe("update", () => {
    it("should POST the changes to the customer", async () => {
      transport.reply(200, { ...customer, status: CustomerStatus.SUSPENDED });

      const updated = await customers.update(CUSTOMER_ID, { status: "suspended" });

      expect(updated.status).toBe("suspended");
      expect(transport.lastRequest()).toMatchObject({
        method: "POST",
        url: CUSTOMER_URL,
        body: '{"status":"suspended"}',
      });
    });
  });
});
