import { ApiException } from "../errors/ApiException";
import { silentLogger } from "../lib/logger";
import { StubTransport } from "../test-utils/StubTransport";
import { UploadDocumentRequest } from "../types/models";
import { ApiClient } from "./ApiClient";

const JSON_V1 = "application/vnd.dwolla.v1.hal+json";
const REQUEST_ID = "some-id";
const REQUEST_URI = "https://api-sandbox.example.com/foo";
const AUTH_REQUEST_URI = "https://sandbox.example.com/oauth/v2/foo";
const HEADERS = { key1: "value1", key2: "value2" };

interface TestRequest {
  message: string;
}

interface TestResponse {
  message: string;
}

const request: TestRequest = { message: "requestTest" };
const response: TestResponse = { message: "responseTest" };

function expectedMessage(method: string, url = REQUEST_URI): string {
  return `API Error, Resource="${method} ${url}", RequestId="${REQUEST_ID}"`;
}

function createUploadRequest(): UploadDocumentRequest {
  return {
    documentType: "idCard",
    document: {
      contentType: "image/png",
      filename: "test.png",
      data: new Uint8Array([137, 80, 78, 71]),
    },
  };
}

describe("ApiClient", () => {
  let transport: StubTransport;
  let client: ApiClient;

  beforeEach(() => {
    transport = new StubTransport();
    client = new ApiClient({ transport, environment: "sandbox", logger: silentLogger });
  });

  describe("addresses", () => {
    it("should use sandbox addresses by default", () => {
      const defaultClient = new ApiClient({ transport, logger: silentLogger });

      expect(defaultClient.apiBaseAddress).toBe("https://api-sandbox.dwolla.com");
      expect(defaultClient.authBaseAddress).toBe("https://sandbox.dwolla.com/oauth/v2");
    });

    it("should use production addresses", () => {
      const production = new ApiClient({ transport, environment: "production", logger: silentLogger });

      expect(production.apiBaseAddress).toBe("https://api.dwolla.com");
      expect(production.authBaseAddress).toBe("https://www.dwolla.com/oauth/v2");
    });

    it("should accept overrides without a trailing slash", () => {
      const custom = new ApiClient({
        transport,
        apiBaseAddress: "https://api.test.com/",
        authBaseAddress: "https://auth.test.com",
        logger: silentLogger,
      });

      expect(custom.apiBaseAddress).toBe("https://api.test.com");
      expect(custom.authBaseAddress).toBe("https://auth.test.com");
    });
  });

  describe("postAuth", () => {
    it("should create a plain JSON POST and pass it to the transport", async () => {
      transport.reply(200, response, { "x-request-id": REQUEST_ID });

      const actual = await client.postAuth<TestRequest, TestResponse>(AUTH_REQUEST_URI, request);

      expect(actual.content).toEqual(response);
      expect(transport.lastRequest()).toEqual({
        method: "POST",
        url: AUTH_REQUEST_URI,
        headers: { "Content-Type": "application/json; charset=utf-8" },
        body: '{"message":"requestTest"}',
      });
    });

    it("should throw on failure", async () => {
      transport.fail(500, "Content", { "x-request-id": REQUEST_ID });

      const error = await client
        .postAuth<TestRequest, TestResponse>(AUTH_REQUEST_URI, request)
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ApiException);
      expect(error).toMatchObject({
        message: expectedMessage("POST", AUTH_REQUEST_URI),
        content: "Content",
        requestId: REQUEST_ID,
        error: undefined,
      });
    });
  });

  describe("get", () => {
    it("should create a GET with the supplied headers only", async () => {
      transport.reply(200, response, { "x-request-id": REQUEST_ID });

      const actual = await client.get<TestResponse>(REQUEST_URI, HEADERS);

      expect(actual.content).toEqual(response);
      expect(actual.response.request).toEqual({ method: "GET", url: REQUEST_URI });
      expect(transport.lastRequest()).toEqual({
        method: "GET",
        url: REQUEST_URI,
        headers: HEADERS,
      });
    });

    it("should not share the caller's header object", async () => {
      transport.reply(200, response);
      const headers = { key1: "value1" };

      await client.get<TestResponse>(REQUEST_URI, headers);
      transport.lastRequest().headers.extra = "x";

      expect(headers).toEqual({ key1: "value1" });
    });

    it("should throw on failure", async () => {
      transport.fail(500, "Content", { "x-request-id": REQUEST_ID });

      const error = await client.get<TestResponse>(REQUEST_URI, HEADERS).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ApiException);
      expect(error).toMatchObject({
        message: expectedMessage("GET"),
        content: "Content",
        error: undefined,
      });
      expect(error).toHaveProperty("response.status", 500);
    });

    it("should deserialize the error body", async () => {
      transport.fail(
        500,
        '{"code":"ExpiredAccessToken","message":"Access token expired."}',
        { "x-request-id": REQUEST_ID },
      );

      const error = await client.get<TestResponse>(REQUEST_URI, HEADERS).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ApiException);
      expect(error).toMatchObject({
        message: 'API Error, Resource="GET https://api-sandbox.example.com/foo", RequestId="some-id"',
        content: '{"code":"ExpiredAccessToken","message":"Access token expired."}',
        error: { code: "ExpiredAccessToken", message: "Access token expired." },
      });
    });
  });

  describe("post", () => {
    it("should serialize the body as HAL+JSON", async () => {
      transport.reply(200, response, { "x-request-id": REQUEST_ID });

      const actual = await client.post<TestRequest, TestResponse>(REQUEST_URI, request, HEADERS);

      expect(actual.content).toEqual(response);
      expect(transport.lastRequest()).toEqual({
        method: "POST",
        url: REQUEST_URI,
        headers: { ...HEADERS, "Content-Type": `${JSON_V1}; charset=utf-8` },
        body: '{"message":"requestTest"}',
      });
    });

    it("should return a body-less response for 201 Created", async () => {
      transport.reply(201, undefined, { location: "https://api-sandbox.example.com/foo/1" });

      const actual = await client.post(REQUEST_URI, request, HEADERS);

      expect(actual.content).toBeUndefined();
      expect(actual.response.headers.location).toBe("https://api-sandbox.example.com/foo/1");
    });

    it("should throw on failure", async () => {
      transport.fail(400, "Content", { "x-request-id": REQUEST_ID });

      await expect(client.post(REQUEST_URI, request, HEADERS)).rejects.toMatchObject({
        message: expectedMessage("POST"),
        content: "Content",
        error: undefined,
      });
    });
  });

  describe("delete", () => {
    it("should send a DELETE with a HAL+JSON body", async () => {
      transport.reply(200);

      await client.delete(REQUEST_URI, request, HEADERS);

      expect(transport.lastRequest()).toEqual({
        method: "DELETE",
        url: REQUEST_URI,
        headers: { ...HEADERS, "Content-Type": `${JSON_V1}; charset=utf-8` },
        body: '{"message":"requestTest"}',
      });
    });

    it("should send a DELETE without content", async () => {
      transport.reply(200);

      await client.delete<null>(REQUEST_URI, null, HEADERS);

      expect(transport.lastRequest()).toEqual({
        method: "DELETE",
        url: REQUEST_URI,
        headers: HEADERS,
      });
    });

    it("should throw on failure", async () => {
      transport.fail(404, "Content", { "x-request-id": REQUEST_ID });

      await expect(client.delete(REQUEST_URI, request, HEADERS)).rejects.toMatchObject({
        message: expectedMessage("DELETE"),
        content: "Content",
        error: undefined,
      });
    });
  });

  describe("upload", () => {
    it("should send the document as multipart form data", async () => {
      transport.reply(201, undefined, { location: "https://api-sandbox.example.com/documents/1" });

      const actual = await client.upload(REQUEST_URI, createUploadRequest(), HEADERS);

      expect(actual.response.headers.location).toBe("https://api-sandbox.example.com/documents/1");

      const sent = transport.lastRequest();
      expect(sent.method).toBe("POST");
      expect(sent.url).toBe(REQUEST_URI);
      expect(sent.headers).toEqual(HEADERS);
      expect(sent.body).toBeInstanceOf(FormData);
    });

    it("should throw on failure", async () => {
      transport.fail(500, "Content", { "x-request-id": REQUEST_ID });

      await expect(client.upload(REQUEST_URI, createUploadRequest(), HEADERS)).rejects.toMatchObject({
        message: expectedMessage("POST"),
        content: "Content",
        error: undefined,
      });
    });
  });

  describe("transport failures without a response", () => {
    it("should report an empty request id", async () => {
      transport.fail(undefined, "");

      await expect(client.get(REQUEST_URI)).rejects.toMatchObject({
        message: `API Error, Resource="GET ${REQUEST_URI}", RequestId=""`,
        requestId: "",
        status: undefined,
      });
    });
  });
});
