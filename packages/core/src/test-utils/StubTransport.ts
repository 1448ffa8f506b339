import { HttpMethod, RestError, RestRequest, RestResponse, Transport } from "../types/http";

/**
 * In-process transport for tests
 * Records every request and answers from a queue of canned responses
 */
export class StubTransport implements Transport {
  private readonly queue: Array<(request: RestRequest) => RestResponse<unknown>> = [];
  public readonly sent: RestRequest[] = [];

  /**
   * Queue a successful response whose body is `content` serialized as JSON
   */
  reply(status: number, content?: unknown, headers: Record<string, string> = {}): this {
    this.queue.push((request) => {
      const rawContent = content === undefined ? "" : JSON.stringify(content);
      return {
        response: responseInfo(request, status, headers),
        content,
        rawContent,
      };
    });
    return this;
  }

  /**
   * Queue a failed response with a raw body
   */
  fail(status: number | undefined, rawContent: string, headers: Record<string, string> = {}): this {
    this.queue.push((request) => ({
      response: responseInfo(request, status, headers),
      rawContent,
      error: new RestError(`Request failed with status ${status}`, status, rawContent),
    }));
    return this;
  }

  async send<T>(request: RestRequest): Promise<RestResponse<T>> {
    this.sent.push(request);
    const next = this.queue.shift();
    if (!next) {
      throw new Error(`No response queued for ${request.method} ${request.url}`);
    }
    return narrow<T>(next(request));
  }

  lastRequest(): RestRequest {
    const request = this.sent[this.sent.length - 1];
    if (!request) {
      throw new Error("No request sent");
    }
    return request;
  }
}

function responseInfo(
  request: RestRequest,
  status: number | undefined,
  headers: Record<string, string>,
): RestResponse<unknown>["response"] {
  const method: HttpMethod = request.method;
  return { status, headers, request: { method, url: request.url } };
}

// Canned bodies are whatever the test says the caller's type is
function narrow<T>(response: RestResponse<unknown>): RestResponse<T> {
  const { content, ...rest } = response;
  const typed: T | undefined = content === undefined ? undefined : JSON.parse(JSON.stringify(content));
  return { ...rest, content: typed };
}
