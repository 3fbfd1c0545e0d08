import Axios, {
  AxiosError,
  AxiosHeaders,
  type AxiosAdapter,
  type AxiosInstance,
  type AxiosResponse,
} from "axios";

export interface FakeReply {
  status: number;
  body?: unknown;
  headers?: Record<string, string>;
  /** Fail without a response, like a refused connection */
  networkError?: boolean;
}

export interface RecordedRequest {
  method: string;
  url: string;
  data?: unknown;
  headers: AxiosHeaders;
}

interface Route {
  method: string;
  url: string;
  replies: FakeReply[];
  served: number;
}

/**
 * In-process stand-in for the orchestrator, plugged in as an Axios adapter.
 * Each route answers with its replies in order and repeats the last one.
 */
export class FakeServer {
  readonly requests: RecordedRequest[] = [];
  private readonly routes: Route[] = [];

  on(method: string, url: string, ...replies: FakeReply[]): this {
    this.routes.push({ method: method.toUpperCase(), url, replies, served: 0 });
    return this;
  }

  createInstance(): AxiosInstance {
    return Axios.create({ adapter: this.adapter });
  }

  requestsTo(method: string, url: string): RecordedRequest[] {
    return this.requests.filter(
      (request) => request.method === method.toUpperCase() && request.url === url,
    );
  }

  private readonly adapter: AxiosAdapter = async (config) => {
    const method = (config.method ?? "get").toUpperCase();
    const url = config.url ?? "";
    this.requests.push({
      method,
      url,
      data: typeof config.data === "string" ? JSON.parse(config.data) : config.data,
      headers: config.headers,
    });

    const route = this.routes.find((r) => r.method === method && r.url === url);
    const reply: FakeReply = route
      ? route.replies[Math.min(route.served++, route.replies.length - 1)]
      : { status: 404, body: { detail: `no route for ${method} ${url}` } };

    if (reply.networkError) {
      throw new AxiosError("connect ECONNREFUSED", "ECONNREFUSED", config);
    }

    const response: AxiosResponse = {
      data:
        reply.body === undefined
          ? ""
          : typeof reply.body === "string"
            ? reply.body
            : JSON.stringify(reply.body),
      status: reply.status,
      statusText: String(reply.status),
      headers: new AxiosHeaders(reply.headers),
      config,
      request: {},
    };

    const validateStatus = config.validateStatus;
    if (!validateStatus || validateStatus(reply.status)) {
      return response;
    }

    throw new AxiosError(
      `Request failed with status code ${reply.status}`,
      reply.status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
      config,
      {},
      response,
    );
  };
}
