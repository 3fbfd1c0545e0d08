import type { AxiosError, AxiosInstance } from "axios";
import {
  APIError,
  AuthenticationError,
  AuthorizationError,
  NetworkError,
  NotFoundError,
  RateLimitError,
  SDKError,
  ValidationError,
} from "./errors/index.js";
import { createHttpInstance, createStatusFetcher } from "./lib/http.js";
import { AccountService } from "./services/accounts.js";
import { NsService } from "./services/ns.js";
import { NsiService } from "./services/nsi.js";
import { PduService } from "./services/pdu.js";
import type { ClientConfig, ResolvedClientConfig } from "./types/config.js";
import type { StatusFetcher } from "./types/status.js";
import { DEFAULT_TIMEOUTS, SDK_VERSION } from "./utils/constants.js";
import { writeProgressToStderr } from "./utils/polling.js";
import { asPayload } from "./utils/status.js";

const DEFAULT_BASE_URL = "https://localhost:9999/osm";
const DEFAULT_TIMEOUT = 30000;

/**
 * Client for a network-function-orchestration northbound API.
 *
 * Lifecycle calls accept `{ wait: true }` to block until the server-side
 * operation reaches a terminal state, reporting detailed-status changes
 * on the way.
 *
 * @example
 * ```typescript
 * import { NfvoClient } from 'nfvo-client';
 *
 * const client = new NfvoClient({
 *   baseURL: 'https://orchestrator.example.net:9999/osm',
 *   token: process.env.NFVO_TOKEN,
 * });
 *
 * const { id } = await client.ns.create(
 *   { nsdId, nsName: 'edge-1', vimAccountId },
 *   { wait: true },
 * );
 * await client.ns.delete(id, { wait: true });
 * ```
 */
export class NfvoClient {
  private readonly config: ResolvedClientConfig;
  private readonly fetcher: StatusFetcher;
  private _ns?: NsService;
  private _nsi?: NsiService;
  private _vim?: AccountService;
  private _wim?: AccountService;
  private _sdnc?: AccountService;
  private _pdu?: PduService;

  constructor(config: ClientConfig = {}) {
    const baseURL = config.baseURL ?? DEFAULT_BASE_URL;
    const timeout = config.timeout ?? DEFAULT_TIMEOUT;

    this.config = {
      baseURL,
      token: config.token,
      timeout,
      maxRetries: config.maxRetries ?? 3,
      retryDelay: config.retryDelay ?? 1000,
      retryMultiplier: config.retryMultiplier ?? 2,
      waitTimeouts: { ...DEFAULT_TIMEOUTS, ...config.waitTimeouts },
      onProgress: config.onProgress ?? writeProgressToStderr,
      debug: config.debug ?? false,
      httpClient: config.httpClient ?? createHttpInstance(baseURL, timeout),
    };

    const http = this.config.httpClient;
    http.defaults.headers.common["User-Agent"] = `nfvo-client-js/${SDK_VERSION}`;
    if (this.config.token) {
      http.defaults.headers.common["Authorization"] = `Bearer ${this.config.token}`;
    }

    this.setupInterceptors(http);
    this.fetcher = createStatusFetcher(http);
  }

  /**
   * Setup request/response interceptors
   */
  private setupInterceptors(http: AxiosInstance): void {
    // Request interceptor for debugging
    if (this.config.debug) {
      http.interceptors.request.use(
        (config) => {
          console.log("[nfvo] Request:", {
            method: config.method?.toUpperCase(),
            url: config.url,
            params: config.params,
          });
          return config;
        },
        (error) => {
          console.error("[nfvo] Request Error:", error);
          return Promise.reject(error);
        },
      );
    }

    // Response interceptor for error handling
    http.interceptors.response.use(
      (response) => {
        if (this.config.debug) {
          console.log("[nfvo] Response:", {
            status: response.status,
            data: response.data,
          });
        }
        return response;
      },
      (error: AxiosError) => {
        const sdkError = mapError(error);
        if (this.config.debug) {
          console.error("[nfvo] Response Error:", sdkError);
        }
        return Promise.reject(sdkError);
      },
    );
  }

  /**
   * Network service instances.
   *
   * @example
   * ```typescript
   * // Scale out and wait for the operation
   * await client.ns.scaleVnf('edge-1', '1', 'web-tier', 'out', { wait: true });
   * ```
   */
  get ns(): NsService {
    if (!this._ns) {
      this._ns = new NsService(this.config, this.fetcher);
    }
    return this._ns;
  }

  /**
   * Network slice instances
   */
  get nsi(): NsiService {
    if (!this._nsi) {
      this._nsi = new NsiService(this.config, this.fetcher);
    }
    return this._nsi;
  }

  /**
   * VIM accounts
   */
  get vim(): AccountService {
    if (!this._vim) {
      this._vim = new AccountService("VIM", this.config, this.fetcher);
    }
    return this._vim;
  }

  /**
   * WIM accounts
   */
  get wim(): AccountService {
    if (!this._wim) {
      this._wim = new AccountService("WIM", this.config, this.fetcher);
    }
    return this._wim;
  }

  /**
   * SDN controllers
   */
  get sdnc(): AccountService {
    if (!this._sdnc) {
      this._sdnc = new AccountService("SDNC", this.config, this.fetcher);
    }
    return this._sdnc;
  }

  /**
   * Physical deployment units
   */
  get pdu(): PduService {
    if (!this._pdu) {
      this._pdu = new PduService(this.config);
    }
    return this._pdu;
  }
}

/**
 * Map Axios errors to client errors
 */
export function mapError(error: AxiosError): SDKError {
  const status = error.response?.status;
  const data = error.response?.data;

  // Network errors
  if (!status) {
    return new NetworkError(`Network error: ${error.message}`, error);
  }

  const message = extractMessage(data) ?? error.message;

  switch (status) {
    case 401:
      return new AuthenticationError(message);

    case 403:
      return new AuthorizationError(message);

    case 404:
      return new NotFoundError(message);

    case 429: {
      const header = error.response?.headers["retry-after"];
      const retryAfter =
        typeof header === "string" ? parseInt(header, 10) : undefined;
      return new RateLimitError(
        message,
        retryAfter !== undefined && !isNaN(retryAfter) ? retryAfter : undefined,
      );
    }

    case 400:
    case 422:
      return new ValidationError(message);

    default:
      return new APIError(message, status, data);
  }
}

/**
 * Extract message - handles `detail`, `message` and `error` in string or object form
 */
function extractMessage(data: unknown): string | undefined {
  if (typeof data === "string") {
    return data.length > 0 ? data : undefined;
  }

  const body = asPayload(data);
  if (!body) return undefined;

  if (typeof body.detail === "string") return body.detail;
  if (typeof body.message === "string") return body.message;
  if (typeof body.error === "string") return body.error;

  const nested = asPayload(body.error);
  if (nested && typeof nested.message === "string") return nested.message;
  if (body.error !== undefined) return JSON.stringify(body.error);

  return undefined;
}
