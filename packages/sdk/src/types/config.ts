import type { AxiosInstance } from "axios";
import type { EntityKind, ProgressSink } from "./status.js";

/**
 * Client configuration options
 */
export interface ClientConfig {
  /** Base API URL. Default: https://localhost:9999/osm */
  baseURL?: string;

  /** Bearer token sent with every request */
  token?: string;

  /** Request timeout in milliseconds. Default: 30000 (30s) */
  timeout?: number;

  /** Maximum retry attempts for transient errors on lookups. Default: 3 */
  maxRetries?: number;

  /** Initial delay between retries in ms. Default: 1000 */
  retryDelay?: number;

  /** Backoff multiplier for exponential retry. Default: 2 */
  retryMultiplier?: number;

  /** Per-kind wait budgets in seconds, overriding the defaults */
  waitTimeouts?: Partial<Record<EntityKind, number>>;

  /** Receives detailed-status changes while waiting. Default: stderr */
  onProgress?: ProgressSink;

  /** Custom Axios instance (advanced) */
  httpClient?: AxiosInstance;

  /** Enable debug logging */
  debug?: boolean;
}

/**
 * Configuration after defaults are applied
 */
export interface ResolvedClientConfig
  extends Required<Omit<ClientConfig, "token" | "waitTimeouts">> {
  token?: string;
  waitTimeouts: Record<EntityKind, number>;
}
