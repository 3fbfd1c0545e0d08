import type { AxiosInstance } from "axios";
import {
  APIError,
  MalformedResponseError,
  NotFoundError,
  ValidationError,
} from "../errors/index.js";
import type { ResolvedClientConfig } from "../types/config.js";
import type { DeleteOptions, DeleteResult, ResourceRecord } from "../types/resources.js";
import type { EntityKind, StatusFetcher, WaitResult } from "../types/status.js";
import { waitForStatus } from "../utils/polling.js";
import { withRetry } from "../utils/retry.js";
import { isRecord } from "../utils/status.js";
import { isUuid, validateResourceRef } from "../utils/validation.js";

/**
 * Answer of a DELETE before any waiting
 */
interface DeleteAnswer {
  status: "deleted" | "in-progress";
  resourceId: string;
  body: Record<string, unknown>;
}

/**
 * Lookup and delete plumbing shared by every resource collection
 */
export abstract class ResourceService<T extends ResourceRecord> {
  /** Collection path, e.g. `/admin/v1/vim_accounts` */
  protected abstract readonly basePath: string;

  /** Label used in error messages */
  protected abstract readonly label: string;

  constructor(protected readonly config: ResolvedClientConfig) {}

  protected get http(): AxiosInstance {
    return this.config.httpClient;
  }

  /**
   * List the collection, optionally narrowed by a raw query string such as
   * `name=edge-1`
   */
  async list(filter?: string): Promise<T[]> {
    const url = filter ? `${this.basePath}?${filter}` : this.basePath;
    const { data } = await this.retry(() => this.http.get<T[] | "">(url));
    return Array.isArray(data) ? data : [];
  }

  /**
   * Find a resource by id (UUID) or by name in the collection listing
   *
   * @throws {NotFoundError} If nothing matches
   */
  async get(nameOrId: string): Promise<T> {
    this.checkRef(nameOrId);

    const field = isUuid(nameOrId) ? "_id" : "name";
    const match = (await this.list()).find((item) => item[field] === nameOrId);
    if (!match) {
      throw new NotFoundError(`${this.label} '${nameOrId}' not found`);
    }
    return match;
  }

  /**
   * Fetch one resource from its own endpoint rather than the listing.
   * A UUID is used as is; a name is resolved through {@link get} first.
   *
   * @throws {NotFoundError} If the server answers 404 or with an empty body
   */
  async getIndividual(nameOrId: string): Promise<T> {
    this.checkRef(nameOrId);

    const id = isUuid(nameOrId) ? nameOrId : (await this.get(nameOrId))._id;
    const notFound = new NotFoundError(`${this.label} '${nameOrId}' not found`);

    const { data } = await this.retry(() =>
      this.http.get<T | "">(`${this.basePath}/${id}`),
    ).catch((error: unknown) => {
      throw error instanceof NotFoundError ? notFound : error;
    });

    if (!data) {
      throw notFound;
    }
    return data;
  }

  /**
   * Read one top-level field of a resource
   *
   * @throws {NotFoundError} If the resource or the field is missing
   */
  async getField(nameOrId: string, field: string): Promise<unknown> {
    const resource = await this.get(nameOrId);
    if (!(field in resource)) {
      throw new NotFoundError(`failed to find ${field} in ${this.label} ${nameOrId}`);
    }
    return resource[field];
  }

  /**
   * Issue a DELETE and interpret the answer: 204 means deleted, 202 means
   * the server started an asynchronous deletion.
   */
  protected async requestDelete(
    nameOrId: string,
    options: DeleteOptions,
  ): Promise<DeleteAnswer> {
    const resource = await this.get(nameOrId);
    const query = options.force ? "?FORCE=True" : "";
    const response = await this.http.delete<unknown>(
      `${this.basePath}/${resource._id}${query}`,
    );

    if (response.status !== 202 && response.status !== 204) {
      throw new APIError(
        `failed to delete ${this.label} ${nameOrId} - unexpected status ${response.status}`,
        response.status,
        response.data,
      );
    }

    return {
      status: response.status === 204 ? "deleted" : "in-progress",
      resourceId: resource._id,
      body: isRecord(response.data) ? response.data : {},
    };
  }

  protected retry<R>(operation: () => Promise<R>): Promise<R> {
    return withRetry(operation, {
      maxRetries: this.config.maxRetries,
      initialDelay: this.config.retryDelay,
      multiplier: this.config.retryMultiplier,
    });
  }

  private checkRef(nameOrId: string): void {
    const validation = validateResourceRef(nameOrId);
    if (!validation.valid) {
      throw new ValidationError(validation.error ?? `Invalid reference: ${nameOrId}`);
    }
  }
}

/**
 * Collection whose create and delete calls start asynchronous operations
 * that can be waited on
 */
export abstract class WaitableResourceService<
  T extends ResourceRecord,
> extends ResourceService<T> {
  /** Kind used when waiting on this collection's operations */
  protected abstract readonly kind: EntityKind;

  constructor(
    config: ResolvedClientConfig,
    private readonly fetcher: StatusFetcher,
  ) {
    super(config);
  }

  /**
   * Delete and, when asked, wait on the id `waitTarget` picks from the
   * 202 body and the resource id
   *
   * @throws {MalformedResponseError} If waiting was requested and the 202 body names nothing to wait on
   */
  protected async deleteResource(
    nameOrId: string,
    options: DeleteOptions,
    statusEndpoint: string,
    waitTarget: (body: Record<string, unknown>, resourceId: string) => string | undefined,
  ): Promise<DeleteResult> {
    const answer = await this.requestDelete(nameOrId, options);
    if (answer.status === "deleted") {
      return { status: "deleted" };
    }

    const operationId = waitTarget(answer.body, answer.resourceId);
    if (!options.wait) {
      return { status: "in-progress", operationId };
    }
    if (!operationId) {
      throw new MalformedResponseError(answer.body);
    }

    const result = await this.wait(operationId, statusEndpoint, true);
    return { status: "finished", operationId, result };
  }

  /**
   * Block until the operation behind `entityId` reaches a terminal state
   */
  protected wait(
    entityId: string,
    statusEndpoint: string,
    deleteOperation = false,
  ): Promise<WaitResult> {
    if (this.config.debug) {
      console.log(`[nfvo] Waiting for ${this.kind}:`, {
        entityId,
        statusEndpoint,
        deleteOperation,
      });
    }

    return waitForStatus(
      {
        kind: this.kind,
        entityId,
        statusEndpoint,
        timeout: this.config.waitTimeouts[this.kind],
        deleteOperation,
      },
      this.fetcher,
      { onProgress: this.config.onProgress, debug: this.config.debug },
    );
  }
}

/**
 * Read a string field from a response body
 */
export function stringField(
  body: Record<string, unknown>,
  field: string,
): string | undefined {
  const value = body[field];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}
