import { MalformedResponseError } from "../errors/index.js";
import type {
  CreateNsOptions,
  CreateResult,
  DeleteOptions,
  DeleteResult,
  LcmOperation,
  NsInstance,
  ScaleDirection,
  WaitFlag,
} from "../types/resources.js";
import { isRecord } from "../utils/status.js";
import { WaitableResourceService, stringField } from "./base.js";

const NSLCM = "/nslcm/v1";

/**
 * Network service instance lifecycle.
 *
 * Create, delete and actions are asynchronous on the server; with
 * `{ wait: true }` each call polls the lifecycle operation it started
 * until that operation reaches `COMPLETED`, `PARTIALLY_COMPLETED`,
 * `FAILED_TEMP` or `FAILED`.
 *
 * @example
 * ```typescript
 * const { id, result } = await client.ns.create(
 *   { nsdId, nsName: 'edge-1', vimAccountId },
 *   { wait: true },
 * );
 *
 * if (result?.payload?.operationState !== 'COMPLETED') {
 *   console.error(`Instantiation of ${id} ended in ${result?.payload?.operationState}`);
 * }
 * ```
 */
export class NsService extends WaitableResourceService<NsInstance> {
  protected readonly basePath = `${NSLCM}/ns_instances_content`;
  protected readonly kind = "NS";
  protected readonly label = "ns";

  /** Lifecycle operation occurrences */
  private readonly operationsPath = `${NSLCM}/ns_lcm_op_occs`;

  /**
   * Instantiate a network service.
   *
   * @param options - Descriptor, name, target VIM and instantiation parameters
   * @param flags.wait - Wait for the instantiation operation
   * @returns Instance id and the id of the instantiation operation
   * @throws {MalformedResponseError} If the server answer lacks an `id`
   * @throws {OperationFailedError} If waiting fails or times out
   */
  async create(options: CreateNsOptions, flags: WaitFlag = {}): Promise<CreateResult> {
    const request: Record<string, unknown> = {
      ...options.config,
      nsdId: options.nsdId,
      nsName: options.nsName,
      nsDescription: options.nsDescription ?? "default description",
      vimAccountId: options.vimAccountId,
      ...(options.sshKeys && options.sshKeys.length > 0
        ? { ssh_keys: options.sshKeys }
        : {}),
    };

    const { data } = await this.http.post<unknown>(this.basePath, request);
    const body = isRecord(data) ? data : {};
    const id = stringField(body, "id");
    if (!id) {
      throw new MalformedResponseError(data);
    }

    const operationId = stringField(body, "nslcmop_id");
    if (!flags.wait || !operationId) {
      return { id, operationId };
    }

    const result = await this.wait(operationId, this.operationsPath);
    return { id, operationId, result };
  }

  /**
   * Delete a network service instance.
   *
   * The server answers 204 when nothing was deployed, otherwise 202 with
   * the id of the termination operation, which is what gets polled.
   */
  async delete(nameOrId: string, options: DeleteOptions = {}): Promise<DeleteResult> {
    return this.deleteResource(nameOrId, options, this.operationsPath, (body) =>
      stringField(body, "_id"),
    );
  }

  /**
   * Execute a primitive or lifecycle action on an instance
   *
   * @returns Operation id plus the wait result when `wait` is set
   */
  async execAction(
    nameOrId: string,
    action: string,
    params: Record<string, unknown> = {},
    flags: WaitFlag = {},
  ): Promise<CreateResult> {
    const ns = await this.get(nameOrId);
    const { data } = await this.http.post<unknown>(
      `${NSLCM}/ns_instances/${ns._id}/${action}`,
      params,
    );

    const body = isRecord(data) ? data : {};
    const operationId = stringField(body, "id");
    if (!operationId) {
      throw new MalformedResponseError(data);
    }

    if (!flags.wait) {
      return { id: operationId, operationId };
    }

    const result = await this.wait(operationId, this.operationsPath);
    return { id: operationId, operationId, result };
  }

  /**
   * Scale a VNF of the instance by one step of a scaling group
   */
  scaleVnf(
    nsNameOrId: string,
    memberVnfIndex: string,
    scalingGroup: string,
    direction: ScaleDirection,
    flags: WaitFlag = {},
  ): Promise<CreateResult> {
    return this.execAction(
      nsNameOrId,
      "scale",
      {
        scaleType: "SCALE_VNF",
        scaleVnfData: {
          scaleVnfType: direction === "in" ? "SCALE_IN" : "SCALE_OUT",
          scaleByStepData: {
            "member-vnf-index": memberVnfIndex,
            "scaling-group-descriptor": scalingGroup,
          },
        },
      },
      flags,
    );
  }

  /**
   * Fetch one lifecycle operation
   */
  async getOperation(operationId: string): Promise<LcmOperation> {
    const { data } = await this.retry(() =>
      this.http.get<LcmOperation>(`${this.operationsPath}/${operationId}`),
    );
    return data;
  }

  /**
   * List lifecycle operations, optionally of a single instance
   */
  async listOperations(nsNameOrId?: string): Promise<LcmOperation[]> {
    let url = this.operationsPath;
    if (nsNameOrId) {
      const ns = await this.get(nsNameOrId);
      url = `${url}?nsInstanceId=${ns._id}`;
    }

    const { data } = await this.retry(() => this.http.get<LcmOperation[] | "">(url));
    return Array.isArray(data) ? data : [];
  }
}
