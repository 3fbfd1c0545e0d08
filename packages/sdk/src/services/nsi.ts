import { MalformedResponseError } from "../errors/index.js";
import type {
  CreateNsiOptions,
  CreateResult,
  DeleteOptions,
  DeleteResult,
  ResourceRecord,
  WaitFlag,
} from "../types/resources.js";
import { isRecord } from "../utils/status.js";
import { WaitableResourceService, stringField } from "./base.js";

const NSILCM = "/nsilcm/v1";

/**
 * Network slice instance lifecycle. Same operation model as NS.
 */
export class NsiService extends WaitableResourceService<ResourceRecord> {
  protected readonly basePath = `${NSILCM}/netslice_instances_content`;
  protected readonly kind = "NSI";
  protected readonly label = "nsi";

  private readonly operationsPath = `${NSILCM}/nsi_lcm_op_occs`;

  async create(options: CreateNsiOptions, flags: WaitFlag = {}): Promise<CreateResult> {
    const request: Record<string, unknown> = {
      ...options.config,
      nstId: options.nstId,
      nsiName: options.nsiName,
      nsiDescription: options.nsiDescription ?? "default description",
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

    const operationId = stringField(body, "nsilcmop_id");
    if (!flags.wait || !operationId) {
      return { id, operationId };
    }

    const result = await this.wait(operationId, this.operationsPath);
    return { id, operationId, result };
  }

  async delete(nameOrId: string, options: DeleteOptions = {}): Promise<DeleteResult> {
    return this.deleteResource(nameOrId, options, this.operationsPath, (body) =>
      stringField(body, "_id"),
    );
  }
}
