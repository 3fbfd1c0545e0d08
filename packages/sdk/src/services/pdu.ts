import { MalformedResponseError } from "../errors/index.js";
import type { DeleteOptions, DeleteResult, ResourceRecord } from "../types/resources.js";
import { isRecord } from "../utils/status.js";
import { ResourceService, stringField } from "./base.js";

/**
 * Physical deployment units. The server registers and removes them
 * synchronously, so nothing here waits.
 */
export class PduService extends ResourceService<ResourceRecord> {
  protected readonly basePath = "/pdu/v1/pdu_descriptors";
  protected readonly label = "pdu";

  /**
   * Register a PDU
   *
   * @throws {MalformedResponseError} If the server answer lacks an `id`
   */
  async create(pdu: Record<string, unknown>): Promise<{ id: string }> {
    const { data } = await this.http.post<unknown>(this.basePath, pdu);
    const id = stringField(isRecord(data) ? data : {}, "id");
    if (!id) {
      throw new MalformedResponseError(data);
    }
    return { id };
  }

  /**
   * Replace the descriptor of an existing PDU
   */
  async update(nameOrId: string, pdu: Record<string, unknown>): Promise<{ id: string }> {
    const resource = await this.get(nameOrId);
    await this.http.put<unknown>(`${this.basePath}/${resource._id}`, pdu);
    return { id: resource._id };
  }

  /**
   * Remove a PDU. `force` skips the server's in-use checks.
   */
  async delete(nameOrId: string, options: DeleteOptions = {}): Promise<DeleteResult> {
    const { status } = await this.requestDelete(nameOrId, { force: options.force });
    return { status };
  }
}
