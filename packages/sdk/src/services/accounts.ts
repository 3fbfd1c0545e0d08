import { MalformedResponseError } from "../errors/index.js";
import type { ResolvedClientConfig } from "../types/config.js";
import type {
  CreateResult,
  DeleteOptions,
  DeleteResult,
  ResourceRecord,
  WaitFlag,
} from "../types/resources.js";
import type { StatusFetcher } from "../types/status.js";
import { isRecord } from "../utils/status.js";
import { WaitableResourceService, stringField } from "./base.js";

export type AccountKind = "VIM" | "WIM" | "SDNC";

const ACCOUNT_PATHS: Record<AccountKind, { path: string; label: string }> = {
  VIM: { path: "/admin/v1/vim_accounts", label: "vim" },
  WIM: { path: "/admin/v1/wim_accounts", label: "wim" },
  SDNC: { path: "/admin/v1/sdns", label: "sdn controller" },
};

/**
 * VIM, WIM and SDN controller accounts.
 *
 * Accounts have no separate operation records: waiting polls the account
 * itself until `_admin.operationalState` is `ENABLED` or `ERROR`, and a
 * delete is complete once the account answers 404.
 */
export class AccountService extends WaitableResourceService<ResourceRecord> {
  protected readonly basePath: string;
  protected readonly label: string;

  constructor(
    protected readonly kind: AccountKind,
    config: ResolvedClientConfig,
    fetcher: StatusFetcher,
  ) {
    super(config, fetcher);
    this.basePath = ACCOUNT_PATHS[kind].path;
    this.label = ACCOUNT_PATHS[kind].label;
  }

  /**
   * Register an account
   *
   * @param account - Account body as accepted by the server (name, type, url, credentials)
   */
  async create(account: Record<string, unknown>, flags: WaitFlag = {}): Promise<CreateResult> {
    const { data } = await this.http.post<unknown>(this.basePath, account);
    const body = isRecord(data) ? data : {};
    const id = stringField(body, "id");
    if (!id) {
      throw new MalformedResponseError(data);
    }

    if (!flags.wait) {
      return { id };
    }

    const result = await this.wait(id, this.basePath);
    return { id, result };
  }

  async delete(nameOrId: string, options: DeleteOptions = {}): Promise<DeleteResult> {
    return this.deleteResource(
      nameOrId,
      options,
      this.basePath,
      (_body, resourceId) => resourceId,
    );
  }
}
