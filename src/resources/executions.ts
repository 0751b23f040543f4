import { BaseResource } from "./base-resource.js";
import { ExecutionListSchema, ExecutionSchema } from "../models/schemas.js";
import type {
  Execution,
  ExecutionFilterOptions,
  ExecutionGetOptions,
  ExecutionList,
} from "../types/index.js";

/**
 * Read access to execution records. Execution payloads are left out unless
 * `includeData` is set.
 */
export class ExecutionsResource extends BaseResource {
  protected readonly basePath = "/executions";

  async list(options: ExecutionFilterOptions = {}): Promise<ExecutionList> {
    return this.send(
      ExecutionListSchema,
      "execution list",
      "GET",
      this.basePath,
      {
        query: {
          ...this.paginationQuery(options),
          includeData: options.includeData ?? false,
          status: options.status || undefined,
          workflowId: options.workflowId,
        },
      },
    );
  }

  async get(
    id: number | string,
    options: ExecutionGetOptions = {},
  ): Promise<Execution> {
    return this.send(ExecutionSchema, "execution", "GET", this.path(id), {
      query: { includeData: options.includeData ?? false },
    });
  }

  async delete(id: number | string): Promise<void> {
    await this.remove(id);
  }
}
