import { BaseResource } from "./base-resource.js";
import {
  WorkflowListSchema,
  WorkflowSchema,
} from "../models/schemas.js";
import { toWorkflowPayload } from "../models/payloads.js";
import { parseEntity } from "../utils/validation.js";
import type {
  PaginationOptions,
  Workflow,
  WorkflowInput,
  WorkflowList,
} from "../types/index.js";

export class WorkflowsResource extends BaseResource {
  protected readonly basePath = "/workflows";

  /**
   * List workflows, one page at a time
   */
  async list(options: PaginationOptions = {}): Promise<WorkflowList> {
    return this.send(WorkflowListSchema, "workflow list", "GET", this.basePath, {
      query: this.paginationQuery(options),
    });
  }

  /**
   * Get a single workflow by ID
   */
  async get(id: string): Promise<Workflow> {
    return this.send(WorkflowSchema, "workflow", "GET", this.path(id));
  }

  /**
   * Create a new workflow. Any `id` on the input is ignored; the server
   * assigns one.
   */
  async create(workflow: WorkflowInput): Promise<Workflow> {
    const payload = toWorkflowPayload(
      parseEntity(WorkflowSchema, workflow, "workflow"),
    );
    return this.send(WorkflowSchema, "workflow", "POST", this.basePath, {
      body: payload,
    });
  }

  /**
   * Replace an existing workflow
   */
  async update(id: string, workflow: WorkflowInput): Promise<Workflow> {
    const payload = toWorkflowPayload(
      parseEntity(WorkflowSchema, workflow, "workflow"),
    );
    return this.send(WorkflowSchema, "workflow", "PUT", this.path(id), {
      body: payload,
    });
  }

  async delete(id: string): Promise<void> {
    await this.remove(id);
  }
}
