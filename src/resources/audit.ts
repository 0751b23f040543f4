import { BaseResource } from "./base-resource.js";
import { AuditOptionsSchema, AuditSchema } from "../models/schemas.js";
import { toAuditOptionsPayload } from "../models/payloads.js";
import { parseEntity } from "../utils/validation.js";
import type { Audit, AuditOptionsInput } from "../types/index.js";

export class AuditResource extends BaseResource {
  protected readonly basePath = "/audit";

  /**
   * Generate a security audit of the instance. Without options the request
   * carries no body.
   */
  async generate(options?: AuditOptionsInput): Promise<Audit> {
    const body = options
      ? toAuditOptionsPayload(
          parseEntity(AuditOptionsSchema, options, "audit options"),
        )
      : undefined;
    return this.send(AuditSchema, "audit", "POST", this.basePath, { body });
  }
}
