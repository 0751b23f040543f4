import { BaseResource } from "./base-resource.js";
import {
  CredentialEntitySchema,
  CredentialListSchema,
  CredentialRecordSchema,
  CredentialTypeSchema,
} from "../models/schemas.js";
import { toCredentialPayload } from "../models/payloads.js";
import { parseEntity } from "../utils/validation.js";
import type {
  Credential,
  CredentialInput,
  CredentialList,
  CredentialSchema,
  PaginationOptions,
} from "../types/index.js";

export class CredentialsResource extends BaseResource {
  protected readonly basePath = "/credentials";

  async list(options: PaginationOptions = {}): Promise<CredentialList> {
    return this.send(
      CredentialListSchema,
      "credential list",
      "GET",
      this.basePath,
      { query: this.paginationQuery(options) },
    );
  }

  /**
   * Create a credential. `data` must follow the shape returned by
   * getSchema() for the credential type.
   */
  async create(credential: CredentialInput): Promise<Credential> {
    const payload = toCredentialPayload(
      parseEntity(CredentialEntitySchema, credential, "credential"),
    );
    return this.send(
      CredentialRecordSchema,
      "credential",
      "POST",
      this.basePath,
      { body: payload },
    );
  }

  async delete(id: string): Promise<void> {
    await this.remove(id);
  }

  /**
   * JSON schema of the `data` field for a credential type, e.g. "slackApi"
   */
  async getSchema(credentialType: string): Promise<CredentialSchema> {
    return this.send(
      CredentialTypeSchema,
      "credential schema",
      "GET",
      this.path("schema", credentialType),
    );
  }
}
