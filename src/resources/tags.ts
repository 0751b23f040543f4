import { BaseResource } from "./base-resource.js";
import { TagListSchema, TagSchema } from "../models/schemas.js";
import { toTagPayload } from "../models/payloads.js";
import { parseEntity } from "../utils/validation.js";
import type {
  PaginationOptions,
  Tag,
  TagInput,
  TagList,
} from "../types/index.js";

export class TagsResource extends BaseResource {
  protected readonly basePath = "/tags";

  async list(options: PaginationOptions = {}): Promise<TagList> {
    return this.send(TagListSchema, "tag list", "GET", this.basePath, {
      query: this.paginationQuery(options),
    });
  }

  async create(tag: TagInput): Promise<Tag> {
    const payload = toTagPayload(parseEntity(TagSchema, tag, "tag"));
    return this.send(TagSchema, "tag", "POST", this.basePath, {
      body: payload,
    });
  }

  async get(id: string): Promise<Tag> {
    return this.send(TagSchema, "tag", "GET", this.path(id));
  }

  async delete(id: string): Promise<void> {
    await this.remove(id);
  }
}
