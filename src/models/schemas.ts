/**
 * zod schemas for the n8n public API (v1) entities.
 *
 * Unknown response fields are stripped; free-form mappings and connection
 * targets are kept as sent. Optional fields accept `null` because the server
 * reports unset values that way.
 */

import { z } from "zod";

const Mapping = z.record(z.unknown());

/** Mapping that decodes `null`/absent as an empty object */
const MappingOrEmpty = Mapping.nullish().transform((value) => value ?? {});

const Timestamp = z.string().nullish();

/** Opaque resource id; older servers send numbers */
const ResourceId = z.union([
  z.string(),
  z.number().transform((value) => String(value)),
]);

/** Execution ids are integers; newer servers serialize them as digit strings */
const IntegerId = z.union([
  z.number().int(),
  z
    .string()
    .regex(/^\d+$/, "Expected an integer id")
    .transform((value, ctx) => {
      const id = Number(value);
      if (!Number.isSafeInteger(id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "Integer id exceeds the safe integer range",
        });
        return z.NEVER;
      }
      return id;
    }),
]);

export const TagSchema = z.object({
  id: ResourceId.nullish(),
  name: z.string(),
  createdAt: Timestamp,
  updatedAt: Timestamp,
});

export const NodeSchema = z.object({
  id: z.string(),
  name: z.string(),
  type: z.string(),
  typeVersion: z.number(),
  position: z.tuple([z.number(), z.number()]),
  parameters: MappingOrEmpty,
  webhookId: z.string().nullish(),
  disabled: z.boolean().default(false),
  notesInFlow: z.boolean().default(false),
  notes: z.string().nullish(),
  executeOnce: z.boolean().default(false),
  alwaysOutputData: z.boolean().default(false),
  retryOnFail: z.boolean().default(false),
  maxTries: z.number().int().nullish(),
  waitBetweenTries: z.number().int().nullish(),
  continueOnFail: z.boolean().default(false),
  onError: z.string().nullish(),
  credentials: Mapping.nullish(),
  createdAt: Timestamp,
  updatedAt: Timestamp,
});

export const ConnectionSchema = z
  .object({
    node: z.string(),
    type: z.string(),
    index: z.number().int(),
  })
  .passthrough();

// node name -> output type -> output slot -> targets
export const ConnectionsSchema = z.record(
  z.record(z.array(z.array(ConnectionSchema))),
);

export const WorkflowSettingsSchema = z.object({
  saveExecutionProgress: z.boolean().default(true),
  saveManualExecutions: z.boolean().default(true),
  saveDataErrorExecution: z.string().default("all"),
  saveDataSuccessExecution: z.string().default("all"),
  executionTimeout: z.number().int().nullish(),
  errorWorkflow: z.string().nullish(),
  timezone: z.string().nullish(),
  executionOrder: z.string().default("v1"),
});

export const WorkflowSchema = z.object({
  id: ResourceId.nullish(),
  name: z.string(),
  nodes: z.array(NodeSchema),
  connections: ConnectionsSchema,
  settings: WorkflowSettingsSchema.nullish().transform(
    (settings) => settings ?? WorkflowSettingsSchema.parse({}),
  ),
  staticData: MappingOrEmpty,
  createdAt: Timestamp,
  updatedAt: Timestamp,
});

export const ExecutionSchema = z.object({
  id: IntegerId,
  data: Mapping.nullish(),
  finished: z.boolean().default(false),
  mode: z.string(),
  status: z.string().nullish(),
  retryOf: IntegerId.nullish(),
  retrySuccessId: IntegerId.nullish(),
  startedAt: Timestamp,
  stoppedAt: Timestamp,
  waitTill: Timestamp,
  workflowId: IntegerId,
  customData: Mapping.nullish(),
});

export const CredentialEntitySchema = z.object({
  id: ResourceId.nullish(),
  name: z.string(),
  type: z.string(),
  data: Mapping,
  createdAt: Timestamp,
  updatedAt: Timestamp,
});

/**
 * Credentials as the server returns them. The secret payload is never echoed
 * back, so `data` falls back to an empty mapping.
 */
export const CredentialRecordSchema = CredentialEntitySchema.extend({
  data: MappingOrEmpty,
});

export const CredentialTypeSchema = z.object({
  additionalProperties: z.boolean().default(false),
  type: z.string().default("object"),
  properties: Mapping,
  required: z.array(z.string()),
});

export const AuditOptionsSchema = z.object({
  additionalOptions: Mapping.nullish(),
});

export const AuditSchema = z.object({
  credentials: Mapping.nullish(),
  database: Mapping.nullish(),
  filesystem: Mapping.nullish(),
  nodes: Mapping.nullish(),
  instance: Mapping.nullish(),
});

export function listEnvelope<T extends z.ZodTypeAny>(item: T) {
  return z.object({
    data: z.array(item),
    nextCursor: z
      .string()
      .nullish()
      .transform((cursor) => cursor ?? undefined),
  });
}

export const WorkflowListSchema = listEnvelope(WorkflowSchema);
export const ExecutionListSchema = listEnvelope(ExecutionSchema);
export const CredentialListSchema = listEnvelope(CredentialRecordSchema);
export const TagListSchema = listEnvelope(TagSchema);
