/**
 * n8n REST client
 *
 * Main entry point for programmatic usage.
 * For CLI usage, see src/scripts/n8n-workflows.ts and src/scripts/cli.ts
 */

// Client exports
export {
  N8nClient,
  withN8nClient,
  createN8nClientFromEnv,
  clientConfigFromEnv,
} from "./services/n8n-api-client.js";
export type { N8nClientConfig, FetchLike } from "./services/n8n-api-client.js";

// Resource exports
export {
  BaseResource,
  DEFAULT_PAGE_LIMIT,
} from "./resources/base-resource.js";
export type {
  HttpMethod,
  N8nTransport,
  QueryValue,
  RequestOptions,
} from "./resources/base-resource.js";
export { WorkflowsResource } from "./resources/workflows.js";
export { ExecutionsResource } from "./resources/executions.js";
export { CredentialsResource } from "./resources/credentials.js";
export { TagsResource } from "./resources/tags.js";
export { AuditResource } from "./resources/audit.js";

// Blueprint exports
export {
  loadBlueprint,
  blueprintToWorkflow,
  createWorkflowFromBlueprint,
} from "./blueprints/index.js";
export type { Blueprint } from "./blueprints/index.js";

// Model exports
export {
  TagSchema,
  NodeSchema,
  ConnectionSchema,
  ConnectionsSchema,
  WorkflowSettingsSchema,
  WorkflowSchema,
  ExecutionSchema,
  CredentialEntitySchema,
  CredentialRecordSchema,
  CredentialTypeSchema,
  AuditOptionsSchema,
  AuditSchema,
  WorkflowListSchema,
  ExecutionListSchema,
  CredentialListSchema,
  TagListSchema,
} from "./models/schemas.js";
export {
  toWorkflowPayload,
  toNodePayload,
  toSettingsPayload,
  toCredentialPayload,
  toTagPayload,
  toAuditOptionsPayload,
} from "./models/payloads.js";
export type {
  WorkflowPayload,
  NodePayload,
  WorkflowSettingsPayload,
  CredentialPayload,
  TagPayload,
  AuditOptionsPayload,
} from "./models/payloads.js";

// Utility exports
export {
  logger,
  configureLogger,
  createChildLogger,
  createSilentLogger,
} from "./utils/logger.js";
export { loadConfig, getConfig, MAX_TIMEOUT_MS } from "./utils/config.js";
export { parseEntity } from "./utils/validation.js";
export {
  N8nClientError,
  ConnectionError,
  ApiError,
  ValidationError,
  BlueprintError,
  handleError,
} from "./utils/error-handler.js";

// Type exports
export type {
  Tag,
  TagInput,
  WorkflowNode,
  WorkflowNodeInput,
  Connection,
  WorkflowConnections,
  WorkflowSettings,
  WorkflowSettingsInput,
  Workflow,
  WorkflowInput,
  Execution,
  ExecutionStatus,
  Credential,
  CredentialInput,
  CredentialSchema,
  Audit,
  AuditOptions,
  AuditOptionsInput,
  WorkflowList,
  ExecutionList,
  CredentialList,
  TagList,
  PaginationOptions,
  ExecutionFilterOptions,
  ExecutionGetOptions,
  Config,
  ValidationIssue,
  ErrorReport,
} from "./types/index.js";
