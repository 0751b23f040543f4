/**
 * n8n API Types
 * Based on n8n REST API v1
 */

import type { z } from 'zod';
import type {
  AuditOptionsSchema,
  AuditSchema,
  ConnectionSchema,
  ConnectionsSchema,
  CredentialEntitySchema,
  CredentialListSchema,
  CredentialRecordSchema,
  CredentialTypeSchema,
  ExecutionListSchema,
  ExecutionSchema,
  NodeSchema,
  TagListSchema,
  TagSchema,
  WorkflowListSchema,
  WorkflowSchema,
  WorkflowSettingsSchema,
} from '../models/schemas.js';

// Decoded entities (defaults applied)
export type Tag = z.output<typeof TagSchema>;
export type WorkflowNode = z.output<typeof NodeSchema>;
export type Connection = z.output<typeof ConnectionSchema>;
export type WorkflowConnections = z.output<typeof ConnectionsSchema>;
export type WorkflowSettings = z.output<typeof WorkflowSettingsSchema>;
export type Workflow = z.output<typeof WorkflowSchema>;
export type Execution = z.output<typeof ExecutionSchema>;
export type Credential = z.output<typeof CredentialRecordSchema>;
export type CredentialSchema = z.output<typeof CredentialTypeSchema>;
export type Audit = z.output<typeof AuditSchema>;
export type AuditOptions = z.output<typeof AuditOptionsSchema>;

// Caller-built entities: fields with defaults may be left out
export type TagInput = z.input<typeof TagSchema>;
export type WorkflowNodeInput = z.input<typeof NodeSchema>;
export type WorkflowSettingsInput = z.input<typeof WorkflowSettingsSchema>;
export type WorkflowInput = z.input<typeof WorkflowSchema>;
export type CredentialInput = z.input<typeof CredentialEntitySchema>;
export type AuditOptionsInput = z.input<typeof AuditOptionsSchema>;

// List envelopes; `nextCursor` is absent on the last page
export type WorkflowList = z.output<typeof WorkflowListSchema>;
export type ExecutionList = z.output<typeof ExecutionListSchema>;
export type CredentialList = z.output<typeof CredentialListSchema>;
export type TagList = z.output<typeof TagListSchema>;

// Execution status as reported by the server
export type ExecutionStatus =
  | 'canceled'
  | 'crashed'
  | 'error'
  | 'new'
  | 'running'
  | 'success'
  | 'unknown'
  | 'waiting';

// Pagination options
export interface PaginationOptions {
  limit?: number;
  cursor?: string;
}

// Execution filter options
export interface ExecutionFilterOptions extends PaginationOptions {
  status?: ExecutionStatus;
  workflowId?: string | number;
  includeData?: boolean;
}

export interface ExecutionGetOptions {
  includeData?: boolean;
}
