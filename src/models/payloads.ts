/**
 * Submit views: the request bodies sent for create/update calls.
 *
 * Server-managed fields (`id`, `createdAt`, `updatedAt`) are never part of a
 * payload. Unset optional fields are left `undefined`, which JSON.stringify
 * omits, so the server applies its own defaults.
 */

import type {
  AuditOptions,
  Credential,
  Tag,
  Workflow,
  WorkflowConnections,
  WorkflowNode,
  WorkflowSettings,
} from "../types/n8n.js";

export interface NodePayload {
  id: string;
  name: string;
  type: string;
  typeVersion: number;
  position: [number, number];
  parameters: Record<string, unknown>;
  webhookId?: string;
  disabled: boolean;
  notesInFlow: boolean;
  notes?: string;
  executeOnce: boolean;
  alwaysOutputData: boolean;
  retryOnFail: boolean;
  maxTries?: number;
  waitBetweenTries?: number;
  continueOnFail: boolean;
  onError?: string;
  credentials?: Record<string, unknown>;
}

export interface WorkflowSettingsPayload {
  saveExecutionProgress: boolean;
  saveManualExecutions: boolean;
  saveDataErrorExecution: string;
  saveDataSuccessExecution: string;
  executionTimeout?: number;
  errorWorkflow?: string;
  timezone?: string;
  executionOrder: string;
}

export interface WorkflowPayload {
  name: string;
  nodes: NodePayload[];
  connections: WorkflowConnections;
  settings: WorkflowSettingsPayload;
  staticData: Record<string, unknown>;
}

export interface CredentialPayload {
  name: string;
  type: string;
  data: Record<string, unknown>;
}

export interface TagPayload {
  name: string;
}

export interface AuditOptionsPayload {
  additionalOptions?: Record<string, unknown>;
}

export function toNodePayload(node: WorkflowNode): NodePayload {
  return {
    id: node.id,
    name: node.name,
    type: node.type,
    typeVersion: node.typeVersion,
    position: node.position,
    parameters: node.parameters,
    webhookId: node.webhookId ?? undefined,
    disabled: node.disabled,
    notesInFlow: node.notesInFlow,
    notes: node.notes ?? undefined,
    executeOnce: node.executeOnce,
    alwaysOutputData: node.alwaysOutputData,
    retryOnFail: node.retryOnFail,
    maxTries: node.maxTries ?? undefined,
    waitBetweenTries: node.waitBetweenTries ?? undefined,
    continueOnFail: node.continueOnFail,
    onError: node.onError ?? undefined,
    credentials: node.credentials ?? undefined,
  };
}

export function toSettingsPayload(
  settings: WorkflowSettings,
): WorkflowSettingsPayload {
  return {
    saveExecutionProgress: settings.saveExecutionProgress,
    saveManualExecutions: settings.saveManualExecutions,
    saveDataErrorExecution: settings.saveDataErrorExecution,
    saveDataSuccessExecution: settings.saveDataSuccessExecution,
    executionTimeout: settings.executionTimeout ?? undefined,
    errorWorkflow: settings.errorWorkflow ?? undefined,
    timezone: settings.timezone ?? undefined,
    executionOrder: settings.executionOrder,
  };
}

export function toWorkflowPayload(workflow: Workflow): WorkflowPayload {
  return {
    name: workflow.name,
    nodes: workflow.nodes.map(toNodePayload),
    connections: workflow.connections,
    settings: toSettingsPayload(workflow.settings),
    staticData: workflow.staticData,
  };
}

export function toCredentialPayload(credential: Credential): CredentialPayload {
  return {
    name: credential.name,
    type: credential.type,
    data: credential.data,
  };
}

export function toTagPayload(tag: Tag): TagPayload {
  return { name: tag.name };
}

export function toAuditOptionsPayload(
  options: AuditOptions,
): AuditOptionsPayload {
  return { additionalOptions: options.additionalOptions ?? undefined };
}
