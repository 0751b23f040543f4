import { z } from "zod";
import { WorkflowSchema } from "../models/schemas.js";
import { BlueprintError, formatIssues } from "../utils/error-handler.js";
import { toValidationIssues } from "../utils/validation.js";
import type { Workflow } from "../types/index.js";

const BlueprintNodeSchema = z.object({
  id: z.string(),
  name: z.string(),
  type: z.string(),
  typeVersion: z.number(),
  position: z.tuple([z.number(), z.number()]),
  parameters: z.record(z.unknown()).optional(),
});

const BlueprintSchema = z.object({
  name: z.string(),
  nodes: z.array(BlueprintNodeSchema),
  connections: z.record(z.unknown()),
  settings: z
    .object({ executionOrder: z.string().optional() })
    .nullish(),
  staticData: z.record(z.unknown()).nullish(),
});

export type Blueprint = z.input<typeof BlueprintSchema>;

function invalid(stage: string, error: z.ZodError): BlueprintError {
  const issues = toValidationIssues(error);
  return new BlueprintError(
    `Invalid blueprint ${stage}: ${formatIssues(issues)}`,
    { issues },
  );
}

/**
 * Convert a parsed blueprint into a Workflow.
 *
 * Nodes keep only their identity, type, position and parameters; connections
 * and staticData are copied as they are. Of the settings only executionOrder
 * is taken over, everything else keeps the workflow defaults.
 *
 * @throws BlueprintError if name, nodes or connections are missing or malformed
 */
export function blueprintToWorkflow(blueprint: unknown): Workflow {
  const parsed = BlueprintSchema.safeParse(blueprint);
  if (!parsed.success) {
    throw invalid("document", parsed.error);
  }
  const { name, nodes, connections, settings, staticData } = parsed.data;

  const workflow = WorkflowSchema.safeParse({
    name,
    nodes: nodes.map((node) => ({
      id: node.id,
      name: node.name,
      type: node.type,
      typeVersion: node.typeVersion,
      position: node.position,
      parameters: node.parameters ?? {},
    })),
    connections,
    settings: { executionOrder: settings?.executionOrder ?? "v1" },
    staticData: staticData ?? {},
  });
  if (!workflow.success) {
    throw invalid("workflow", workflow.error);
  }

  return workflow.data;
}
