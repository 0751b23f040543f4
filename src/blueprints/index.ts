import { loadBlueprint } from "./blueprint-loader.js";
import { blueprintToWorkflow } from "./blueprint-mapper.js";
import type { N8nClient } from "../services/n8n-api-client.js";
import type { Workflow } from "../types/index.js";

export { loadBlueprint } from "./blueprint-loader.js";
export { blueprintToWorkflow, type Blueprint } from "./blueprint-mapper.js";

/**
 * Load a blueprint file and create the workflow it describes.
 * Traces go to the client's logger.
 * @param name - Overrides the blueprint's own name
 * @returns The workflow as created by the server, including its id
 */
export async function createWorkflowFromBlueprint(
  client: Pick<N8nClient, "workflows" | "logger">,
  filePath: string,
  name?: string,
): Promise<Workflow> {
  const blueprint = await loadBlueprint(filePath, client.logger);
  const workflow = blueprintToWorkflow(blueprint);

  if (name) {
    workflow.name = name;
  }

  client.logger.debug("Creating workflow from blueprint", {
    filePath,
    name: workflow.name,
    nodes: workflow.nodes.length,
  });
  return client.workflows.create(workflow);
}
