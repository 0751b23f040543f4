import { describe, it, expect } from "vitest";
import { fileURLToPath } from "url";
import { blueprintToWorkflow } from "./blueprint-mapper.js";
import { loadBlueprint } from "./blueprint-loader.js";
import { BlueprintError } from "../utils/error-handler.js";

const fixture = (name: string) =>
  fileURLToPath(new URL(`./__fixtures__/${name}`, import.meta.url));

const simple = {
  name: "My workflow",
  nodes: [
    {
      id: "1",
      name: "Manual Trigger",
      type: "n8n-nodes-base.manualTrigger",
      typeVersion: 1,
      position: [0, 0],
    },
    {
      id: "2",
      name: "Execute Command",
      type: "n8n-nodes-base.executeCommand",
      typeVersion: 1,
      position: [200, 0],
    },
  ],
  connections: {
    "Manual Trigger": {
      main: [[{ node: "Execute Command", type: "main", index: 0 }]],
    },
  },
};

describe("blueprintToWorkflow", () => {
  it("maps the sample blueprint", () => {
    const workflow = blueprintToWorkflow(simple);

    expect(workflow.name).toBe("My workflow");
    expect(workflow.nodes.map((node) => node.name)).toEqual([
      "Manual Trigger",
      "Execute Command",
    ]);
    expect(workflow.nodes[1].type).toBe("n8n-nodes-base.executeCommand");
    expect(workflow.nodes[0].parameters).toEqual({});
    expect(workflow.connections).toEqual(simple.connections);
    expect(workflow.settings.executionOrder).toBe("v1");
    expect(workflow.staticData).toEqual({});
    expect(workflow.id).toBeUndefined();
  });

  it("keeps node count, connections and execution order of a loaded file", async () => {
    const blueprint = await loadBlueprint(fixture("webhook-reply.json"));

    const workflow = blueprintToWorkflow(blueprint);

    expect(workflow.nodes).toHaveLength(2);
    expect(workflow.connections).toEqual(blueprint.connections);
    expect(workflow.settings.executionOrder).toBe("v0");
    expect(workflow.staticData).toEqual({
      lastRun: "2024-05-01T00:00:00.000Z",
    });
  });

  it("takes only the execution order from the blueprint settings", async () => {
    const workflow = blueprintToWorkflow(
      await loadBlueprint(fixture("webhook-reply.json")),
    );

    expect(workflow.settings).toEqual({
      saveExecutionProgress: true,
      saveManualExecutions: true,
      saveDataErrorExecution: "all",
      saveDataSuccessExecution: "all",
      executionOrder: "v0",
    });
  });

  it("copies node identity, position and parameters only", async () => {
    const workflow = blueprintToWorkflow(
      await loadBlueprint(fixture("webhook-reply.json")),
    );

    expect(workflow.nodes[0]).toMatchObject({
      id: "a1",
      name: "Webhook",
      type: "n8n-nodes-base.webhook",
      typeVersion: 2,
      position: [250, 300],
      parameters: {
        path: "reply",
        httpMethod: "POST",
        responseMode: "lastNode",
      },
    });
    expect(workflow.nodes[0].webhookId).toBeUndefined();
    expect(workflow.nodes[1].typeVersion).toBe(3.4);
  });

  it.each(["name", "nodes", "connections"])(
    "raises BlueprintError when %s is missing",
    (field) => {
      const blueprint: Record<string, unknown> = { ...simple };
      delete blueprint[field];

      expect(() => blueprintToWorkflow(blueprint)).toThrow(
        new BlueprintError(`Invalid blueprint document: ${field} (Required)`),
      );
    },
  );

  it("raises BlueprintError for a malformed connection target", () => {
    const error = (() => {
      try {
        blueprintToWorkflow({
          ...simple,
          connections: { "Manual Trigger": { main: [[{ node: "Execute Command" }]] } },
        });
      } catch (caught) {
        return caught;
      }
      return undefined;
    })();

    expect(error).toBeInstanceOf(BlueprintError);
    if (!(error instanceof BlueprintError)) return;
    expect(error.context).toEqual({
      issues: [
        {
          path: "connections.Manual Trigger.main.0.0.type",
          message: "Required",
        },
        {
          path: "connections.Manual Trigger.main.0.0.index",
          message: "Required",
        },
      ],
    });
  });
});
