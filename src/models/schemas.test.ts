import { describe, it, expect } from "vitest";
import {
  CredentialEntitySchema,
  CredentialListSchema,
  CredentialTypeSchema,
  ExecutionSchema,
  NodeSchema,
  TagListSchema,
  WorkflowSchema,
} from "./schemas.js";
import { parseEntity } from "../utils/validation.js";
import { ValidationError } from "../utils/error-handler.js";

const trigger = {
  id: "1",
  name: "Manual Trigger",
  type: "n8n-nodes-base.manualTrigger",
  typeVersion: 1,
  position: [0, 0],
};

function validationError(fn: () => unknown): ValidationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) return error;
    throw error;
  }
  throw new Error("Expected a ValidationError");
}

describe("NodeSchema", () => {
  it("applies defaults to a minimal node", () => {
    const node = NodeSchema.parse(trigger);

    expect(node.parameters).toEqual({});
    expect(node.disabled).toBe(false);
    expect(node.notesInFlow).toBe(false);
    expect(node.executeOnce).toBe(false);
    expect(node.alwaysOutputData).toBe(false);
    expect(node.retryOnFail).toBe(false);
    expect(node.continueOnFail).toBe(false);
    expect(node.maxTries).toBeUndefined();
  });

  it("accepts fractional type versions", () => {
    expect(NodeSchema.parse({ ...trigger, typeVersion: 2.1 }).typeVersion).toBe(
      2.1,
    );
  });

  it("accepts null for unset optional fields", () => {
    const node = NodeSchema.parse({
      ...trigger,
      parameters: null,
      notes: null,
      credentials: null,
    });

    expect(node.parameters).toEqual({});
    expect(node.notes).toBeNull();
    expect(node.credentials).toBeNull();
  });

  it("rejects a position that is not an [x, y] pair", () => {
    const error = validationError(() =>
      parseEntity(NodeSchema, { ...trigger, position: [0] }, "node"),
    );

    expect(error.issues.map((issue) => issue.path)).toEqual(["position"]);
  });
});

describe("WorkflowSchema", () => {
  it("fills in settings and staticData defaults", () => {
    const workflow = WorkflowSchema.parse({
      name: "Defaults",
      nodes: [],
      connections: {},
    });

    expect(workflow.settings).toEqual({
      saveExecutionProgress: true,
      saveManualExecutions: true,
      saveDataErrorExecution: "all",
      saveDataSuccessExecution: "all",
      executionOrder: "v1",
    });
    expect(workflow.staticData).toEqual({});
  });

  it("treats null settings and staticData from the server as defaults", () => {
    const workflow = WorkflowSchema.parse({
      id: "wf1",
      name: "From server",
      nodes: [],
      connections: {},
      settings: null,
      staticData: null,
    });

    expect(workflow.settings.executionOrder).toBe("v1");
    expect(workflow.staticData).toEqual({});
  });

  it("drops unknown fields instead of rejecting them", () => {
    const workflow = WorkflowSchema.parse({
      id: "wf1",
      name: "Extra",
      nodes: [{ ...trigger, pinned: true }],
      connections: {},
      active: true,
      versionId: "v-123",
    });

    expect("active" in workflow).toBe(false);
    expect("versionId" in workflow).toBe(false);
    expect("pinned" in workflow.nodes[0]).toBe(false);
  });

  it("keeps connection targets as sent", () => {
    const connections = {
      "Manual Trigger": {
        main: [[{ node: "Next", type: "main", index: 0, extra: "kept" }]],
      },
    };
    const workflow = WorkflowSchema.parse({
      name: "Connections",
      nodes: [trigger],
      connections,
    });

    expect(workflow.connections).toEqual(connections);
  });

  it("converts numeric ids to strings", () => {
    const workflow = WorkflowSchema.parse({
      id: 12,
      name: "Legacy",
      nodes: [],
      connections: {},
    });

    expect(workflow.id).toBe("12");
  });

  it("lists every offending field path", () => {
    const error = validationError(() =>
      parseEntity(
        WorkflowSchema,
        { nodes: [{ ...trigger, type: undefined }], connections: {} },
        "workflow",
      ),
    );

    expect(error.issues).toEqual([
      { path: "name", message: "Required" },
      { path: "nodes.0.type", message: "Required" },
    ]);
    expect(error.message).toBe(
      "Invalid workflow: name (Required); nodes.0.type (Required)",
    );
  });
});

describe("ExecutionSchema", () => {
  it("decodes integer ids sent as digit strings", () => {
    const execution = ExecutionSchema.parse({
      id: "1042",
      mode: "manual",
      workflowId: "7",
      retryOf: null,
      retrySuccessId: null,
      startedAt: "2024-05-01T10:00:00.000Z",
      stoppedAt: null,
      waitTill: null,
      status: "success",
    });

    expect(execution.id).toBe(1042);
    expect(execution.workflowId).toBe(7);
    expect(execution.finished).toBe(false);
    expect(execution.retryOf).toBeNull();
    expect(execution.status).toBe("success");
  });

  it("requires id, mode and workflowId", () => {
    const error = validationError(() =>
      parseEntity(ExecutionSchema, { finished: true }, "execution"),
    );

    expect(error.issues.map((issue) => issue.path)).toEqual([
      "id",
      "mode",
      "workflowId",
    ]);
  });

  it("rejects non-numeric execution ids", () => {
    const error = validationError(() =>
      parseEntity(
        ExecutionSchema,
        { id: "abc", mode: "manual", workflowId: 1 },
        "execution",
      ),
    );

    expect(error.issues.map((issue) => issue.path)).toEqual(["id"]);
  });

  it("rejects digit-string ids beyond the safe integer range", () => {
    const error = validationError(() =>
      parseEntity(
        ExecutionSchema,
        { id: "9007199254740993", mode: "manual", workflowId: 1 },
        "execution",
      ),
    );

    expect(error.issues).toEqual([
      { path: "id", message: "Integer id exceeds the safe integer range" },
    ]);
  });
});

describe("credentials", () => {
  it("requires data when a credential is built locally", () => {
    const error = validationError(() =>
      parseEntity(
        CredentialEntitySchema,
        { name: "Slack", type: "slackApi" },
        "credential",
      ),
    );

    expect(error.issues).toEqual([{ path: "data", message: "Required" }]);
  });

  it("defaults data to an empty mapping in server responses", () => {
    const list = CredentialListSchema.parse({
      data: [{ id: "c1", name: "Slack", type: "slackApi" }],
      nextCursor: null,
    });

    expect(list.data[0].data).toEqual({});
    expect(list.nextCursor).toBeUndefined();
  });

  it("decodes a credential type schema", () => {
    const schema = CredentialTypeSchema.parse({
      type: "object",
      properties: { accessToken: { type: "string" } },
      required: ["accessToken"],
    });

    expect(schema).toEqual({
      additionalProperties: false,
      type: "object",
      properties: { accessToken: { type: "string" } },
      required: ["accessToken"],
    });
  });
});

describe("list envelopes", () => {
  it("keeps the cursor when more pages exist", () => {
    const list = TagListSchema.parse({
      data: [{ id: "t1", name: "prod" }],
      nextCursor: "MTIzZTQ1Njc=",
    });

    expect(list.data).toHaveLength(1);
    expect(list.nextCursor).toBe("MTIzZTQ1Njc=");
  });
});
