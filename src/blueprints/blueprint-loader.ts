import { readFile } from "fs/promises";
import type { Logger } from "winston";
import { z } from "zod";
import { BlueprintError } from "../utils/error-handler.js";
import { createSilentLogger } from "../utils/logger.js";

const BlueprintDocumentSchema = z.record(z.unknown());

/**
 * Read a workflow blueprint (an exported workflow JSON document) from disk.
 * The document is only parsed here; blueprintToWorkflow() validates it.
 * @param log - Receives a trace of the load; silent by default
 * @throws BlueprintError if the file is missing, unreadable or not a JSON object
 */
export async function loadBlueprint(
  filePath: string,
  log: Logger = createSilentLogger(),
): Promise<Record<string, unknown>> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      throw new BlueprintError(
        `Blueprint file does not exist: ${filePath}`,
        { filePath },
        { cause: error },
      );
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new BlueprintError(
      `Failed to read blueprint ${filePath}: ${message}`,
      { filePath },
      { cause: error },
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new BlueprintError(
      `Invalid JSON in blueprint ${filePath}: ${message}`,
      { filePath },
      { cause: error },
    );
  }

  const document = BlueprintDocumentSchema.safeParse(parsed);
  if (!document.success) {
    throw new BlueprintError(
      `Blueprint ${filePath} must contain a JSON object`,
      { filePath },
    );
  }

  log.debug("Loaded blueprint", { filePath });
  return document.data;
}
