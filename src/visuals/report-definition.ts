import fs from "node:fs/promises";
import path from "node:path";
import { REPORT_DEFINITION_FILE } from "../config/defaults.js";
import { collaboratorError } from "../errors/linter-error.js";

/** Number of visual containers across all pages of a report folder. */
export async function countVisuals(reportRoot: string): Promise<number> {
  const filePath = path.join(reportRoot, REPORT_DEFINITION_FILE);
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (error) {
    throw collaboratorError(
      `Failed to read report definition ${filePath}: ${errorMessage(error)}`,
      error,
    );
  }

  let doc: unknown;
  try {
    doc = JSON.parse(stripBom(raw));
  } catch (error) {
    throw collaboratorError(
      `Report definition is not valid JSON: ${errorMessage(error)}`,
      error,
    );
  }

  if (!isRecord(doc) || !Array.isArray(doc.sections)) {
    return 0;
  }
  let visuals = 0;
  for (const section of doc.sections) {
    if (isRecord(section) && Array.isArray(section.visualContainers)) {
      visuals += section.visualContainers.length;
    }
  }
  return visuals;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function stripBom(raw: string): string {
  return raw.charCodeAt(0) === 0xfeff ? raw.slice(1) : raw;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
