import fs from "node:fs/promises";
import path from "node:path";
import { WORKSPACE_MAX_DEPTH } from "../config/defaults.js";
import type { WorkspaceIndex, WorkspaceItems } from "./types.js";

const PLATFORM_FILE = ".platform";

/**
 * Folders holding a `.platform` file, searched at most `maxDepth` levels
 * below `rootPath`. An item folder is not searched further.
 */
export async function listPlatformFolders(
  rootPath: string,
  maxDepth: number = WORKSPACE_MAX_DEPTH,
): Promise<string[]> {
  const folders: string[] = [];
  await collectPlatformFolders(path.resolve(rootPath), maxDepth, folders);
  folders.sort((a, b) => a.localeCompare(b));
  return folders;
}

async function collectPlatformFolders(
  currentPath: string,
  depth: number,
  folders: string[],
): Promise<void> {
  if (await isFile(path.join(currentPath, PLATFORM_FILE))) {
    folders.push(currentPath);
    return;
  }
  if (depth === 0) {
    return;
  }

  const entries = await fs.readdir(currentPath, { withFileTypes: true });
  for (const entry of entries) {
    if (!entry.isDirectory()) {
      continue;
    }
    await collectPlatformFolders(
      path.join(currentPath, entry.name),
      depth - 1,
      folders,
    );
  }
}

export async function readItemType(
  itemPath: string,
): Promise<string | undefined> {
  let raw: string;
  try {
    raw = await fs.readFile(path.join(itemPath, PLATFORM_FILE), "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return undefined;
    }
    throw error;
  }

  let doc: unknown;
  try {
    doc = JSON.parse(raw);
  } catch {
    return undefined;
  }
  if (!isRecord(doc) || !isRecord(doc.metadata)) {
    return undefined;
  }
  const type = doc.metadata.type;
  return typeof type === "string" ? type : undefined;
}

export async function listItems(
  rootPath: string,
  maxDepth: number = WORKSPACE_MAX_DEPTH,
): Promise<WorkspaceIndex> {
  const itemFolders = await listPlatformFolders(rootPath, maxDepth);
  const grouped = new Map<
    string,
    { semanticModels: string[]; reports: string[] }
  >();

  for (const folder of itemFolders) {
    const parent = path.dirname(folder);
    let items = grouped.get(parent);
    if (!items) {
      items = { semanticModels: [], reports: [] };
      grouped.set(parent, items);
    }

    const type = await readItemType(folder);
    if (type === "SemanticModel") {
      items.semanticModels.push(folder);
    } else if (type === "Report") {
      items.reports.push(folder);
    }
  }

  return new Map<string, WorkspaceItems>(grouped);
}

async function isFile(targetPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(targetPath);
    return stats.isFile();
  } catch {
    return false;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
