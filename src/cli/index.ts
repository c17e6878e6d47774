#!/usr/bin/env node
import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { createProgram } from "./program.js";

const program = createProgram({ version: await loadVersion() });
await program.parseAsync(process.argv);

async function loadVersion(): Promise<string> {
  const dir = path.dirname(fileURLToPath(import.meta.url));
  const rootPath = path.resolve(dir, "..", "..");
  const raw = await fs.readFile(path.join(rootPath, "package.json"), "utf8");
  const json: unknown = JSON.parse(raw);
  if (
    json &&
    typeof json === "object" &&
    "version" in json &&
    typeof json.version === "string"
  ) {
    return json.version;
  }
  return "0.0.0";
}
