import fs from "node:fs/promises";
import path from "node:path";
import type { BestPracticeRule, LogSink, RuleCollection } from "./types.js";

export interface RuleSourceOptions {
  readonly log: LogSink;
  readonly fetchImpl?: typeof fetch;
}

/**
 * Loads a rule collection from an http(s) URL or a local JSON file.
 *
 * Never throws for an unreachable or malformed source: the caller cannot
 * tell those apart from an empty collection and treats all of them the same
 * way. The reason ends up in `issues` and in the log sink.
 */
export async function loadRuleCollection(
  source: string,
  options: RuleSourceOptions,
): Promise<RuleCollection> {
  const issues: string[] = [];
  const report = (issue: string): void => {
    issues.push(issue);
    options.log.write(issue);
  };

  const raw = isRemoteSource(source)
    ? await fetchRuleDocument(source, options.fetchImpl ?? fetch, report)
    : await readRuleDocument(source, report);
  if (raw === null) {
    return { source, rules: [], issues };
  }

  const rules = parseRuleDocument(raw, report);
  options.log.write(`Loaded ${rules.length} rules from ${source}`);
  return { source, rules, issues };
}

export function parseRuleDocument(
  raw: string,
  report: (issue: string) => void,
): BestPracticeRule[] {
  let doc: unknown;
  try {
    doc = JSON.parse(stripBom(raw));
  } catch (error) {
    report(`Rule document is not valid JSON: ${errorMessage(error)}`);
    return [];
  }

  if (!Array.isArray(doc)) {
    report("Rule document must be a JSON array of rules");
    return [];
  }

  const rules: BestPracticeRule[] = [];
  doc.forEach((entry: unknown, index) => {
    if (isBestPracticeRule(entry)) {
      rules.push(entry);
      return;
    }
    report(`Skipping rule at index ${index}: missing ID or Severity`);
  });
  return rules;
}

export function isRemoteSource(source: string): boolean {
  try {
    const url = new URL(source);
    return url.protocol === "https:" || url.protocol === "http:";
  } catch {
    return false;
  }
}

async function fetchRuleDocument(
  url: string,
  fetchImpl: typeof fetch,
  report: (issue: string) => void,
): Promise<string | null> {
  try {
    const response = await fetchImpl(url, {
      method: "GET",
      headers: { accept: "application/json" },
    });
    if (!response.ok) {
      report(`Failed to fetch rules from ${url}: HTTP ${response.status}`);
      return null;
    }
    return await response.text();
  } catch (error) {
    report(`Failed to fetch rules from ${url}: ${errorMessage(error)}`);
    return null;
  }
}

async function readRuleDocument(
  filePath: string,
  report: (issue: string) => void,
): Promise<string | null> {
  const resolved = path.resolve(filePath);
  try {
    return await fs.readFile(resolved, "utf8");
  } catch (error) {
    report(`Failed to read rules from ${resolved}: ${errorMessage(error)}`);
    return null;
  }
}

function isBestPracticeRule(value: unknown): value is BestPracticeRule {
  return (
    isRecord(value) &&
    typeof value.ID === "string" &&
    value.ID.length > 0 &&
    typeof value.Severity === "number"
  );
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
