import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CapturedLog, discardSink } from "../../src/analyzer/log-sink.js";
import {
  isRemoteSource,
  loadRuleCollection,
} from "../../src/analyzer/rule-source.js";

const RULES_URL = "https://rules.test/bpa.json";

const ruleDocument = [
  {
    ID: "AVOID_FLOATING_POINT_DATA_TYPES",
    Name: "Do not use floating point data types",
    Severity: 2,
    Scope: "DataColumn",
    Expression: 'DataType = "Double"',
  },
  { ID: "HIDE_FOREIGN_KEYS", Severity: 3 },
  { Name: "Rule without an identifier", Severity: 1 },
];

function respondWith(body: string, status = 200): {
  fetchImpl: typeof fetch;
  requested: string[];
} {
  const requested: string[] = [];
  const fetchImpl: typeof fetch = async (input) => {
    requested.push(String(input));
    return new Response(body, { status });
  };
  return { fetchImpl, requested };
}

let tempDir: string;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "bpa-score-rules-"));
});

afterEach(async () => {
  if (tempDir) {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
});

describe("rule source", () => {
  it("fetches rules and drops entries without ID or Severity", async () => {
    const { fetchImpl, requested } = respondWith(JSON.stringify(ruleDocument));
    const log = new CapturedLog();

    const collection = await loadRuleCollection(RULES_URL, { log, fetchImpl });

    expect(requested).toEqual([RULES_URL]);
    expect(collection.source).toBe(RULES_URL);
    expect(collection.rules.map((rule) => rule.ID)).toEqual([
      "AVOID_FLOATING_POINT_DATA_TYPES",
      "HIDE_FOREIGN_KEYS",
    ]);
    expect(collection.rules[0]?.Expression).toBe('DataType = "Double"');
    expect(collection.issues).toEqual([
      "Skipping rule at index 2: missing ID or Severity",
    ]);
    expect(log.close()).toEqual([
      "Skipping rule at index 2: missing ID or Severity",
      `Loaded 2 rules from ${RULES_URL}`,
    ]);
  });

  it("accepts a document with a byte order mark", async () => {
    const { fetchImpl } = respondWith(
      "\uFEFF" + JSON.stringify([{ ID: "A", Severity: 1 }]),
    );
    const collection = await loadRuleCollection(RULES_URL, {
      log: discardSink,
      fetchImpl,
    });
    expect(collection.rules).toHaveLength(1);
    expect(collection.issues).toEqual([]);
  });

  it("returns no rules when the request fails", async () => {
    const fetchImpl: typeof fetch = async () => {
      throw new Error("offline");
    };
    const collection = await loadRuleCollection(RULES_URL, {
      log: discardSink,
      fetchImpl,
    });
    expect(collection.rules).toEqual([]);
    expect(collection.issues).toEqual([
      `Failed to fetch rules from ${RULES_URL}: offline`,
    ]);
  });

  it("returns no rules for a non-success status", async () => {
    const { fetchImpl } = respondWith("not found", 404);
    const collection = await loadRuleCollection(RULES_URL, {
      log: discardSink,
      fetchImpl,
    });
    expect(collection.rules).toEqual([]);
    expect(collection.issues).toEqual([
      `Failed to fetch rules from ${RULES_URL}: HTTP 404`,
    ]);
  });

  it("returns no rules for malformed documents", async () => {
    const invalid = await loadRuleCollection(RULES_URL, {
      log: discardSink,
      fetchImpl: respondWith("<html>").fetchImpl,
    });
    expect(invalid.rules).toEqual([]);
    expect(invalid.issues[0]).toMatch(/^Rule document is not valid JSON: /);

    const notArray = await loadRuleCollection(RULES_URL, {
      log: discardSink,
      fetchImpl: respondWith('{"rules":[]}').fetchImpl,
    });
    expect(notArray.rules).toEqual([]);
    expect(notArray.issues).toEqual([
      "Rule document must be a JSON array of rules",
    ]);
  });

  it("treats an empty array as an empty collection", async () => {
    const collection = await loadRuleCollection(RULES_URL, {
      log: discardSink,
      fetchImpl: respondWith("[]").fetchImpl,
    });
    expect(collection.rules).toEqual([]);
    expect(collection.issues).toEqual([]);
  });

  it("reads rules from a local file", async () => {
    const rulesPath = path.join(tempDir, "BPARules.json");
    await fs.writeFile(rulesPath, JSON.stringify(ruleDocument), "utf8");

    const collection = await loadRuleCollection(rulesPath, {
      log: discardSink,
    });
    expect(collection.rules).toHaveLength(2);
  });

  it("reports a missing local file", async () => {
    const rulesPath = path.join(tempDir, "missing.json");
    const collection = await loadRuleCollection(rulesPath, {
      log: discardSink,
    });
    expect(collection.rules).toEqual([]);
    expect(collection.issues[0]).toContain(
      `Failed to read rules from ${rulesPath}`,
    );
  });

  it("recognises remote sources", () => {
    expect(isRemoteSource("https://example.com/rules.json")).toBe(true);
    expect(isRemoteSource("http://example.com/rules.json")).toBe(true);
    expect(isRemoteSource("./rules/BPARules.json")).toBe(false);
    expect(isRemoteSource("C:\\rules\\BPARules.json")).toBe(false);
  });
});
