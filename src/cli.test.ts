import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdir, mkdtemp, readFile, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { parseFormats, runCli } from "./cli.js";
import { getConfig, type AppConfig } from "./config/env.js";
import { resetEngineConfig } from "./services/ruleRegistry.js";
import { CATEGORIES_YAML, RULES_YAML, STANDARD_CHARTERED_TEXT } from "./test-utils/fixtures.js";

describe("parseFormats", () => {
  it("defaults to every format", () => {
    expect(parseFormats(undefined)).toEqual(["csv", "xlsx", "json"]);
  });

  it("accepts a comma separated subset in canonical order", () => {
    expect(parseFormats("JSON, csv")).toEqual(["csv", "json"]);
  });

  it("rejects unknown formats", () => {
    expect(() => parseFormats("csv,ods")).toThrow("Unknown export format(s): ods");
  });
});

describe("runCli", () => {
  let tempDir: string;
  let config: AppConfig;

  beforeEach(async () => {
    resetEngineConfig();
    tempDir = await mkdtemp(path.join(os.tmpdir(), "ledger-cli-"));
    await mkdir(path.join(tempDir, "statements"));
    await writeFile(path.join(tempDir, "rules.yaml"), RULES_YAML);
    await writeFile(path.join(tempDir, "categories.yaml"), CATEGORIES_YAML);
    config = {
      ...getConfig({}),
      bankRulesFile: path.join(tempDir, "rules.yaml"),
      categoryMappingFile: path.join(tempDir, "categories.yaml"),
      statementsDir: path.join(tempDir, "statements"),
      outputDir: path.join(tempDir, "csv"),
      maxWorkers: 2,
    };
  });

  afterEach(async () => {
    resetEngineConfig();
    await rm(tempDir, { recursive: true, force: true });
  });

  it("processes the statements directory and writes the requested exports", async () => {
    await writeFile(path.join(config.statementsDir, "jan.txt"), STANDARD_CHARTERED_TEXT);
    await writeFile(path.join(config.statementsDir, "notes.md"), "ignored");

    const result = await runCli(["--formats", "csv"], config);

    expect(result.exitCode).toBe(0);
    expect(result.summary?.diagnostic).toBe("ok");
    expect(result.summary?.documents.map((doc) => doc.fileName)).toEqual(["jan.txt"]);
    expect(result.written).toHaveLength(1);
    expect(path.dirname(result.written[0])).toBe(config.outputDir);
    expect(path.basename(result.written[0])).toMatch(/^transactions_\d{8}\.csv$/);

    const csv = await readFile(result.written[0], "utf-8");
    expect(csv.split("\n")[1]).toBe("Standard Chartered,2024-12-12,23.40,GRABFOOD SINGAPORE,Dining");
  });

  it("takes the input and output directories from flags", async () => {
    const input = path.join(tempDir, "elsewhere");
    await mkdir(input);

    const result = await runCli(["--input", input, "--output", path.join(tempDir, "out")], config);

    expect(result.exitCode).toBe(0);
    expect(result.summary?.diagnostic).toBe("no-documents");
    expect(result.written).toEqual([]);
  });

  it("exits with 1 when the rule file is missing", async () => {
    const result = await runCli([], { ...config, bankRulesFile: path.join(tempDir, "missing.yaml") });

    expect(result).toEqual({ exitCode: 1, written: [] });
  });
});
