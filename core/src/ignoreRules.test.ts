import { mkdtemp, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, describe, expect, it } from "vitest";
import { createIgnoreRules, isIgnored, isPathExcluded, loadIgnoreRules } from "./ignoreRules";

let tempDir: string | null = null;

afterEach(async () => {
  if (tempDir) {
    await rm(tempDir, { recursive: true, force: true });
    tempDir = null;
  }
});

describe("default patterns", () => {
  const rules = createIgnoreRules();

  it("excludes build output", () => {
    expect(isPathExcluded(rules, "build/output.py")).toBe(true);
  });

  it("excludes dependencies at any depth", () => {
    expect(isPathExcluded(rules, "pkg/node_modules/lib/index.js")).toBe(true);
    expect(isPathExcluded(rules, "app/__pycache__/mod.py")).toBe(true);
  });

  it("keeps ordinary sources", () => {
    expect(isPathExcluded(rules, "src/app.py")).toBe(false);
    expect(isPathExcluded(rules, "src/builder.py")).toBe(false);
  });

  it("never ignores the root or paths outside it", () => {
    expect(isIgnored(rules, "")).toBe(false);
    expect(isIgnored(rules, "../build/x.py")).toBe(false);
  });
});

describe("gitignore rules", () => {
  it("prunes directories listed with a trailing slash", () => {
    const rules = createIgnoreRules([], "secret/\n*.log\n");
    expect(isPathExcluded(rules, "secret/keys.py")).toBe(true);
    expect(isPathExcluded(rules, "logs/run.log")).toBe(true);
    expect(isPathExcluded(rules, "src/secret.py")).toBe(false);
  });

  it("loads the root .gitignore when present", async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "docgap-ignore-"));
    await writeFile(path.join(tempDir, ".gitignore"), "generated/\n", "utf8");
    const rules = await loadIgnoreRules(tempDir);
    expect(isPathExcluded(rules, "generated/api.py")).toBe(true);
    expect(isPathExcluded(rules, "build/api.py")).toBe(true);
  });

  it("works without a .gitignore", async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "docgap-ignore-"));
    const rules = await loadIgnoreRules(tempDir);
    expect(rules.gitignore).toBeNull();
  });
});
