import * as fs from "node:fs/promises";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ConfigurationError, ContextError, PathTraversalError } from "../core/errors.js";
import { RollupManager, type RollupOptions } from "../core/RollupManager.js";
import type { FileResult } from "../core/types.js";
import { exists, fakeMetaReader, readText, tempDir, writeTree } from "./helpers.js";
import { ROLLUP_YAML, writeTemplate } from "./fixtures.js";

const outcomes = (files: FileResult[]) =>
  Object.fromEntries(files.map((file) => [file.relativePath, file.outcome]));

describe("RollupManager", () => {
  let templateDir: string;
  let targetDir: string;

  const rollup = (options: Partial<RollupOptions> = {}) =>
    new RollupManager({
      templateDir,
      targetDir,
      noInput: true,
      metaReader: fakeMetaReader(),
      ...options,
    }).rollup();

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    templateDir = await tempDir("rollup-template-");
    targetDir = await tempDir("rollup-target-");
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(templateDir, { recursive: true, force: true });
    await fs.rm(targetDir, { recursive: true, force: true });
  });

  it("creates a new project", async () => {
    await writeTemplate(templateDir);

    const report = await rollup({ extraContext: { project_dest: "demo" } });

    expect(report.isNewProject).toBe(true);
    expect(report.context).toEqual({ project_dest: "demo" });
    expect(report.files).toEqual([
      { relativePath: ".gitignore", strategy: "SortedUniqueLines", outcome: "created" },
      { relativePath: ".keep-local", strategy: "Ignore", outcome: "skipped" },
      { relativePath: ".template-rollup.conf", strategy: "Overwrite", outcome: "created" },
      { relativePath: "README.md", strategy: "IfMissing", outcome: "created" },
      { relativePath: "demo/__init__.py", strategy: "Overwrite", outcome: "created" },
      { relativePath: "setup.cfg", strategy: "SetupCfgMerge", outcome: "created" },
    ]);

    expect(await readText(targetDir, ".gitignore")).toBe("*.pyc\nenv/\n");
    expect(await readText(targetDir, "README.md")).toBe("# demo\n");
    expect(await readText(targetDir, "demo/__init__.py")).toBe("VERSION = '1'\n");
    expect(await readText(targetDir, "setup.cfg")).toBe("[metadata]\nname = demo\n");
    expect(await readText(targetDir, ".template-rollup.conf")).toBe(
      "[template_context]\nproject_dest = demo\n",
    );
    expect(await exists(targetDir, ".keep-local")).toBe(false);
  });

  it("changes nothing when rolled up twice", async () => {
    await writeTemplate(templateDir);
    await rollup({ extraContext: { project_dest: "demo" } });

    const report = await rollup();

    expect(report.isNewProject).toBe(false);
    expect(report.context).toEqual({ project_dest: "demo" });
    expect(outcomes(report.files)).toEqual({
      ".gitignore": "unchanged",
      ".keep-local": "skipped",
      ".template-rollup.conf": "unchanged",
      "README.md": "unchanged",
      "demo/__init__.py": "unchanged",
      "setup.cfg": "unchanged",
    });
  });

  it("merges into an existing project", async () => {
    await writeTemplate(templateDir);
    await writeTree(targetDir, {
      ".template-rollup.conf": "[template_context]\nproject_dest = demo\n",
      ".gitignore": "ENV/\r\nbuild/\r\n",
      ".keep-local": "mine\n",
      "README.md": "custom\n",
      "setup.cfg": "[metadata]\nname = old\nurl = https://example.org\n",
      "only-target.txt": "keep\n",
    });

    const report = await rollup();

    expect(outcomes(report.files)).toEqual({
      ".gitignore": "updated",
      ".keep-local": "skipped",
      ".template-rollup.conf": "unchanged",
      "README.md": "unchanged",
      "demo/__init__.py": "created",
      "setup.cfg": "updated",
    });
    expect(await readText(targetDir, ".gitignore")).toBe("*.pyc\r\nENV/\r\nbuild/\r\nenv/\r\n");
    expect(await readText(targetDir, "setup.cfg")).toBe(
      "[metadata]\nname = demo\nurl = https://example.org\n",
    );
    expect(await readText(targetDir, "README.md")).toBe("custom\n");
    expect(await readText(targetDir, ".keep-local")).toBe("mine\n");
    expect(await readText(targetDir, "only-target.txt")).toBe("keep\n");
  });

  it("keeps the target's line endings when overwriting a text file", async () => {
    await writeTemplate(templateDir, { LICENSE: "MIT\n" });
    await writeTree(targetDir, {
      ".template-rollup.conf": "[template_context]\nproject_dest = demo\n",
      LICENSE: "MIT\r\nold\r\n",
    });

    const report = await rollup();

    expect(outcomes(report.files).LICENSE).toBe("updated");
    expect(await readText(targetDir, "LICENSE")).toBe("MIT\r\n");
  });

  it("writes nothing on a dry run", async () => {
    await writeTemplate(templateDir);

    const report = await rollup({ extraContext: { project_dest: "demo" }, dryRun: true });

    expect(outcomes(report.files)["setup.cfg"]).toBe("created");
    expect(await fs.readdir(targetDir)).toEqual([]);
  });

  it("requires context for a new project without input", async () => {
    await writeTemplate(templateDir);

    await expect(rollup()).rejects.toThrow(ContextError);
    await expect(rollup()).rejects.toThrow(
      ".template-rollup.conf: not found in the target project; " +
        "pass the context explicitly or run interactively",
    );
  });

  it("prompts for variables when input is allowed", async () => {
    await writeTemplate(templateDir);
    const prompt = vi.fn(async () => "prompted");

    const report = await rollup({ noInput: false, prompt });

    expect(prompt).toHaveBeenCalledWith("project_dest", "demo");
    expect(report.context).toEqual({ project_dest: "prompted" });
    expect(await readText(targetDir, "prompted/__init__.py")).toBe("VERSION = '1'\n");
  });

  it("copies binary files and modes into the target", async () => {
    const binary = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0xff, 0x00]);
    await writeTemplate(templateDir, { "assets/logo.png": binary, "run.sh": "#!/bin/sh\n" });
    await fs.chmod(path.join(templateDir, "project", "run.sh"), 0o755);

    await rollup({ extraContext: { project_dest: "demo" } });

    expect(await fs.readFile(path.join(targetDir, "assets", "logo.png"))).toEqual(binary);
    const { mode } = await fs.stat(path.join(targetDir, "run.sh"));
    expect(mode & 0o777).toBe(0o755);
  });

  it("refuses paths that leave the target", async () => {
    await writeTemplate(templateDir);

    await expect(rollup({ extraContext: { project_dest: "../escape" } })).rejects.toThrow(
      PathTraversalError,
    );
  });

  it("validates strategies before touching any file", async () => {
    await writeTemplate(
      templateDir,
      {},
      `${ROLLUP_YAML}  ^docs/: {strategy: SortedUniqueLines, config: {comment_pattern: "("}}\n`,
    );

    await expect(rollup({ extraContext: { project_dest: "demo" } })).rejects.toThrow(
      ConfigurationError,
    );
    expect(await fs.readdir(targetDir)).toEqual([]);
  });

  it("stamps TemplateHash files with the template commit", async () => {
    await writeTemplate(
      templateDir,
      { "ci.yml": "stages: [test]\n" },
      `${ROLLUP_YAML}  ^ci\\.yml$: TemplateHash\n`,
    );

    await rollup({ extraContext: { project_dest: "demo" } });
    await writeTree(targetDir, {
      "ci.yml":
        "stages: [test, deploy]\n\n# Generated by template-rollup\n" +
        "# From https://github.com/acme/template/commit/abc123\n",
    });
    const report = await rollup();

    expect(outcomes(report.files)["ci.yml"]).toBe("skipped");
  });

  it("passes whether the project is new to IfNewProject", async () => {
    await writeTemplate(
      templateDir,
      { "CHANGELOG.md": "# Changelog\n" },
      `${ROLLUP_YAML}  ^CHANGELOG\\.md$: IfNewProject\n`,
    );

    await rollup({ extraContext: { project_dest: "demo" } });
    await fs.rm(path.join(targetDir, "CHANGELOG.md"));
    const report = await rollup();

    expect(outcomes(report.files)["CHANGELOG.md"]).toBe("skipped");
    expect(await exists(targetDir, "CHANGELOG.md")).toBe(false);
  });
});
