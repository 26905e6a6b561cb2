import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import type { TemplateMetaReader } from "../core/TemplateMetaReader.js";
import type { StrategyInput, TemplateMeta } from "../core/types.js";

export const meta: TemplateMeta = {
  projectUrl: "https://github.com/acme/template",
  commitHash: "abc123",
  commitUrl: "https://github.com/acme/template/commit/abc123",
  isDirty: false,
  headRef: "main",
};

export const fakeMetaReader = (value: TemplateMeta = meta): TemplateMetaReader => ({
  read: async () => value,
});

export function strategyInput(
  template: string | Buffer,
  target: string | Buffer | null,
  overrides: Partial<StrategyInput> = {},
): StrategyInput {
  return {
    relativePath: "file.txt",
    template: Buffer.isBuffer(template) ? template : Buffer.from(template, "utf-8"),
    target: target === null || Buffer.isBuffer(target) ? target : Buffer.from(target, "utf-8"),
    meta,
    isNewProject: false,
    ...overrides,
  };
}

export async function tempDir(prefix = "rollup-test-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

/**
 * Write files under a directory, creating parents
 */
export async function writeTree(root: string, files: Record<string, string | Buffer>): Promise<void> {
  for (const [relativePath, contents] of Object.entries(files)) {
    const file = path.join(root, ...relativePath.split("/"));
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, contents);
  }
}

export async function readText(root: string, relativePath: string): Promise<string> {
  return fs.readFile(path.join(root, ...relativePath.split("/")), "utf-8");
}

export async function exists(root: string, relativePath: string): Promise<boolean> {
  try {
    await fs.access(path.join(root, ...relativePath.split("/")));
    return true;
  } catch {
    return false;
  }
}
