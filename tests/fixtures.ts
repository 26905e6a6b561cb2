import * as path from "node:path";
import { writeTree } from "./helpers.js";

export const ROLLUP_YAML = [
  "variables:",
  "  project_dest: demo",
  "strategies_mapping:",
  "  ^\\.gitignore$: SortedUniqueLines",
  "  ^setup\\.cfg$: SetupCfgMerge",
  "  ^README\\.md$: IfMissing",
  "  ^\\.keep-local$: Ignore",
  "",
].join("\n");

/**
 * A small template: rollup.yaml plus a project/ directory
 */
export async function writeTemplate(
  templateDir: string,
  extraFiles: Record<string, string | Buffer> = {},
  config = ROLLUP_YAML,
): Promise<void> {
  await writeTree(templateDir, { "rollup.yaml": config });
  await writeTree(path.join(templateDir, "project"), {
    ".gitignore": "*.pyc\nenv/\n",
    ".keep-local": "template\n",
    "README.md": "# {{ project_dest }}\n",
    "setup.cfg": "[metadata]\nname = {{ project_dest }}\n",
    "{{ project_dest }}/__init__.py": "VERSION = '1'\n",
    ...extraFiles,
  });
}
