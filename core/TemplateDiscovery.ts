/**
 * Template Discovery
 *
 * Lists the files of a template's project directory or of a rendered tree
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { glob } from "glob";
import { InvalidTemplateError, isErrnoCode } from "./errors.js";
import { compareOrdinal } from "./newline.js";

/** Directory inside a template holding the files to render */
export const PROJECT_DIR = "project";

export class TemplateDiscovery {
  constructor(private rootDir: string) {}

  /**
   * Template directory layout: rollup.yaml next to project/
   */
  static forTemplate(templateDir: string): TemplateDiscovery {
    return new TemplateDiscovery(path.join(templateDir, PROJECT_DIR));
  }

  get root(): string {
    return this.rootDir;
  }

  /**
   * Relative POSIX paths of every file under the root, hidden ones included,
   * in byte order
   */
  async discoverFiles(): Promise<string[]> {
    try {
      const stats = await fs.stat(this.rootDir);
      if (!stats.isDirectory()) {
        throw new InvalidTemplateError(`Not a directory: ${this.rootDir}`);
      }
    } catch (error: unknown) {
      if (isErrnoCode(error, "ENOENT")) {
        throw new InvalidTemplateError(`Template directory not found: ${this.rootDir}`);
      }
      throw error;
    }

    const files = await glob("**/*", {
      cwd: this.rootDir,
      nodir: true,
      dot: true, // Include hidden files like .gitignore
      posix: true,
    });

    return files.sort(compareOrdinal);
  }

  /**
   * Absolute path of a discovered file
   */
  resolve(relativePath: string): string {
    return path.join(this.rootDir, ...relativePath.split("/"));
  }
}
