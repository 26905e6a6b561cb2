/**
 * Template Meta Reader
 *
 * Reads the template's git state: HEAD commit, remote URLs, dirtiness
 */

import * as childProcess from "node:child_process";
import { promisify } from "node:util";
import { GitError } from "./errors.js";
import { makeGitRemote } from "./GitRemote.js";
import type { GitRemoteType, TemplateMeta } from "./types.js";

const execFile = promisify(childProcess.execFile);

export interface TemplateMetaReader {
  read(templateDir: string, remoteType?: GitRemoteType): Promise<TemplateMeta>;
}

export class GitTemplateMetaReader implements TemplateMetaReader {
  async read(templateDir: string, remoteType?: GitRemoteType): Promise<TemplateMeta> {
    // Fails when there's no remote called `origin`
    const remoteUrl = await this.git(["config", "--get", "remote.origin.url"], templateDir);
    const commitHash = await this.git(["rev-parse", "--verify", "HEAD"], templateDir);
    const status = await this.git(["status", "--porcelain"], templateDir);
    const ref = await this.git(["rev-parse", "--abbrev-ref", "HEAD"], templateDir);

    const remote = makeGitRemote(remoteUrl, remoteType);

    return {
      projectUrl: remote.projectUrl(),
      commitHash,
      commitUrl: remote.commitUrl(commitHash),
      isDirty: status !== "",
      headRef: ref === "HEAD" ? null : ref,
    };
  }

  private async git(args: string[], cwd: string): Promise<string> {
    try {
      const { stdout } = await execFile("git", args, { cwd, encoding: "utf-8" });
      return stdout.trim();
    } catch (error: unknown) {
      const details =
        typeof error === "object" && error !== null && "stderr" in error
          ? String(error.stderr)
          : String(error);
      throw new GitError(args, cwd, details);
    }
  }
}
