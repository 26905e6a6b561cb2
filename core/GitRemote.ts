/**
 * Git Remote
 *
 * Turns a git remote (ssh or http) into web URLs for the project and its
 * commits, which TemplateHash stamps into files
 */

import type { GitRemoteType } from "./types.js";

/**
 * `git@gitlab.com:group/project.git` -> `https://gitlab.com/group/project`
 */
export function remoteToHttps(remoteUrl: string): string {
  return remoteUrl.replace(/^[^@/]*@([^:]+):/, "https://$1/").replace(/\.git$/, "");
}

export abstract class GitRemote {
  constructor(protected readonly remote: string) {}

  projectUrl(): string {
    return remoteToHttps(this.remote);
  }

  abstract commitUrl(commitHash: string): string;
}

export class GitHubRemote extends GitRemote {
  commitUrl(commitHash: string): string {
    return `${this.projectUrl().replace(/\/+$/, "")}/commit/${commitHash}`;
  }
}

export class GitLabRemote extends GitRemote {
  commitUrl(commitHash: string): string {
    return `${this.projectUrl().replace(/\/+$/, "")}/commit/${commitHash}`;
  }
}

export class BitBucketRemote extends GitRemote {
  commitUrl(commitHash: string): string {
    return `${this.projectUrl().replace(/\/+$/, "")}/commits/${commitHash}`;
  }
}

const REMOTES: Record<GitRemoteType, new (remote: string) => GitRemote> = {
  github: GitHubRemote,
  gitlab: GitLabRemote,
  bitbucket: BitBucketRemote,
};

/**
 * Pick the remote implementation, detecting it from the URL unless given
 */
export function makeGitRemote(remote: string, remoteType?: GitRemoteType): GitRemote {
  if (remoteType !== undefined) {
    return new REMOTES[remoteType](remote);
  }

  const lowered = remote.toLowerCase();
  for (const type of ["gitlab", "github", "bitbucket"] as const) {
    if (lowered.includes(type)) {
      return new REMOTES[type](remote);
    }
  }

  throw new Error(
    "Unable to determine the git remote type automatically. " +
      "Set one with the `git_remote_type` option in rollup.yaml.",
  );
}
