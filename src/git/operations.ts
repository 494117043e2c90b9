import { simpleGit, type SimpleGit } from "simple-git";

export type GitIdentity = { branch: string; sha: string };

/** Used outside a git checkout, e.g. an unpacked chart tarball. */
export const DETACHED: GitIdentity = { branch: "detached", sha: "0000000" };

/**
 * Thin wrapper over simple-git.
 */
export class GitOperations {
  private git: SimpleGit;

  constructor(repoPath: string, git?: SimpleGit) {
    this.git = git ?? simpleGit(repoPath);
  }

  /** Get HEAD SHA of a branch (defaults to current HEAD). */
  async getCurrentSha(branch?: string): Promise<string> {
    const result = await this.git.revparse([branch ?? "HEAD"]);
    return result.trim();
  }

  /** Get current branch name. */
  async getCurrentBranch(): Promise<string> {
    const result = await this.git.revparse(["--abbrev-ref", "HEAD"]);
    return result.trim();
  }

  /** Branch and HEAD sha, or DETACHED when the directory is not a repository. */
  async identity(): Promise<GitIdentity> {
    if (!(await this.git.checkIsRepo())) return DETACHED;
    const [branch, sha] = await Promise.all([this.getCurrentBranch(), this.getCurrentSha()]);
    return { branch: branch === "HEAD" ? DETACHED.branch : branch, sha };
  }
}
