import { simpleGit, type SimpleGit } from "simple-git";

/**
 * Thin wrapper over simple-git.
 */
export class GitOperations {
  private git: SimpleGit;

  constructor(repoPath: string, git?: SimpleGit) {
    this.git = git ?? simpleGit(repoPath);
  }

  /** Full SHA of a ref (defaults to HEAD). */
  async getCurrentSha(ref = "HEAD"): Promise<string> {
    const result = await this.git.revparse([ref]);
    return result.trim();
  }

  /** Current branch as a fully qualified ref, e.g. refs/heads/main. */
  async getCurrentRef(): Promise<string> {
    const result = await this.git.raw(["symbolic-ref", "--quiet", "HEAD"]);
    return result.trim();
  }

  /**
   * Files touched by a push. With a base, everything between base and head;
   * without one, the files of the head commit alone.
   */
  async getChangedFiles(head: string, base?: string): Promise<string[]> {
    const output = base
      ? await this.git.diff(["--name-only", `${base}...${head}`])
      : await this.git.raw(["diff-tree", "--no-commit-id", "--name-only", "-r", "--root", head]);
    return output
      .trim()
      .split("\n")
      .filter((f) => f.length > 0);
  }
}
