import { simpleGit } from "simple-git";

export type GitContext = {
  commit_hash: string | null;
  branch: string | null;
  files_changed: string[];
};

/** The part of simple-git these queries use. */
export type GitClient = {
  checkIsRepo(): Promise<boolean>;
  revparse(args: string[]): Promise<string>;
  diff(args: string[]): Promise<string>;
};

/** Read-only git queries used to fill in change metadata. */
export class GitOperations {
  private git: GitClient;

  constructor(repoPath: string, git?: GitClient) {
    this.git = git ?? simpleGit(repoPath);
  }

  async isRepository(): Promise<boolean> {
    return this.git.checkIsRepo();
  }

  /** SHA of a ref (defaults to HEAD). */
  async getCurrentSha(ref = "HEAD"): Promise<string> {
    const result = await this.git.revparse([ref]);
    return result.trim();
  }

  async getCurrentBranch(): Promise<string> {
    const result = await this.git.revparse(["--abbrev-ref", "HEAD"]);
    return result.trim();
  }

  /** Files changed between two refs, limited to `pathspecs` when given. */
  async getChangedFiles(base: string, head: string, pathspecs: string[] = []): Promise<string[]> {
    const args = ["--name-only", `${base}...${head}`];
    if (pathspecs.length > 0) args.push("--", ...pathspecs);
    const diff = await this.git.diff(args);
    return diff
      .trim()
      .split("\n")
      .filter((f) => f.length > 0);
  }

  /**
   * HEAD commit and branch, plus the .proto files changed since `base` when
   * one is given. Outside a repository everything is empty.
   */
  async readContext(base?: string): Promise<GitContext> {
    if (!(await this.isRepository())) return { commit_hash: null, branch: null, files_changed: [] };
    const [sha, branch] = await Promise.all([this.getCurrentSha(), this.getCurrentBranch()]);
    const files = base ? await this.getChangedFiles(base, "HEAD", ["*.proto"]) : [];
    return { commit_hash: sha, branch: branch === "HEAD" ? null : branch, files_changed: files };
  }
}
