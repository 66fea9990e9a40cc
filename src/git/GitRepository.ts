import { GitCommandError } from "../errors.js";
import { logger as baseLogger, type Logger } from "../logger.js";
import { runGit, type GitOutput } from "./core.js";

/** The version-control operations a publish run sequences. */
export interface VersionControl {
  stage(path: string): Promise<void>;
  /** True when the index differs from HEAD for `path`. */
  hasStagedChanges(path: string): Promise<boolean>;
  /** Commits `path` and returns the new commit's sha. */
  commit(message: string, path: string): Promise<string>;
  push(remote: string, branch: string): Promise<void>;
}

export interface GitRepositoryOptions {
  userName?: string;
  userEmail?: string;
  sshKeyPath?: string;
  logger?: Logger;
}

export class GitRepository implements VersionControl {
  private readonly logger: Logger;

  constructor(
    public readonly repoRoot: string,
    private readonly options: GitRepositoryOptions = {},
  ) {
    this.logger = options.logger ?? baseLogger;
  }

  private git(args: string[]): Promise<GitOutput> {
    this.logger.debug("git", { repoRoot: this.repoRoot, args });
    return runGit(args, { cwd: this.repoRoot, sshKeyPath: this.options.sshKeyPath });
  }

  private identityArgs(): string[] {
    const args: string[] = [];
    if (this.options.userName) args.push("-c", `user.name=${this.options.userName}`);
    if (this.options.userEmail) args.push("-c", `user.email=${this.options.userEmail}`);
    return args;
  }

  async stage(path: string): Promise<void> {
    await this.git(["add", "--", path]);
  }

  async hasStagedChanges(path: string): Promise<boolean> {
    try {
      await this.git(["diff", "--cached", "--quiet", "--", path]);
      return false;
    } catch (error) {
      if (error instanceof GitCommandError && error.exitCode === 1) {
        return true;
      }
      throw error;
    }
  }

  async commit(message: string, path: string): Promise<string> {
    const sanitized = message.replace(/\s+/g, " ").trim();
    await this.git([...this.identityArgs(), "commit", "-m", sanitized, "--", path]);
    return this.headSha();
  }

  async push(remote: string, branch: string): Promise<void> {
    await this.git(["push", remote, branch]);
  }

  async headSha(): Promise<string> {
    const { stdout } = await this.git(["rev-parse", "HEAD"]);
    return stdout.trim();
  }
}
