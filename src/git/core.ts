import { execFile } from "child_process";
import { promisify } from "util";
import type { Env } from "../config.js";
import { GitCommandError } from "../errors.js";

const execGit = promisify(execFile);

export type GitRunOptions = { cwd?: string; sshKeyPath?: string };
export type GitOutput = { stdout: string; stderr: string };

// Lets tests replace git execution without spying on ESM exports
type RunGitImpl = (args: string[], options: GitRunOptions) => Promise<GitOutput>;
let runGitImpl: RunGitImpl | null = null;

export function gitEnv(sshKeyPath?: string, base: Env = process.env): Env {
  const env: Env = { ...base };
  env.GIT_TERMINAL_PROMPT = "0";
  if (sshKeyPath) {
    env.GIT_SSH_COMMAND = `ssh -i "${sshKeyPath}" -o IdentitiesOnly=yes`;
  }
  return env;
}

function toGitCommandError(args: string[], error: unknown): GitCommandError {
  if (error instanceof GitCommandError) return error;
  if (error && typeof error === "object") {
    const exitCode = "code" in error && typeof error.code === "number" ? error.code : null;
    const stderr =
      "stderr" in error && typeof error.stderr === "string" && error.stderr.length
        ? error.stderr
        : error instanceof Error
          ? error.message
          : "";
    return new GitCommandError(args, exitCode, stderr);
  }
  return new GitCommandError(args, null, String(error));
}

/** Runs `git` without a shell. Failures surface as GitCommandError carrying the exit code. */
export async function runGit(args: string[], options: GitRunOptions = {}): Promise<GitOutput> {
  if (runGitImpl) return runGitImpl(args, options);
  try {
    const { stdout, stderr } = await execGit("git", args, {
      cwd: options.cwd,
      env: gitEnv(options.sshKeyPath),
      maxBuffer: 16 * 1024 * 1024,
    });
    return { stdout, stderr };
  } catch (error) {
    throw toGitCommandError(args, error);
  }
}

// Test-only hook to override git execution
export function __setRunGitImplForTests(impl?: RunGitImpl | null) {
  runGitImpl = impl || null;
}
