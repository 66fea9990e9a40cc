export type PublishErrorCode = "configuration" | "generation" | "publish" | "git";

export class PublishRunnerError extends Error {
  constructor(
    message: string,
    public readonly code: PublishErrorCode,
    public readonly details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Required environment resource missing, or configuration rejected. */
export class ConfigurationError extends PublishRunnerError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, "configuration", details);
  }
}

/** Generator exited non-zero, was killed, timed out or could not start. */
export class GenerationError extends PublishRunnerError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, "generation", details);
  }
}

/**
 * Push to the remote failed. The commit created by the run stays in the
 * local history; nothing is rolled back.
 */
export class PublishError extends PublishRunnerError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, "publish", details);
  }
}

export class GitCommandError extends PublishRunnerError {
  constructor(
    public readonly args: string[],
    public readonly exitCode: number | null,
    public readonly stderr: string,
  ) {
    const detail = stderr.trim();
    super(
      `git ${args.join(" ")} failed${exitCode !== null ? ` (exit ${exitCode})` : ""}${detail ? `: ${detail}` : ""}`,
      "git",
      { args, exitCode },
    );
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
