import { formatUtcDate } from "../../util/date.js";
import { PublishStep, type StepResult } from "../PublishStep.js";
import type { PublishContext } from "../PublishContext.js";

export function commitMessageFor(prefix: string, now: Date): string {
  return `${prefix}: ${formatUtcDate(now)}`;
}

export class CommitStep extends PublishStep {
  constructor() {
    super({ name: "commit", description: "commit the artifact with a date-stamped message" });
  }

  async execute(context: PublishContext): Promise<StepResult> {
    const { artifact, commitPrefix } = context.config;
    const message = commitMessageFor(commitPrefix, context.collaborators.clock());

    const sha = await context.collaborators.vcs.commit(message, artifact);
    context.commitMessage = message;
    context.commitSha = sha;

    context.output.out(`Committed ${sha.slice(0, 7)}: ${message}`);
    context.logger.info("artifact committed", { artifact, sha, message });
    return { status: "success", state: "Committed" };
  }
}
