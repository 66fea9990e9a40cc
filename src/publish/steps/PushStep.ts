import { PublishError, errorMessage } from "../../errors.js";
import { PublishStep, type StepResult } from "../PublishStep.js";
import type { PublishContext } from "../PublishContext.js";

export class PushStep extends PublishStep {
  constructor() {
    super({ name: "push", description: "push the new commit to the configured remote branch" });
  }

  async execute(context: PublishContext): Promise<StepResult> {
    const { remote, branch } = context.config.git;

    context.output.out(`Pushing to ${remote}/${branch}...`);
    try {
      await context.collaborators.vcs.push(remote, branch);
    } catch (error) {
      // The local commit stays; the next successful push carries it.
      return {
        status: "failure",
        error: new PublishError(`Push to ${remote}/${branch} failed: ${errorMessage(error)}`, {
          remote,
          branch,
          commitSha: context.commitSha
        })
      };
    }

    context.output.out("Feed update complete.");
    context.logger.info("artifact published", { remote, branch, sha: context.commitSha });
    return { status: "success", state: "Pushed" };
  }
}
