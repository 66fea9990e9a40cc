import { PublishStep, type StepResult } from "../PublishStep.js";
import type { PublishContext } from "../PublishContext.js";

/** Stages the artifact and ends the run when the index matches HEAD. */
export class StageStep extends PublishStep {
  constructor() {
    super({ name: "stage", description: "stage the artifact and detect changes" });
  }

  async execute(context: PublishContext): Promise<StepResult> {
    const { artifact } = context.config;
    const { vcs } = context.collaborators;

    context.output.out(`Staging ${artifact}...`);
    await vcs.stage(artifact);

    if (!(await vcs.hasStagedChanges(artifact))) {
      context.output.out(`No changes detected in ${artifact}; nothing to commit.`);
      context.logger.info("artifact unchanged", { artifact });
      return { status: "halt", state: "NoOp", reason: "no_changes" };
    }

    context.logger.info("artifact changed", { artifact });
    return { status: "success", state: "Staged" };
  }
}
