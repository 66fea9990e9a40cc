import type { PublishConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import { logger as baseLogger, type Logger } from "../logger.js";
import { PublishContext, type PublishCollaborators, type RunState, type StepRecord } from "./PublishContext.js";
import type { PublishStep, StepResult } from "./PublishStep.js";
import { CommitStep, EnvironmentCheckStep, GenerateStep, PushStep, StageStep } from "./steps/index.js";

export type RunStatus = "published" | "unchanged" | "failed";

export interface RunOutcome {
  runId: string;
  status: RunStatus;
  /** Last state reached before the run ended. */
  state: RunState;
  failedStep?: string;
  error?: Error;
  commitMessage?: string;
  commitSha?: string;
  history: StepRecord[];
}

export function defaultSteps(): PublishStep[] {
  return [new EnvironmentCheckStep(), new GenerateStep(), new StageStep(), new CommitStep(), new PushStep()];
}

/** Process exit code for a finished run: 0 when published or unchanged, 1 otherwise. */
export function exitCodeFor(outcome: RunOutcome): 0 | 1 {
  return outcome.status === "failed" ? 1 : 0;
}

/**
 * Runs the steps in order. The first failure ends the run with that error,
 * a halt ends it successfully; nothing is retried or rolled back.
 */
export class PublishRunner {
  constructor(
    private readonly config: PublishConfig,
    private readonly collaborators: PublishCollaborators,
    private readonly steps: PublishStep[] = defaultSteps(),
    private readonly logger: Logger = baseLogger,
  ) {}

  async run(): Promise<RunOutcome> {
    const context = new PublishContext(this.config, this.collaborators, undefined, this.logger);
    context.logger.info("publish run starting", {
      repoRoot: this.config.repoRoot,
      artifact: this.config.artifact,
      remote: this.config.git.remote,
      branch: this.config.git.branch
    });

    for (const step of this.steps) {
      const stepName = step.config.name;
      context.recordStepStart(stepName);
      context.logger.debug("publish step starting", { step: stepName, description: step.config.description });

      let result: StepResult;
      try {
        result = await step.execute(context);
      } catch (error) {
        result = { status: "failure", error: error instanceof Error ? error : new Error(String(error)) };
      }

      if (result.status === "failure") {
        context.recordStepComplete(stepName, "failure", result.error.message);
        context.logger.error("publish step failed", {
          step: stepName,
          state: context.state,
          error: result.error
        });
        context.output.err(errorMessage(result.error));
        return this.finish(context, "failed", { failedStep: stepName, error: result.error });
      }

      context.recordStepComplete(stepName, result.status);
      context.state = result.state;

      if (result.status === "halt") {
        context.logger.info("publish run halted", { step: stepName, reason: result.reason });
        return this.finish(context, "unchanged");
      }
    }

    return this.finish(context, "published");
  }

  private finish(
    context: PublishContext,
    status: RunStatus,
    failure: { failedStep?: string; error?: Error } = {},
  ): RunOutcome {
    context.logger.info("publish run finished", {
      status,
      state: context.state,
      commitSha: context.commitSha,
      summary: context.getExecutionSummary()
    });
    return {
      runId: context.runId,
      status,
      state: context.state,
      ...failure,
      commitMessage: context.commitMessage,
      commitSha: context.commitSha,
      history: context.getExecutionHistory()
    };
  }
}
