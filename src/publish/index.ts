import type { PublishConfig } from "../config.js";
import { runGenerator } from "../generator.js";
import { GitRepository } from "../git/GitRepository.js";
import { logger } from "../logger.js";
import { consoleOutput } from "../output.js";
import type { PublishCollaborators } from "./PublishContext.js";
import { PublishRunner } from "./PublishRunner.js";

export { PublishRunner, defaultSteps, exitCodeFor } from "./PublishRunner.js";
export type { RunOutcome, RunStatus } from "./PublishRunner.js";
export { PublishContext } from "./PublishContext.js";
export type { PublishCollaborators, RunState, StepRecord } from "./PublishContext.js";
export { PublishStep } from "./PublishStep.js";
export type { StepResult, PublishStepConfig } from "./PublishStep.js";

/** Wires the real collaborators (git working tree, child process, wall clock, console). */
export function createPublishRunner(
  config: PublishConfig,
  overrides: Partial<PublishCollaborators> = {},
): PublishRunner {
  const output = overrides.output ?? consoleOutput;
  const collaborators: PublishCollaborators = {
    vcs:
      overrides.vcs ??
      new GitRepository(config.repoRoot, {
        userName: config.git.userName,
        userEmail: config.git.userEmail,
        sshKeyPath: config.git.sshKeyPath,
        logger
      }),
    generator: overrides.generator ?? ((spec) => runGenerator(spec, output, logger)),
    output,
    clock: overrides.clock ?? (() => new Date()),
    baseEnv: overrides.baseEnv ?? process.env
  };
  return new PublishRunner(config, collaborators);
}
