import { checkActivation, type ActivationEnvironment } from "../../environment.js";
import { PublishStep, type StepResult } from "../PublishStep.js";
import type { PublishContext } from "../PublishContext.js";

/** Fails the run before anything else happens when the activation script is missing. */
export class EnvironmentCheckStep extends PublishStep {
  constructor() {
    super({ name: "environment-check", description: "verify the activation resource exists" });
  }

  async execute(context: PublishContext): Promise<StepResult> {
    const { activationPath } = context.config;
    let activation: ActivationEnvironment;
    try {
      activation = await checkActivation(activationPath, context.collaborators.baseEnv);
    } catch (error) {
      context.logger.error("activation resource missing", { activationPath });
      return { status: "failure", error: error instanceof Error ? error : new Error(String(error)) };
    }
    context.activation = activation;
    context.logger.debug("activation resource found", {
      activationPath,
      envDir: activation.envDir
    });
    return { status: "success", state: "EnvChecked" };
  }
}
