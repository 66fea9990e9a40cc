import { GenerationError, errorMessage } from "../../errors.js";
import { generationFailedMessage } from "../../generator.js";
import { PublishStep, type StepResult } from "../PublishStep.js";
import type { PublishContext } from "../PublishContext.js";

export class GenerateStep extends PublishStep {
  constructor() {
    super({ name: "generate", description: "run the generator that rewrites the artifact" });
  }

  async execute(context: PublishContext): Promise<StepResult> {
    const { generator: spec, repoRoot } = context.config;
    const activation = context.activation;
    if (!activation) {
      return { status: "failure", error: new Error("generate step ran before the environment check") };
    }

    context.output.out("Running scraper...");
    try {
      await context.collaborators.generator({
        command: spec.command,
        args: spec.args,
        cwd: repoRoot,
        env: activation.env,
        timeoutMs: spec.timeoutMs
      });
    } catch (error) {
      const failure =
        error instanceof GenerationError
          ? error
          : new GenerationError(generationFailedMessage(spec), { error: errorMessage(error) });
      return { status: "failure", error: failure };
    }
    return { status: "success", state: "Generated" };
  }
}
