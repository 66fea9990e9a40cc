import type { PublishContext, RunState } from "./PublishContext.js";

export type StepResult =
  | { status: "success"; state: RunState }
  /** Run ends successfully; later steps are not executed. */
  | { status: "halt"; state: RunState; reason: string }
  | { status: "failure"; error: Error };

export interface PublishStepConfig {
  name: string;
  description?: string;
}

export abstract class PublishStep {
  constructor(public readonly config: PublishStepConfig) {}

  abstract execute(context: PublishContext): Promise<StepResult>;
}
