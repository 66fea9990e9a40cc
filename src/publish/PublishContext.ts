import { randomUUID } from "crypto";
import type { Env, PublishConfig } from "../config.js";
import type { ActivationEnvironment } from "../environment.js";
import type { Generator } from "../generator.js";
import type { VersionControl } from "../git/GitRepository.js";
import { childLogger, logger as baseLogger, type Logger } from "../logger.js";
import type { RunnerOutput } from "../output.js";

/**
 * Idle -> EnvChecked -> Generated -> Staged -> NoOp
 *                                          \-> Committed -> Pushed
 */
export type RunState = "Idle" | "EnvChecked" | "Generated" | "Staged" | "NoOp" | "Committed" | "Pushed";

export type StepStatus = "running" | "success" | "failure" | "halt";

export interface StepRecord {
  stepName: string;
  status: StepStatus;
  startTime: Date;
  endTime?: Date;
  duration_ms?: number;
  error?: string;
}

export interface PublishCollaborators {
  vcs: VersionControl;
  generator: Generator;
  output: RunnerOutput;
  clock: () => Date;
  /** Environment the activation is applied on top of. */
  baseEnv: Env;
}

export class PublishContext {
  public state: RunState = "Idle";
  public activation?: ActivationEnvironment;
  public commitMessage?: string;
  public commitSha?: string;

  public readonly logger: Logger;
  private executionHistory: StepRecord[] = [];

  constructor(
    public readonly config: PublishConfig,
    public readonly collaborators: PublishCollaborators,
    public readonly runId: string = randomUUID(),
    logger: Logger = baseLogger,
  ) {
    this.logger = childLogger({ runId }, logger);
  }

  get output(): RunnerOutput {
    return this.collaborators.output;
  }

  recordStepStart(stepName: string): void {
    this.executionHistory.push({
      stepName,
      status: "running",
      startTime: this.collaborators.clock()
    });
  }

  recordStepComplete(stepName: string, status: Exclude<StepStatus, "running">, error?: string): void {
    const entry = this.executionHistory.find(h => h.stepName === stepName && !h.endTime);
    if (entry) {
      entry.status = status;
      entry.endTime = this.collaborators.clock();
      if (error) {
        entry.error = error;
      }
    }
  }

  getExecutionHistory(): StepRecord[] {
    return this.executionHistory.map(entry => ({
      ...entry,
      duration_ms: entry.endTime ? entry.endTime.getTime() - entry.startTime.getTime() : undefined
    }));
  }

  getExecutionSummary(): {
    totalSteps: number;
    completedSteps: number;
    failedSteps: number;
    totalDuration_ms: number;
  } {
    const history = this.getExecutionHistory();
    return {
      totalSteps: history.length,
      completedSteps: history.filter(h => h.status === "success" || h.status === "halt").length,
      failedSteps: history.filter(h => h.status === "failure").length,
      totalDuration_ms: history.reduce((sum, h) => sum + (h.duration_ms ?? 0), 0)
    };
  }
}
