export { EnvironmentCheckStep } from "./EnvironmentCheckStep.js";
export { GenerateStep } from "./GenerateStep.js";
export { StageStep } from "./StageStep.js";
export { CommitStep, commitMessageFor } from "./CommitStep.js";
export { PushStep } from "./PushStep.js";
