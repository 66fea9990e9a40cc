export { runCli } from "./cli.js";
export type { CliOptions } from "./cli.js";
export { loadPublishConfig, getConfig, parseDurationMs, parseArgList, DEFAULT_CONFIG_FILE } from "./config.js";
export type { PublishConfig, Env, LogLevel } from "./config.js";
export {
  PublishRunnerError,
  ConfigurationError,
  GenerationError,
  PublishError,
  GitCommandError
} from "./errors.js";
export { checkActivation, activatedEnv } from "./environment.js";
export type { ActivationEnvironment } from "./environment.js";
export { runGenerator } from "./generator.js";
export type { Generator, GeneratorSpec, GeneratorResult } from "./generator.js";
export { GitRepository } from "./git/GitRepository.js";
export type { VersionControl, GitRepositoryOptions } from "./git/GitRepository.js";
export { runGit } from "./git/core.js";
export { logger, configureLogger, closeLogger } from "./logger.js";
export type { Logger } from "./logger.js";
export { consoleOutput, BufferedOutput } from "./output.js";
export type { RunnerOutput } from "./output.js";
export { formatUtcDate } from "./util/date.js";
export * from "./publish/index.js";
