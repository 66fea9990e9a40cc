import { loadPublishConfig, type Env } from "./config.js";
import { errorMessage } from "./errors.js";
import { configureLogger, logger } from "./logger.js";
import { consoleOutput, type RunnerOutput } from "./output.js";
import { createPublishRunner, exitCodeFor } from "./publish/index.js";
import type { PublishCollaborators } from "./publish/PublishContext.js";

export interface CliOptions {
  env?: Env;
  cwd?: string;
  output?: RunnerOutput;
  collaborators?: Partial<Omit<PublishCollaborators, "output">>;
}

/**
 * One publish run as the `feed-publisher` command performs it. Takes no
 * arguments; anything passed is reported and ignored. Resolves to the
 * process exit code: 0 when published or unchanged, 1 on any failure.
 */
export async function runCli(argv: string[], options: CliOptions = {}): Promise<number> {
  const output = options.output ?? consoleOutput;
  if (argv.length) {
    output.err(`Ignoring unexpected arguments: ${argv.join(" ")}`);
  }

  try {
    const cfg = loadPublishConfig(options.env ?? process.env, options.cwd ?? process.cwd());
    configureLogger(cfg.log);
    logger.debug("configuration loaded", { configFile: cfg.configFile, repoRoot: cfg.repoRoot });

    const outcome = await createPublishRunner(cfg, { ...options.collaborators, output }).run();
    return exitCodeFor(outcome);
  } catch (err) {
    output.err(errorMessage(err));
    logger.error("publish run crashed", { error: err });
    return 1;
  }
}
