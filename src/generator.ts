import { spawn } from "child_process";
import readline from "readline";
import type { Readable } from "stream";
import type { Env } from "./config.js";
import { GenerationError, errorMessage } from "./errors.js";
import { logger as baseLogger, type Logger } from "./logger.js";
import { consoleOutput, type RunnerOutput } from "./output.js";

export interface GeneratorSpec {
  command: string;
  args: string[];
  cwd: string;
  env: Env;
  timeoutMs?: number;
  /** Wait after SIGTERM on timeout before SIGKILL. */
  killGraceMs?: number;
}

export const DEFAULT_KILL_GRACE_MS = 5000;

export interface GeneratorResult {
  exitCode: number;
  signal: NodeJS.Signals | null;
  durationMs: number;
}

/** Runs the content generator; resolves only when it succeeded. */
export type Generator = (spec: GeneratorSpec) => Promise<GeneratorResult>;

export function describeCommand(spec: Pick<GeneratorSpec, "command" | "args">): string {
  return [spec.command, ...spec.args].join(" ");
}

export function generationFailedMessage(spec: Pick<GeneratorSpec, "command" | "args">): string {
  return `${describeCommand(spec)} failed; aborting feed update.`;
}

function forwardLines(source: Readable | null, sink: (line: string) => void) {
  if (!source) return;
  const rl = readline.createInterface({ input: source, crlfDelay: Infinity });
  rl.on("line", sink);
}

export function runGenerator(
  spec: GeneratorSpec,
  output: RunnerOutput = consoleOutput,
  logger: Logger = baseLogger,
): Promise<GeneratorResult> {
  const command = describeCommand(spec);
  const startedAt = Date.now();
  logger.info("generator starting", { command, cwd: spec.cwd, timeoutMs: spec.timeoutMs });

  return new Promise<GeneratorResult>((resolve, reject) => {
    let settled = false;
    let timedOut = false;

    const child = spawn(spec.command, spec.args, {
      cwd: spec.cwd,
      env: spec.env,
      stdio: ["ignore", "pipe", "pipe"],
    });

    forwardLines(child.stdout, (line) => {
      output.out(line);
      logger.debug("generator stdout", { line });
    });
    forwardLines(child.stderr, (line) => {
      output.err(line);
      logger.debug("generator stderr", { line });
    });

    let killTimer: NodeJS.Timeout | null = null;
    const timer = spec.timeoutMs
      ? setTimeout(() => {
          timedOut = true;
          logger.warn("generator timed out, terminating", { command, timeoutMs: spec.timeoutMs });
          child.kill("SIGTERM");
          const graceMs = spec.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
          killTimer = setTimeout(() => {
            logger.warn("generator ignored SIGTERM, killing", { command, graceMs });
            child.kill("SIGKILL");
          }, graceMs);
        }, spec.timeoutMs)
      : null;

    const clearTimers = () => {
      if (timer) clearTimeout(timer);
      if (killTimer) clearTimeout(killTimer);
    };

    const fail = (reason: string, details: Record<string, unknown>) => {
      if (settled) return;
      settled = true;
      clearTimers();
      logger.error("generator failed", { command, reason, ...details });
      reject(new GenerationError(generationFailedMessage(spec), { command, reason, ...details }));
    };

    child.on("error", (error) => {
      fail("spawn_failed", { error: errorMessage(error) });
    });

    child.on("close", (code, signal) => {
      clearTimers();
      const durationMs = Date.now() - startedAt;
      if (timedOut) {
        fail("timeout", { timeoutMs: spec.timeoutMs, signal, durationMs });
        return;
      }
      if (code !== 0) {
        fail(code === null ? "signal" : "exit_code", { exitCode: code, signal, durationMs });
        return;
      }
      if (settled) return;
      settled = true;
      logger.info("generator finished", { command, durationMs });
      resolve({ exitCode: 0, signal, durationMs });
    });
  });
}
