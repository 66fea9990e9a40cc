import fs from "fs/promises";
import path from "path";
import type { Env } from "./config.js";
import { ConfigurationError } from "./errors.js";

export interface ActivationEnvironment {
  /** Absolute path of the activation script that was found. */
  activationPath: string;
  /** Environment directory: the parent of the script's `bin/` directory. */
  envDir: string;
  /** Process environment for the generator, as the activation script would leave it. */
  env: Env;
}

export function activationMessage(activationPath: string): string {
  return `Virtual environment not found at ${activationPath}. Please create it before running this script.`;
}

/**
 * Builds what sourcing `<envDir>/bin/activate` produces: VIRTUAL_ENV set,
 * the environment's bin directory first on PATH, PYTHONHOME unset.
 */
export function activatedEnv(envDir: string, base: Env = process.env): Env {
  const env: Env = { ...base };
  const binDir = path.join(envDir, "bin");
  const pathKey = Object.keys(env).find((k) => k.toUpperCase() === "PATH") ?? "PATH";
  const current = env[pathKey];
  env[pathKey] = current ? `${binDir}${path.delimiter}${current}` : binDir;
  env.VIRTUAL_ENV = envDir;
  delete env.PYTHONHOME;
  return env;
}

/** Existence check only; the activation script is never executed. */
export async function checkActivation(activationPath: string, base: Env = process.env): Promise<ActivationEnvironment> {
  let isFile = false;
  try {
    const stat = await fs.stat(activationPath);
    isFile = stat.isFile();
  } catch {
    isFile = false;
  }
  if (!isFile) {
    throw new ConfigurationError(activationMessage(activationPath), { activationPath });
  }
  const envDir = path.dirname(path.dirname(activationPath));
  return { activationPath, envDir, env: activatedEnv(envDir, base) };
}
