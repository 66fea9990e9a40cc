import "dotenv/config";
import fs from "fs";
import path from "path";
import { parse as yamlParse } from "yaml";
import { z } from "zod";
import { ConfigurationError, errorMessage } from "./errors.js";

export type Env = Record<string, string | undefined>;

export const LOG_LEVELS = ["error", "warn", "info", "debug", "trace"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const DEFAULT_CONFIG_FILE = "feed-publisher.yml";

function expandHome(p: string | undefined, env: Env): string | undefined {
  if (!p) return p;
  return p.replace(/^~(?=$|\/|\\)/, env.HOME || env.USERPROFILE || "~");
}

function nonEmpty(v: string | undefined): string | undefined {
  if (v === undefined) return undefined;
  const trimmed = v.trim();
  return trimmed.length ? trimmed : undefined;
}

function bool(v: string | undefined): boolean | undefined {
  const value = nonEmpty(v);
  if (value === undefined) return undefined;
  return ["1", "true", "yes", "on"].includes(value.toLowerCase());
}

function splitCsv(value: string): string[] {
  return value
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

export function parseArgList(value: string | undefined): string[] | undefined {
  const v = nonEmpty(value);
  if (v === undefined) return undefined;
  if (v.startsWith("[")) {
    try {
      const parsed: unknown = JSON.parse(v);
      if (Array.isArray(parsed)) return parsed.map(String);
    } catch {
      // not JSON; treated as a comma separated list below
    }
  }
  return splitCsv(v);
}

function bareNumberMs(num: number): number | undefined {
  if (!Number.isFinite(num) || num <= 0) return undefined;
  if (num > 1000) return Math.floor(num);
  return Math.floor(num * 1000);
}

/**
 * Parses `500ms`, `30s`, `10m`, `1h` or a bare number (string or numeric).
 * Bare numbers above 1000 are milliseconds, smaller ones seconds. Returns
 * undefined when the value is not a positive duration.
 */
export function parseDurationMs(value: string | number | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value === "number") return bareNumberMs(value);
  let s = value.trim();
  if (
    (s.startsWith("'") && s.endsWith("'")) ||
    (s.startsWith('"') && s.endsWith('"'))
  )
    s = s.slice(1, -1).trim();
  if (!s.length) return undefined;

  const m = s.match(/^([0-9]+(?:\.[0-9]+)?)\s*(ms|s|m|min|h)?$/i);
  if (!m) return undefined;
  const num = Number(m[1]);
  if (!Number.isFinite(num) || num <= 0) return undefined;
  const unit = (m[2] || "").toLowerCase();
  if (unit === "ms") return Math.floor(num);
  if (unit === "s") return Math.floor(num * 1000);
  if (unit === "m" || unit === "min") return Math.floor(num * 60 * 1000);
  if (unit === "h") return Math.floor(num * 60 * 60 * 1000);

  return bareNumberMs(num);
}

const FileConfigSchema = z
  .object({
    repoRoot: z.string().optional(),
    activationPath: z.string().optional(),
    artifact: z.string().optional(),
    generator: z
      .object({
        command: z.string().optional(),
        args: z.array(z.coerce.string()).optional(),
        timeout: z.union([z.number(), z.string()]).optional(),
      })
      .strict()
      .optional(),
    commit: z.object({ prefix: z.string().optional() }).strict().optional(),
    git: z
      .object({
        remote: z.string().optional(),
        branch: z.string().optional(),
        userName: z.string().optional(),
        userEmail: z.string().optional(),
        sshKeyPath: z.string().optional(),
      })
      .strict()
      .optional(),
    log: z
      .object({
        level: z.string().optional(),
        console: z.boolean().optional(),
        file: z.string().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();
type FileConfig = z.infer<typeof FileConfigSchema>;

export const PublishConfigSchema = z.object({
  repoRoot: z.string().min(1),
  activationPath: z.string().min(1),
  artifact: z.string().min(1),
  generator: z.object({
    command: z.string().min(1),
    args: z.array(z.string()),
    timeoutMs: z.number().int().positive().optional(),
  }),
  commitPrefix: z.string().min(1),
  git: z.object({
    remote: z.string().min(1),
    branch: z.string().min(1),
    userName: z.string().min(1).optional(),
    userEmail: z.string().min(1).optional(),
    sshKeyPath: z.string().min(1).optional(),
  }),
  log: z.object({
    level: z.enum(LOG_LEVELS),
    console: z.boolean(),
    file: z.string().optional(),
  }),
  configFile: z.string().optional(),
});
export type PublishConfig = z.infer<typeof PublishConfigSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

function readConfigFile(filePath: string, required: boolean): FileConfig {
  if (!fs.existsSync(filePath)) {
    if (required) {
      throw new ConfigurationError(`Config file not found at ${filePath}`, { filePath });
    }
    return {};
  }
  let raw: unknown;
  try {
    raw = yamlParse(fs.readFileSync(filePath, "utf8"));
  } catch (error) {
    throw new ConfigurationError(`Failed to read config file ${filePath}: ${errorMessage(error)}`, {
      filePath,
    });
  }
  if (raw === null || raw === undefined) return {};
  const parsed = FileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid config file ${filePath}: ${formatIssues(parsed.error)}`, {
      filePath,
    });
  }
  return parsed.data;
}

function normalizeLevel(value: string | undefined): LogLevel {
  const lvl = (value || "info").toLowerCase();
  return LOG_LEVELS.find((l) => l === lvl) ?? "info";
}

/**
 * Resolves the artifact against the repository root and returns it as a
 * repository-relative path, the form git commands take.
 */
function resolveArtifact(repoRoot: string, artifact: string): string {
  const relative = path.relative(repoRoot, path.resolve(repoRoot, artifact));
  if (
    !relative ||
    relative === ".." ||
    relative.startsWith(".." + path.sep) ||
    path.isAbsolute(relative)
  ) {
    throw new ConfigurationError(`Artifact ${artifact} must be a file inside ${repoRoot}`, {
      artifact,
      repoRoot,
    });
  }
  return relative.split(path.sep).join("/");
}

export function loadPublishConfig(env: Env = process.env, cwd: string = process.cwd()): PublishConfig {
  const envRoot = nonEmpty(env.PUBLISH_REPO_ROOT);
  const baseRoot = path.resolve(cwd, expandHome(envRoot, env) ?? ".");

  const explicitFile = nonEmpty(env.PUBLISH_CONFIG);
  const configFile = explicitFile
    ? path.resolve(cwd, expandHome(explicitFile, env) ?? explicitFile)
    : path.join(baseRoot, DEFAULT_CONFIG_FILE);
  const file = readConfigFile(configFile, explicitFile !== undefined);
  const fileDir = path.dirname(configFile);

  const repoRoot =
    envRoot !== undefined || !file.repoRoot
      ? baseRoot
      : path.resolve(fileDir, expandHome(file.repoRoot, env) ?? file.repoRoot);

  const activationRaw =
    nonEmpty(env.VENV_PATH) ?? file.activationPath ?? ".venv/bin/activate";
  const artifactRaw = nonEmpty(env.FEED_ARTIFACT) ?? file.artifact ?? "CNSfeed.xml";

  const timeoutRaw = nonEmpty(env.GENERATOR_TIMEOUT) ?? file.generator?.timeout;
  const timeoutMs = parseDurationMs(timeoutRaw);
  if (timeoutRaw !== undefined && timeoutMs === undefined) {
    throw new ConfigurationError(`Invalid generator timeout: ${String(timeoutRaw)}`);
  }

  const sshKey = nonEmpty(env.GIT_SSH_KEY_PATH) ?? file.git?.sshKeyPath;
  const logFile = nonEmpty(env.LOG_FILE) ?? file.log?.file;

  const candidate = {
    repoRoot,
    activationPath: path.resolve(repoRoot, expandHome(activationRaw, env) ?? activationRaw),
    artifact: resolveArtifact(repoRoot, artifactRaw),
    generator: {
      command: nonEmpty(env.GENERATOR_COMMAND) ?? file.generator?.command ?? "python",
      args: parseArgList(env.GENERATOR_ARGS) ?? file.generator?.args ?? ["main.py"],
      timeoutMs,
    },
    commitPrefix: nonEmpty(env.COMMIT_MESSAGE_PREFIX) ?? file.commit?.prefix ?? "Update feed",
    git: {
      remote: nonEmpty(env.GIT_REMOTE) ?? file.git?.remote ?? "origin",
      branch: nonEmpty(env.GIT_BRANCH) ?? file.git?.branch ?? "main",
      userName: nonEmpty(env.GIT_USER_NAME) ?? file.git?.userName,
      userEmail: nonEmpty(env.GIT_USER_EMAIL) ?? file.git?.userEmail,
      sshKeyPath: sshKey ? path.resolve(repoRoot, expandHome(sshKey, env) ?? sshKey) : undefined,
    },
    log: {
      level: normalizeLevel(nonEmpty(env.LOG_LEVEL) ?? file.log?.level),
      console: bool(env.LOG_CONSOLE) ?? file.log?.console ?? false,
      file: logFile ? path.resolve(repoRoot, expandHome(logFile, env) ?? logFile) : undefined,
    },
    configFile: fs.existsSync(configFile) ? configFile : undefined,
  };

  const parsed = PublishConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

let cached: PublishConfig | null = null;

export function getConfig(): PublishConfig {
  if (!cached) cached = loadPublishConfig();
  return cached;
}
