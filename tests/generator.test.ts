import { describe, it, expect } from "vitest";
import fs from "fs/promises";
import path from "path";
import { runGenerator, describeCommand, type GeneratorSpec } from "../src/generator.js";
import { GenerationError } from "../src/errors.js";
import { BufferedOutput } from "../src/output.js";
import { makeTempDir } from "./makeTempRepo.js";

function nodeScript(cwd: string, script: string, extra: Partial<GeneratorSpec> = {}): GeneratorSpec {
  return {
    command: process.execPath,
    args: ["-e", script],
    cwd,
    env: { ...process.env },
    ...extra,
  };
}

describe("runGenerator", () => {
  it("resolves when the generator exits 0 and leaves its output in the working directory", async () => {
    const cwd = await makeTempDir("feed-gen-");
    const output = new BufferedOutput();

    const result = await runGenerator(
      nodeScript(cwd, "require('fs').writeFileSync('CNSfeed.xml', '<rss/>'); console.log('wrote feed')"),
      output,
    );

    expect(result.exitCode).toBe(0);
    expect(result.signal).toBeNull();
    expect(await fs.readFile(path.join(cwd, "CNSfeed.xml"), "utf8")).toBe("<rss/>");
    expect(output.stdout).toEqual(["wrote feed"]);
  });

  it("forwards stderr lines to the error stream", async () => {
    const cwd = await makeTempDir("feed-gen-");
    const output = new BufferedOutput();

    await runGenerator(nodeScript(cwd, "console.error('warn: slow journal'); console.error('second')"), output);

    expect(output.stderr).toEqual(["warn: slow journal", "second"]);
  });

  it("passes the given environment to the generator", async () => {
    const cwd = await makeTempDir("feed-gen-");
    const output = new BufferedOutput();

    await runGenerator(
      nodeScript(cwd, "console.log(process.env.VIRTUAL_ENV)", {
        env: { ...process.env, VIRTUAL_ENV: "/srv/feed/.venv" },
      }),
      output,
    );

    expect(output.stdout).toEqual(["/srv/feed/.venv"]);
  });

  it("rejects with a GenerationError when the generator exits non-zero", async () => {
    const cwd = await makeTempDir("feed-gen-");
    const spec = nodeScript(cwd, "process.exit(3)");

    const error = await runGenerator(spec, new BufferedOutput()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GenerationError);
    expect(error).toMatchObject({
      message: `${describeCommand(spec)} failed; aborting feed update.`,
      details: { reason: "exit_code", exitCode: 3 },
    });
  });

  it("rejects when the command cannot be started", async () => {
    const cwd = await makeTempDir("feed-gen-");

    const error = await runGenerator(
      { command: path.join(cwd, "no-such-generator"), args: [], cwd, env: { ...process.env } },
      new BufferedOutput(),
    ).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GenerationError);
    expect(error).toMatchObject({ details: { reason: "spawn_failed" } });
  });

  it("terminates a generator that exceeds its timeout", async () => {
    const cwd = await makeTempDir("feed-gen-");

    const error = await runGenerator(
      nodeScript(cwd, "setTimeout(() => {}, 60000)", { timeoutMs: 200 }),
      new BufferedOutput(),
    ).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GenerationError);
    expect(error).toMatchObject({ details: { reason: "timeout", timeoutMs: 200 } });
  });

  it("kills a generator that ignores SIGTERM once the grace period runs out", async () => {
    const cwd = await makeTempDir("feed-gen-");
    const startedAt = Date.now();

    const error = await runGenerator(
      nodeScript(cwd, "process.on('SIGTERM', () => {}); console.log('ready'); setTimeout(() => {}, 60000)", {
        timeoutMs: 500,
        killGraceMs: 200,
      }),
      new BufferedOutput(),
    ).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GenerationError);
    expect(error).toMatchObject({ details: { reason: "timeout", signal: "SIGKILL" } });
    expect(Date.now() - startedAt).toBeLessThan(10000);
  });
});

describe("describeCommand", () => {
  it("joins the command and its arguments", () => {
    expect(describeCommand({ command: "python", args: ["main.py"] })).toBe("python main.py");
    expect(describeCommand({ command: "./generate", args: [] })).toBe("./generate");
  });
});
