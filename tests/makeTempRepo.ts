import fs from "fs/promises";
import path from "path";
import os from "os";
import { exec, execFileSync } from "child_process";
import { promisify } from "util";
const execP = promisify(exec);

export const gitAvailable = (() => {
  try {
    execFileSync("git", ["--version"], { stdio: "ignore" });
    return true;
  } catch {
    return false;
  }
})();

export async function makeTempDir(prefix = "feed-"): Promise<string> {
  const base = process.env.FEED_TEST_TMP || os.tmpdir();
  return fs.mkdtemp(path.join(base, prefix));
}

export async function writeFiles(dir: string, files: Record<string, string>) {
  for (const [rel, content] of Object.entries(files)) {
    const full = path.join(dir, rel);
    await fs.mkdir(path.dirname(full), { recursive: true });
    await fs.writeFile(full, content, "utf8");
  }
}

export async function makeTempRepo(initialFiles?: Record<string, string>) {
  const dir = await makeTempDir("feed-repo-");
  await writeFiles(dir, initialFiles ?? { "README.md": "# temp\n" });
  await execP("git init -b main", { cwd: dir });
  await execP("git add .", { cwd: dir });
  await execP('git commit -m "init"', { cwd: dir });
  return dir;
}

/** Creates a bare repository, registers it as `origin` of `repoDir` and pushes main to it. */
export async function addBareRemote(repoDir: string) {
  const bare = await makeTempDir("feed-remote-");
  await execP("git init --bare -b main", { cwd: bare });
  await execP(`git remote add origin "${bare}"`, { cwd: repoDir });
  await execP("git push -u origin main", { cwd: repoDir });
  return bare;
}

/** Creates `<dir>/.venv/bin/activate` and returns its path. */
export async function makeActivation(dir: string) {
  const activation = path.join(dir, ".venv", "bin", "activate");
  await writeFiles(dir, { ".venv/bin/activate": "# activation\n" });
  return activation;
}

export async function git(cwd: string, command: string) {
  const { stdout } = await execP(`git ${command}`, { cwd });
  return stdout.trim();
}
