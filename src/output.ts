/** User-facing lines of a run: progress on stdout, failures on stderr. */
export interface RunnerOutput {
  out(line: string): void;
  err(line: string): void;
}

export const consoleOutput: RunnerOutput = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

/** Collects lines in memory; used where a run's output is inspected afterwards. */
export class BufferedOutput implements RunnerOutput {
  readonly stdout: string[] = [];
  readonly stderr: string[] = [];

  out(line: string): void {
    this.stdout.push(line);
  }

  err(line: string): void {
    this.stderr.push(line);
  }
}
