import { spawn } from "node:child_process";

export interface ProcessRunOptions {
  cwd: string;
}

export interface ProcessRunResult {
  code: number | null;
  signal: NodeJS.Signals | null;
  stdout: Buffer;
  stderr: Buffer;
}

export interface ProcessRunner {
  run(command: string, args: string[], options: ProcessRunOptions): Promise<ProcessRunResult>;
}

// Resolves after exit and stream close; rejects only when the child never started.
export const spawnProcessRunner: ProcessRunner = {
  run: (command, args, options) =>
    new Promise<ProcessRunResult>((resolve, reject) => {
      const child = spawn(command, args, {
        cwd: options.cwd,
        stdio: ["ignore", "pipe", "pipe"],
        windowsHide: true
      });

      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];
      child.stdout.on("data", (chunk: Buffer) => stdoutChunks.push(chunk));
      child.stderr.on("data", (chunk: Buffer) => stderrChunks.push(chunk));

      child.once("error", reject);
      child.once("close", (code, signal) => {
        resolve({
          code,
          signal,
          stdout: Buffer.concat(stdoutChunks),
          stderr: Buffer.concat(stderrChunks)
        });
      });
    })
};
