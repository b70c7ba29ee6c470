import { Logger, Platform, assertNonEmptyString } from "@fingerprint-bridge/core";
import { PathProbe, resolveInterpreter } from "./interpreter";
import { ProcessRunResult, ProcessRunner, spawnProcessRunner } from "./runner";

export class CaptureProcessError extends Error {
  readonly code: number | null;
  readonly signal: NodeJS.Signals | null;

  constructor(code: number | null, signal: NodeJS.Signals | null) {
    super(signal ? `signal: ${signal}` : `exit status ${code ?? -1}`);
    this.name = "CaptureProcessError";
    this.code = code;
    this.signal = signal;
  }
}

export type CaptureOutcome =
  | { status: "captured"; image: Buffer; stderr: Buffer }
  | { status: "empty"; stderr: Buffer }
  | { status: "failed"; error: Error; stdout: Buffer; stderr: Buffer };

export interface CaptureService {
  capture(): Promise<CaptureOutcome>;
}

export interface CaptureServiceOptions {
  platform: Platform;
  workDir: string;
  scriptPath: string;
  venvDir?: string;
  runner?: ProcessRunner;
  probe?: PathProbe;
  logger: Logger;
}

export function createCaptureService(options: CaptureServiceOptions): CaptureService {
  assertNonEmptyString(options.scriptPath, "scriptPath");
  const runner = options.runner ?? spawnProcessRunner;

  return {
    capture: async () => {
      const interpreter = resolveInterpreter({
        platform: options.platform,
        workDir: options.workDir,
        venvDir: options.venvDir,
        probe: options.probe
      });
      if (interpreter.source === "venv") {
        options.logger.info(`Found virtual environment python executable at ${interpreter.candidate}`);
      }

      let result: ProcessRunResult;
      try {
        result = await runner.run(interpreter.executable, [options.scriptPath], { cwd: options.workDir });
      } catch (error) {
        return {
          status: "failed",
          error: error instanceof Error ? error : new Error(String(error)),
          stdout: Buffer.alloc(0),
          stderr: Buffer.alloc(0)
        };
      }

      return classifyRunResult(result);
    }
  };
}

export function classifyRunResult(result: ProcessRunResult): CaptureOutcome {
  if (result.code !== 0 || result.signal) {
    return {
      status: "failed",
      error: new CaptureProcessError(result.code, result.signal),
      stdout: result.stdout,
      stderr: result.stderr
    };
  }

  if (result.stdout.length === 0) {
    return { status: "empty", stderr: result.stderr };
  }

  return { status: "captured", image: result.stdout, stderr: result.stderr };
}
