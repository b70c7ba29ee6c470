import { statSync } from "node:fs";
import path from "node:path";
import { Platform } from "@fingerprint-bridge/core";

export type PathProbe = (absolutePath: string) => boolean;

export interface InterpreterResolutionOptions {
  platform: Platform;
  workDir: string;
  venvDir?: string;
  probe?: PathProbe;
}

export interface ResolvedInterpreter {
  executable: string;
  source: "venv" | "default";
  candidate: string;
}

export const DEFAULT_VENV_DIR = "venv";

const conventions: Record<Platform, { paths: path.PlatformPath; venvSubpath: string[]; fallback: string }> = {
  posix: { paths: path.posix, venvSubpath: ["bin", "python3"], fallback: "python3" },
  windows: { paths: path.win32, venvSubpath: ["Scripts", "python.exe"], fallback: "python" }
};

export const statProbe: PathProbe = (absolutePath) => {
  statSync(absolutePath);
  return true;
};

export function venvInterpreterPath(platform: Platform, venvDir: string = DEFAULT_VENV_DIR): string {
  const convention = conventions[platform];
  return convention.paths.join(venvDir, ...convention.venvSubpath);
}

export function defaultInterpreterName(platform: Platform): string {
  return conventions[platform].fallback;
}

/**
 * Picks the executable that runs the capture script. A virtual environment
 * interpreter wins when present; otherwise the bare default name is left for
 * the spawn to look up on PATH. A probe that throws counts as "absent".
 */
export function resolveInterpreter(options: InterpreterResolutionOptions): ResolvedInterpreter {
  const { paths } = conventions[options.platform];
  const probe = options.probe ?? statProbe;
  const candidate = venvInterpreterPath(options.platform, options.venvDir);
  const absoluteCandidate = paths.resolve(options.workDir, candidate);

  if (probeQuietly(probe, absoluteCandidate)) {
    return { executable: absoluteCandidate, source: "venv", candidate };
  }

  return { executable: defaultInterpreterName(options.platform), source: "default", candidate };
}

function probeQuietly(probe: PathProbe, absolutePath: string): boolean {
  try {
    return probe(absolutePath);
  } catch {
    return false;
  }
}
