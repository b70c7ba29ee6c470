import { Platform, platformFromNodePlatform } from "@fingerprint-bridge/core";
import { DEFAULT_VENV_DIR } from "@fingerprint-bridge/capture";

export interface ServerConfig {
  port: number;
  platform: Platform;
  workDir: string;
  scriptPath: string;
  venvDir: string;
}

export const DEFAULT_PORT = 8080;
export const DEFAULT_SCRIPT_PATH = "capture.py";

export function loadServerConfig(
  env: NodeJS.ProcessEnv,
  nodePlatform: NodeJS.Platform = process.platform,
  cwd: string = process.cwd()
): ServerConfig {
  return {
    port: normalizePort(env.PORT, DEFAULT_PORT),
    platform: platformFromNodePlatform(nodePlatform),
    workDir: nonBlank(env.WORK_DIR, cwd),
    scriptPath: nonBlank(env.CAPTURE_SCRIPT, DEFAULT_SCRIPT_PATH),
    venvDir: nonBlank(env.VENV_DIR, DEFAULT_VENV_DIR)
  };
}

function normalizePort(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < 0 || parsed > 65535) {
    return fallback;
  }
  return parsed;
}

function nonBlank(raw: string | undefined, fallback: string): string {
  const trimmed = raw?.trim() ?? "";
  return trimmed.length > 0 ? trimmed : fallback;
}
