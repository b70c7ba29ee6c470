import http from "node:http";
import { Logger, assertPort, createProcessLogger } from "@fingerprint-bridge/core";
import { CaptureService, ProcessRunner, createCaptureService } from "@fingerprint-bridge/capture";
import { createRouter } from "./routes";
import { ServerConfig } from "./server-config";

export interface ServerDependencies {
  logger?: Logger;
  runner?: ProcessRunner;
  captureService?: CaptureService;
}

export async function startServer(config: ServerConfig, deps: ServerDependencies = {}): Promise<http.Server> {
  assertPort(config.port, "port");
  const logger = deps.logger ?? createProcessLogger();
  const captureService =
    deps.captureService ??
    createCaptureService({
      platform: config.platform,
      workDir: config.workDir,
      scriptPath: config.scriptPath,
      venvDir: config.venvDir,
      runner: deps.runner,
      logger
    });

  const router = createRouter({ captureService, logger });
  const server = http.createServer(router.handle);

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(config.port, () => {
      server.off("error", reject);
      resolve();
    });
  });

  const address = server.address();
  const boundPort = address && typeof address === "object" ? address.port : config.port;
  logger.info(`Starting server on http://localhost:${boundPort}`);
  return server;
}
