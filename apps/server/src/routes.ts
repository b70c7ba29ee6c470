import { IncomingMessage, ServerResponse } from "node:http";
import { Logger } from "@fingerprint-bridge/core";
import { CaptureOutcome, CaptureService } from "@fingerprint-bridge/capture";
import { sendPng, sendText } from "./http-utils";
import { RouteHandler, Router } from "./router";
import { formatElapsed, withTiming } from "./timing";

export const CAPTURE_FAILED_PREFIX = "Failed to capture fingerprint: ";
export const NO_DATA_MESSAGE = "No data received from capture script";

export interface RouteDependencies {
  captureService: CaptureService;
  logger: Logger;
  now?: () => number;
}

export function createCaptureHandler(deps: RouteDependencies): RouteHandler {
  const { captureService, logger } = deps;

  return withTiming(
    async (_req: IncomingMessage, res: ServerResponse) => {
      const outcome = await captureOrFail(captureService);

      if (outcome.status === "failed") {
        logger.error(`Failed to capture fingerprint ${outcome.error.message}`);
        logger.error(`Capture script stdout:\n${outcome.stdout.toString("utf8")}`);
        logger.error(`Capture script stderr:\n${outcome.stderr.toString("utf8")}`);
        sendText(res, 500, `${CAPTURE_FAILED_PREFIX}${outcome.stderr.toString("utf8")}`);
        return;
      }

      if (outcome.status === "empty") {
        logger.error("Capture script returned empty output.");
        sendText(res, 500, NO_DATA_MESSAGE);
        return;
      }

      sendPng(res, outcome.image);
    },
    (elapsedMs) => logger.info(`sent fingerprint image and took ${formatElapsed(elapsedMs)}`),
    deps.now
  );
}

export function createRouter(deps: RouteDependencies): Router {
  return new Router(deps.logger).get("/capture", createCaptureHandler(deps));
}

// A rejected capture is answered like any other failed run.
async function captureOrFail(captureService: CaptureService): Promise<CaptureOutcome> {
  try {
    return await captureService.capture();
  } catch (error) {
    return {
      status: "failed",
      error: error instanceof Error ? error : new Error(String(error)),
      stdout: Buffer.alloc(0),
      stderr: Buffer.alloc(0)
    };
  }
}
