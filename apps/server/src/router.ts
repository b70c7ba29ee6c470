import { IncomingMessage, ServerResponse } from "node:http";
import { Logger } from "@fingerprint-bridge/core";
import { sendText } from "./http-utils";

export type RouteHandler = (req: IncomingMessage, res: ServerResponse) => Promise<void> | void;

export class Router {
  private readonly routes = new Map<string, Map<string, RouteHandler>>();

  constructor(private readonly logger: Logger) {}

  get(pathname: string, handler: RouteHandler): this {
    return this.on("GET", pathname, handler);
  }

  on(method: string, pathname: string, handler: RouteHandler): this {
    const byMethod = this.routes.get(pathname) ?? new Map<string, RouteHandler>();
    byMethod.set(method.toUpperCase(), handler);
    this.routes.set(pathname, byMethod);
    return this;
  }

  // Never rejects.
  readonly handle = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    const method = req.method ?? "GET";
    const pathname = parsePathname(req.url);
    if (pathname === undefined) {
      sendText(res, 400, "400 Bad Request");
      return;
    }

    const byMethod = this.routes.get(pathname);
    if (!byMethod) {
      sendText(res, 404, "404 page not found");
      return;
    }

    // HEAD falls through to GET; node drops the body.
    const handler = byMethod.get(method) ?? (method === "HEAD" ? byMethod.get("GET") : undefined);
    if (!handler) {
      sendText(res, 405, "Method Not Allowed", { allow: allowedMethods(byMethod) });
      return;
    }

    try {
      await handler(req, res);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`${method} ${pathname} failed: ${message}`);
      if (res.headersSent) {
        res.destroy();
        return;
      }
      sendText(res, 500, INTERNAL_ERROR_MESSAGE);
    }
  };
}

export const INTERNAL_ERROR_MESSAGE = "Internal Server Error";

// Parses the request target alone; Host is ignored.
function parsePathname(url: string | undefined): string | undefined {
  try {
    return new URL(url ?? "/", "http://localhost").pathname;
  } catch {
    return undefined;
  }
}

function allowedMethods(byMethod: Map<string, RouteHandler>): string {
  const methods = new Set(byMethod.keys());
  if (methods.has("GET")) {
    methods.add("HEAD");
  }
  return [...methods].sort().join(", ");
}
