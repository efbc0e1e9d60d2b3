import { createServer } from "node:http";
import type { IncomingMessage, Server, ServerResponse } from "node:http";
import { describeError } from "./errors.js";
import { silentLogger } from "./logger.js";
import type { Logger } from "./logger.js";

/**
 * Read-only view of the bridge the status endpoints report on.
 */
export interface StatusSource {
  readonly isRunning: boolean;
  readonly targetUrl: string;
  readonly bucket: string;
}

export interface StatusServerOptions {
  host: string;
  port: number;
  logger?: Logger;
}

export interface StatusServer {
  /** Start listening and resolve with the bound port. */
  listen(): Promise<number>;
  /** Stop listening. Safe when not listening. */
  close(): Promise<void>;
  /** Bound port, or `null` when not listening. */
  readonly port: number | null;
}

/**
 * Serialize a JSON response with status code.
 */
export function writeJson(res: ServerResponse, statusCode: number, payload: unknown): void {
  const body = JSON.stringify(payload);
  res.statusCode = statusCode;
  res.setHeader("Content-Type", "application/json; charset=utf-8");
  res.setHeader("Content-Length", Buffer.byteLength(body));
  res.end(body);
}

type RouteHandler = (res: ServerResponse) => void;

function routeKey(method: string, pathname: string): string {
  return `${method.toUpperCase()} ${pathname}`;
}

/**
 * HTTP server exposing `GET /health` and `GET /status`.
 */
export function createStatusServer(source: StatusSource, options: StatusServerOptions): StatusServer {
  const logger = options.logger ?? silentLogger;
  const routes = new Map<string, RouteHandler>();

  routes.set(routeKey("GET", "/health"), (res) => {
    writeJson(res, 200, {
      status: "healthy",
      listener_running: source.isRunning,
    });
  });

  routes.set(routeKey("GET", "/status"), (res) => {
    writeJson(res, 200, {
      running: source.isRunning,
      target_url: source.targetUrl,
      bucket: source.bucket,
    });
  });

  const handleRequest = (req: IncomingMessage, res: ServerResponse): void => {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const handler = routes.get(routeKey(req.method ?? "GET", url.pathname));
    if (!handler) {
      writeJson(res, 404, { error: "not_found" });
      return;
    }
    try {
      handler(res);
    } catch (error: unknown) {
      logger.error(`Status request failed: ${describeError(error)}`);
      if (!res.headersSent) {
        writeJson(res, 500, { error: "internal_error" });
      }
    }
  };

  let server: Server | null = null;

  return {
    get port(): number | null {
      const address = server?.address();
      return address && typeof address === "object" ? address.port : null;
    },

    listen(): Promise<number> {
      const created = createServer(handleRequest);
      return new Promise<number>((resolve, reject) => {
        created.once("error", reject);
        created.listen(options.port, options.host, () => {
          created.removeListener("error", reject);
          server = created;
          const address = created.address();
          const port = address && typeof address === "object" ? address.port : options.port;
          logger.info(`Status server listening on ${options.host}:${port}`);
          resolve(port);
        });
      });
    },

    close(): Promise<void> {
      const current = server;
      server = null;
      if (!current) {
        return Promise.resolve();
      }
      return new Promise<void>((resolve, reject) => {
        current.close((error) => {
          if (error) {
            reject(error);
            return;
          }
          resolve();
        });
        current.closeAllConnections();
      });
    },
  };
}
