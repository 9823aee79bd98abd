/**
 * HTTP request handler — home page, health check, framework defaults.
 * Routing only; the page itself lives in domain/homePage.
 */

import { createServer, type IncomingMessage, type ServerResponse } from "node:http";
import type { Server } from "node:http";
import { HOME_PAGE_HTML } from "../domain/homePage.js";
import { ERROR_STATUS, apiError } from "./apiErrors.js";

export type Logger = Pick<Console, "info" | "error">;

export interface PageResponse {
  readonly statusCode: number;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: string;
}

const HOME_PATH = "/";
const HEALTH_PATH = "/health";

const PATH_BASE = "http://localhost";

const HTML_CONTENT_TYPE = "text/html; charset=utf-8";
const JSON_CONTENT_TYPE = "application/json";

/** Methods each path answers; anything else gets 405. */
const ALLOWED_METHODS: Readonly<Record<string, readonly string[]>> = {
  [HOME_PATH]: ["GET", "HEAD", "OPTIONS"],
  [HEALTH_PATH]: ["GET", "HEAD"],
};

function html(statusCode: number, body: string): PageResponse {
  return { statusCode, headers: { "Content-Type": HTML_CONTENT_TYPE }, body };
}

function json(statusCode: number, body: unknown, headers: Record<string, string> = {}): PageResponse {
  return {
    statusCode,
    headers: { "Content-Type": JSON_CONTENT_TYPE, ...headers },
    body: JSON.stringify(body),
  };
}

/**
 * Path part of the request target. The Host header is never consulted.
 * Targets that are not origin-form ("*", absolute URLs) come back unchanged,
 * so they match no route.
 */
export function getPathname(url: string | undefined): string {
  if (url === undefined) return "/";
  if (!url.startsWith("/")) return url;
  try {
    return new URL(`${PATH_BASE}${url}`).pathname;
  } catch {
    return url;
  }
}

/** Resolve a method + pathname to a response. HEAD is answered like GET; the body is dropped on write. */
export function route(method: string, pathname: string): PageResponse {
  const allowed = ALLOWED_METHODS[pathname];
  if (allowed === undefined) {
    return json(ERROR_STATUS.NOT_FOUND, apiError("NOT_FOUND", `No route for ${pathname}`));
  }

  if (!allowed.includes(method)) {
    return json(
      ERROR_STATUS.METHOD_NOT_ALLOWED,
      apiError("METHOD_NOT_ALLOWED", `${method} is not allowed on ${pathname}`, { allowed }),
      { Allow: allowed.join(", ") }
    );
  }

  if (method === "OPTIONS") {
    return { statusCode: 200, headers: { Allow: allowed.join(", ") }, body: "" };
  }

  if (pathname === HEALTH_PATH) {
    return json(200, { status: "ok" });
  }

  return html(200, HOME_PAGE_HTML);
}

/** Write one request's response and its access-log line. */
export function handleRequest(req: IncomingMessage, res: ServerResponse, logger: Logger): void {
  const pathname = getPathname(req.url);
  const method = (req.method ?? "GET").toUpperCase();
  const { statusCode, headers, body } = route(method, pathname);

  res.writeHead(statusCode, {
    ...headers,
    "Content-Length": String(Buffer.byteLength(body)),
  });
  res.end(method === "HEAD" ? undefined : body);
  logger.info(`${method} ${pathname} ${statusCode}`);
}

export interface AppOptions {
  logger?: Logger;
}

export interface App {
  readonly server: Server;
  handle(req: IncomingMessage, res: ServerResponse): void;
}

/** Create the HTTP server; `handle` is exposed for socket-free tests. */
export function createApp(options: AppOptions = {}): App {
  const logger = options.logger ?? console;

  const handle = (req: IncomingMessage, res: ServerResponse): void => {
    try {
      handleRequest(req, res, logger);
    } catch (err) {
      logger.error(err);
      if (res.headersSent) {
        res.destroy();
        return;
      }
      const payload = JSON.stringify(apiError("INTERNAL_ERROR", "Internal Server Error"));
      res.writeHead(ERROR_STATUS.INTERNAL_ERROR, { "Content-Type": JSON_CONTENT_TYPE });
      res.end(payload);
    }
  };

  return { server: createServer(handle), handle };
}
