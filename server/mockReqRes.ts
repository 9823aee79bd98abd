/**
 * Test utils — mock HTTP req/res without sockets.
 * Enables deterministic handler tests with no network.
 */

import { Readable } from "node:stream";
import type { IncomingMessage, ServerResponse } from "node:http";

export interface MockReqOptions {
  method?: string;
  url?: string;
  headers?: Record<string, string>;
}

export interface MockedResponse {
  readonly statusCode: number;
  /** Header names lowercased. */
  readonly headers: Record<string, string>;
  readonly body: string;
  /** Whether end() has been called. */
  readonly ended: boolean;
  json<T = unknown>(): T;
}

export function mockReq(opts: MockReqOptions = {}): IncomingMessage {
  const headers: Record<string, string> = {};
  for (const [k, v] of Object.entries(opts.headers ?? {})) {
    headers[k.toLowerCase()] = v;
  }
  return Object.assign(Readable.from([]), {
    method: opts.method ?? "GET",
    url: opts.url ?? "/",
    headers,
  }) as unknown as IncomingMessage;
}

export function mockRes(): ServerResponse & MockedResponse {
  const state = {
    statusCode: 0,
    headers: {} as Record<string, string>,
    body: "",
    ended: false,
  };

  const res = {
    get statusCode() {
      return state.statusCode;
    },
    get headers() {
      return { ...state.headers };
    },
    get body() {
      return state.body;
    },
    get ended() {
      return state.ended;
    },
    get headersSent() {
      return state.statusCode !== 0;
    },
    writeHead(code: number, h?: Record<string, string | string[]>) {
      state.statusCode = code;
      for (const [k, v] of Object.entries(h ?? {})) {
        state.headers[k.toLowerCase()] = Array.isArray(v) ? v.join(", ") : v;
      }
    },
    end(chunk?: string | Buffer) {
      if (chunk !== undefined) state.body += typeof chunk === "string" ? chunk : chunk.toString("utf8");
      state.ended = true;
    },
    destroy() {
      state.ended = true;
    },
    json<T = unknown>(): T {
      return JSON.parse(state.body) as T;
    },
  };

  return res as unknown as ServerResponse & MockedResponse;
}

export interface MockReqResResult {
  req: IncomingMessage;
  res: ServerResponse & MockedResponse;
}

export function mockReqRes(opts: MockReqOptions = {}): MockReqResResult {
  return {
    req: mockReq(opts),
    res: mockRes(),
  };
}
