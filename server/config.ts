/**
 * Server configuration — bind address from the environment.
 * Defaults match the container image: all interfaces, port 80.
 */

import { assert } from "../domain/validation.js";

export interface ServerConfig {
  readonly host: string;
  readonly port: number;
}

export const DEFAULT_HOST = "0.0.0.0";
export const DEFAULT_PORT = 80;

const MAX_PORT = 65_535;

function parsePort(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === "") return DEFAULT_PORT;
  const value = raw.trim();
  assert(/^\d+$/.test(value), `PORT must be a decimal integer, got "${raw}"`, { port: raw });
  const port = Number(value);
  assert(port <= MAX_PORT, `PORT must be between 0 and ${MAX_PORT}, got ${port}`, { port: raw });
  return port;
}

function parseHost(raw: string | undefined): string {
  const value = raw?.trim();
  return value ? value : DEFAULT_HOST;
}

/** Read HOST and PORT. Throws ValidationError on a malformed PORT. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    host: parseHost(env.HOST),
    port: parsePort(env.PORT),
  };
}
