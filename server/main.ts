/**
 * Process lifecycle — config, bind, signals.
 * Any startup failure is written to the error log and ends the process with status 1.
 */

import type { Server } from "node:http";
import { describeError } from "../domain/errors.js";
import { createApp, type Logger } from "./app.js";
import { loadConfig } from "./config.js";
import { startServer, stopServer } from "./listen.js";

const SHUTDOWN_SIGNALS = ["SIGINT", "SIGTERM"] as const;

export interface MainOptions {
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  exit?: (code: number) => void;
}

async function start(env: NodeJS.ProcessEnv, logger: Logger): Promise<Server> {
  const config = loadConfig(env);
  const { server } = createApp({ logger });
  const address = await startServer(server, config);
  logger.info(`Server listening on http://${config.host}:${address.port}`);
  return server;
}

/** Start serving. Resolves with the listening server, or undefined after a fatal startup error. */
export async function main(options: MainOptions = {}): Promise<Server | undefined> {
  const {
    env = process.env,
    logger = console,
    exit = (code: number) => process.exit(code),
  } = options;

  const server = await start(env, logger).catch((err: unknown) => {
    logger.error(describeError(err));
    exit(1);
    return undefined;
  });
  if (server === undefined) return undefined;

  // Errors after startup (e.g. EMFILE on accept) are logged, not thrown.
  server.on("error", (err) => logger.error(err));

  const onSignal = (signal: NodeJS.Signals): void => {
    logger.info(`${signal} received, closing server`);
    stopServer(server).then(
      () => exit(0),
      (err: unknown) => {
        logger.error(describeError(err));
        exit(1);
      }
    );
  };
  for (const signal of SHUTDOWN_SIGNALS) process.once(signal, onSignal);
  server.once("close", () => {
    for (const signal of SHUTDOWN_SIGNALS) process.off(signal, onSignal);
  });

  return server;
}
