/**
 * Listener lifecycle — bind and close, as promises.
 */

import type { Server } from "node:http";
import type { AddressInfo } from "node:net";
import { StartupError } from "../domain/errors.js";
import type { ServerConfig } from "./config.js";

function errorCode(err: Error): string | undefined {
  return "code" in err && typeof err.code === "string" ? err.code : undefined;
}

/** Resolves with the bound address; rejects with StartupError if the bind fails. */
export function startServer(server: Server, config: ServerConfig): Promise<AddressInfo> {
  const { host, port } = config;
  return new Promise((resolve, reject) => {
    const onError = (err: Error): void => {
      server.off("listening", onListening);
      reject(
        new StartupError(
          `Cannot listen on ${host}:${port}: ${err.message}`,
          { host, port, code: errorCode(err) },
          { cause: err }
        )
      );
    };
    const onListening = (): void => {
      server.off("error", onError);
      const address = server.address();
      if (address === null || typeof address === "string") {
        reject(new StartupError(`Unexpected listener address for ${host}:${port}`, { host, port, address }));
        return;
      }
      resolve(address);
    };
    server.once("error", onError);
    server.once("listening", onListening);
    server.listen(port, host);
  });
}

/** Stop accepting connections; resolves once open ones have finished. */
export function stopServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => {
      if (err) reject(err);
      else resolve();
    });
  });
}
