import type { Server } from "node:net";
import { log } from "./log";

// Bind failures (EADDRINUSE, EACCES) arrive as "error" events, not throws.
export function exitOnServerError(server: Server) {
  server.on("error", (err: NodeJS.ErrnoException) => {
    log("error", "server failed", { err: err.message, code: err.code });
    process.exit(1);
  });
}
