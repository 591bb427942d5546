import { serve } from "@hono/node-server";
import type { Server } from "node:net";
import { loadConfig } from "./env";
import { createApp } from "./index";
import { exitOnServerError } from "./lib/lifecycle";
import { log } from "./lib/log";
import { PackSizeRegistry } from "./services/packSizes";

function main() {
  const config = loadConfig(process.env);
  const registry = new PackSizeRegistry(config.defaultPackSizes);
  const app = createApp({ registry, config });

  const server: Server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
    log("info", "server listening", { address: info.address, port: info.port, pack_sizes: registry.get() });
  });

  exitOnServerError(server);

  let stopping = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    log("info", "shutdown signal received", { signal });

    const force = setTimeout(() => {
      log("error", "graceful shutdown timed out", { timeout_ms: config.shutdownTimeoutMs });
      process.exit(1);
    }, config.shutdownTimeoutMs);
    force.unref();

    server.close((err) => {
      if (err) {
        log("error", "graceful shutdown failed", { err: err.message });
        process.exit(1);
      }
      log("info", "server stopped");
      process.exit(0);
    });
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

try {
  main();
} catch (err) {
  log("error", "unable to start server", { err: err instanceof Error ? err.message : String(err) });
  process.exit(1);
}
