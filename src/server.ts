// src/server.ts
// HTTP entry point: build the runtime, serve the API.

import { config } from "./config";
import { buildApp } from "./app";
import { createRuntime } from "./runtime";
import { createLogger } from "./observability";

const startupLogger = createLogger("startup");

async function main() {
  const runtime = await createRuntime();
  const app = await buildApp({ engine: runtime.engine, store: runtime.store, defaultTopK: config.search.topK });

  const shutdown = async (signal: string) => {
    startupLogger.info({ signal }, "Shutting down");
    await app.close();
    await runtime.close();
    process.exit(0);
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err) => {
        startupLogger.error({ err }, "Shutdown failed");
        process.exit(1);
      });
    });
  }

  await app.listen({ port: config.server.port, host: "0.0.0.0" });
  startupLogger.info({ port: config.server.port, profiles: runtime.engine.profileCount }, "API listening");
}

main().catch((err) => {
  startupLogger.fatal({ err }, "Server startup failed");
  process.exit(1);
});
