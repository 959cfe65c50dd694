import "dotenv/config";
import { loadConfig } from "./config/index.js";
import { createServices } from "./services.js";
import { buildApp } from "./app.js";

async function start() {
  // 1. Load config — fails fast on malformed numeric variables
  const config = loadConfig();

  // 2. Wire the orchestration core
  const services = createServices(config);

  // 3. Start server
  const app = await buildApp(config, services);

  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(`StudyForge API running on ${config.host}:${config.port} [${config.env}]`);
  } catch (err) {
    app.log.error(err, "Failed to start server");
    process.exit(1);
  }

  // 4. Status polling; the first snapshot is published as soon as it completes
  services.aggregator.start().then(
    (snapshot) => app.log.info({ issues: snapshot.issues }, "Initial status check complete"),
    (err: unknown) => app.log.error({ err }, "Initial status check failed"),
  );

  // 5. Graceful shutdown
  const shutdown = async (signal: string) => {
    app.log.info(`Received ${signal}, shutting down...`);
    services.aggregator.stop();
    await app.close();
    app.log.info("Shutdown complete.");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("unhandledRejection", (reason) => {
    app.log.error({ reason }, "Unhandled promise rejection");
    void shutdown("unhandledRejection");
  });
}

void start();
