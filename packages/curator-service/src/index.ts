import "dotenv/config";
import { loadConfig } from "./config/index.js";
import { buildApp } from "./app.js";

async function start() {
  const config = loadConfig();
  const app = await buildApp(config);

  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(`Curator service on ${config.host}:${config.port}, model ${config.curatorModel}`);
  } catch (err) {
    app.log.error(err, "Failed to start server");
    process.exit(1);
  }

  const shutdown = async (signal: string) => {
    app.log.info(`Received ${signal}, shutting down...`);
    await app.close();
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

void start();
