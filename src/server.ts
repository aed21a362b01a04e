import path from "node:path";
import dotenv from "dotenv";
import { createApp } from "./app";
import { loadConfig } from "./config/env";
import { openDatabase } from "./shared/db/database";
import { createLogger } from "./shared/logger";

dotenv.config({ path: path.resolve(process.cwd(), ".env") });

const config = loadConfig();
const logger = createLogger(config);

if (config.sessionSecretGenerated) {
  logger.warn("SESSION_SECRET is not set; using a random secret, sessions end when the process restarts");
}

const db = openDatabase(config.databasePath);
const app = createApp({ config, db, logger });

const server = app.listen(config.port, () => {
  logger.info({ port: config.port, database: config.databasePath }, "Sera API listening");
});

const shutdown = (signal: string): void => {
  logger.info({ signal }, "Shutting down");
  server.close(() => {
    db.close();
    process.exit(0);
  });
};

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
