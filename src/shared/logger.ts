import pino, { type Logger } from "pino";
import type { AppConfig } from "../config/env";

export type { Logger };

export const createLogger = (config: Pick<AppConfig, "logLevel" | "nodeEnv">): Logger =>
  pino({
    name: "sera-api",
    level: config.logLevel,
    base: { env: config.nodeEnv },
  });
