import type { AppConfig } from "../config/env";
import type { Db } from "./db/database";
import type { Logger } from "./logger";

export type AppContext = {
  config: AppConfig;
  db: Db;
  logger: Logger;
};
