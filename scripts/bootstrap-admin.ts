import path from "node:path";
import dotenv from "dotenv";
import { loadConfig } from "../src/config/env";
import { setupSchema } from "../src/modules/auth/auth.dto";
import { AuthService } from "../src/modules/auth/auth.service";
import { openDatabase } from "../src/shared/db/database";
import { createLogger } from "../src/shared/logger";

function required(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`Missing required env var: ${name}`);
  }
  return value;
}

async function main(): Promise<void> {
  dotenv.config({ path: path.resolve(__dirname, "../.env") });

  const config = loadConfig();
  const logger = createLogger(config);
  const db = openDatabase(config.databasePath);

  try {
    const auth = new AuthService({ config, db, logger });
    if (!auth.setupRequired()) {
      logger.info("Users already exist; nothing to bootstrap");
      return;
    }

    const input = setupSchema.parse({
      username: required("BOOTSTRAP_USERNAME"),
      password: required("BOOTSTRAP_PASSWORD"),
      fullName: process.env.BOOTSTRAP_FULL_NAME,
      email: process.env.BOOTSTRAP_EMAIL,
    });

    await auth.setup(input);
  } finally {
    db.close();
  }
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
