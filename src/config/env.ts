import crypto from "node:crypto";
import type { SignOptions } from "jsonwebtoken";
import { z } from "zod";

const durationPattern = /^\d+(s|m|h|d)?$/;

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().min(1).max(65_535).default(5000),
  DATABASE_PATH: z.string().trim().min(1).default("sera.db"),
  SESSION_SECRET: z.preprocess((value) => (value === "" ? undefined : value), z.string().min(16).optional()),
  SESSION_TTL: z.string().trim().regex(durationPattern, "Expected a duration such as 30m, 12h or 7d").default("12h"),
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(12),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
});

/** A lifetime jsonwebtoken takes as `expiresIn`: seconds, or a timespan such as `12h`. */
export type SessionTtl = NonNullable<SignOptions["expiresIn"]>;

export type AppConfig = {
  nodeEnv: "development" | "test" | "production";
  port: number;
  databasePath: string;
  sessionSecret: string;
  /** True when no SESSION_SECRET was provided and a random one was generated. */
  sessionSecretGenerated: boolean;
  sessionTtl: SessionTtl;
  bcryptRounds: number;
  logLevel: z.infer<typeof envSchema>["LOG_LEVEL"];
};

const isTimespan = (value: string): value is Extract<SessionTtl, string> => /^\d+(s|m|h|d)$/.test(value);

export function toSessionTtl(value: string): SessionTtl {
  const trimmed = value.trim();
  // jsonwebtoken reads a bare numeric string as milliseconds
  if (/^\d+$/.test(trimmed)) return Number(trimmed);
  if (isTimespan(trimmed)) return trimmed;
  throw new Error(`Invalid duration: ${value}`);
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  const env = parsed.data;
  const sessionSecret = env.SESSION_SECRET ?? crypto.randomBytes(32).toString("hex");

  return {
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
    databasePath: env.DATABASE_PATH,
    sessionSecret,
    sessionSecretGenerated: env.SESSION_SECRET === undefined,
    sessionTtl: toSessionTtl(env.SESSION_TTL),
    bcryptRounds: env.BCRYPT_ROUNDS,
    logLevel: env.LOG_LEVEL,
  };
}
