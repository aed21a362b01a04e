import assert from "node:assert/strict";
import type { Express } from "express";
import request from "supertest";
import { createApp } from "../app";
import type { AppConfig } from "../config/env";
import { CreatePersonnelInput } from "../modules/personnel/personnel.dto";
import { Personnel, PersonnelService } from "../modules/personnel/personnel.service";
import { User, UserService } from "../modules/users/user.service";
import type { Role } from "../shared/auth/token.service";
import type { AppContext } from "../shared/context";
import { openDatabase } from "../shared/db/database";
import { createLogger } from "../shared/logger";

export const TEST_PASSWORD = "test-password";

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    nodeEnv: "test",
    port: 0,
    databasePath: ":memory:",
    sessionSecret: "test-secret-0123456789",
    sessionSecretGenerated: false,
    sessionTtl: "1h",
    bcryptRounds: 4,
    logLevel: "silent",
    ...overrides,
  };
}

export function createTestContext(overrides: Partial<AppConfig> = {}): AppContext {
  const config = testConfig(overrides);
  return { config, db: openDatabase(config.databasePath), logger: createLogger(config) };
}

export function createTestApp(overrides: Partial<AppConfig> = {}): { ctx: AppContext; app: Express } {
  const ctx = createTestContext(overrides);
  return { ctx, app: createApp(ctx) };
}

export function createUser(ctx: AppContext, username: string, role: Role = "kullanici"): Promise<User> {
  return new UserService(ctx.db, ctx.config.bcryptRounds).create({ username, password: TEST_PASSWORD, role });
}

export async function loginAs(app: Express, username: string): Promise<string> {
  const res = await request(app).post("/api/v1/oturum/giris").send({ username, password: TEST_PASSWORD });
  assert.equal(res.status, 200);
  const token: unknown = res.body.accessToken;
  assert.equal(typeof token, "string");
  return String(token);
}

/** Creates a user with the given role and returns a bearer header value for it. */
export async function sessionFor(ctx: AppContext, app: Express, username: string, role: Role = "kullanici") {
  await createUser(ctx, username, role);
  return `Bearer ${await loginAs(app, username)}`;
}

export function addPersonnel(ctx: AppContext, input: Partial<CreatePersonnelInput> & { name: string }): Personnel {
  return new PersonnelService(ctx.db).create({ monthlySalary: 0, ...input });
}

export function countRows(ctx: AppContext, table: string): number {
  return ctx.db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ${table}`).get()?.count ?? 0;
}
