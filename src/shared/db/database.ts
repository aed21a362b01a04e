import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { SCHEMA } from "./schema";

export type Db = Database.Database;

export function openDatabase(filename: string): Db {
  if (filename !== ":memory:") {
    fs.mkdirSync(path.dirname(path.resolve(filename)), { recursive: true });
  }

  const db = new Database(filename);
  if (filename !== ":memory:") {
    db.pragma("journal_mode = WAL");
  }
  db.pragma("foreign_keys = ON");
  db.exec(SCHEMA);

  return db;
}

export function toBoolean(value: number): boolean {
  return value !== 0;
}

export function toFlag(value: boolean): number {
  return value ? 1 : 0;
}

export function insertedId(lastInsertRowid: number | bigint): number {
  return Number(lastInsertRowid);
}
