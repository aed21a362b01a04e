import bcrypt from "bcryptjs";
import type { Role } from "../../shared/auth/token.service";
import { Db, insertedId, toBoolean, toFlag } from "../../shared/db/database";
import { assignments, Filters, SqlValue } from "../../shared/db/query";
import { ApiError, notFound } from "../../shared/http/api-error";
import { CreateUserInput, UpdateUserInput } from "./user.dto";

export type User = {
  id: number;
  username: string;
  email: string | null;
  fullName: string | null;
  role: Role;
  active: boolean;
  lastLoginAt: string | null;
  createdAt: string;
};

type UserRow = Omit<User, "active"> & { active: number };

export type LoginAttempt = {
  id: number;
  username: string;
  ip: string | null;
  success: boolean;
  attemptedAt: string;
};

const SELECT_USER = `
  SELECT id, username, email, full_name AS fullName, role, active, last_login_at AS lastLoginAt,
         created_at AS createdAt
    FROM users`;

const toUser = (row: UserRow): User => ({ ...row, active: toBoolean(row.active) });

function normalizeEmail(email: string | null | undefined): string | null | undefined {
  if (typeof email !== "string") return email;
  const trimmed = email.trim().toLowerCase();
  return trimmed || null;
}

export class UserService {
  constructor(
    private readonly db: Db,
    private readonly bcryptRounds: number,
  ) {}

  count(): number {
    return this.db.prepare<[], { count: number }>("SELECT COUNT(*) AS count FROM users").get()?.count ?? 0;
  }

  list(): User[] {
    return this.db.prepare<[], UserRow>(`${SELECT_USER} ORDER BY created_at DESC, id DESC`).all().map(toUser);
  }

  get(id: number): User {
    const row = this.db.prepare<[number], UserRow>(`${SELECT_USER} WHERE id = ?`).get(id);
    if (!row) {
      throw notFound("Kullanıcı");
    }
    return toUser(row);
  }

  /** With `firstUser`, fails unless the users table is still empty. */
  async create(input: CreateUserInput, opts: { firstUser?: boolean } = {}): Promise<User> {
    const passwordHash = await bcrypt.hash(input.password, this.bcryptRounds);

    return this.db.transaction(() => {
      if (opts.firstUser && this.count() > 0) {
        throw new ApiError(409, "Kurulum zaten tamamlandı");
      }

      const taken = this.db
        .prepare<[string], { id: number }>("SELECT id FROM users WHERE username = ?")
        .get(input.username);
      if (taken) {
        throw new ApiError(409, "Bu kullanıcı adı zaten kullanılıyor");
      }

      const result = this.db
        .prepare<SqlValue[]>(
          `INSERT INTO users (username, email, password_hash, full_name, role, active)
           VALUES (?, ?, ?, ?, ?, ?)`,
        )
        .run(
          input.username,
          normalizeEmail(input.email) ?? null,
          passwordHash,
          input.fullName ?? null,
          input.role,
          toFlag(input.active ?? true),
        );
      return this.get(insertedId(result.lastInsertRowid));
    })();
  }

  async update(id: number, input: UpdateUserInput): Promise<User> {
    const passwordHash =
      input.password === undefined ? undefined : await bcrypt.hash(input.password, this.bcryptRounds);

    return this.db.transaction(() => {
      const existing = this.get(id);

      const losesAdmin =
        existing.role === "admin" &&
        existing.active &&
        ((input.role !== undefined && input.role !== "admin") || input.active === false);
      if (losesAdmin) {
        this.assertAnotherActiveAdmin(id);
      }

      const set = assignments({
        email: normalizeEmail(input.email),
        password_hash: passwordHash,
        full_name: input.fullName,
        role: input.role,
        active: input.active === undefined ? undefined : toFlag(input.active),
      });

      if (set.sql) {
        this.db.prepare<SqlValue[]>(`UPDATE users SET ${set.sql} WHERE id = ?`).run(...set.params, id);
      }

      if (input.active === false || passwordHash !== undefined) {
        this.revokeSessions(id);
      }

      return this.get(id);
    })();
  }

  remove(id: number, actorUserId: number): void {
    if (id === actorUserId) {
      throw new ApiError(400, "Kendi hesabınızı silemezsiniz");
    }

    this.db.transaction(() => {
      const existing = this.get(id);
      if (existing.role === "admin" && existing.active) {
        this.assertAnotherActiveAdmin(id);
      }
      this.db.prepare<[number]>("DELETE FROM users WHERE id = ?").run(id);
    })();
  }

  listLoginAttempts(opts: { username?: string; limit?: number } = {}): LoginAttempt[] {
    const limit = Math.max(1, Math.min(500, opts.limit ?? 100));
    const filters = new Filters();
    if (opts.username) filters.add("username = ?", opts.username);

    return this.db
      .prepare<SqlValue[], Omit<LoginAttempt, "success"> & { success: number }>(
        `SELECT id, username, ip, success, attempted_at AS attemptedAt
           FROM login_attempts ${filters.toSql()}
          ORDER BY id DESC
          LIMIT ?`,
      )
      .all(...filters.params, limit)
      .map((row) => ({ ...row, success: toBoolean(row.success) }));
  }

  private revokeSessions(userId: number): void {
    this.db
      .prepare<[string, number]>("UPDATE sessions SET revoked_at = ? WHERE user_id = ? AND revoked_at IS NULL")
      .run(new Date().toISOString(), userId);
  }

  private assertAnotherActiveAdmin(userId: number): void {
    const others = this.db
      .prepare<[number], { count: number }>(
        "SELECT COUNT(*) AS count FROM users WHERE role = 'admin' AND active = 1 AND id != ?",
      )
      .get(userId);
    if (!others || others.count === 0) {
      throw new ApiError(409, "En az bir aktif yönetici kalmalıdır");
    }
  }
}
