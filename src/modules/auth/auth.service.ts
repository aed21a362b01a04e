import crypto from "node:crypto";
import bcrypt from "bcryptjs";
import { createTokenService, hashToken, type Role, type TokenService } from "../../shared/auth/token.service";
import type { AppContext } from "../../shared/context";
import { Db, insertedId, toFlag } from "../../shared/db/database";
import { ApiError } from "../../shared/http/api-error";
import type { Logger } from "../../shared/logger";
import { User, UserService } from "../users/user.service";
import type { LoginInput, SetupInput } from "./auth.dto";

export type RequestMeta = {
  ip: string | null;
  userAgent: string | null;
};

export type LoginResult = {
  accessToken: string;
  expiresAt: string;
  user: User;
};

type CredentialRow = {
  id: number;
  role: Role;
  active: number;
  passwordHash: string;
};

const INVALID_CREDENTIALS = "Kullanıcı adı veya şifre hatalı";

function normalize(value: string | null | undefined, max: number): string | null {
  if (!value) return null;
  const trimmed = value.trim();
  if (!trimmed) return null;
  return trimmed.slice(0, max);
}

export class AuthService {
  private readonly db: Db;
  private readonly logger: Logger;
  private readonly tokens: TokenService;
  private readonly users: UserService;
  private readonly bcryptRounds: number;
  private decoyHash?: Promise<string>;

  constructor({ db, config, logger }: AppContext) {
    this.db = db;
    this.logger = logger;
    this.tokens = createTokenService(config);
    this.users = new UserService(db, config.bcryptRounds);
    this.bcryptRounds = config.bcryptRounds;
  }

  /** Appends one row to the login attempt log. */
  recordAttempt(username: string, ip: string | null, success: boolean): void {
    this.db
      .prepare<[string, string | null, number, string]>(
        "INSERT INTO login_attempts (username, ip, success, attempted_at) VALUES (?, ?, ?, ?)",
      )
      .run(username.slice(0, 80), normalize(ip, 45), toFlag(success), new Date().toISOString());
  }

  async login(input: LoginInput, meta: RequestMeta): Promise<LoginResult> {
    const user = this.db
      .prepare<[string], CredentialRow>(
        "SELECT id, role, active, password_hash AS passwordHash FROM users WHERE username = ?",
      )
      .get(input.username);

    // Unknown usernames still pay for one hash comparison.
    const passwordMatches = await bcrypt.compare(input.password, user?.passwordHash ?? (await this.getDecoyHash()));
    const ok = !!user && user.active !== 0 && passwordMatches;
    this.recordAttempt(input.username, meta.ip, ok);

    if (!user || !ok) {
      // Same answer for unknown users, wrong passwords and disabled accounts.
      this.logger.warn({ username: input.username, ip: meta.ip }, "Login failed");
      throw new ApiError(401, INVALID_CREDENTIALS);
    }

    return this.db.transaction(() => {
      const now = new Date().toISOString();

      this.db.prepare<[string, number]>("UPDATE users SET last_login_at = ? WHERE id = ?").run(now, user.id);

      // The row id goes into the token, so the session is stored before it is signed.
      const session = this.db
        .prepare<[number, string | null, string, string]>(
          "INSERT INTO sessions (user_id, user_agent, created_at, expires_at) VALUES (?, ?, ?, ?)",
        )
        .run(user.id, normalize(meta.userAgent, 500), now, now);
      const sid = insertedId(session.lastInsertRowid);

      const signed = this.tokens.signAccessToken({ sub: user.id, role: user.role, sid });
      const expiresAt = signed.expiresAt.toISOString();
      this.db
        .prepare<[string, string, number]>("UPDATE sessions SET token_hash = ?, expires_at = ? WHERE id = ?")
        .run(hashToken(signed.token), expiresAt, sid);

      return { accessToken: signed.token, expiresAt, user: this.users.get(user.id) };
    })();
  }

  private getDecoyHash(): Promise<string> {
    this.decoyHash ??= bcrypt.hash(crypto.randomBytes(16).toString("hex"), this.bcryptRounds);
    return this.decoyHash;
  }

  logout(sessionId: number): void {
    this.db
      .prepare<[string, number]>("UPDATE sessions SET revoked_at = ? WHERE id = ? AND revoked_at IS NULL")
      .run(new Date().toISOString(), sessionId);
  }

  me(userId: number): User {
    return this.users.get(userId);
  }

  setupRequired(): boolean {
    return this.users.count() === 0;
  }

  /** Creates the first admin account. Only allowed while no user exists. */
  async setup(input: SetupInput): Promise<User> {
    if (!this.setupRequired()) {
      throw new ApiError(409, "Kurulum zaten tamamlandı");
    }

    const admin = await this.users.create({ ...input, role: "admin", active: true }, { firstUser: true });
    this.logger.info({ userId: admin.id, username: admin.username }, "Initial admin account created");
    return admin;
  }
}
