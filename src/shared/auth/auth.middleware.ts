import { NextFunction, Request, Response } from "express";
import type { AppContext } from "../context";
import { ApiError } from "../http/api-error";
import { AccessTokenPayload, createTokenService, hashToken, ROLES, type Role } from "./token.service";

declare global {
  namespace Express {
    interface Request {
      auth?: AccessTokenPayload;
    }
  }
}

type SessionUserRow = {
  userId: number;
  role: string;
  active: number;
  tokenHash: string | null;
  expiresAt: string;
  revokedAt: string | null;
};

function isRole(value: string): value is Role {
  return ROLES.some((role) => role === value);
}

export const createRequireAuth = ({ db, config }: AppContext) => {
  const tokens = createTokenService(config);
  const findSession = db.prepare<[number, number], SessionUserRow>(
    `SELECT s.user_id AS userId, u.role AS role, u.active AS active, s.token_hash AS tokenHash,
            s.expires_at AS expiresAt, s.revoked_at AS revokedAt
       FROM sessions s
       JOIN users u ON u.id = s.user_id
      WHERE s.id = ? AND s.user_id = ?`,
  );

  return (req: Request, _res: Response, next: NextFunction): void => {
    const header = req.headers.authorization;
    if (!header || !header.startsWith("Bearer ")) {
      throw new ApiError(401, "Oturum açmanız gerekiyor");
    }

    const token = header.slice("Bearer ".length);

    let payload: AccessTokenPayload;
    try {
      payload = tokens.verifyAccessToken(token);
    } catch {
      throw new ApiError(401, "Geçersiz oturum");
    }

    const session = findSession.get(payload.sid, payload.sub);
    if (!session || session.revokedAt !== null || session.tokenHash !== hashToken(token)) {
      throw new ApiError(401, "Oturum sona erdi");
    }

    if (session.expiresAt <= new Date().toISOString()) {
      throw new ApiError(401, "Oturum sona erdi");
    }

    if (!session.active || !isRole(session.role)) {
      throw new ApiError(401, "Hesap devre dışı");
    }

    // Use the current DB role, not the one baked into the token.
    req.auth = { sub: session.userId, role: session.role, sid: payload.sid };

    next();
  };
};

export function authOf(req: Request): AccessTokenPayload {
  if (!req.auth) {
    throw new ApiError(401, "Oturum açmanız gerekiyor");
  }
  return req.auth;
}
