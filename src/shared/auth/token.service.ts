import crypto from "node:crypto";
import jwt from "jsonwebtoken";
import { z } from "zod";
import type { AppConfig } from "../../config/env";

export const ROLES = ["admin", "kullanici"] as const;
export type Role = (typeof ROLES)[number];

export type AccessTokenPayload = {
  sub: number;
  role: Role;
  sid: number;
};

const payloadSchema = z.object({
  sub: z.number().int().positive(),
  role: z.enum(ROLES),
  sid: z.number().int().positive(),
});

export function hashToken(token: string): string {
  // Only a hash of each issued token is stored.
  return crypto.createHash("sha256").update(token).digest("hex");
}

export type SignedToken = {
  token: string;
  /** Taken from the token's own `exp` claim. */
  expiresAt: Date;
};

export const createTokenService = (config: Pick<AppConfig, "sessionSecret" | "sessionTtl">) => ({
  signAccessToken(payload: AccessTokenPayload): SignedToken {
    const token = jwt.sign(payload, config.sessionSecret, { expiresIn: config.sessionTtl });
    const decoded = jwt.decode(token);
    if (!decoded || typeof decoded !== "object" || typeof decoded.exp !== "number") {
      throw new Error("Signed token has no exp claim");
    }
    return { token, expiresAt: new Date(decoded.exp * 1000) };
  },
  verifyAccessToken(token: string): AccessTokenPayload {
    const decoded = jwt.verify(token, config.sessionSecret);
    return payloadSchema.parse(decoded);
  },
});

export type TokenService = ReturnType<typeof createTokenService>;
