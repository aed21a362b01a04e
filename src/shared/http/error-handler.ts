import { NextFunction, Request, Response } from "express";
import { ZodError } from "zod";
import type { Logger } from "../logger";
import { ApiError } from "./api-error";

export type FieldErrors = Record<string, string[]>;

export function toFieldErrors(error: ZodError): FieldErrors {
  const fields: FieldErrors = {};
  for (const issue of error.issues) {
    const key = issue.path.length > 0 ? issue.path.join(".") : "_form";
    (fields[key] ??= []).push(issue.message);
  }
  return fields;
}

function sqliteCode(err: unknown): string | null {
  if (!(err instanceof Error) || !("code" in err)) return null;
  return typeof err.code === "string" ? err.code : null;
}

export const notFoundHandler = (_req: Request, _res: Response, next: NextFunction): void => {
  next(new ApiError(404, "Sayfa bulunamadı"));
};

export const createErrorHandler = (logger: Logger) => {
  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    if (err instanceof ApiError) {
      res.status(err.statusCode).json({ error: err.message });
      return;
    }

    if (err instanceof ZodError) {
      res.status(400).json({ error: "Geçersiz form verisi", fields: toFieldErrors(err) });
      return;
    }

    // express.json() rejects malformed bodies with a 400-class error
    if (err instanceof SyntaxError && "status" in err && err.status === 400) {
      res.status(400).json({ error: "Geçersiz istek gövdesi" });
      return;
    }

    const code = sqliteCode(err);
    if (code === "SQLITE_CONSTRAINT_UNIQUE") {
      res.status(409).json({ error: "Bu kayıt zaten mevcut" });
      return;
    }
    if (code === "SQLITE_CONSTRAINT_FOREIGNKEY") {
      res.status(409).json({ error: "Kayıt başka kayıtlar tarafından kullanılıyor" });
      return;
    }

    logger.error({ err, method: req.method, path: req.originalUrl }, "Unhandled request error");
    res.status(500).json({ error: "Sunucu hatası" });
  };
};
