import { NextFunction, Request, Response } from "express";
import { ApiError } from "../http/api-error";
import type { Role } from "./token.service";

export const requireRole = (roles: Role[]) => {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const role = req.auth?.role;
    if (!role) {
      throw new ApiError(401, "Oturum bulunamadı");
    }

    if (!roles.includes(role)) {
      throw new ApiError(403, "Bu işlem için yetkiniz yok");
    }

    next();
  };
};
