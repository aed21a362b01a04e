import { Router } from "express";
import { createRequireAuth } from "../../shared/auth/auth.middleware";
import type { AppContext } from "../../shared/context";
import { asyncHandler } from "../../shared/http/async-handler";
import { AuthController } from "./auth.controller";
import { AuthService } from "./auth.service";

export const createAuthRouter = (ctx: AppContext): Router => {
  const router = Router();
  const controller = new AuthController(new AuthService(ctx));
  const requireAuth = createRequireAuth(ctx);

  router.post("/giris", asyncHandler(controller.login));
  router.post("/cikis", requireAuth, asyncHandler(controller.logout));
  router.get("/ben", requireAuth, asyncHandler(controller.me));
  router.get("/kurulum", asyncHandler(controller.setupStatus));
  router.post("/kurulum", asyncHandler(controller.setup));

  return router;
};
