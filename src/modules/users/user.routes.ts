import { Router } from "express";
import { requireRole } from "../../shared/auth/role.middleware";
import type { AppContext } from "../../shared/context";
import { asyncHandler } from "../../shared/http/async-handler";
import { UserController } from "./user.controller";
import { UserService } from "./user.service";

export const createUserRouter = ({ db, config, logger }: AppContext): Router => {
  const router = Router();
  const controller = new UserController(new UserService(db, config.bcryptRounds), logger);

  router.use(requireRole(["admin"]));

  router.get("/", asyncHandler(controller.list));
  router.get("/giris-denemeleri", asyncHandler(controller.listLoginAttempts));
  router.get("/:id", asyncHandler(controller.get));
  router.post("/", asyncHandler(controller.create));
  router.patch("/:id", asyncHandler(controller.update));
  router.delete("/:id", asyncHandler(controller.remove));

  return router;
};
