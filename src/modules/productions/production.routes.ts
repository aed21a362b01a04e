import { Router } from "express";
import type { AppContext } from "../../shared/context";
import { asyncHandler } from "../../shared/http/async-handler";
import { ProductionController } from "./production.controller";
import { ProductionService } from "./production.service";

export const createProductionRouter = ({ db }: AppContext): Router => {
  const router = Router();
  const controller = new ProductionController(new ProductionService(db));

  router.get("/", asyncHandler(controller.list));
  router.get("/:id", asyncHandler(controller.get));
  router.post("/", asyncHandler(controller.create));
  router.patch("/:id", asyncHandler(controller.update));
  router.delete("/:id", asyncHandler(controller.remove));

  return router;
};
