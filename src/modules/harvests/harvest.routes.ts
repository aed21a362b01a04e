import { Router } from "express";
import type { AppContext } from "../../shared/context";
import { asyncHandler } from "../../shared/http/async-handler";
import { HarvestController } from "./harvest.controller";
import { HarvestService } from "./harvest.service";

export const createHarvestRouter = ({ db }: AppContext): Router => {
  const router = Router();
  const controller = new HarvestController(new HarvestService(db));

  router.get("/", asyncHandler(controller.list));
  router.get("/:id", asyncHandler(controller.get));
  router.post("/", asyncHandler(controller.create));
  router.patch("/:id", asyncHandler(controller.update));
  router.delete("/:id", asyncHandler(controller.remove));

  return router;
};
