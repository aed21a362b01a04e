import { Router } from "express";
import type { AppContext } from "../../shared/context";
import { asyncHandler } from "../../shared/http/async-handler";
import { PersonnelController } from "./personnel.controller";
import { PersonnelService } from "./personnel.service";

export const createPersonnelRouter = ({ db }: AppContext): Router => {
  const router = Router();
  const controller = new PersonnelController(new PersonnelService(db));

  router.get("/", asyncHandler(controller.list));
  router.get("/:id", asyncHandler(controller.get));
  router.post("/", asyncHandler(controller.create));
  router.patch("/:id", asyncHandler(controller.update));
  router.delete("/:id", asyncHandler(controller.remove));

  return router;
};
