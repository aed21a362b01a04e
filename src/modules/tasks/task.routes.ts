import { Router } from "express";
import type { AppContext } from "../../shared/context";
import { asyncHandler } from "../../shared/http/async-handler";
import { TaskController } from "./task.controller";
import { TaskService } from "./task.service";

export const createTaskRouter = ({ db }: AppContext): Router => {
  const router = Router();
  const controller = new TaskController(new TaskService(db));

  router.get("/", asyncHandler(controller.list));
  router.get("/:id", asyncHandler(controller.get));
  router.post("/", asyncHandler(controller.create));
  router.patch("/:id", asyncHandler(controller.update));
  router.delete("/:id", asyncHandler(controller.remove));

  return router;
};
