import { Router } from "express";
import type { AppContext } from "../../shared/context";
import { asyncHandler } from "../../shared/http/async-handler";
import { InventoryItemController } from "./inventory-item.controller";
import { InventoryItemService } from "./inventory-item.service";

export const createInventoryItemRouter = ({ db }: AppContext): Router => {
  const router = Router();
  const controller = new InventoryItemController(new InventoryItemService(db));

  router.get("/", asyncHandler(controller.list));
  router.get("/:id", asyncHandler(controller.get));
  router.post("/", asyncHandler(controller.create));
  router.post("/:id/hareket", asyncHandler(controller.move));
  router.patch("/:id", asyncHandler(controller.update));
  router.delete("/:id", asyncHandler(controller.remove));

  return router;
};
