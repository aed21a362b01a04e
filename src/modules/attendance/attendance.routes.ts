import { Router } from "express";
import type { AppContext } from "../../shared/context";
import { asyncHandler } from "../../shared/http/async-handler";
import { AttendanceController } from "./attendance.controller";
import { AttendanceService } from "./attendance.service";

export const createAttendanceRouter = ({ db }: AppContext): Router => {
  const router = Router();
  const controller = new AttendanceController(new AttendanceService(db));

  router.get("/", asyncHandler(controller.list));
  router.get("/ozet", asyncHandler(controller.summary));
  router.get("/disa-aktar", asyncHandler(controller.exportMonth));
  router.put("/gunluk", asyncHandler(controller.recordDay));
  router.get("/:id", asyncHandler(controller.get));
  router.post("/", asyncHandler(controller.create));
  router.patch("/:id", asyncHandler(controller.update));
  router.delete("/:id", asyncHandler(controller.remove));

  return router;
};
