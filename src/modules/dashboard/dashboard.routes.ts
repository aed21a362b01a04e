import { Router } from "express";
import type { AppContext } from "../../shared/context";
import { asyncHandler } from "../../shared/http/async-handler";
import { DashboardController } from "./dashboard.controller";
import { DashboardService } from "./dashboard.service";

export const createDashboardRouter = ({ db }: AppContext): Router => {
  const router = Router();
  const controller = new DashboardController(new DashboardService(db));

  router.get("/", asyncHandler(controller.summary));

  return router;
};
