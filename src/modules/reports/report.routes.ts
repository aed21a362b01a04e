import { Router } from "express";
import type { AppContext } from "../../shared/context";
import { asyncHandler } from "../../shared/http/async-handler";
import { ReportController } from "./report.controller";
import { ReportService } from "./report.service";

export const createReportRouter = ({ db }: AppContext): Router => {
  const router = Router();
  const controller = new ReportController(new ReportService(db));

  router.get("/aylik", asyncHandler(controller.monthly));
  router.get("/genel", asyncHandler(controller.overview));

  return router;
};
