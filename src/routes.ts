import { RequestHandler, Router } from "express";
import { createAttendanceRouter } from "./modules/attendance/attendance.routes";
import { createAuthRouter } from "./modules/auth/auth.routes";
import { createDashboardRouter } from "./modules/dashboard/dashboard.routes";
import { createHarvestRouter } from "./modules/harvests/harvest.routes";
import { createInventoryItemRouter } from "./modules/inventory-items/inventory-item.routes";
import { createPersonnelRouter } from "./modules/personnel/personnel.routes";
import { createProductionRouter } from "./modules/productions/production.routes";
import { createReportRouter } from "./modules/reports/report.routes";
import { createTaskRouter } from "./modules/tasks/task.routes";
import { createUserRouter } from "./modules/users/user.routes";
import { createRequireAuth } from "./shared/auth/auth.middleware";
import type { AppContext } from "./shared/context";

export const SERVICE_NAME = "sera-api";

export const createApiRouter = (ctx: AppContext): Router => {
  const apiRouter = Router();
  const requireAuth: RequestHandler = createRequireAuth(ctx);

  apiRouter.get("/health", (_req, res) => {
    res.json({ ok: true, service: SERVICE_NAME });
  });

  apiRouter.use("/oturum", createAuthRouter(ctx));

  const mountProtected = (path: string, router: Router): void => {
    apiRouter.use(path, requireAuth, router);
  };

  mountProtected("/panel", createDashboardRouter(ctx));
  mountProtected("/uretim", createProductionRouter(ctx));
  mountProtected("/hasat", createHarvestRouter(ctx));
  mountProtected("/stok", createInventoryItemRouter(ctx));
  mountProtected("/personel", createPersonnelRouter(ctx));
  mountProtected("/devam", createAttendanceRouter(ctx));
  mountProtected("/gorevler", createTaskRouter(ctx));
  mountProtected("/rapor", createReportRouter(ctx));
  mountProtected("/kullanicilar", createUserRouter(ctx));

  return apiRouter;
};
