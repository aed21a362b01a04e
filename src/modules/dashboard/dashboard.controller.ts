import { Request, Response } from "express";
import { DashboardService } from "./dashboard.service";

export class DashboardController {
  constructor(private readonly dashboard: DashboardService) {}

  summary = async (_req: Request, res: Response): Promise<void> => {
    const data = this.dashboard.summary();
    res.json({ data });
  };
}
