import { Request, Response } from "express";
import { z } from "zod";
import { monthQuery } from "../../shared/validation/fields";
import { ReportService } from "./report.service";

const overviewQuerySchema = z.object({
  months: z.coerce.number().int().min(1).max(36).default(12),
});

export class ReportController {
  constructor(private readonly reports: ReportService) {}

  monthly = async (req: Request, res: Response): Promise<void> => {
    const { year, month } = monthQuery.parse(req.query);
    const data = this.reports.monthly(year, month);
    res.json({ data });
  };

  overview = async (req: Request, res: Response): Promise<void> => {
    const { months } = overviewQuerySchema.parse(req.query);
    const data = this.reports.overview(new Date(), months);
    res.json({ data });
  };
}
