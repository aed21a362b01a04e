import { Request, Response } from "express";
import { z } from "zod";
import { monthBounds, trailingDays } from "../../shared/dates";
import { entityId, idParams, monthQuery, withDateRange } from "../../shared/validation/fields";
import {
  ATTENDANCE_STATUSES,
  createAttendanceSchema,
  dailySheetSchema,
  updateAttendanceSchema,
} from "./attendance.dto";
import { buildAttendanceWorkbook } from "./attendance.export";
import { AttendanceService } from "./attendance.service";

const attendanceListQuerySchema = withDateRange({
  personnelId: entityId.optional(),
  status: z.enum(ATTENDANCE_STATUSES).optional(),
});

const summaryQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(90).default(7),
});

const XLSX_MIME = "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";

export class AttendanceController {
  constructor(private readonly attendance: AttendanceService) {}

  list = async (req: Request, res: Response): Promise<void> => {
    const query = attendanceListQuerySchema.parse(req.query);
    const data = this.attendance.list(query);
    res.json({ data });
  };

  summary = async (req: Request, res: Response): Promise<void> => {
    const { days } = summaryQuerySchema.parse(req.query);
    const data = this.attendance.dailySummary(trailingDays(new Date(), days));
    res.json({ data });
  };

  get = async (req: Request, res: Response): Promise<void> => {
    const { id } = idParams.parse(req.params);
    const data = this.attendance.get(id);
    res.json({ data });
  };

  create = async (req: Request, res: Response): Promise<void> => {
    const payload = createAttendanceSchema.parse(req.body);
    const data = this.attendance.create(payload);
    res.status(201).json({ data });
  };

  update = async (req: Request, res: Response): Promise<void> => {
    const { id } = idParams.parse(req.params);
    const payload = updateAttendanceSchema.parse(req.body);
    const data = this.attendance.update(id, payload);
    res.json({ data });
  };

  remove = async (req: Request, res: Response): Promise<void> => {
    const { id } = idParams.parse(req.params);
    this.attendance.remove(id);
    res.status(204).send();
  };

  recordDay = async (req: Request, res: Response): Promise<void> => {
    const payload = dailySheetSchema.parse(req.body);
    const data = this.attendance.recordDay(payload);
    res.json({ data });
  };

  exportMonth = async (req: Request, res: Response): Promise<void> => {
    const { year, month } = monthQuery.parse(req.query);
    const bounds = monthBounds(year, month);
    const records = this.attendance.list({ from: bounds.start, to: bounds.end, chronological: true });
    const body = buildAttendanceWorkbook(records);

    res.setHeader("Content-Type", XLSX_MIME);
    res.setHeader("Content-Disposition", `attachment; filename="devam_${bounds.key}.xlsx"`);
    res.send(body);
  };
}
