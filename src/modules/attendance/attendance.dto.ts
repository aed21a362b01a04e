import { z } from "zod";
import { clockTime, entityId, isoDate, notes } from "../../shared/validation/fields";

export const ATTENDANCE_STATUSES = ["Geldi", "Gelmedi", "İzinli", "Rapor"] as const;
export type AttendanceStatus = (typeof ATTENDANCE_STATUSES)[number];

/** Report keys for each stored status. */
export const ATTENDANCE_STATUS_KEYS = {
  Geldi: "present",
  Gelmedi: "absent",
  "İzinli": "leave",
  Rapor: "sick",
} as const satisfies Record<AttendanceStatus, string>;

const status = z.enum(ATTENDANCE_STATUSES, {
  errorMap: () => ({ message: "Durum Geldi, Gelmedi, İzinli veya Rapor olmalıdır" }),
});

const timeFields = {
  checkIn: clockTime.nullable().optional(),
  checkOut: clockTime.nullable().optional(),
};

export const createAttendanceSchema = z.object({
  personnelId: entityId,
  date: isoDate,
  status,
  ...timeFields,
  notes,
});

export const updateAttendanceSchema = createAttendanceSchema.omit({ personnelId: true, date: true }).partial();

export const dailySheetSchema = z.object({
  date: isoDate,
  entries: z
    .array(
      z.object({
        personnelId: entityId,
        status,
        ...timeFields,
        notes,
      }),
    )
    .max(1000)
    .default([]),
});

export type CreateAttendanceInput = z.infer<typeof createAttendanceSchema>;
export type UpdateAttendanceInput = z.infer<typeof updateAttendanceSchema>;
export type DailySheetInput = z.infer<typeof dailySheetSchema>;
