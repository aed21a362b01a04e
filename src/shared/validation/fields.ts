import { format, isValid, parseISO } from "date-fns";
import { z } from "zod";

export const DATE_FORMAT = "yyyy-MM-dd";

function isCalendarDate(value: string): boolean {
  const parsed = parseISO(value);
  return isValid(parsed) && format(parsed, DATE_FORMAT) === value;
}

export const isoDate = z
  .string({ required_error: "Tarih zorunludur" })
  .trim()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Tarih YYYY-AA-GG biçiminde olmalıdır")
  .refine(isCalendarDate, "Geçersiz tarih");

export const clockTime = z
  .string()
  .trim()
  .regex(/^([01]\d|2[0-3]):[0-5]\d$/, "Saat SS:DD biçiminde olmalıdır");

export const requiredText = (label: string, max = 200) =>
  z
    .string({ required_error: `${label} zorunludur` })
    .trim()
    .min(1, `${label} zorunludur`)
    .max(max, `${label} en fazla ${max} karakter olabilir`);

export const optionalText = (max = 200) => z.string().trim().max(max).nullable().optional();

export const notes = z.string().trim().max(10_000).optional();

export const nonNegative = (label: string) =>
  z
    .number({ required_error: `${label} zorunludur`, invalid_type_error: `${label} sayı olmalıdır` })
    .finite()
    .nonnegative(`${label} negatif olamaz`);

export const entityId = z.coerce.number().int().positive();

export const idParams = z.object({ id: entityId });

export const booleanQuery = z.enum(["true", "false"]).transform((value) => value === "true");

const dateRangeShape = {
  from: isoDate.optional(),
  to: isoDate.optional(),
};

/** Query object with optional `from`/`to` dates, rejected when `from` is after `to`. */
export const withDateRange = <T extends z.ZodRawShape>(shape: T) =>
  z.object({ ...shape, ...dateRangeShape }).refine((range) => !range.from || !range.to || range.from <= range.to, {
    message: "Başlangıç tarihi bitiş tarihinden sonra olamaz",
    path: ["to"],
  });

export const monthQuery = z.object({
  year: z.coerce.number().int().min(2000).max(2100),
  month: z.coerce.number().int().min(1).max(12),
});

export type MonthInput = z.infer<typeof monthQuery>;

/** A validation error for one field, reported the same way as schema failures. */
export const fieldError = (field: string, message: string): z.ZodError =>
  new z.ZodError([{ code: z.ZodIssueCode.custom, path: [field], message }]);
