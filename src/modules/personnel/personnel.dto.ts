import { z } from "zod";
import { isoDate, nonNegative, notes, optionalText, requiredText } from "../../shared/validation/fields";

export const createPersonnelSchema = z.object({
  name: requiredText("Personel adı", 120),
  position: optionalText(120),
  monthlySalary: nonNegative("Aylık maaş").default(0),
  startDate: isoDate.nullable().optional(),
  active: z.boolean().optional(),
  phone: optionalText(40),
  notes,
});

export const updatePersonnelSchema = createPersonnelSchema.partial();

export type CreatePersonnelInput = z.infer<typeof createPersonnelSchema>;
export type UpdatePersonnelInput = z.infer<typeof updatePersonnelSchema>;
