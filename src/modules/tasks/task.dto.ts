import { z } from "zod";
import { entityId, isoDate, notes, optionalText, requiredText } from "../../shared/validation/fields";

export const createTaskSchema = z.object({
  personnelId: entityId,
  description: requiredText("Görev", 500),
  date: isoDate,
  greenhouse: optionalText(120),
  completed: z.boolean().optional(),
  notes,
});

export const updateTaskSchema = createTaskSchema.partial();

export type CreateTaskInput = z.infer<typeof createTaskSchema>;
export type UpdateTaskInput = z.infer<typeof updateTaskSchema>;
