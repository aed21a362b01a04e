import { z } from "zod";
import { entityId, isoDate, nonNegative, notes, optionalText, requiredText } from "../../shared/validation/fields";

export const createHarvestSchema = z.object({
  productionId: entityId.nullable().optional(),
  harvestDate: isoDate,
  plot: requiredText("Parsel/alan", 120),
  quantity: nonNegative("Hasat miktarı"),
  personnelId: entityId,
  deliveredTo: optionalText(200),
  notes,
});

export const updateHarvestSchema = createHarvestSchema.partial();

export type CreateHarvestInput = z.infer<typeof createHarvestSchema>;
export type UpdateHarvestInput = z.infer<typeof updateHarvestSchema>;
