import { z } from "zod";
import { isoDate, nonNegative, notes, requiredText } from "../../shared/validation/fields";

export const PRODUCTION_STATUSES = ["Ekim Yapıldı", "Büyüme Döneminde", "Çiçeklenme", "Hasat Edildi"] as const;
export type ProductionStatus = (typeof PRODUCTION_STATUSES)[number];

export const HARVESTED: ProductionStatus = "Hasat Edildi";

export const HARVEST_BEFORE_PLANTING = "Hasat tarihi ekim tarihinden önce olamaz";

export const PLANTING_AFTER_LINKED_HARVEST = "Ekim tarihi bağlı hasat kayıtlarının tarihinden sonra olamaz";

const productionFields = z.object({
  greenhouse: requiredText("Sera adı", 120),
  crop: requiredText("Ürün adı", 120),
  plantingDate: isoDate,
  harvestDate: isoDate.nullable().optional(),
  status: z.enum(PRODUCTION_STATUSES).optional(),
  area: nonNegative("Alan").nullable().optional(),
  expectedYield: nonNegative("Beklenen verim").nullable().optional(),
  actualYield: nonNegative("Gerçek verim").nullable().optional(),
  notes,
});

export function harvestsAfterPlanting(dates: { plantingDate: string; harvestDate?: string | null }): boolean {
  return !dates.harvestDate || dates.harvestDate >= dates.plantingDate;
}

export const createProductionSchema = productionFields.refine(harvestsAfterPlanting, {
  message: HARVEST_BEFORE_PLANTING,
  path: ["harvestDate"],
});

// Cross-field checks for updates run in the service against the stored row.
export const updateProductionSchema = productionFields.partial();

export type CreateProductionInput = z.infer<typeof createProductionSchema>;
export type UpdateProductionInput = z.infer<typeof updateProductionSchema>;
