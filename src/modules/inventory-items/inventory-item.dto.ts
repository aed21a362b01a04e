import { z } from "zod";
import { isoDate, nonNegative, notes, optionalText, requiredText } from "../../shared/validation/fields";

export const createInventoryItemSchema = z.object({
  name: requiredText("Malzeme adı", 120),
  category: optionalText(80),
  quantity: nonNegative("Miktar"),
  unit: optionalText(20),
  date: isoDate.optional(),
  warehouse: optionalText(80),
  minStock: nonNegative("Minimum stok").default(0),
  unitCost: nonNegative("Maliyet").default(0),
  notes,
});

export const updateInventoryItemSchema = createInventoryItemSchema.partial();

export const STOCK_MOVEMENTS = ["ekle", "cikar"] as const;

export const stockMovementSchema = z.object({
  type: z.enum(STOCK_MOVEMENTS, { errorMap: () => ({ message: "İşlem türü 'ekle' veya 'cikar' olmalıdır" }) }),
  quantity: z
    .number({ required_error: "Miktar zorunludur", invalid_type_error: "Miktar sayı olmalıdır" })
    .finite()
    .positive("Miktar sıfırdan büyük olmalıdır"),
});

export type CreateInventoryItemInput = z.infer<typeof createInventoryItemSchema>;
export type UpdateInventoryItemInput = z.infer<typeof updateInventoryItemSchema>;
export type StockMovementInput = z.infer<typeof stockMovementSchema>;
