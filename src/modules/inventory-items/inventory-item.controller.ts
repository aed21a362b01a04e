import { Request, Response } from "express";
import { z } from "zod";
import { booleanQuery, idParams } from "../../shared/validation/fields";
import { createInventoryItemSchema, stockMovementSchema, updateInventoryItemSchema } from "./inventory-item.dto";
import { InventoryItemService } from "./inventory-item.service";

const inventoryListQuerySchema = z.object({
  category: z.string().trim().min(1).optional(),
  lowStock: booleanQuery.optional(),
});

export class InventoryItemController {
  constructor(private readonly items: InventoryItemService) {}

  list = async (req: Request, res: Response): Promise<void> => {
    const query = inventoryListQuerySchema.parse(req.query);
    const data = this.items.list(query);
    res.json({ data });
  };

  get = async (req: Request, res: Response): Promise<void> => {
    const { id } = idParams.parse(req.params);
    const data = this.items.get(id);
    res.json({ data });
  };

  create = async (req: Request, res: Response): Promise<void> => {
    const payload = createInventoryItemSchema.parse(req.body);
    const data = this.items.create(payload);
    res.status(201).json({ data });
  };

  update = async (req: Request, res: Response): Promise<void> => {
    const { id } = idParams.parse(req.params);
    const payload = updateInventoryItemSchema.parse(req.body);
    const data = this.items.update(id, payload);
    res.json({ data });
  };

  move = async (req: Request, res: Response): Promise<void> => {
    const { id } = idParams.parse(req.params);
    const payload = stockMovementSchema.parse(req.body);
    const data = this.items.move(id, payload);
    res.json({ data });
  };

  remove = async (req: Request, res: Response): Promise<void> => {
    const { id } = idParams.parse(req.params);
    this.items.remove(id);
    res.status(204).send();
  };
}
