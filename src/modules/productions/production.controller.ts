import { Request, Response } from "express";
import { z } from "zod";
import { booleanQuery, idParams, withDateRange } from "../../shared/validation/fields";
import { createProductionSchema, PRODUCTION_STATUSES, updateProductionSchema } from "./production.dto";
import { ProductionService } from "./production.service";

const productionListQuerySchema = withDateRange({
  status: z.enum(PRODUCTION_STATUSES).optional(),
  greenhouse: z.string().trim().min(1).optional(),
  active: booleanQuery.optional(),
});

export class ProductionController {
  constructor(private readonly productions: ProductionService) {}

  list = async (req: Request, res: Response): Promise<void> => {
    const query = productionListQuerySchema.parse(req.query);
    const data = this.productions.list(query);
    res.json({ data });
  };

  get = async (req: Request, res: Response): Promise<void> => {
    const { id } = idParams.parse(req.params);
    const data = this.productions.get(id);
    res.json({ data });
  };

  create = async (req: Request, res: Response): Promise<void> => {
    const payload = createProductionSchema.parse(req.body);
    const data = this.productions.create(payload);
    res.status(201).json({ data });
  };

  update = async (req: Request, res: Response): Promise<void> => {
    const { id } = idParams.parse(req.params);
    const payload = updateProductionSchema.parse(req.body);
    const data = this.productions.update(id, payload);
    res.json({ data });
  };

  remove = async (req: Request, res: Response): Promise<void> => {
    const { id } = idParams.parse(req.params);
    this.productions.remove(id);
    res.status(204).send();
  };
}
