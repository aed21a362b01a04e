import { Request, Response } from "express";
import { entityId, idParams, withDateRange } from "../../shared/validation/fields";
import { createHarvestSchema, updateHarvestSchema } from "./harvest.dto";
import { HarvestService } from "./harvest.service";

const harvestListQuerySchema = withDateRange({
  personnelId: entityId.optional(),
  productionId: entityId.optional(),
});

export class HarvestController {
  constructor(private readonly harvests: HarvestService) {}

  list = async (req: Request, res: Response): Promise<void> => {
    const query = harvestListQuerySchema.parse(req.query);
    const data = this.harvests.list(query);
    res.json({ data });
  };

  get = async (req: Request, res: Response): Promise<void> => {
    const { id } = idParams.parse(req.params);
    const data = this.harvests.get(id);
    res.json({ data });
  };

  create = async (req: Request, res: Response): Promise<void> => {
    const payload = createHarvestSchema.parse(req.body);
    const data = this.harvests.create(payload);
    res.status(201).json({ data });
  };

  update = async (req: Request, res: Response): Promise<void> => {
    const { id } = idParams.parse(req.params);
    const payload = updateHarvestSchema.parse(req.body);
    const data = this.harvests.update(id, payload);
    res.json({ data });
  };

  remove = async (req: Request, res: Response): Promise<void> => {
    const { id } = idParams.parse(req.params);
    this.harvests.remove(id);
    res.status(204).send();
  };
}
