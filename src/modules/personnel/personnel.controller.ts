import { Request, Response } from "express";
import { z } from "zod";
import { booleanQuery, idParams } from "../../shared/validation/fields";
import { createPersonnelSchema, updatePersonnelSchema } from "./personnel.dto";
import { PersonnelService } from "./personnel.service";

const personnelListQuerySchema = z.object({
  active: booleanQuery.optional(),
});

export class PersonnelController {
  constructor(private readonly personnel: PersonnelService) {}

  list = async (req: Request, res: Response): Promise<void> => {
    const { active } = personnelListQuerySchema.parse(req.query);
    const data = this.personnel.list({ active });
    res.json({ data });
  };

  get = async (req: Request, res: Response): Promise<void> => {
    const { id } = idParams.parse(req.params);
    const data = this.personnel.get(id);
    res.json({ data });
  };

  create = async (req: Request, res: Response): Promise<void> => {
    const payload = createPersonnelSchema.parse(req.body);
    const data = this.personnel.create(payload);
    res.status(201).json({ data });
  };

  update = async (req: Request, res: Response): Promise<void> => {
    const { id } = idParams.parse(req.params);
    const payload = updatePersonnelSchema.parse(req.body);
    const data = this.personnel.update(id, payload);
    res.json({ data });
  };

  remove = async (req: Request, res: Response): Promise<void> => {
    const { id } = idParams.parse(req.params);
    this.personnel.remove(id);
    res.status(204).send();
  };
}
