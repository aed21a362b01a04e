import { Request, Response } from "express";
import { booleanQuery, entityId, idParams, withDateRange } from "../../shared/validation/fields";
import { createTaskSchema, updateTaskSchema } from "./task.dto";
import { TaskService } from "./task.service";

const taskListQuerySchema = withDateRange({
  personnelId: entityId.optional(),
  completed: booleanQuery.optional(),
});

export class TaskController {
  constructor(private readonly tasks: TaskService) {}

  list = async (req: Request, res: Response): Promise<void> => {
    const query = taskListQuerySchema.parse(req.query);
    const data = this.tasks.list(query);
    res.json({ data });
  };

  get = async (req: Request, res: Response): Promise<void> => {
    const { id } = idParams.parse(req.params);
    const data = this.tasks.get(id);
    res.json({ data });
  };

  create = async (req: Request, res: Response): Promise<void> => {
    const payload = createTaskSchema.parse(req.body);
    const data = this.tasks.create(payload);
    res.status(201).json({ data });
  };

  update = async (req: Request, res: Response): Promise<void> => {
    const { id } = idParams.parse(req.params);
    const payload = updateTaskSchema.parse(req.body);
    const data = this.tasks.update(id, payload);
    res.json({ data });
  };

  remove = async (req: Request, res: Response): Promise<void> => {
    const { id } = idParams.parse(req.params);
    this.tasks.remove(id);
    res.status(204).send();
  };
}
