import { Request, Response } from "express";
import { authOf } from "../../shared/auth/auth.middleware";
import type { Logger } from "../../shared/logger";
import { idParams } from "../../shared/validation/fields";
import { createUserSchema, loginAttemptsQuerySchema, updateUserSchema } from "./user.dto";
import { UserService } from "./user.service";

export class UserController {
  constructor(
    private readonly users: UserService,
    private readonly logger: Logger,
  ) {}

  list = async (_req: Request, res: Response): Promise<void> => {
    const data = this.users.list();
    res.json({ data });
  };

  get = async (req: Request, res: Response): Promise<void> => {
    const { id } = idParams.parse(req.params);
    const data = this.users.get(id);
    res.json({ data });
  };

  create = async (req: Request, res: Response): Promise<void> => {
    const payload = createUserSchema.parse(req.body);
    const data = await this.users.create(payload);
    this.logger.info({ actorUserId: authOf(req).sub, userId: data.id, role: data.role }, "User created");
    res.status(201).json({ data });
  };

  update = async (req: Request, res: Response): Promise<void> => {
    const { id } = idParams.parse(req.params);
    const payload = updateUserSchema.parse(req.body);
    const data = await this.users.update(id, payload);
    this.logger.info(
      { actorUserId: authOf(req).sub, userId: id, fields: Object.keys(payload).filter((k) => k !== "password") },
      "User updated",
    );
    res.json({ data });
  };

  remove = async (req: Request, res: Response): Promise<void> => {
    const { id } = idParams.parse(req.params);
    const actorUserId = authOf(req).sub;
    this.users.remove(id, actorUserId);
    this.logger.info({ actorUserId, userId: id }, "User deleted");
    res.status(204).send();
  };

  listLoginAttempts = async (req: Request, res: Response): Promise<void> => {
    const query = loginAttemptsQuerySchema.parse(req.query);
    const data = this.users.listLoginAttempts(query);
    res.json({ data });
  };
}
