import { Request, Response } from "express";
import { authOf } from "../../shared/auth/auth.middleware";
import { loginSchema, setupSchema } from "./auth.dto";
import { AuthService, RequestMeta } from "./auth.service";

function requestMeta(req: Request): RequestMeta {
  return {
    ip: req.ip ?? req.socket.remoteAddress ?? null,
    userAgent: req.get("user-agent") ?? null,
  };
}

/** The username as submitted, for the attempt log of a form that failed validation. */
function submittedUsername(body: unknown): string {
  if (typeof body === "object" && body !== null && "username" in body && typeof body.username === "string") {
    return body.username.trim();
  }
  return "";
}

export class AuthController {
  constructor(private readonly auth: AuthService) {}

  login = async (req: Request, res: Response): Promise<void> => {
    const meta = requestMeta(req);
    const parsed = loginSchema.safeParse(req.body);
    if (!parsed.success) {
      this.auth.recordAttempt(submittedUsername(req.body), meta.ip, false);
      throw parsed.error;
    }

    const result = await this.auth.login(parsed.data, meta);
    res.json(result);
  };

  logout = async (req: Request, res: Response): Promise<void> => {
    this.auth.logout(authOf(req).sid);
    res.status(204).send();
  };

  me = async (req: Request, res: Response): Promise<void> => {
    const data = this.auth.me(authOf(req).sub);
    res.json({ data });
  };

  setupStatus = async (_req: Request, res: Response): Promise<void> => {
    res.json({ data: { setupRequired: this.auth.setupRequired() } });
  };

  setup = async (req: Request, res: Response): Promise<void> => {
    const payload = setupSchema.parse(req.body);
    const data = await this.auth.setup(payload);
    res.status(201).json({ data });
  };
}
