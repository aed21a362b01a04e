import cors from "cors";
import express from "express";
import helmet from "helmet";
import { createApiRouter } from "./routes";
import type { AppContext } from "./shared/context";
import { createErrorHandler, notFoundHandler } from "./shared/http/error-handler";

export const createApp = (ctx: AppContext) => {
  const app = express();

  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: "1mb" }));

  app.use("/api/v1", createApiRouter(ctx));
  app.use(notFoundHandler);
  app.use(createErrorHandler(ctx.logger));

  return app;
};
