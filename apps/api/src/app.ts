import express, { type Express, type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import { NotFoundError } from "@ragsync/errors";
import type { AppContext } from "./context.js";
import { errorHandler } from "./middleware/error-handler.js";
import { createRequestContext } from "./middleware/request-context.js";
import { documentRoutes } from "./routes/documents.js";
import { healthRoutes } from "./routes/health.js";
import { vectorRoutes } from "./routes/vectors.js";

export function createApp(ctx: AppContext): Express {
  const app = express();
  app.disable("x-powered-by");

  app.use(createRequestContext(ctx.logger));
  app.use(cors({ origin: ctx.config.http.corsOrigins, exposedHeaders: ["x-request-id"] }));
  app.use(express.json({ limit: ctx.config.http.maxUploadBytes }));

  app.use(healthRoutes(ctx));
  app.use(documentRoutes(ctx));
  app.use(vectorRoutes(ctx));

  app.use((req: Request, _res: Response, next: NextFunction) => {
    next(new NotFoundError(`Route ${req.method} ${req.path} not found`));
  });
  app.use(errorHandler);

  return app;
}
