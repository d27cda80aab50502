import { Router } from "express";
import type { HealthStatus } from "@ragsync/types";
import type { AppContext } from "../context.js";
import { asyncHandler } from "../middleware/async-handler.js";
import { sendData } from "../respond.js";

export function healthRoutes(ctx: AppContext): Router {
  const router = Router();

  router.get(
    "/health",
    asyncHandler(async (req, res) => {
      let ok = false;
      try {
        ok = await ctx.vectorStore.healthCheck();
      } catch (err) {
        req.log.warn({ err }, "Vector store health check failed");
      }

      const status: HealthStatus = {
        ok,
        vectorStore: ctx.vectorStore.name,
        index: ctx.config.indexing.indexName,
        namespaceDefault: ctx.config.indexing.defaultNamespace,
        embedDim: ctx.config.indexing.embedDim,
        embeddingProvider: ctx.embeddingProvider.name,
      };
      sendData(res, status);
    }),
  );

  return router;
}
