import { Router } from "express";
import { validateMetadataFilter } from "@ragsync/core";
import { PartialDeleteError, withRetry } from "@ragsync/errors";
import type { AppContext } from "../context.js";
import { asyncHandler } from "../middleware/async-handler.js";
import { sendData } from "../respond.js";
import { deleteBodySchema, parseBody, queryBodySchema, upsertBodySchema } from "../schemas.js";

export function vectorRoutes(ctx: AppContext): Router {
  const router = Router();

  router.post(
    "/vectors/upsert",
    asyncHandler(async (req, res) => {
      const body = parseBody(upsertBodySchema, req.body);
      const result = await ctx.indexing.upsertPoints(
        body.namespace,
        body.points.map((p) => ({ id: p.id, vector: p.values, metadata: p.metadata })),
      );
      sendData(res, result);
    }),
  );

  // Interrupted deletes are repeated; each attempt only sees what is left,
  // so the reported total is the sum over attempts.
  router.post(
    "/vectors/delete_by_document",
    asyncHandler(async (req, res) => {
      const { documentId, namespace } = parseBody(deleteBodySchema, req.body);
      let deletedBefore = 0;

      try {
        const result = await withRetry(() => ctx.indexing.deleteByDocument(documentId, namespace), {
          maxRetries: ctx.config.indexing.deleteMaxRetries,
          baseDelayMs: ctx.deleteRetryDelayMs,
          retryOn: (err) => err instanceof PartialDeleteError,
          onRetry: (err, attempt, delayMs) => {
            if (err instanceof PartialDeleteError) deletedBefore += err.deleted;
            req.log.warn({ attempt, delayMs, deletedSoFar: deletedBefore }, "Retrying delete by document");
          },
        });
        sendData(res, { ...result, deleted: result.deleted + deletedBefore });
      } catch (err) {
        if (err instanceof PartialDeleteError && deletedBefore > 0) {
          throw new PartialDeleteError(err.documentId, err.namespace, err.deleted + deletedBefore, {
            cause: err.cause,
          });
        }
        throw err;
      }
    }),
  );

  router.post(
    "/vectors/query",
    asyncHandler(async (req, res) => {
      const body = parseBody(queryBodySchema, req.body);
      const result = await ctx.retrieval.query({
        namespace: body.namespace,
        text: body.text,
        vector: body.vector,
        topK: body.topK,
        filter: body.filter === undefined ? undefined : validateMetadataFilter(body.filter),
        includeValues: body.includeValues,
        includeMetadata: body.includeMetadata,
      });
      sendData(res, result);
    }),
  );

  return router;
}
