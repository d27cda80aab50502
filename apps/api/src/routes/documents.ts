import { Router } from "express";
import { assertVectorDimensions, embedInBatches } from "@ragsync/core";
import type { IngestRequest } from "@ragsync/types";
import type { AppContext } from "../context.js";
import { asyncHandler } from "../middleware/async-handler.js";
import { sendData } from "../respond.js";
import {
  embedBodySchema,
  extractFormSchema,
  ingestFormSchema,
  ingestJsonSchema,
  parseBody,
} from "../schemas.js";
import { createUpload, isMultipart, requireFile } from "../upload.js";

/** Extraction, embedding and ingestion of whole documents. */
export function documentRoutes(ctx: AppContext): Router {
  const router = Router();
  const upload = createUpload(ctx.config.http.maxUploadBytes);

  router.post(
    "/extract",
    upload,
    asyncHandler(async (req, res) => {
      const file = requireFile(req);
      const { mime } = parseBody(extractFormSchema, req.body);

      const document = await ctx.normalizer.normalize({
        content: file.buffer,
        mimeType: mime ?? file.mimetype,
        filename: file.originalname,
      });
      sendData(res, { text: document.text, kind: document.kind, pageCount: document.pageCount });
    }),
  );

  router.post(
    "/embed",
    asyncHandler(async (req, res) => {
      const { texts } = parseBody(embedBodySchema, req.body);
      const { embedDim, embedBatchSize } = ctx.config.indexing;

      const result = await embedInBatches(ctx.embeddingProvider, texts, {
        dimensions: embedDim,
        batchSize: embedBatchSize,
        inputType: "document",
      });
      assertVectorDimensions(result.embeddings, embedDim);

      sendData(res, { vectors: result.embeddings, model: result.model, dimensions: embedDim });
    }),
  );

  router.post(
    "/ingest",
    upload,
    asyncHandler(async (req, res) => {
      let request: IngestRequest;

      if (isMultipart(req)) {
        const file = requireFile(req);
        const form = parseBody(ingestFormSchema, req.body);
        request = {
          documentId: form.documentId,
          namespace: form.namespace,
          metadata: form.metadata,
          replace: form.replace,
          source: { bytes: file.buffer, mimeType: form.mime ?? file.mimetype, filename: file.originalname },
        };
      } else {
        const body = parseBody(ingestJsonSchema, req.body);
        request = {
          documentId: body.documentId,
          namespace: body.namespace,
          metadata: body.metadata,
          replace: body.replace,
          source: { text: body.text },
        };
      }

      const result = await ctx.indexing.ingest(request);
      sendData(res, result, 201);
    }),
  );

  return router;
}
