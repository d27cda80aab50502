import { z } from "zod";
import { ValidationError } from "@ragsync/errors";

const metadataValue = z.union([z.string(), z.number(), z.boolean()]);
const metadataRecord = z.record(metadataValue);
const namespace = z.string().trim().min(1).optional();

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

export const embedBodySchema = z.object({
  texts: z.array(z.string()).min(1),
});

export const ingestJsonSchema = z.object({
  documentId: z.string().trim().min(1),
  text: z.string(),
  namespace,
  metadata: metadataRecord.optional(),
  replace: z.boolean().optional(),
});

/** Multipart fields all arrive as strings. */
export const ingestFormSchema = z.object({
  documentId: z.string().trim().min(1),
  namespace,
  mime: z.string().trim().min(1).optional(),
  replace: z
    .enum(["true", "false"])
    .optional()
    .transform((value) => value === "true"),
  metadata: z
    .string()
    .optional()
    .transform((raw, ctx) => {
      if (raw === undefined || raw.trim() === "") return undefined;
      const result = metadataRecord.safeParse(parseJson(raw));
      if (result.success) return result.data;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be a JSON object of string, number or boolean values" });
      return z.NEVER;
    }),
});

export const extractFormSchema = z.object({
  mime: z.string().trim().min(1).optional(),
});

export const upsertBodySchema = z.object({
  namespace,
  points: z.array(
    z.object({
      id: z.string().trim().min(1),
      values: z.array(z.number()),
      metadata: metadataRecord,
    }),
  ),
});

export const deleteBodySchema = z.object({
  namespace,
  documentId: z.string().trim().min(1),
});

export const queryBodySchema = z.object({
  namespace,
  text: z.string().optional(),
  vector: z.array(z.number()).optional(),
  topK: z.number().int().positive().optional(),
  filter: z.unknown().optional(),
  includeValues: z.boolean().optional(),
  includeMetadata: z.boolean().optional(),
});

/**
 * Validate a request body, raising ValidationError with one message per
 * offending field path.
 */
export function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
  const result = schema.safeParse(body ?? {});
  if (result.success) return result.data;

  const fields: Record<string, string> = {};
  for (const issue of result.error.issues) {
    const path = issue.path.length > 0 ? issue.path.join(".") : "body";
    fields[path] ??= issue.message;
  }
  throw new ValidationError("Request body is invalid", fields);
}
