import multer from "multer";
import type { Request } from "express";
import { ValidationError } from "@ragsync/errors";

/** Buffers a single `file` part in memory, capped at `maxBytes`. */
export function createUpload(maxBytes: number) {
  return multer({ storage: multer.memoryStorage(), limits: { fileSize: maxBytes, files: 1 } }).single("file");
}

export function isMultipart(req: Request): boolean {
  return typeof req.is("multipart/form-data") === "string";
}

export function requireFile(req: Request): Express.Multer.File {
  if (!req.file) {
    throw new ValidationError("A file upload is required", { file: "is required" });
  }
  return req.file;
}
