import type { DocumentKind } from "@ragsync/types";
import { UnsupportedDocumentKindError } from "@ragsync/errors";

export interface KindHints {
  declaredKind?: string;
  mimeType?: string;
  filename?: string;
  bytes?: Uint8Array;
}

const EXTENSION_KINDS: Record<string, DocumentKind> = {
  pdf: "pdf",
  docx: "docx",
  txt: "text",
  text: "text",
  md: "text",
  markdown: "text",
  csv: "text",
  html: "text",
  htm: "text",
  json: "text",
  xml: "text",
};

const PDF_MAGIC = [0x25, 0x50, 0x44, 0x46, 0x2d]; // %PDF-
const ZIP_MAGIC = [0x50, 0x4b, 0x03, 0x04]; // PK\x03\x04
const SNIFF_LENGTH = 8192;

function startsWith(bytes: Uint8Array, magic: number[]): boolean {
  return magic.every((byte, i) => bytes[i] === byte);
}

function isKind(value: string): value is DocumentKind {
  return value === "pdf" || value === "docx" || value === "text";
}

function kindFromMimeType(mimeType: string): DocumentKind | undefined {
  const mime = mimeType.toLowerCase();
  if (mime.includes("pdf")) return "pdf";
  if (mime.includes("word") || mime.includes("msword") || mime.includes("officedocument")) {
    return "docx";
  }
  if (mime.startsWith("text/") || mime.endsWith("/json") || mime.endsWith("/xml")) return "text";
  return undefined;
}

function kindFromFilename(filename: string): DocumentKind | undefined {
  const dot = filename.lastIndexOf(".");
  if (dot < 0) return undefined;
  return EXTENSION_KINDS[filename.slice(dot + 1).toLowerCase()];
}

/**
 * Back off to the last complete UTF-8 sequence so a character cut by the
 * sample boundary does not fail strict decoding.
 */
function completeSequenceEnd(sample: Uint8Array): number {
  if (sample.length < SNIFF_LENGTH) return sample.length;
  let end = sample.length;
  while (end > 0 && ((sample[end - 1] ?? 0) & 0xc0) === 0x80) end--;
  if (end > 0 && (sample[end - 1] ?? 0) >= 0xc0) end--;
  return end;
}

function looksLikeText(bytes: Uint8Array): boolean {
  const sample = bytes.subarray(0, SNIFF_LENGTH);
  if (sample.length === 0 || sample.includes(0)) return false;
  try {
    new TextDecoder("utf-8", { fatal: true }).decode(sample.subarray(0, completeSequenceEnd(sample)));
    return true;
  } catch {
    return false;
  }
}

function sniffKind(bytes: Uint8Array): DocumentKind | undefined {
  if (startsWith(bytes, PDF_MAGIC)) return "pdf";
  if (startsWith(bytes, ZIP_MAGIC)) return "docx";
  if (looksLikeText(bytes)) return "text";
  return undefined;
}

/**
 * Decide which parser handles a document.
 *
 * Order: declared kind, MIME type, file extension, then the leading bytes.
 * `application/octet-stream` carries no information and falls through to sniffing.
 */
export function resolveDocumentKind(hints: KindHints): DocumentKind {
  if (hints.declaredKind !== undefined) {
    const declared = hints.declaredKind.toLowerCase();
    if (isKind(declared)) return declared;
    throw new UnsupportedDocumentKindError(hints.declaredKind);
  }

  const fromMime = hints.mimeType ? kindFromMimeType(hints.mimeType) : undefined;
  if (fromMime) return fromMime;

  const fromName = hints.filename ? kindFromFilename(hints.filename) : undefined;
  if (fromName) return fromName;

  const sniffed = hints.bytes ? sniffKind(hints.bytes) : undefined;
  if (sniffed) return sniffed;

  throw new UnsupportedDocumentKindError(hints.mimeType ?? hints.filename ?? "unknown");
}
