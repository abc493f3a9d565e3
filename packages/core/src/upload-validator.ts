import type { Outcome, UploadFile } from "@studydesk/types";
import { PDF_MIME_TYPE } from "@studydesk/types";
import { AppError, ValidationError, fail, succeed } from "@studydesk/errors";

const BYTES_PER_MB = 1024 * 1024;

export const DEFAULT_MAX_UPLOAD_BYTES = 50 * BYTES_PER_MB;

const PDF_MAGIC = [0x25, 0x50, 0x44, 0x46]; // "%PDF"

function hasPdfMagic(content: Uint8Array): boolean {
  return PDF_MAGIC.every((byte, i) => content[i] === byte);
}

/**
 * Check an upload candidate: declared type, size ceiling, filename and
 * the `%PDF` magic number, in that order. Every check runs; the first
 * failure becomes the error message and all of them land in `fields`.
 */
export function validateUpload(
  file: UploadFile,
  maxBytes: number = DEFAULT_MAX_UPLOAD_BYTES,
): Outcome<void, AppError> {
  const fields: Record<string, string> = {};

  if (file.type !== PDF_MIME_TYPE) {
    fields["type"] = `Only PDF files are accepted (got "${file.type || "unknown"}")`;
  }
  if (file.size > maxBytes) {
    const sizeMb = (file.size / BYTES_PER_MB).toFixed(2);
    const limitMb = Number((maxBytes / BYTES_PER_MB).toFixed(2));
    fields["size"] = `File is too large (${sizeMb} MB, limit ${String(limitMb)} MB)`;
  }
  if (file.name.trim() === "") {
    fields["name"] = "Filename is empty";
  }
  if (!hasPdfMagic(file.content)) {
    fields["content"] = "File content is not a PDF";
  }

  const [first] = Object.values(fields);
  if (first !== undefined) {
    return fail(new ValidationError(first, fields, { operation: "documents.validate" }));
  }
  return succeed(undefined);
}
