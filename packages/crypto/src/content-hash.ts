import crypto from "node:crypto";

const HASH_ALGORITHM = "sha256";
const NAME_HASH_LENGTH = 8;
const NONCE_BYTES = 3;
const MAX_STEM_LENGTH = 50;
const FALLBACK_STEM = "file";

/** SHA-256 hex digest of raw bytes. The identity of a stored document. */
export function hashContent(bytes: Uint8Array): string {
  return crypto.createHash(HASH_ALGORITHM).update(bytes).digest("hex");
}

// Letters and digits of any script survive, so non-Latin names keep their stem.
function sanitize(value: string): string {
  return value.replace(/[^\p{L}\p{N}_-]/gu, "");
}

function splitExtension(filename: string): { stem: string; extension: string } {
  const dot = filename.lastIndexOf(".");
  if (dot <= 0) {
    return { stem: filename, extension: "" };
  }
  return { stem: filename.slice(0, dot), extension: filename.slice(dot + 1) };
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

function formatTimestamp(now: Date): string {
  const date = `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}`;
  const time = `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
  return `${date}_${time}`;
}

/**
 * Derive a collision-resistant storage name for an upload:
 * `YYYYMMDD_HHMMSS_<md5(name)[0..8]>_<nonce>_<stem>.<ext>` (UTC).
 *
 * Only letters, digits, `_` and `-` survive in the stem (capped at 50
 * characters) and in the extension.
 */
export function uniqueStorageName(originalFilename: string, now: Date = new Date()): string {
  const nameHash = crypto
    .createHash("md5")
    .update(originalFilename)
    .digest("hex")
    .slice(0, NAME_HASH_LENGTH);
  const nonce = crypto.randomBytes(NONCE_BYTES).toString("hex");

  const { stem, extension } = splitExtension(originalFilename);
  const safeStem = Array.from(sanitize(stem)).slice(0, MAX_STEM_LENGTH).join("") || FALLBACK_STEM;
  const safeExtension = sanitize(extension);

  const base = `${formatTimestamp(now)}_${nameHash}_${nonce}_${safeStem}`;
  return safeExtension ? `${base}.${safeExtension}` : base;
}

export interface FileSetEntry {
  name: string;
  /** {@link hashContent} of the file's bytes. */
  contentHash: string;
}

/** Order-independent fingerprint of a selected file set (names and contents), used as a batch id. */
export function fingerprintFileSet(entries: readonly FileSetEntry[]): string {
  const keys = entries.map((entry) => `${entry.name}\u0000${entry.contentHash}`).sort();
  return crypto.createHash(HASH_ALGORITHM).update(keys.join("\n")).digest("hex");
}
