import { z } from "zod";
import type { ChunkMetadata, VectorPayload } from "@studydesk/types";

const locationShape = {
  source: z.string(),
  pageNumber: z.number().int().positive(),
  startChar: z.number().int().nonnegative(),
  endChar: z.number().int().nonnegative(),
};

const chunkMetadataSchema = z.discriminatedUnion("sourceType", [
  z.object({ sourceType: z.literal("base"), ...locationShape }),
  z.object({
    sourceType: z.literal("user"),
    ...locationShape,
    originalFilename: z.string(),
    uploadTime: z.string(),
    fileSize: z.number().nonnegative(),
  }),
]);

export function toPayload(metadata: ChunkMetadata): VectorPayload {
  const payload: VectorPayload = {
    sourceType: metadata.sourceType,
    source: metadata.source,
    pageNumber: metadata.pageNumber,
    startChar: metadata.startChar,
    endChar: metadata.endChar,
  };

  if (metadata.sourceType === "user") {
    payload["originalFilename"] = metadata.originalFilename;
    payload["uploadTime"] = metadata.uploadTime;
    payload["fileSize"] = metadata.fileSize;
  }

  return payload;
}

/** Undefined when a stored payload does not describe a chunk. */
export function fromPayload(payload: VectorPayload): ChunkMetadata | undefined {
  const parsed = chunkMetadataSchema.safeParse(payload);
  return parsed.success ? parsed.data : undefined;
}
