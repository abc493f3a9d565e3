import type { ChunkResult, ChunkStrategy, ChunkingConfig } from "@studydesk/types";
import { ValidationError } from "@studydesk/errors";

export interface IChunker {
  readonly strategy: ChunkStrategy;
  chunk(content: string, config: ChunkingConfig): ChunkResult[];
}

/** Window sizes are counted in characters. */
export function validateChunkingConfig(config: ChunkingConfig): void {
  const fields: Record<string, string> = {};

  if (!Number.isInteger(config.chunkSize) || config.chunkSize <= 0) {
    fields["chunkSize"] = "chunkSize must be a positive integer";
  }
  if (!Number.isInteger(config.chunkOverlap) || config.chunkOverlap < 0) {
    fields["chunkOverlap"] = "chunkOverlap must be a non-negative integer";
  } else if (config.chunkOverlap >= config.chunkSize) {
    fields["chunkOverlap"] = "chunkOverlap must be smaller than chunkSize";
  }

  const [first] = Object.values(fields);
  if (first !== undefined) {
    throw new ValidationError(first, fields, { operation: "chunker.validate" });
  }
}
