import path from "node:path";
import type { ChunkMetadata, ScoredChunk } from "@studydesk/types";

function sourceLabel(metadata: ChunkMetadata): string {
  if (metadata.sourceType === "base") {
    return `course material: ${path.basename(metadata.source)}, page ${String(metadata.pageNumber)}`;
  }
  return `user document: ${metadata.originalFilename} (uploaded ${metadata.uploadTime}), page ${String(metadata.pageNumber)}`;
}

/**
 * Numbered context blocks, one per chunk in input order:
 *
 *   [1] course material: thermo.pdf, page 3
 *   <chunk text>
 */
export function formatWithProvenance(chunks: readonly ScoredChunk[]): string {
  return chunks
    .map((chunk, i) => `[${String(i + 1)}] ${sourceLabel(chunk.metadata)}\n${chunk.content.trim()}`)
    .join("\n\n");
}
