import type { ChunkResult, ChunkingConfig } from "@studydesk/types";
import { validateChunkingConfig, type IChunker } from "./chunker.interface.js";

/**
 * Exact character windows. Window i starts at i * (chunkSize - chunkOverlap);
 * the last window ends at the end of the text.
 */
export class FixedChunker implements IChunker {
  readonly strategy = "fixed";

  chunk(content: string, config: ChunkingConfig): ChunkResult[] {
    validateChunkingConfig(config);
    const { chunkSize, chunkOverlap } = config;
    const step = chunkSize - chunkOverlap;
    const results: ChunkResult[] = [];

    for (let startChar = 0; startChar < content.length; startChar += step) {
      const endChar = Math.min(startChar + chunkSize, content.length);
      const window = content.slice(startChar, endChar);

      if (window.trim().length > 0) {
        results.push({ content: window, index: results.length, metadata: { startChar, endChar } });
      }
      if (endChar === content.length) break;
    }

    return results;
  }
}
