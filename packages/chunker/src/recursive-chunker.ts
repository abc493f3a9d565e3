import type { ChunkResult, ChunkingConfig } from "@studydesk/types";
import { validateChunkingConfig, type IChunker } from "./chunker.interface.js";

export const DEFAULT_SEPARATORS = ["\n\n", "\n", " ", ""];

/**
 * Recursive splitting with separator hierarchy.
 * Tries larger separators first, falling back to smaller ones, then merges
 * adjacent pieces up to chunkSize characters while carrying up to
 * chunkOverlap characters of trailing pieces into the next window.
 */
export class RecursiveChunker implements IChunker {
  readonly strategy = "recursive";
  private separators: string[];

  constructor(separators?: string[]) {
    this.separators = separators ?? DEFAULT_SEPARATORS;
  }

  chunk(content: string, config: ChunkingConfig): ChunkResult[] {
    validateChunkingConfig(config);
    const separators = config.separators ?? this.separators;
    const pieces = this.splitText(content, separators, config);
    const results: ChunkResult[] = [];

    let searchFrom = 0;
    for (const piece of pieces) {
      const found = content.indexOf(piece, searchFrom);
      const startChar = found >= 0 ? found : searchFrom;
      const endChar = startChar + piece.length;

      results.push({ content: piece, index: results.length, metadata: { startChar, endChar } });
      searchFrom = startChar + 1;
    }

    return results;
  }

  private splitText(text: string, separators: string[], config: ChunkingConfig): string[] {
    const found = separators.findIndex((s) => s === "" || text.includes(s));
    const separator = found === -1 ? "" : (separators[found] ?? "");
    const remaining = found === -1 ? [] : separators.slice(found + 1);

    const splits = (separator === "" ? [...text] : text.split(separator)).filter((s) => s !== "");
    const output: string[] = [];
    let short: string[] = [];

    for (const split of splits) {
      if (split.length < config.chunkSize) {
        short.push(split);
        continue;
      }
      if (short.length > 0) {
        output.push(...this.mergeSplits(short, separator, config));
        short = [];
      }
      if (remaining.length === 0) {
        output.push(split);
      } else {
        output.push(...this.splitText(split, remaining, config));
      }
    }

    if (short.length > 0) {
      output.push(...this.mergeSplits(short, separator, config));
    }

    return output;
  }

  private mergeSplits(splits: string[], separator: string, config: ChunkingConfig): string[] {
    const { chunkSize, chunkOverlap } = config;
    const docs: string[] = [];
    const current: string[] = [];
    let total = 0;

    const joinedLength = (pieceLength: number) =>
      total + pieceLength + (current.length > 0 ? separator.length : 0);

    for (const split of splits) {
      if (joinedLength(split.length) > chunkSize && current.length > 0) {
        this.pushDoc(docs, current, separator);

        // Drop leading pieces until only the overlap remains and the next piece fits.
        while (total > chunkOverlap || (joinedLength(split.length) > chunkSize && total > 0)) {
          const head = current.shift();
          if (head === undefined) break;
          total -= head.length + (current.length > 0 ? separator.length : 0);
        }
      }

      total = joinedLength(split.length);
      current.push(split);
    }

    this.pushDoc(docs, current, separator);
    return docs;
  }

  private pushDoc(docs: string[], pieces: string[], separator: string): void {
    const doc = pieces.join(separator).trim();
    if (doc.length > 0) {
      docs.push(doc);
    }
  }
}
