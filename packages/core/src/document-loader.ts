import { readFile } from "node:fs/promises";
import type {
  Chunk,
  ChunkMetadata,
  ChunkProvenance,
  ChunkStrategy,
  LoadResult,
  PageText,
  ParseResult,
} from "@studydesk/types";
import { createChunker, validateChunkingConfig } from "@studydesk/chunker";
import type { IParser } from "@studydesk/parser";
import type { Logger } from "@studydesk/logger";

export interface LoadOptions {
  chunkSize: number;
  chunkOverlap: number;
  provenance: ChunkProvenance;
  strategy?: ChunkStrategy;
}

export interface LoaderDependencies {
  parser: IParser;
  logger: Logger;
}

interface SourcedPage extends PageText {
  source: string;
}

/**
 * Read and parse every path, then split each page into overlapping
 * windows. Unreadable files and blank pages are logged and skipped.
 * `documentCount` counts pages that yielded text.
 */
export async function loadAndSplit(
  paths: readonly string[],
  options: LoadOptions,
  deps: LoaderDependencies,
): Promise<LoadResult> {
  const config = {
    strategy: options.strategy ?? "recursive",
    chunkSize: options.chunkSize,
    chunkOverlap: options.chunkOverlap,
  };
  validateChunkingConfig(config);

  const pages: SourcedPage[] = [];
  for (const source of paths) {
    pages.push(...(await readPages(source, deps)));
  }

  const chunker = createChunker(config.strategy);
  const chunks: Chunk[] = [];

  for (const page of pages) {
    for (const piece of chunker.chunk(page.text, config)) {
      const location = {
        source: page.source,
        pageNumber: page.pageNumber,
        startChar: piece.metadata.startChar,
        endChar: piece.metadata.endChar,
      };
      const metadata: ChunkMetadata =
        options.provenance.sourceType === "base"
          ? { sourceType: "base", ...location }
          : { ...options.provenance, ...location };

      chunks.push({ content: piece.content, metadata });
    }
  }

  deps.logger.debug(
    { files: paths.length, pages: pages.length, chunks: chunks.length },
    "Documents loaded and split",
  );

  return { chunks, documentCount: pages.length };
}

async function readPages(source: string, deps: LoaderDependencies): Promise<SourcedPage[]> {
  let parsed: ParseResult;
  try {
    const bytes = await readFile(source);
    parsed = await deps.parser.parse(new Uint8Array(bytes));
  } catch (err) {
    deps.logger.warn({ err, source }, "Skipping unreadable document");
    return [];
  }

  const pages: SourcedPage[] = [];
  for (const page of parsed.pages) {
    if (page.text.trim() === "") {
      deps.logger.debug({ source, pageNumber: page.pageNumber }, "Skipping blank page");
      continue;
    }
    pages.push({ ...page, source });
  }
  return pages;
}
