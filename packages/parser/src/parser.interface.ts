import type { ParseResult } from "@studydesk/types";

export interface IParser {
  readonly supportedMimeTypes: string[];
  /** Extract per-page text. Rejects when the document cannot be read at all. */
  parse(input: Uint8Array): Promise<ParseResult>;
}
