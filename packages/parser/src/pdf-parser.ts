import { PDFParse } from "pdf-parse";
import type { PageText, ParseResult } from "@studydesk/types";
import { IndexingError, errorMessage } from "@studydesk/errors";
import type { IParser } from "./parser.interface.js";

/**
 * PDF text extraction on top of pdf-parse. Page numbers are 1-based and
 * follow the document's own page order.
 */
export class PdfParser implements IParser {
  readonly supportedMimeTypes = ["application/pdf"];

  async parse(input: Uint8Array): Promise<ParseResult> {
    const parser = new PDFParse({ data: input });

    try {
      const result = await parser.getText();
      const pages: PageText[] = result.pages.map((page) => ({
        pageNumber: page.num,
        text: page.text,
      }));

      return {
        pages,
        pageCount: result.total,
        metadata: { mimeType: "application/pdf", byteSize: input.byteLength },
      };
    } catch (err) {
      throw new IndexingError(`Failed to parse PDF: ${errorMessage(err)}`, {
        operation: "parser.pdf",
        cause: err,
      });
    } finally {
      await parser.destroy();
    }
  }
}
