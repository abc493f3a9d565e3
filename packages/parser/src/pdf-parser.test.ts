import { describe, it, expect, vi, beforeEach } from "vitest";

const { getText, destroy } = vi.hoisted(() => ({ getText: vi.fn(), destroy: vi.fn() }));

vi.mock("pdf-parse", () => ({
  PDFParse: class {
    getText = getText;
    destroy = destroy;
  },
}));

import { PdfParser } from "./pdf-parser.js";

describe("PdfParser", () => {
  const parser = new PdfParser();
  const input = new TextEncoder().encode("%PDF-1.4 fake");

  beforeEach(() => {
    getText.mockReset();
    destroy.mockReset();
    destroy.mockResolvedValue(undefined);
  });

  it("supports only PDF", () => {
    expect(parser.supportedMimeTypes).toEqual(["application/pdf"]);
  });

  it("maps pdf-parse pages to 1-based page texts", async () => {
    getText.mockResolvedValue({
      pages: [
        { num: 1, text: "Intro" },
        { num: 2, text: "" },
        { num: 3, text: "Summary" },
      ],
      text: "Intro\n\nSummary",
      total: 3,
    });

    const result = await parser.parse(input);

    expect(result.pages).toEqual([
      { pageNumber: 1, text: "Intro" },
      { pageNumber: 2, text: "" },
      { pageNumber: 3, text: "Summary" },
    ]);
    expect(result.pageCount).toBe(3);
    expect(result.metadata).toEqual({ mimeType: "application/pdf", byteSize: input.byteLength });
    expect(destroy).toHaveBeenCalledOnce();
  });

  it("wraps extraction failures in an IndexingError and still releases the document", async () => {
    getText.mockRejectedValue(new Error("bad xref"));

    await expect(parser.parse(input)).rejects.toMatchObject({
      code: "INDEXING_ERROR",
      message: "Failed to parse PDF: bad xref",
    });
    expect(destroy).toHaveBeenCalledOnce();
  });
});
