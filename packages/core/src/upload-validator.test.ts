import { describe, expect, it } from "vitest";
import { ValidationError } from "@studydesk/errors";
import { validateUpload } from "./upload-validator.js";
import { fakePdf, pdfUpload } from "./test-helpers.js";

describe("validateUpload", () => {
  it("accepts a PDF within the limit", () => {
    expect(validateUpload(pdfUpload("a.pdf"))).toEqual({ success: true, data: undefined });
  });

  it("runs every check and reports the first failure", () => {
    const result = validateUpload(
      { name: "  ", type: "text/plain", size: 60 * 1024 * 1024, content: new Uint8Array([0x25, 0x50]) },
      50 * 1024 * 1024,
    );

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBeInstanceOf(ValidationError);
    expect(result.error.message).toBe('Only PDF files are accepted (got "text/plain")');
    expect(result.error).toMatchObject({
      fields: {
        type: 'Only PDF files are accepted (got "text/plain")',
        size: "File is too large (60.00 MB, limit 50 MB)",
        name: "Filename is empty",
        content: "File content is not a PDF",
      },
    });
  });

  it("checks the declared size against the ceiling", () => {
    const file = { ...pdfUpload("big.pdf", fakePdf("x")), size: 11 * 1024 * 1024 };

    const result = validateUpload(file, 10 * 1024 * 1024);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.message).toBe("File is too large (11.00 MB, limit 10 MB)");
  });

  it("requires the %PDF magic number even with a PDF MIME type", () => {
    const content = new TextEncoder().encode("PDF-1.4 but no percent");

    const result = validateUpload(pdfUpload("a.pdf", content));

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.message).toBe("File content is not a PDF");
  });
});
