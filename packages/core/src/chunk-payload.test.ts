import { describe, expect, it } from "vitest";
import type { ChunkMetadata } from "@studydesk/types";
import { fromPayload, toPayload } from "./chunk-payload.js";

describe("chunk payloads", () => {
  it("keeps user provenance fields", () => {
    const metadata: ChunkMetadata = {
      sourceType: "user",
      source: "/uploads/x_notes.pdf",
      pageNumber: 2,
      startChar: 10,
      endChar: 40,
      originalFilename: "notes.pdf",
      uploadTime: "2024-01-02T03:04:05.000Z",
      fileSize: 2048,
    };

    expect(toPayload(metadata)).toEqual(metadata);
    expect(fromPayload(toPayload(metadata))).toEqual(metadata);
  });

  it("omits upload fields for course material", () => {
    const payload = toPayload({ sourceType: "base", source: "/course/a.pdf", pageNumber: 1, startChar: 0, endChar: 5 });

    expect(Object.keys(payload).sort()).toEqual(["endChar", "pageNumber", "source", "sourceType", "startChar"]);
  });

  it("rejects payloads that do not describe a chunk", () => {
    expect(fromPayload({ sourceType: "user", source: "/uploads/x.pdf", pageNumber: 1, startChar: 0, endChar: 5 })).toBe(
      undefined,
    );
    expect(fromPayload({ sourceType: "web", source: "x", pageNumber: 1, startChar: 0, endChar: 1 })).toBe(undefined);
    expect(fromPayload({})).toBe(undefined);
  });
});
