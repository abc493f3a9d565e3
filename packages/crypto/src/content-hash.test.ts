import { describe, it, expect } from "vitest";
import { hashContent, uniqueStorageName, fingerprintFileSet } from "./content-hash.js";

const encoder = new TextEncoder();

describe("hashContent", () => {
  it("produces a 64-char hex digest", () => {
    const digest = hashContent(encoder.encode("abc"));

    expect(digest).toBe("ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad");
  });

  it("is independent of the file name (same bytes, same hash)", () => {
    const bytes = encoder.encode("%PDF-1.4 identical body");

    expect(hashContent(bytes)).toBe(hashContent(Uint8Array.from(bytes)));
  });

  it("changes when a single byte changes", () => {
    const a = encoder.encode("%PDF-1.4 body A");
    const b = encoder.encode("%PDF-1.4 body B");

    expect(hashContent(a)).not.toBe(hashContent(b));
  });
});

describe("uniqueStorageName", () => {
  const now = new Date(Date.UTC(2024, 2, 5, 9, 7, 3));

  it("follows the timestamp_hash_nonce_stem.ext layout", () => {
    const name = uniqueStorageName("Lecture Notes (week 1).pdf", now);

    expect(name).toMatch(/^20240305_090703_[0-9a-f]{8}_[0-9a-f]{6}_LectureNotesweek1\.pdf$/);
  });

  it("uses the md5 prefix of the original filename", () => {
    const name = uniqueStorageName("a.pdf", now);
    const [, , nameHash] = name.split("_");

    expect(nameHash).toHaveLength(8);
    expect(uniqueStorageName("a.pdf", now).split("_")[2]).toBe(nameHash);
    expect(uniqueStorageName("b.pdf", now).split("_")[2]).not.toBe(nameHash);
  });

  it("caps the stem at 50 characters", () => {
    const name = uniqueStorageName(`${"x".repeat(80)}.pdf`, now);
    const stem = name.slice(name.lastIndexOf("_") + 1, -".pdf".length);

    expect(stem).toBe("x".repeat(50));
  });

  it("falls back to a placeholder stem when nothing survives sanitising", () => {
    const name = uniqueStorageName("???.pdf", now);

    expect(name.endsWith("_file.pdf")).toBe(true);
  });

  it("keeps letters and digits of non-Latin scripts", () => {
    const name = uniqueStorageName("讲义 第2章.pdf", now);

    expect(name.endsWith("_讲义第2章.pdf")).toBe(true);
  });

  it("omits the extension when the name has none", () => {
    const name = uniqueStorageName("README", now);

    expect(name.endsWith("_README")).toBe(true);
    expect(name).not.toContain(".");
  });

  it("gives distinct names to the same file within the same second", () => {
    const names = new Set(Array.from({ length: 20 }, () => uniqueStorageName("same.pdf", now)));

    expect(names.size).toBe(20);
  });
});

describe("fingerprintFileSet", () => {
  const one = hashContent(encoder.encode("%PDF-1.4 entropy"));
  const two = hashContent(encoder.encode("%PDF-1.4 protein"));

  it("ignores selection order", () => {
    const a = fingerprintFileSet([
      { name: "one.pdf", contentHash: one },
      { name: "two.pdf", contentHash: two },
    ]);
    const b = fingerprintFileSet([
      { name: "two.pdf", contentHash: two },
      { name: "one.pdf", contentHash: one },
    ]);

    expect(a).toBe(b);
  });

  it("changes when the content behind a name changes", () => {
    const a = fingerprintFileSet([{ name: "notes.pdf", contentHash: one }]);
    const b = fingerprintFileSet([{ name: "notes.pdf", contentHash: two }]);

    expect(a).not.toBe(b);
  });

  it("changes when a file is renamed", () => {
    const a = fingerprintFileSet([{ name: "one.pdf", contentHash: one }]);
    const b = fingerprintFileSet([{ name: "uno.pdf", contentHash: one }]);

    expect(a).not.toBe(b);
  });
});
