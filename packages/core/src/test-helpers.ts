import { mkdtemp, mkdir, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import type { EmbeddingResult, ParseResult, UploadFile } from "@studydesk/types";
import type { IEmbeddingProvider } from "@studydesk/embeddings";
import type { IParser } from "@studydesk/parser";

/** Words the fake embedding counts, one dimension each. */
export const TOPICS = ["entropy", "gradient", "protein", "notes"];

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/** A "%PDF" header followed by form-feed separated pages; read by FakePdfParser. */
export function fakePdf(...pages: string[]): Uint8Array {
  return encoder.encode(`%PDF-1.4\n${pages.join("\f")}`);
}

export function pdfUpload(name: string, content: Uint8Array = fakePdf(`${name} body`)): UploadFile {
  return { name, type: "application/pdf", size: content.byteLength, content };
}

export class FakePdfParser implements IParser {
  readonly supportedMimeTypes = ["application/pdf"];

  async parse(input: Uint8Array): Promise<ParseResult> {
    const text = decoder.decode(input);
    if (!text.startsWith("%PDF")) {
      throw new Error("not a PDF");
    }
    const body = text.slice(text.indexOf("\n") + 1);
    const pages = body.split("\f").map((pageText, i) => ({ pageNumber: i + 1, text: pageText }));
    return { pages, pageCount: pages.length, metadata: {} };
  }
}

export function topicVector(text: string): number[] {
  const lower = text.toLowerCase();
  return TOPICS.map((topic) => lower.split(topic).length - 1 + 0.01);
}

export class FakeEmbeddings implements IEmbeddingProvider {
  readonly name = "fake";
  readonly dimensions = TOPICS.length;
  failing = false;
  calls = 0;

  async embed(text: string): Promise<EmbeddingResult> {
    return this.batchEmbed([text]);
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    this.calls++;
    if (this.failing) {
      throw new Error("embedding service down");
    }
    return {
      embeddings: texts.map(topicVector),
      model: "fake",
      tokensUsed: 0,
      dimensions: this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    return !this.failing;
  }
}

export function makeTempDir(): Promise<string> {
  return mkdtemp(path.join(tmpdir(), "studydesk-core-"));
}

export async function writePdf(dir: string, name: string, ...pages: string[]): Promise<string> {
  await mkdir(dir, { recursive: true });
  const filePath = path.join(dir, name);
  await writeFile(filePath, fakePdf(...pages));
  return filePath;
}
