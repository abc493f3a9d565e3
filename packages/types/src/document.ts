export interface DocumentRecord {
  fileId: string;
  originalFilename: string;
  storagePath: string;
  byteSize: number;
  contentHash: string;
  uploadedAt: string;
  indexed: boolean;
}

/** An upload candidate as handed over by the caller. */
export interface UploadFile {
  name: string;
  /** Declared MIME type. */
  type: string;
  /** Declared size in bytes. */
  size: number;
  content: Uint8Array;
}

export type DocumentMetadataMap = Record<string, DocumentRecord>;

export const PDF_MIME_TYPE = "application/pdf";
