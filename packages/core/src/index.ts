export { validateUpload, DEFAULT_MAX_UPLOAD_BYTES } from "./upload-validator.js";

export { DocumentStore } from "./document-store.js";
export type { DocumentStoreOptions } from "./document-store.js";

export { loadAndSplit } from "./document-loader.js";
export type { LoadOptions, LoaderDependencies } from "./document-loader.js";

export { toPayload, fromPayload } from "./chunk-payload.js";

export { DualVectorIndex, DEFAULT_BASE_COLLECTION, DEFAULT_USER_COLLECTION } from "./dual-index.js";
export type { CollectionState, DualIndexOptions, UserDocumentInput } from "./dual-index.js";

export { HybridRetriever } from "./hybrid-retriever.js";
export type { HybridRetrieverOptions } from "./hybrid-retriever.js";
export { formatWithProvenance } from "./context-assembler.js";

export { BatchUploadCoordinator } from "./batch-upload.js";
export type { BatchUploadDependencies } from "./batch-upload.js";

export { answerQuestion } from "./answer-service.js";
export type { AnswerDependencies } from "./answer-service.js";
