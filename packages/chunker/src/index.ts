export { validateChunkingConfig } from "./chunker.interface.js";
export type { IChunker } from "./chunker.interface.js";
export { RecursiveChunker, DEFAULT_SEPARATORS } from "./recursive-chunker.js";
export { FixedChunker } from "./fixed-chunker.js";
export { createChunker } from "./factory.js";
