export { hashContent, uniqueStorageName, fingerprintFileSet } from "./content-hash.js";
export type { FileSetEntry } from "./content-hash.js";
