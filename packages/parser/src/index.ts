export type { IParser } from "./parser.interface.js";
export { PdfParser } from "./pdf-parser.js";
