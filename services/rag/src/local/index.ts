export { LocalFileClient } from "./client.js";
export type { LocalFileClientConfig } from "./client.js";
export { extractText, htmlToText, pdfToText } from "./extract.js";
export type { LocalFile, LoadResult } from "./types.js";
