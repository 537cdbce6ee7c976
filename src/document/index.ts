export type { DocumentValue, DocumentMapping, DocumentFormat, LoadErrorKind } from "./types.js";
export { DocumentLoadError } from "./errors.js";
export { loadDocument } from "./loadDocument.js";
