export type DocumentValue = null | boolean | number | string | DocumentValue[] | DocumentMapping;

export type DocumentMapping = { [key: string]: DocumentValue };

export type DocumentFormat = "yaml" | "json";

export type LoadErrorKind = "not-found" | "parse" | "unsupported-format" | "io";

export function isDocumentMapping(value: DocumentValue): value is DocumentMapping {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
