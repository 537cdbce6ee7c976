import { readFile } from "node:fs/promises";
import { parseDocument, type DocumentOptions, type ParseOptions, type SchemaOptions, type Tags } from "yaml";
import type { Logger } from "../lib/logger.js";
import { DocumentLoadError } from "./errors.js";
import type { DocumentFormat, DocumentValue } from "./types.js";

const UNSUPPORTED_FORMAT_MESSAGE = "Unsupported file format. Use YAML or JSON.";

export function detectFormat(filePath: string): DocumentFormat | null {
  if (filePath.endsWith(".yaml") || filePath.endsWith(".yml")) return "yaml";
  if (filePath.endsWith(".json")) return "json";
  return null;
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Copies parser output into a DocumentValue tree, rejecting anything JSON
 * cannot represent (YAML binary values, bigints, ...).
 */
export function toDocumentValue(value: unknown, at = "$"): DocumentValue {
  if (typeof value === "boolean" || typeof value === "number" || typeof value === "string") return value;
  if (typeof value !== "object") throw new TypeError(`unsupported ${typeof value} value at ${at}`);
  if (value === null) return null;
  if (Array.isArray(value)) return value.map((item: unknown, i) => toDocumentValue(item, `${at}[${i}]`));
  if (!isPlainObject(value)) {
    throw new TypeError(`unsupported ${value.constructor.name} value at ${at}`);
  }
  return Object.fromEntries(
    Object.entries(value).map(([key, child]: [string, unknown]) => [key, toDocumentValue(child, `${at}.${key}`)]),
  );
}

function lineAndColumn(text: string, offset: number): { line: number; column: number } {
  const before = text.slice(0, offset);
  const lines = before.split("\n");
  return { line: lines.length, column: (lines.at(-1)?.length ?? 0) + 1 };
}

function describeJsonSyntaxError(error: Error, text: string): string {
  if (/\(line \d+ column \d+\)/.test(error.message)) return error.message;
  const match = /at position (\d+)/.exec(error.message);
  if (!match?.[1]) return error.message;
  const { line, column } = lineAndColumn(text, Number.parseInt(match[1], 10));
  return `${error.message} (line ${line}, column ${column})`;
}

const TIMESTAMP_TAG = "tag:yaml.org,2002:timestamp";

/**
 * YAML 1.1 resolution (`yes`/`no`/`on`/`off` are booleans, later duplicate keys
 * win), except that timestamps stay as their source text.
 */
const YAML_OPTIONS = {
  version: "1.1",
  uniqueKeys: false,
  customTags: (tags: Tags) => tags.filter((tag) => typeof tag === "string" || tag.tag !== TIMESTAMP_TAG),
} satisfies DocumentOptions & SchemaOptions & ParseOptions;

function parseYaml(text: string, filePath: string, logger: Logger): unknown {
  const doc = parseDocument(text, YAML_OPTIONS);
  for (const warning of doc.warnings) {
    logger.warning(`YAML warning in ${filePath}: ${warning.message}`);
  }
  const [first] = doc.errors;
  if (first) {
    // The first line carries "... at line L, column C"; the rest is a source excerpt.
    const diagnostic = (first.message.split("\n")[0] ?? first.message).replace(/:$/, "");
    throw new DocumentLoadError("parse", filePath, diagnostic, { cause: first });
  }
  return doc.toJS();
}

function parseJson(text: string, filePath: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    if (!(err instanceof SyntaxError)) throw err;
    throw new DocumentLoadError("parse", filePath, describeJsonSyntaxError(err, text), { cause: err });
  }
}

export function parseDocumentText(
  text: string,
  format: DocumentFormat,
  filePath: string,
  logger: Logger,
): DocumentValue {
  const raw = format === "yaml" ? parseYaml(text, filePath, logger) : parseJson(text, filePath);
  try {
    return toDocumentValue(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new DocumentLoadError("parse", filePath, message, { cause: err });
  }
}

function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}

async function readText(filePath: string): Promise<string> {
  try {
    return await readFile(filePath, "utf8");
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      throw new DocumentLoadError("not-found", filePath, `File not found: ${filePath}`, { cause: err });
    }
    const message = err instanceof Error ? err.message : String(err);
    throw new DocumentLoadError("io", filePath, message, { cause: err });
  }
}

function logLoadFailure(logger: Logger, err: unknown, format: DocumentFormat | null): void {
  if (err instanceof DocumentLoadError) {
    if (err.kind === "not-found") {
      logger.error(`File not found: ${err.path}`);
      return;
    }
    if (err.kind === "parse") {
      logger.error(`Error parsing ${format === "yaml" ? "YAML" : "JSON"} file: ${err.message}`);
      return;
    }
  }
  logger.error(`Error loading data: ${err instanceof Error ? err.message : String(err)}`);
}

/**
 * Reads a YAML (`.yaml`, `.yml`) or JSON (`.json`) file into a DocumentValue.
 * Every failure is logged at error level before it is rethrown.
 */
export async function loadDocument(filePath: string, logger: Logger): Promise<DocumentValue> {
  const format = detectFormat(filePath);
  try {
    const text = await readText(filePath);
    if (!format) throw new DocumentLoadError("unsupported-format", filePath, UNSUPPORTED_FORMAT_MESSAGE);
    const value = parseDocumentText(text, format, filePath, logger);
    logger.debug(`Loaded ${format.toUpperCase()} document from ${filePath}`);
    return value;
  } catch (err) {
    logLoadFailure(logger, err, format);
    throw err;
  }
}
