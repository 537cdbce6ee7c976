import { createRequire } from "node:module";
import * as AjvModule from "ajv";
import type { AnySchema, AnySchemaObject, ErrorObject, Options } from "ajv";
import * as Ajv2019Module from "ajv/dist/2019.js";
import * as Ajv2020Module from "ajv/dist/2020.js";
import AjvDraft04 from "ajv-draft-04";
import { isDocumentMapping, type DocumentValue } from "../document/types.js";
import type { Logger } from "./logger.js";

export type SchemaDialect = "draft-04" | "draft-06" | "draft-07" | "2019-09" | "2020-12";

const require = createRequire(import.meta.url);
// The default Ajv build knows draft-07 only; draft-06 needs its meta-schema registered.
const draft06MetaSchema: AnySchemaObject = require("ajv/dist/refs/json-schema-draft-06.json");

export type SchemaViolation = {
  instancePath: string;
  keyword: string;
  message: string;
};

export type ValidationResult =
  | { valid: true }
  | { valid: false; message: string; violations: SchemaViolation[] };

type CompiledSchema = ((data: unknown) => boolean | Promise<unknown>) & {
  errors?: ErrorObject[] | null;
};

type Validator = {
  compile: (schema: AnySchema) => CompiledSchema;
  errorsText: (errors?: ErrorObject[] | null) => string;
};

const DIALECT_URIS: ReadonlyArray<[RegExp, SchemaDialect]> = [
  [/^http:\/\/json-schema\.org\/draft-04\/schema#?$/, "draft-04"],
  [/^http:\/\/json-schema\.org\/draft-06\/schema#?$/, "draft-06"],
  [/^http:\/\/json-schema\.org\/draft-07\/schema#?$/, "draft-07"],
  [/^https:\/\/json-schema\.org\/draft\/2019-09\/schema#?$/, "2019-09"],
  [/^https:\/\/json-schema\.org\/draft\/2020-12\/schema#?$/, "2020-12"],
];

/** Picks the Ajv build for a schema's `$schema`; schemas without one are read as 2020-12. */
export function detectDialect(schema: DocumentValue): SchemaDialect {
  const uri = isDocumentMapping(schema) ? schema.$schema : undefined;
  if (typeof uri !== "string") return "2020-12";
  for (const [pattern, dialect] of DIALECT_URIS) {
    if (pattern.test(uri)) return dialect;
  }
  // Unknown meta-schemas are left for Ajv to reject at compile time.
  return "2020-12";
}

function toAnySchema(schema: DocumentValue): AnySchema {
  if (typeof schema === "boolean") return schema;
  if (!isDocumentMapping(schema)) {
    throw new TypeError(`schema must be an object or a boolean, got ${schema === null ? "null" : Array.isArray(schema) ? "array" : typeof schema}`);
  }
  if (schema.$async === true) throw new TypeError("asynchronous schemas ($async: true) are not supported");
  return schema;
}

function toViolation(error: ErrorObject): SchemaViolation {
  return {
    instancePath: error.instancePath,
    keyword: error.keyword,
    message: error.message ?? error.keyword,
  };
}

/**
 * Validates documents against JSON Schemas with Ajv. Instances are built per
 * dialect on first use and route Ajv's own warnings into the logger.
 */
export class SchemaValidator {
  private readonly instances = new Map<SchemaDialect, Validator>();

  constructor(private readonly logger: Logger) {}

  private options(): Options {
    const format = (args: unknown[]) => args.map(String).join(" ");
    return {
      allErrors: true,
      strict: false,
      validateFormats: false,
      logger: {
        log: (...args: unknown[]) => this.logger.debug(format(args)),
        warn: (...args: unknown[]) => this.logger.warning(format(args)),
        error: (...args: unknown[]) => this.logger.error(format(args)),
      },
    };
  }

  private instanceFor(dialect: SchemaDialect): Validator {
    const existing = this.instances.get(dialect);
    if (existing) return existing;
    const created = this.createInstance(dialect);
    this.instances.set(dialect, created);
    return created;
  }

  private createInstance(dialect: SchemaDialect): Validator {
    switch (dialect) {
      case "draft-04":
        return new AjvDraft04.default(this.options());
      case "draft-06": {
        const ajv = new AjvModule.Ajv(this.options());
        ajv.addMetaSchema(draft06MetaSchema);
        return ajv;
      }
      case "draft-07":
        return new AjvModule.Ajv(this.options());
      case "2019-09":
        return new Ajv2019Module.Ajv2019(this.options());
      case "2020-12":
        return new Ajv2020Module.Ajv2020(this.options());
    }
  }

  /** Never throws: schema compile failures and unexpected errors come back as `valid: false`. */
  validate(data: DocumentValue, schema: DocumentValue): ValidationResult {
    try {
      const dialect = detectDialect(schema);
      const ajv = this.instanceFor(dialect);
      this.logger.debug(`Validating against a ${dialect} schema`);
      const validate = ajv.compile(toAnySchema(schema));
      if (validate(data) === true) return { valid: true };

      const errors = validate.errors ?? [];
      const [first, ...rest] = errors;
      const message = first ? ajv.errorsText([first]) : "data does not match the schema";
      this.logger.error(`Validation error: ${message}`);
      for (const error of rest) {
        this.logger.debug(`Additional violation: ${ajv.errorsText([error])}`);
      }
      return { valid: false, message, violations: errors.map(toViolation) };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error(`Unexpected error during validation: ${message}`);
      return { valid: false, message, violations: [] };
    }
  }
}

export function validateAgainstSchema(data: DocumentValue, schema: DocumentValue, logger: Logger): ValidationResult {
  return new SchemaValidator(logger).validate(data, schema);
}
