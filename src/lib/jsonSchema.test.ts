import assert from "node:assert/strict";
import { describe, it } from "node:test";
import type { DocumentValue } from "../document/types.js";
import { SchemaValidator, detectDialect, validateAgainstSchema } from "./jsonSchema.js";
import { createMemoryLogger } from "./logger.js";

const personSchema: DocumentValue = {
  type: "object",
  required: ["name"],
  properties: { name: { type: "string" } },
};

const portSchema: DocumentValue = {
  $schema: "http://json-schema.org/draft-07/schema#",
  definitions: { port: { type: "integer", minimum: 1, maximum: 65535 } },
  type: "object",
  properties: { port: { $ref: "#/definitions/port" } },
};

describe("detectDialect", () => {
  it("reads the dialect from $schema", () => {
    assert.equal(detectDialect({ $schema: "http://json-schema.org/draft-04/schema#" }), "draft-04");
    assert.equal(detectDialect({ $schema: "http://json-schema.org/draft-06/schema#" }), "draft-06");
    assert.equal(detectDialect(portSchema), "draft-07");
    assert.equal(detectDialect({ $schema: "http://json-schema.org/draft-07/schema" }), "draft-07");
    assert.equal(detectDialect({ $schema: "https://json-schema.org/draft/2019-09/schema" }), "2019-09");
    assert.equal(detectDialect({ $schema: "https://json-schema.org/draft/2020-12/schema" }), "2020-12");
  });

  it("falls back to 2020-12", () => {
    assert.equal(detectDialect(personSchema), "2020-12");
    assert.equal(detectDialect(true), "2020-12");
    assert.equal(detectDialect({ $schema: 7 }), "2020-12");
  });
});

describe("SchemaValidator", () => {
  it("accepts conforming data", () => {
    const logger = createMemoryLogger();
    const result = validateAgainstSchema({ name: "alice" }, personSchema, logger);
    assert.deepEqual(result, { valid: true });
    assert.deepEqual(
      logger.entries.filter((e) => e.level !== "DEBUG"),
      [],
    );
  });

  it("reports a missing required property", () => {
    const logger = createMemoryLogger();
    const result = validateAgainstSchema({ age: 5 }, personSchema, logger);
    assert.deepEqual(result, {
      valid: false,
      message: "data must have required property 'name'",
      violations: [{ instancePath: "", keyword: "required", message: "must have required property 'name'" }],
    });
    assert.deepEqual(
      logger.entries.filter((e) => e.level === "ERROR"),
      [{ level: "ERROR", message: "Validation error: data must have required property 'name'" }],
    );
  });

  it("collects every violation and logs the first at error level", () => {
    const logger = createMemoryLogger();
    const schema: DocumentValue = {
      type: "object",
      required: ["name", "port"],
      properties: { name: { type: "string" }, port: { type: "integer" } },
    };
    const result = validateAgainstSchema({ port: "22" }, schema, logger);
    assert.equal(result.valid, false);
    if (result.valid) return;
    assert.deepEqual(result.violations.map((v) => v.keyword).sort(), ["required", "type"]);
    assert.equal(logger.entries.filter((e) => e.level === "ERROR").length, 1);
    assert.equal(logger.entries.filter((e) => e.message.startsWith("Additional violation: ")).length, 1);
  });

  it("resolves draft-07 definitions", () => {
    const validator = new SchemaValidator(createMemoryLogger());
    assert.deepEqual(validator.validate({ port: 22 }, portSchema), { valid: true });
    const result = validator.validate({ port: 70000 }, portSchema);
    assert.deepEqual(result, {
      valid: false,
      message: "data/port must be <= 65535",
      violations: [{ instancePath: "/port", keyword: "maximum", message: "must be <= 65535" }],
    });
  });

  it("supports 2019-09 keywords", () => {
    const schema: DocumentValue = {
      $schema: "https://json-schema.org/draft/2019-09/schema",
      type: "object",
      dependentRequired: { tlsCert: ["tlsKey"] },
    };
    const validator = new SchemaValidator(createMemoryLogger());
    assert.equal(validator.validate({ tlsCert: "a", tlsKey: "b" }, schema).valid, true);
    assert.equal(validator.validate({ tlsCert: "a" }, schema).valid, false);
  });

  it("treats a false boolean schema as rejecting everything", () => {
    const result = validateAgainstSchema({}, false, createMemoryLogger());
    assert.equal(result.valid, false);
    if (result.valid) return;
    assert.equal(result.violations[0]?.keyword, "false schema");
  });

  it("turns an invalid schema into a non-conforming result", () => {
    const logger = createMemoryLogger();
    const result = validateAgainstSchema({ name: "alice" }, { type: "strnig" }, logger);
    assert.equal(result.valid, false);
    if (result.valid) return;
    assert.deepEqual(result.violations, []);
    assert.match(logger.entries.at(-1)?.message ?? "", /^Unexpected error during validation: schema is invalid/);
  });

  it("validates draft-04 schemas with their boolean exclusiveMaximum", () => {
    const schema: DocumentValue = {
      $schema: "http://json-schema.org/draft-04/schema#",
      type: "object",
      required: ["port"],
      properties: { port: { type: "integer", maximum: 65535, exclusiveMaximum: true } },
    };
    const validator = new SchemaValidator(createMemoryLogger());
    assert.deepEqual(validator.validate({ port: 22 }, schema), { valid: true });
    assert.equal(validator.validate({ port: 65535 }, schema).valid, false);
    assert.equal(validator.validate({}, schema).valid, false);
  });

  it("validates draft-06 schemas", () => {
    const schema: DocumentValue = {
      $schema: "http://json-schema.org/draft-06/schema#",
      type: "object",
      required: ["name"],
      properties: { role: { const: "admin" } },
    };
    const validator = new SchemaValidator(createMemoryLogger());
    assert.deepEqual(validator.validate({ name: "alice" }, schema), { valid: true });
    const result = validator.validate({ name: "alice", role: "guest" }, schema);
    assert.equal(result.valid, false);
    if (result.valid) return;
    assert.equal(result.violations[0]?.keyword, "const");
  });

  it("turns an unknown meta-schema into a non-conforming result", () => {
    const schema: DocumentValue = { $schema: "http://json-schema.org/draft-03/schema#", type: "object" };
    const result = validateAgainstSchema({}, schema, createMemoryLogger());
    assert.equal(result.valid, false);
    if (result.valid) return;
    assert.match(result.message, /no schema with key or ref/);
  });

  it("never throws for schemas it cannot use", () => {
    const cases: Array<[DocumentValue, string]> = [
      ["object", "schema must be an object or a boolean, got string"],
      [["object"], "schema must be an object or a boolean, got array"],
      [null, "schema must be an object or a boolean, got null"],
      [{ $async: true, type: "object" }, "asynchronous schemas ($async: true) are not supported"],
    ];
    for (const [schema, message] of cases) {
      const logger = createMemoryLogger();
      assert.deepEqual(validateAgainstSchema({}, schema, logger), { valid: false, message, violations: [] });
      assert.equal(logger.entries.at(-1)?.message, `Unexpected error during validation: ${message}`);
    }
  });
});
