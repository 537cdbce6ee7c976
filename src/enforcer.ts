import { loadDocument } from "./document/index.js";
import { extractPolicySchema } from "./policy/index.js";
import { validateAgainstSchema, type ValidationResult } from "./lib/jsonSchema.js";
import type { Logger } from "./lib/logger.js";

export type EnforcementParams = {
  policyPath: string;
  dataPath: string;
  logger: Logger;
};

export type EnforcementOutcome = {
  conforms: boolean;
  result: ValidationResult;
};

/**
 * Loads the policy and data documents, in that order, and validates the data
 * against the policy's schema. Load failures and a policy without a `schema`
 * key reject; a non-conforming document resolves with `conforms: false`.
 */
export async function enforcePolicy(params: EnforcementParams): Promise<EnforcementOutcome> {
  const { policyPath, dataPath, logger } = params;
  const policy = await loadDocument(policyPath, logger);
  const data = await loadDocument(dataPath, logger);
  const schema = extractPolicySchema(policy);
  const result = validateAgainstSchema(data, schema, logger);
  return { conforms: result.valid, result };
}
