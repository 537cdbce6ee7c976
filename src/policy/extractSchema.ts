import { isDocumentMapping, type DocumentValue } from "../document/types.js";

export const POLICY_SCHEMA_KEY = "schema";

export class PolicyShapeError extends Error {
  override name = "PolicyShapeError";
}

/** Returns the JSON Schema a policy document carries under its `schema` key. */
export function extractPolicySchema(policy: DocumentValue): DocumentValue {
  const schema = isDocumentMapping(policy) ? policy[POLICY_SCHEMA_KEY] : undefined;
  if (schema === undefined) {
    throw new PolicyShapeError(`Policy file must contain a '${POLICY_SCHEMA_KEY}' key.`);
  }
  return schema;
}
