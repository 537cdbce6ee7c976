export { extractPolicySchema, PolicyShapeError, POLICY_SCHEMA_KEY } from "./extractSchema.js";
