export { envSchema, parseEnv } from "./env.js";
export { guardrailRulesSchema, parseGuardrailRules, loadGuardrailRules } from "./guardrail-rules.js";
