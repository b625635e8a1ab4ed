export type { IGuardrailCheck } from "./check.interface.js";
export { REDACTED } from "./check.interface.js";
export { DisallowedContentCheck } from "./disallowed-content.js";
export { PromptInjectionCheck, PROMPT_INJECTION } from "./prompt-injection.js";
export { OutputSanityCheck, OUTPUT_SANITY } from "./output-sanity.js";
export { FallbackMessages } from "./messages.js";
export { GuardrailEngine, createGuardrailEngine, UNAVAILABLE } from "./engine.js";
export type { GuardrailEngineOptions } from "./engine.js";
