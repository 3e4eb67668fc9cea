export { GENERIC_FIX, createFixAdvisory, fixFor } from "./fix-advisory.js";
export type { FixAdvisory } from "./fix-advisory.js";
