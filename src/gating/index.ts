export { aggregateFindings, gateStatus } from "./gate.js";
export {
  BEST_PRACTICES_RECOMMENDATION,
  CRITICAL_RECOMMENDATION,
  GENERIC_RECOMMENDATION,
  PRODUCTION_REQUIREMENTS,
  RECOMMENDATIONS,
  buildRecommendations,
  missingRequirements,
} from "./requirements.js";
export { GateStatus } from "./types.js";
export type {
  Compliance,
  ProductionRequirement,
  Recommendation,
  ScanResult,
} from "./types.js";
