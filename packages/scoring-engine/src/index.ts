export {
  computeScoreReport,
  type ComputeScoreReportInput,
} from "./application/compute-score-report.js";
export {
  DEFAULT_THRESHOLDS,
  DEFAULT_TOP_OFFENDER_LIMIT,
  PENALTY_CATEGORY_ORDER,
  PENALTY_POINTS,
  SCORING_PROFILES,
  SCORING_PROFILE_DESCRIPTIONS,
  SCORING_PROFILE_NAMES,
  isScoringProfileName,
  mergeThresholds,
  type ScoringProfileName,
} from "./config.js";
export { classifyAcl, computeAcl } from "./domain/acl.js";
