export { extractFileSummary } from "./application/extract-file-summary.js";
export { extractSignatures } from "./application/extract-signatures.js";
export { DECISION_POINT_WEIGHTS, LOGICAL_LINE_KINDS, RETURN_SLOT_BY_KIND } from "./domain/syntax-tables.js";
