import type { AclTier, FunctionRecord, Thresholds } from "@readyscore/core";

export const ACL_LINES_PER_POINT = 20;

/** Agent cognitive load: decision points plus a point per 20 logical lines. */
export const computeAcl = (record: Pick<FunctionRecord, "complexity" | "logicalLines">): number =>
  record.complexity + record.logicalLines / ACL_LINES_PER_POINT;

export const classifyAcl = (acl: number, thresholds: Pick<Thresholds, "aclYellow" | "aclRed">): AclTier => {
  if (acl >= thresholds.aclRed) {
    return "red";
  }

  return acl >= thresholds.aclYellow ? "yellow" : "green";
};
