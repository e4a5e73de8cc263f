import type { PenaltyCategory, Thresholds } from "@readyscore/core";

export const SCORING_PROFILE_NAMES = ["standard", "relaxed", "generic", "jules", "copilot"] as const;

export type ScoringProfileName = (typeof SCORING_PROFILE_NAMES)[number];

export const DEFAULT_THRESHOLDS: Thresholds = {
  aclYellow: 10,
  aclRed: 15,
  // Share of functions in a file that must carry at least one annotation.
  typeSafetyMinimum: 0.9,
  bloatLineLimit: 200,
  godModuleInboundLimit: 50,
  directoryEntropyLimit: 50,
  // Average files per walked directory; informational, never charged.
  directoryAverageLimit: 15,
  contextTokenBudget: 32_000,
  requiredContextFiles: ["README.md", "AGENTS.md"],
};

// The agent profiles tune size, ACL and typing limits to how each agent consumes context.
export const SCORING_PROFILES: Readonly<Record<ScoringProfileName, Thresholds>> = {
  standard: DEFAULT_THRESHOLDS,
  relaxed: {
    ...DEFAULT_THRESHOLDS,
    typeSafetyMinimum: 0.5,
  },
  generic: {
    ...DEFAULT_THRESHOLDS,
    typeSafetyMinimum: 0.5,
    requiredContextFiles: ["README.md"],
  },
  jules: {
    ...DEFAULT_THRESHOLDS,
    aclYellow: 8,
    aclRed: 12,
    typeSafetyMinimum: 0.8,
    bloatLineLimit: 150,
    requiredContextFiles: ["AGENTS.md", "INSTRUCTIONS.md"],
  },
  copilot: {
    ...DEFAULT_THRESHOLDS,
    aclYellow: 15,
    aclRed: 20,
    typeSafetyMinimum: 0.4,
    bloatLineLimit: 100,
    requiredContextFiles: [],
  },
};

export const SCORING_PROFILE_DESCRIPTIONS: Readonly<Record<ScoringProfileName, string>> = {
  standard: "default limits, README.md and AGENTS.md required",
  relaxed: "standard limits with a 50% typing minimum",
  generic: "standard cleanliness checks, README.md required",
  jules: "strict typing and size limits for autonomous agents, AGENTS.md and INSTRUCTIONS.md required",
  copilot: "small files for inline completion, lenient on logic, no context files required",
};

export const PENALTY_POINTS = {
  bloatPerStep: -1,
  bloatStepLines: 10,
  cognitiveLoadRed: -15,
  cognitiveLoadYellow: -5,
  missingTypes: -20,
  missingContextFile: -15,
  invalidConfig: -15,
  godModule: -10,
  highEntropy: -5,
  circularDependency: -5,
} as const;

// Order in which penalties appear in a report.
export const PENALTY_CATEGORY_ORDER: readonly PenaltyCategory[] = [
  "bloated-file",
  "high-cognitive-load",
  "missing-types",
  "missing-context-file",
  "invalid-config",
  "god-module",
  "high-entropy",
  "circular-dependency",
];

export const DEFAULT_TOP_OFFENDER_LIMIT = 10;

export const isScoringProfileName = (value: string): value is ScoringProfileName =>
  SCORING_PROFILE_NAMES.some((name) => name === value);

export const mergeThresholds = (
  base: Thresholds,
  overrides: Partial<Thresholds> | undefined,
): Thresholds => {
  if (overrides === undefined) {
    return base;
  }

  return {
    ...base,
    ...overrides,
    requiredContextFiles: [...(overrides.requiredContextFiles ?? base.requiredContextFiles)],
  };
};
