import { readFile } from "node:fs/promises";
import { join } from "node:path";
import type { ConfigIssue, Thresholds } from "@readyscore/core";
import {
  DEFAULT_TOP_OFFENDER_LIMIT,
  SCORING_PROFILES,
  SCORING_PROFILE_NAMES,
  mergeThresholds,
  type ScoringProfileName,
} from "@readyscore/scoring-engine";
import { z } from "zod";

export const CONFIG_FILE_NAME = "readyscore.config.json";
export const PACKAGE_JSON_CONFIG_KEY = "readyscore";
export const DEFAULT_MIN_SCORE = 70;

const thresholdOverridesSchema = z
  .object({
    aclYellow: z.number().positive(),
    aclRed: z.number().positive(),
    typeSafetyMinimum: z.number().min(0).max(1),
    bloatLineLimit: z.number().int().nonnegative(),
    godModuleInboundLimit: z.number().int().nonnegative(),
    directoryEntropyLimit: z.number().int().nonnegative(),
    directoryAverageLimit: z.number().nonnegative(),
    contextTokenBudget: z.number().int().positive(),
    requiredContextFiles: z.array(z.string().min(1)),
  })
  .partial()
  .strict();

const projectConfigSchema = z
  .object({
    profile: z.enum(SCORING_PROFILE_NAMES),
    thresholds: thresholdOverridesSchema,
    topOffenders: z.number().int().positive(),
    minScore: z.number().min(0).max(100),
  })
  .partial()
  .strict();

export type ProjectConfig = z.infer<typeof projectConfigSchema>;

export type LoadedProjectConfig = {
  config: ProjectConfig;
  source: string | null;
  issues: readonly ConfigIssue[];
};

type ReadResult = { found: false } | { found: true; text: string } | { found: true; error: string };

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

const isMissingFile = (error: unknown): boolean =>
  typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";

const readOptionalFile = async (filePath: string): Promise<ReadResult> => {
  try {
    return { found: true, text: await readFile(filePath, "utf8") };
  } catch (error) {
    if (isMissingFile(error)) {
      return { found: false };
    }

    return { found: true, error: describeError(error) };
  }
};

const formatZodError = (error: z.ZodError): string =>
  error.issues
    .map((issue) => `${issue.path.length === 0 ? "(root)" : issue.path.join(".")}: ${issue.message}`)
    .join("; ");

const parseJson = (text: string): { ok: true; value: unknown } | { ok: false; reason: string } => {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (error) {
    return { ok: false, reason: `invalid JSON: ${describeError(error)}` };
  }
};

const validate = (source: string, value: unknown): LoadedProjectConfig => {
  const parsed = projectConfigSchema.safeParse(value);
  if (!parsed.success) {
    return { config: {}, source, issues: [{ source, reason: formatZodError(parsed.error) }] };
  }

  return { config: parsed.data, source, issues: [] };
};

const withIssue = (source: string, reason: string): LoadedProjectConfig => ({
  config: {},
  source,
  issues: [{ source, reason }],
});

const packageJsonSchema = z.object({ [PACKAGE_JSON_CONFIG_KEY]: z.unknown() }).passthrough();

/**
 * Loads `readyscore.config.json`, falling back to the `readyscore` key of
 * package.json. Problems are returned as issues alongside the default (empty)
 * configuration; this function does not throw.
 */
export const loadProjectConfig = async (projectRoot: string): Promise<LoadedProjectConfig> => {
  const configFile = await readOptionalFile(join(projectRoot, CONFIG_FILE_NAME));
  if (configFile.found) {
    if ("error" in configFile) {
      return withIssue(CONFIG_FILE_NAME, configFile.error);
    }

    const json = parseJson(configFile.text);
    return json.ok ? validate(CONFIG_FILE_NAME, json.value) : withIssue(CONFIG_FILE_NAME, json.reason);
  }

  const packageFile = await readOptionalFile(join(projectRoot, "package.json"));
  if (!packageFile.found) {
    return { config: {}, source: null, issues: [] };
  }

  if ("error" in packageFile) {
    return withIssue("package.json", packageFile.error);
  }

  const json = parseJson(packageFile.text);
  if (!json.ok) {
    return withIssue("package.json", json.reason);
  }

  const manifest = packageJsonSchema.safeParse(json.value);
  const embedded = manifest.success ? manifest.data[PACKAGE_JSON_CONFIG_KEY] : undefined;
  if (embedded === undefined) {
    return { config: {}, source: null, issues: [] };
  }

  return validate(`package.json#${PACKAGE_JSON_CONFIG_KEY}`, embedded);
};

export type ScoringSettings = {
  profile: ScoringProfileName;
  thresholds: Thresholds;
  topOffenderLimit: number;
  minScore: number;
  /** Problems found once the configuration is combined with its profile. */
  issues: readonly ConfigIssue[];
};

export type ScoringSettingsOverrides = {
  profile?: ScoringProfileName;
  topOffenderLimit?: number;
  minScore?: number;
};

export type ResolvedThresholds = {
  thresholds: Thresholds;
  issues: readonly ConfigIssue[];
};

// Precedence: command-line flags, then the project configuration, then profile defaults.
export const resolveScoringSettings = (
  config: ProjectConfig,
  overrides: ScoringSettingsOverrides = {},
  source: string = CONFIG_FILE_NAME,
): ScoringSettings => {
  const profile = overrides.profile ?? config.profile ?? "standard";
  const { thresholds, issues } = resolveThresholds(profile, config.thresholds, source);
  return {
    profile,
    thresholds,
    topOffenderLimit: overrides.topOffenderLimit ?? config.topOffenders ?? DEFAULT_TOP_OFFENDER_LIMIT,
    minScore: overrides.minScore ?? config.minScore ?? DEFAULT_MIN_SCORE,
    issues,
  };
};

/**
 * Applies threshold overrides to a profile. The ACL tiers are checked on the
 * merged values, since an override of one tier can cross the profile's other
 * tier; such overrides are dropped in favour of the profile.
 */
export const resolveThresholds = (
  profile: ScoringProfileName,
  overrides: Partial<Thresholds> | undefined,
  source: string = CONFIG_FILE_NAME,
): ResolvedThresholds => {
  const thresholds = mergeThresholds(SCORING_PROFILES[profile], overrides);
  if (thresholds.aclYellow <= thresholds.aclRed) {
    return { thresholds, issues: [] };
  }

  return {
    thresholds: SCORING_PROFILES[profile],
    issues: [
      {
        source,
        reason: `thresholds: aclYellow ${thresholds.aclYellow} exceeds aclRed ${thresholds.aclRed} of the ${profile} profile`,
      },
    ],
  };
};
