import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { CONFIG_FILE_NAME, loadProjectConfig, resolveScoringSettings, resolveThresholds } from "./load-config.js";

const createdPaths: string[] = [];

const createProject = async (files: Readonly<Record<string, string>>): Promise<string> => {
  const projectRoot = await mkdtemp(join(tmpdir(), "readyscore-config-test-"));
  createdPaths.push(projectRoot);

  for (const [relativePath, content] of Object.entries(files)) {
    await writeFile(join(projectRoot, relativePath), content, "utf8");
  }

  return projectRoot;
};

afterEach(async () => {
  for (const pathToDelete of createdPaths.splice(0, createdPaths.length)) {
    await rm(pathToDelete, { recursive: true, force: true });
  }
});

describe("loadProjectConfig", () => {
  it("returns an empty configuration when nothing is configured", async () => {
    const projectRoot = await createProject({ "package.json": JSON.stringify({ name: "demo" }) });

    expect(await loadProjectConfig(projectRoot)).toEqual({ config: {}, source: null, issues: [] });
  });

  it("reads the dedicated configuration file", async () => {
    const projectRoot = await createProject({
      [CONFIG_FILE_NAME]: JSON.stringify({ profile: "relaxed", thresholds: { aclRed: 20 }, minScore: 50 }),
    });

    expect(await loadProjectConfig(projectRoot)).toEqual({
      config: { profile: "relaxed", thresholds: { aclRed: 20 }, minScore: 50 },
      source: CONFIG_FILE_NAME,
      issues: [],
    });
  });

  it("falls back to the readyscore key of package.json", async () => {
    const projectRoot = await createProject({
      "package.json": JSON.stringify({ name: "demo", readyscore: { topOffenders: 3 } }),
    });

    expect(await loadProjectConfig(projectRoot)).toEqual({
      config: { topOffenders: 3 },
      source: "package.json#readyscore",
      issues: [],
    });
  });

  it("reports malformed JSON as an issue", async () => {
    const projectRoot = await createProject({ [CONFIG_FILE_NAME]: "{ profile: " });

    const loaded = await loadProjectConfig(projectRoot);

    expect(loaded.config).toEqual({});
    expect(loaded.issues).toHaveLength(1);
    expect(loaded.issues[0]?.source).toBe(CONFIG_FILE_NAME);
    expect(loaded.issues[0]?.reason.startsWith("invalid JSON: ")).toBe(true);
  });

  it("reports schema violations with their paths", async () => {
    const projectRoot = await createProject({
      [CONFIG_FILE_NAME]: JSON.stringify({ thresholds: { aclRed: "high" } }),
    });

    expect(await loadProjectConfig(projectRoot)).toEqual({
      config: {},
      source: CONFIG_FILE_NAME,
      issues: [{ source: CONFIG_FILE_NAME, reason: "thresholds.aclRed: Expected number, received string" }],
    });
  });

  it("rejects unknown keys", async () => {
    const unknownKey = await createProject({ [CONFIG_FILE_NAME]: JSON.stringify({ treshold: 1 }) });

    expect((await loadProjectConfig(unknownKey)).issues[0]?.reason).toBe(
      "(root): Unrecognized key(s) in object: 'treshold'",
    );
  });

  it("accepts the agent profiles", async () => {
    const projectRoot = await createProject({ [CONFIG_FILE_NAME]: JSON.stringify({ profile: "copilot" }) });

    expect(await loadProjectConfig(projectRoot)).toEqual({
      config: { profile: "copilot" },
      source: CONFIG_FILE_NAME,
      issues: [],
    });
  });
});

describe("resolveScoringSettings", () => {
  it("lets flags win over the configuration and the configuration over the profile", () => {
    const settings = resolveScoringSettings(
      { profile: "relaxed", thresholds: { bloatLineLimit: 300 }, topOffenders: 3, minScore: 50 },
      { topOffenderLimit: 5 },
    );

    expect(settings.profile).toBe("relaxed");
    expect(settings.thresholds.typeSafetyMinimum).toBe(0.5);
    expect(settings.thresholds.bloatLineLimit).toBe(300);
    expect(settings.topOffenderLimit).toBe(5);
    expect(settings.minScore).toBe(50);
  });

  it("uses the standard profile defaults without configuration", () => {
    const settings = resolveScoringSettings({}, { profile: undefined });

    expect(settings).toMatchObject({ profile: "standard", topOffenderLimit: 10, minScore: 70 });
    expect(settings.thresholds.typeSafetyMinimum).toBe(0.9);
    expect(settings.issues).toEqual([]);
  });

  it("reports a yellow tier that crosses the profile's red tier", () => {
    const settings = resolveScoringSettings({ thresholds: { aclYellow: 20 } }, {}, "package.json#readyscore");

    expect(settings.thresholds.aclYellow).toBe(10);
    expect(settings.thresholds.aclRed).toBe(15);
    expect(settings.issues).toEqual([
      {
        source: "package.json#readyscore",
        reason: "thresholds: aclYellow 20 exceeds aclRed 15 of the standard profile",
      },
    ]);
  });
});

describe("resolveThresholds", () => {
  it("checks the ACL tiers against the selected profile", () => {
    expect(resolveThresholds("copilot", { aclYellow: 18 }).issues).toEqual([]);
    expect(resolveThresholds("jules", { aclYellow: 14 }).issues).toEqual([
      { source: CONFIG_FILE_NAME, reason: "thresholds: aclYellow 14 exceeds aclRed 12 of the jules profile" },
    ]);
  });

  it("accepts both tiers overridden together", () => {
    const { thresholds, issues } = resolveThresholds("standard", { aclYellow: 20, aclRed: 25 });

    expect(issues).toEqual([]);
    expect(thresholds).toMatchObject({ aclYellow: 20, aclRed: 25 });
  });
});
