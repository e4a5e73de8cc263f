import { Command, InvalidArgumentError, Option } from "commander";
import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import {
  SCORING_PROFILE_DESCRIPTIONS,
  SCORING_PROFILE_NAMES,
  isScoringProfileName,
  type ScoringProfileName,
} from "@readyscore/scoring-engine";
import { z } from "zod";
import { formatScoreOutput, type ScoreOutputMode } from "./application/format-score-output.js";
import { createStderrLogger, parseLogLevel, type LogLevel } from "./application/logger.js";
import { runScoreCommand } from "./application/run-score-command.js";

const program = new Command();
const packageJsonPath = resolve(dirname(fileURLToPath(import.meta.url)), "../package.json");
const { version } = z.object({ version: z.string() }).parse(JSON.parse(readFileSync(packageJsonPath, "utf8")));

const parsePositiveInteger = (value: string): number => {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0 || `${parsed}` !== value.trim()) {
    throw new InvalidArgumentError("expected a positive integer");
  }

  return parsed;
};

const parseScore = (value: string): number => {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed) || parsed < 0 || parsed > 100) {
    throw new InvalidArgumentError("expected a number between 0 and 100");
  }

  return parsed;
};

const profileHelp = SCORING_PROFILE_NAMES.map((name) => `${name} (${SCORING_PROFILE_DESCRIPTIONS[name]})`).join("; ");

const parseProfile = (value: string): ScoringProfileName => {
  if (!isScoringProfileName(value)) {
    throw new InvalidArgumentError(`expected one of ${SCORING_PROFILE_NAMES.join(", ")}`);
  }

  return value;
};

program
  .name("readyscore")
  .description("Agent-readiness scoring for TypeScript/JavaScript codebases")
  .version(version);

program
  .command("score")
  .argument("[path]", "path to the project or single file to score")
  .addOption(
    new Option("--profile <name>", `threshold profile, default from config, else standard: ${profileHelp}`).argParser(
      parseProfile,
    ),
  )
  .option("--changed-since <ref>", "charge file and function penalties only for files changed since a git ref")
  .addOption(
    new Option("--top <count>", "number of top offending functions to report (default: 10)").argParser(
      parsePositiveInteger,
    ),
  )
  .addOption(
    new Option("--min-score <score>", "exit with code 1 when the score is below this value (default: 70)").argParser(
      parseScore,
    ),
  )
  .addOption(
    new Option(
      "--log-level <level>",
      "log verbosity: silent, error, warn, info, debug (logs are written to stderr)",
    )
      .choices(["silent", "error", "warn", "info", "debug"])
      .default(parseLogLevel(process.env["READYSCORE_LOG_LEVEL"])),
  )
  .addOption(
    new Option("--output <mode>", "output mode: summary (default) or json (full report)")
      .choices(["summary", "json"])
      .default("summary"),
  )
  .option("--json", "shortcut for --output json")
  .action(
    async (
      path: string | undefined,
      options: {
        profile?: ScoringProfileName;
        changedSince?: string;
        top?: number;
        minScore?: number;
        logLevel: LogLevel;
        output: ScoreOutputMode;
        json?: boolean;
      },
    ) => {
      const logger = createStderrLogger(options.logLevel);
      const result = await runScoreCommand(
        path,
        {
          ...(options.profile === undefined ? {} : { profile: options.profile }),
          ...(options.changedSince === undefined ? {} : { changedSince: options.changedSince }),
          ...(options.top === undefined ? {} : { top: options.top }),
          ...(options.minScore === undefined ? {} : { minScore: options.minScore }),
        },
        logger,
      );
      const outputMode: ScoreOutputMode = options.json === true ? "json" : options.output;
      process.stdout.write(`${formatScoreOutput(result, outputMode)}\n`);

      if (!result.passed) {
        logger.error(`score ${result.analysis.report.score} is below the minimum of ${result.minScore}`);
        process.exitCode = 1;
      }
    },
  );

const executablePath = process.argv[0] ?? "";
const scriptPath = process.argv[1] ?? "";

const argv =
  process.argv[2] === "--"
    ? [executablePath, scriptPath, ...process.argv.slice(3)]
    : process.argv;

if (argv.length <= 2) {
  program.outputHelp();
  process.exit(0);
}

await program.parseAsync(argv);
