import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import type {
  Config,
  CliFlags,
  ToolsConfig,
  TikwmConfig,
  CobaltConfig,
  NativeConfig,
  AuddConfig,
  AcoustIdConfig,
  ConsensusConfig,
  MasterConfig,
  NativeStrategyName,
  MediaKind,
  ScorerKind,
} from "./types.js";
import { ConfigError, describeError } from "../errors.js";
import { logger } from "../utils/logger.js";

/** Config file shape: every section may be partially specified */
export interface ConfigOverride
  extends Partial<Omit<Config, "tools" | "acquisition" | "recognition" | "consensus" | "master">> {
  tools?: Partial<ToolsConfig>;
  acquisition?: {
    tikwm?: Partial<TikwmConfig>;
    cobalt?: Partial<CobaltConfig>;
    native?: Partial<NativeConfig>;
  };
  recognition?: {
    sampleRate?: number;
    audd?: Partial<AuddConfig>;
    acoustid?: Partial<AcoustIdConfig>;
  };
  consensus?: Partial<ConsensusConfig>;
  master?: Partial<MasterConfig>;
}

const NATIVE_STRATEGIES: readonly NativeStrategyName[] = ["browser", "mobile-app", "randomized"];
const MEDIA_KINDS: readonly MediaKind[] = ["audio", "audio+video"];
const SCORER_KINDS: readonly ScorerKind[] = ["fuzzy", "exact"];
const SINGLE_SOURCE_STATUSES: readonly ConsensusConfig["singleSourceStatus"][] = ["SINGLE_SOURCE", "UNCERTAIN"];

export const DEFAULT_CONFIG: Config = {
  outputDir: "clip-miner-library",
  stagingDir: path.join(os.tmpdir(), "clip-miner-staging"),
  mediaKind: "audio+video",
  concurrency: 1,
  requestTimeoutMs: 20_000,
  knownDomains: [
    "tiktok.com",
    "instagram.com",
    "youtube.com",
    "youtu.be",
    "facebook.com",
    "fb.watch",
    "twitter.com",
    "x.com",
    "kwai.com",
    "soundcloud.com",
  ],
  tools: {
    ffmpeg: "ffmpeg",
    ytDlp: "yt-dlp",
    fpcalc: "fpcalc",
    concurrency: 2,
    timeoutMs: 120_000,
  },
  acquisition: {
    tikwm: {
      enabled: true,
      endpoint: "https://www.tikwm.com/api/",
    },
    cobalt: {
      enabled: true,
      endpoint: "https://api.cobalt.tools/",
    },
    native: {
      enabled: true,
      strategies: ["browser", "mobile-app", "randomized"],
      randomDelayMs: { min: 1_500, max: 4_000 },
    },
  },
  recognition: {
    sampleRate: 44_100,
    audd: {
      enabled: true,
      endpoint: "https://api.audd.io/",
    },
    acoustid: {
      enabled: true,
      apiKey: "",
      endpoint: "https://api.acoustid.org/v2/lookup",
    },
  },
  consensus: {
    scorer: "fuzzy",
    agreementThreshold: 80,
    singleSourceStatus: "SINGLE_SOURCE",
  },
  master: {
    enabled: true,
    queryQualifier: "official audio",
    searchCount: 5,
    minDurationSeconds: 110,
    maxDurationSeconds: 600,
    inclusiveBounds: false,
    audioFormat: "mp3",
    audioQuality: "0",
  },
};

/**
 * Load config from the first available source:
 * 1. Explicit path (--config flag)
 * 2. ~/.config/clip-miner/config.json
 * 3. ./clip-miner.json
 *
 * Falls back to defaults if no config file exists. An explicit path that
 * cannot be read or parsed is an error.
 */
export async function loadConfig(explicitPath?: string): Promise<Config> {
  if (explicitPath) {
    const override = await readConfigFile(explicitPath);
    if (!override) {
      throw new ConfigError([`Config file not found: ${explicitPath}`]);
    }
    return finalize(mergeConfig(DEFAULT_CONFIG, override));
  }

  const candidates = [
    path.join(os.homedir(), ".config", "clip-miner", "config.json"),
    path.resolve("clip-miner.json"),
  ];

  for (const candidate of candidates) {
    const override = await readConfigFile(candidate);
    if (override) {
      return finalize(mergeConfig(DEFAULT_CONFIG, override));
    }
  }

  logger.debug("No config file found, using defaults");
  return finalize(DEFAULT_CONFIG);
}

/**
 * Read and parse a config file.
 * Returns null when the file does not exist; throws on unreadable or invalid JSON.
 */
async function readConfigFile(filePath: string): Promise<ConfigOverride | null> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) {
      return null;
    }
    throw new ConfigError([`Cannot read ${filePath}: ${describeError(error)}`]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigError([`${filePath} is not valid JSON: ${describeError(error)}`]);
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError([`${filePath} must contain a JSON object`]);
  }

  logger.info(`Found config at ${filePath}`);
  return parsed as ConfigOverride;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Merge a partial config over defaults, one section at a time.
 */
export function mergeConfig(defaults: Config, override: ConfigOverride): Config {
  return {
    outputDir: override.outputDir ?? defaults.outputDir,
    stagingDir: override.stagingDir ?? defaults.stagingDir,
    errorLogPath: override.errorLogPath ?? defaults.errorLogPath,
    mediaKind: override.mediaKind ?? defaults.mediaKind,
    concurrency: override.concurrency ?? defaults.concurrency,
    requestTimeoutMs: override.requestTimeoutMs ?? defaults.requestTimeoutMs,
    knownDomains: override.knownDomains ?? defaults.knownDomains,
    tools: { ...defaults.tools, ...override.tools },
    acquisition: {
      tikwm: { ...defaults.acquisition.tikwm, ...override.acquisition?.tikwm },
      cobalt: { ...defaults.acquisition.cobalt, ...override.acquisition?.cobalt },
      native: { ...defaults.acquisition.native, ...override.acquisition?.native },
    },
    recognition: {
      sampleRate: override.recognition?.sampleRate ?? defaults.recognition.sampleRate,
      audd: { ...defaults.recognition.audd, ...override.recognition?.audd },
      acoustid: { ...defaults.recognition.acoustid, ...override.recognition?.acoustid },
    },
    consensus: { ...defaults.consensus, ...override.consensus },
    master: { ...defaults.master, ...override.master },
  };
}

/**
 * Apply CLI flag overrides on top of a loaded config.
 */
export function applyFlags(config: Config, flags: CliFlags): Config {
  const result: Config = {
    ...config,
    master: { ...config.master },
  };

  if (flags.output) {
    result.outputDir = flags.output;
  }
  if (flags.media) {
    result.mediaKind = flags.media === "audio" ? "audio" : "audio+video";
  }
  if (flags.concurrency !== undefined) {
    result.concurrency = flags.concurrency;
  }
  if (flags["skip-master"]) {
    result.master.enabled = false;
  }

  return finalize(result);
}

/**
 * Collect every problem with a config. Empty array means valid.
 */
export function validateConfig(config: Config): string[] {
  const problems: string[] = [];

  const positive: Array<[string, number]> = [
    ["concurrency", config.concurrency],
    ["requestTimeoutMs", config.requestTimeoutMs],
    ["tools.concurrency", config.tools.concurrency],
    ["tools.timeoutMs", config.tools.timeoutMs],
    ["recognition.sampleRate", config.recognition.sampleRate],
    ["master.searchCount", config.master.searchCount],
  ];
  for (const [name, value] of positive) {
    if (!Number.isInteger(value) || value <= 0) {
      problems.push(`${name} must be a positive integer (got ${value})`);
    }
  }

  const { minDurationSeconds, maxDurationSeconds } = config.master;
  if (typeof minDurationSeconds !== "number" || typeof maxDurationSeconds !== "number") {
    problems.push(
      `master duration bounds must be numbers (got ${JSON.stringify(minDurationSeconds)} - ${JSON.stringify(maxDurationSeconds)})`
    );
  } else if (minDurationSeconds < 0 || maxDurationSeconds <= minDurationSeconds) {
    problems.push(
      `master duration window is empty: ${minDurationSeconds}s - ${maxDurationSeconds}s`
    );
  }

  const threshold = config.consensus.agreementThreshold;
  if (typeof threshold !== "number" || !(threshold >= 0 && threshold <= 100)) {
    problems.push(
      `consensus.agreementThreshold must be between 0 and 100 (got ${JSON.stringify(threshold)})`
    );
  }

  checkOneOf(problems, "mediaKind", config.mediaKind, MEDIA_KINDS);
  checkOneOf(problems, "consensus.scorer", config.consensus.scorer, SCORER_KINDS);
  checkOneOf(problems, "consensus.singleSourceStatus", config.consensus.singleSourceStatus, SINGLE_SOURCE_STATUSES);

  const seen = new Set<string>();
  for (const strategy of config.acquisition.native.strategies) {
    if (!NATIVE_STRATEGIES.includes(strategy)) {
      problems.push(`Unknown native strategy "${strategy}" (expected ${NATIVE_STRATEGIES.join(", ")})`);
    } else if (seen.has(strategy)) {
      problems.push(`Native strategy "${strategy}" is listed more than once`);
    }
    seen.add(strategy);
  }

  const { min, max } = config.acquisition.native.randomDelayMs;
  if (min < 0 || max < min) {
    problems.push(`acquisition.native.randomDelayMs range is invalid: ${min}-${max}`);
  }

  return problems;
}

function checkOneOf<T extends string>(problems: string[], name: string, value: T, allowed: readonly T[]): void {
  if (!allowed.includes(value)) {
    problems.push(`${name} must be one of ${allowed.join(", ")} (got ${JSON.stringify(value)})`);
  }
}

function finalize(config: Config): Config {
  const problems = validateConfig(config);
  if (problems.length > 0) {
    throw new ConfigError(problems);
  }
  return config;
}

/** Location of the append-only error log */
export function resolveErrorLogPath(config: Config): string {
  return config.errorLogPath ?? path.join(config.outputDir, "error_log.txt");
}
