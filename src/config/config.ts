import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import type { Config, MatchingConfig, PartialConfig, TieBreaker } from "./types.js";
import { defaultConfig } from "./defaults.js";
import { ConfigError } from "../utils/errors.js";
import { logger } from "../utils/logger.js";

const TIE_BREAKERS: readonly TieBreaker[] = ["reliability", "filenameLength"];

export interface LoadConfigOptions {
  /** Path given with --config; must exist when set */
  explicitPath?: string;
  /** Environment to read SLSKD_* overrides from */
  env?: NodeJS.ProcessEnv;
}

/**
 * Load config from the first available source:
 * 1. Explicit path (--config flag)
 * 2. ~/.config/find-lossless/config.json
 * 3. ./find-lossless.json
 *
 * Falls back to defaults if no config file exists. SLSKD_URL, SLSKD_API_KEY and
 * SLSKD_DOWNLOAD_DIR override the file.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<Config> {
  const override = await readConfigFile(options.explicitPath);
  const merged = applyEnvOverrides(mergeConfig(defaultConfig, override), options.env ?? process.env);
  validateConfig(merged);
  return normalizeConfig(merged);
}

async function readConfigFile(explicitPath?: string): Promise<PartialConfig> {
  if (explicitPath) {
    const resolved = path.resolve(explicitPath);
    const content = await readIfExists(resolved);
    if (content === undefined) {
      throw new ConfigError(`Configuration file not found: ${resolved}`);
    }
    return parseConfigFile(resolved, content);
  }

  const candidates = [
    path.join(os.homedir(), ".config", "find-lossless", "config.json"),
    path.resolve("find-lossless.json"),
  ];

  for (const candidate of candidates) {
    const content = await readIfExists(candidate);
    if (content !== undefined) {
      return parseConfigFile(candidate, content);
    }
  }

  logger.debug("No config file found, using defaults");
  return {};
}

async function readIfExists(filePath: string): Promise<string | undefined> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return undefined;
    }
    throw error;
  }
}

function parseConfigFile(filePath: string, content: string): PartialConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (e) {
    throw new ConfigError(
      `Configuration error: ${filePath} is not valid JSON (${e instanceof Error ? e.message : String(e)})`
    );
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`Configuration error: ${filePath} must contain a JSON object`);
  }
  logger.debug(`Found config at ${filePath}`);
  return parsed as PartialConfig;
}

/**
 * Merge a partial config over defaults, section by section.
 */
export function mergeConfig(defaults: Config, override: PartialConfig): Config {
  return {
    slskd: { ...defaults.slskd, ...override.slskd },
    search: { ...defaults.search, ...override.search },
    matching: { ...defaults.matching, ...override.matching },
    analysis: {
      ...defaults.analysis,
      ...override.analysis,
      thresholds: {
        ...defaults.analysis.thresholds,
        ...override.analysis?.thresholds,
      },
    },
    download: { ...defaults.download, ...override.download },
    logging: { ...defaults.logging, ...override.logging },
  };
}

/**
 * Apply SLSKD_* environment variables over the slskd section.
 */
export function applyEnvOverrides(config: Config, env: NodeJS.ProcessEnv): Config {
  return {
    ...config,
    slskd: {
      ...config.slskd,
      url: env.SLSKD_URL || config.slskd.url,
      apiKey: env.SLSKD_API_KEY || config.slskd.apiKey,
      downloadDir: env.SLSKD_DOWNLOAD_DIR || config.slskd.downloadDir,
    },
  };
}

/**
 * Lowercase keywords and extensions and strip leading dots from extensions.
 */
function normalizeConfig(config: Config): Config {
  const normalizeExtension = (ext: string): string => ext.trim().toLowerCase().replace(/^\./, "");
  const { matching } = config;

  return {
    ...config,
    slskd: { ...config.slskd, url: config.slskd.url.replace(/\/+$/, "") },
    matching: {
      ...matching,
      excludeKeywords: matching.excludeKeywords
        .map((kw) => kw.trim().toLowerCase())
        .filter((kw) => kw.length > 0),
      preferredExtension: normalizeExtension(matching.preferredExtension),
      fallbackExtensions: matching.fallbackExtensions.map(normalizeExtension),
    },
  };
}

/**
 * The acceptable-duration bound, twice the tight tolerance unless configured.
 */
export function acceptableToleranceSecs(
  matching: Pick<MatchingConfig, "durationToleranceSecs" | "acceptableToleranceSecs">
): number {
  return matching.acceptableToleranceSecs ?? matching.durationToleranceSecs * 2;
}

/**
 * Validates the configuration
 * @throws ConfigError if configuration is invalid
 */
export function validateConfig(config: Config): void {
  const { slskd, search, matching, analysis, download } = config;

  if (typeof slskd.url !== "string" || typeof slskd.apiKey !== "string" || typeof slskd.downloadDir !== "string") {
    throw new ConfigError("Configuration error: slskd.url, slskd.apiKey and slskd.downloadDir must be strings");
  }
  requirePositive("slskd.requestTimeoutMs", slskd.requestTimeoutMs);
  requirePositive("search.timeoutSecs", search.timeoutSecs);
  requirePositive("search.pollIntervalMs", search.pollIntervalMs);
  requirePositive("search.stableAfterMs", search.stableAfterMs);
  requirePositive("download.timeoutSecs", download.timeoutSecs);
  requirePositive("download.pollIntervalMs", download.pollIntervalMs);

  const tight = matching.durationToleranceSecs;
  const acceptable = acceptableToleranceSecs(matching);
  if (!isFiniteNumber(tight) || tight < 0) {
    throw new ConfigError("Configuration error: matching.durationToleranceSecs must be 0 or more");
  }
  if (!isFiniteNumber(acceptable) || acceptable < tight) {
    throw new ConfigError(
      "Configuration error: matching.acceptableToleranceSecs must be at least durationToleranceSecs"
    );
  }
  if (!isFiniteNumber(matching.exclusionSecs) || matching.exclusionSecs < acceptable) {
    throw new ConfigError("Configuration error: matching.exclusionSecs must be at least the acceptable tolerance");
  }
  if (!isStringArray(matching.excludeKeywords)) {
    throw new ConfigError("Configuration error: matching.excludeKeywords must be a list of strings");
  }
  if (typeof matching.preferredExtension !== "string" || matching.preferredExtension.length === 0) {
    throw new ConfigError("Configuration error: matching.preferredExtension is required");
  }
  if (!isStringArray(matching.fallbackExtensions)) {
    throw new ConfigError("Configuration error: matching.fallbackExtensions must be a list of strings");
  }
  if (!Number.isInteger(matching.maxResults) || matching.maxResults < 1) {
    throw new ConfigError("Configuration error: matching.maxResults must be a positive integer");
  }
  if (!Array.isArray(matching.tieBreak) || !matching.tieBreak.every((t) => TIE_BREAKERS.includes(t))) {
    throw new ConfigError(
      `Configuration error: matching.tieBreak entries must be one of ${TIE_BREAKERS.join(", ")}`
    );
  }

  if (!Number.isInteger(analysis.segmentLength) || analysis.segmentLength < 256) {
    throw new ConfigError("Configuration error: analysis.segmentLength must be an integer of at least 256");
  }
  if (!isFiniteNumber(analysis.overlap) || analysis.overlap < 0 || analysis.overlap >= 1) {
    throw new ConfigError("Configuration error: analysis.overlap must be in [0, 1)");
  }
  requirePositive("analysis.sampleSecs", analysis.sampleSecs);
  if (!Number.isInteger(analysis.workers) || analysis.workers < 0) {
    throw new ConfigError("Configuration error: analysis.workers must be 0 or a positive integer");
  }

  const t = analysis.thresholds;
  if (!isFiniteNumber(t.authenticRatio) || t.authenticRatio <= 0 || t.authenticRatio > 1) {
    throw new ConfigError("Configuration error: analysis.thresholds.authenticRatio must be in (0, 1]");
  }
  requirePositive("analysis.thresholds.cutoffDropDb", t.cutoffDropDb);
  requirePositive("analysis.thresholds.lossyBandMaxKhz", t.lossyBandMaxKhz);
  requirePositive("analysis.thresholds.sharpRolloffDbPerKhz", t.sharpRolloffDbPerKhz);
  if (!isFiniteNumber(t.brickWallDbPerKhz) || t.brickWallDbPerKhz < t.sharpRolloffDbPerKhz) {
    throw new ConfigError(
      "Configuration error: analysis.thresholds.brickWallDbPerKhz must be at least sharpRolloffDbPerKhz"
    );
  }
  if (!isFiniteNumber(t.brickWallFloorDb) || t.brickWallFloorDb >= 0) {
    throw new ConfigError("Configuration error: analysis.thresholds.brickWallFloorDb must be negative");
  }
  if (!isFiniteNumber(t.silenceRms) || t.silenceRms < 0) {
    throw new ConfigError("Configuration error: analysis.thresholds.silenceRms must be 0 or more");
  }
}

/**
 * Fail unless slskd credentials are present. Only commands that talk to slskd need them.
 */
export function requireSlskdCredentials(config: Config): void {
  if (!config.slskd.url) {
    throw new ConfigError("Configuration error: slskd.url (or SLSKD_URL) is required");
  }
  if (!config.slskd.apiKey) {
    throw new ConfigError("Configuration error: slskd.apiKey (or SLSKD_API_KEY) is required");
  }
}

function requirePositive(name: string, value: number): void {
  if (!isFiniteNumber(value) || value <= 0) {
    throw new ConfigError(`Configuration error: ${name} must be a positive number`);
  }
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}
