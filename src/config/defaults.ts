import type { Config } from "./types.js";

/**
 * Default configuration values
 */
export const defaultConfig: Config = {
  slskd: {
    url: "http://localhost:5030",
    apiKey: "",
    downloadDir: "/downloads",
    requestTimeoutMs: 10_000,
  },
  search: {
    timeoutSecs: 30,
    pollIntervalMs: 2_000,
    stableAfterMs: 8_000,
  },
  matching: {
    durationToleranceSecs: 5,
    exclusionSecs: 30,
    excludeKeywords: [
      "live",
      "remix",
      "acoustic",
      "karaoke",
      "instrumental",
      "cover",
      "demo",
      "radio edit",
      "tribute",
      "remaster",
    ],
    preferredExtension: "flac",
    fallbackExtensions: ["alac", "wav", "aiff", "m4a", "mp3", "aac", "ogg", "opus", "wma"],
    maxResults: 5,
    tieBreak: ["reliability", "filenameLength"],
  },
  analysis: {
    segmentLength: 8192,
    overlap: 0.5,
    sampleSecs: 30,
    workers: 2,
    thresholds: {
      cutoffDropDb: 30,
      authenticRatio: 0.92,
      lossyBandMaxKhz: 19,
      sharpRolloffDbPerKhz: 24,
      brickWallDbPerKhz: 48,
      brickWallFloorDb: -60,
      silenceRms: 0.001,
    },
  },
  download: {
    timeoutSecs: 600,
    pollIntervalMs: 3_000,
  },
  logging: {
    debug: false,
  },
};
