import fs from "node:fs/promises";
import { AuthenticityVerifier } from "./authenticity/verifier.js";
import { createAnalysisRunner, type AnalysisRunner } from "./authenticity/runner.js";
import { loadConfig, requireSlskdCredentials } from "./config/config.js";
import type { Config } from "./config/types.js";
import { SlskdDownloader } from "./download/downloader.js";
import { locateDownloadedFile } from "./download/locate.js";
import type { ScoredCandidate } from "./matching/types.js";
import {
  confirmKeep,
  formatReference,
  presentCandidates,
  presentVerdict,
  promptForPick,
} from "./output/presenter.js";
import { MatchPipeline } from "./pipeline.js";
import { remoteBasename } from "./search/candidate.js";
import { SearchOrchestrator } from "./search/orchestrator.js";
import { SlskdSearchProvider } from "./search/providers/slskd.js";
import { SessionRegistry } from "./search/session-registry.js";
import type { TrackReference } from "./search/types.js";
import { logger } from "./utils/logger.js";
import { verifyRequiredTools } from "./utils/startup.js";

/** Requester identity for the single interactive user */
export const CLI_REQUESTER = "local";

export interface CommonFlags {
  config?: string;
  debug: boolean;
}

export interface TrackFlags extends CommonFlags {
  artist: string;
  title: string;
  duration: string;
  album?: string;
  year?: string;
  timeout?: number;
}

export interface FetchFlags extends TrackFlags {
  pick?: number;
  yes: boolean;
}

/**
 * Parse a track length: "3:42", "1:02:03" or plain seconds ("222").
 * @throws Error for anything else
 */
export function parseDuration(text: string): number {
  const trimmed = text.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    const secs = parseFloat(trimmed);
    if (secs > 0) return secs;
  } else if (/^\d+(:[0-5]\d){1,2}$/.test(trimmed)) {
    const secs = trimmed.split(":").reduce((total, part) => total * 60 + parseInt(part, 10), 0);
    if (secs > 0) return secs;
  }
  throw new Error(`Invalid duration "${text}" (expected m:ss or seconds)`);
}

export function buildReference(flags: Pick<TrackFlags, "artist" | "title" | "duration" | "album" | "year">): TrackReference {
  const artist = flags.artist.trim();
  const title = flags.title.trim();
  if (!artist || !title) {
    throw new Error("Artist and title must not be empty");
  }
  if (flags.year !== undefined && !/^\d{4}$/.test(flags.year.trim())) {
    throw new Error(`Invalid year "${flags.year}" (expected YYYY)`);
  }
  return {
    artist,
    title,
    album: flags.album?.trim() || undefined,
    durationSecs: parseDuration(flags.duration),
    year: flags.year?.trim(),
  };
}

interface Services {
  pipeline: MatchPipeline;
  runner: AnalysisRunner;
  registry: SessionRegistry;
}

function createServices(config: Config): Services {
  const registry = new SessionRegistry();
  const orchestrator = new SearchOrchestrator(new SlskdSearchProvider(config.slskd), registry, {
    search: config.search,
    matching: config.matching,
  });
  const runner = createAnalysisRunner(config.analysis.workers);
  const verifier = new AuthenticityVerifier(runner, config.analysis);
  return { pipeline: new MatchPipeline(orchestrator, verifier, registry, config.matching), runner, registry };
}

async function setup(flags: CommonFlags): Promise<Config> {
  if (flags.debug) logger.setDebug(true);
  const config = await loadConfig({ explicitPath: flags.config });
  if (config.logging.debug) logger.setDebug(true);
  return config;
}

/** Abort on Ctrl-C so the provider session is stopped and deleted before exit */
async function withInterrupt<T>(work: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onInterrupt = (): void => {
    logger.warn("Interrupted, cleaning up...");
    controller.abort(new Error("Interrupted"));
  };
  process.once("SIGINT", onInterrupt);
  try {
    return await work(controller.signal);
  } finally {
    process.removeListener("SIGINT", onInterrupt);
  }
}

/**
 * Search for a track and print the ranked candidates.
 */
export async function searchTrack(flags: TrackFlags): Promise<ScoredCandidate[]> {
  const config = await setup(flags);
  requireSlskdCredentials(config);
  const reference = buildReference(flags);
  const { pipeline, runner } = createServices(config);

  try {
    logger.info(`Searching for ${formatReference(reference)}`);
    const result = await withInterrupt((signal) =>
      pipeline.findCandidates(reference, { requester: CLI_REQUESTER, timeoutSecs: flags.timeout, signal })
    );
    presentCandidates(result.candidates, result.search.usedFallbackFormat);
    return result.candidates;
  } finally {
    await runner.close();
  }
}

/**
 * Analyze a local file and print the verdict.
 */
export async function verifyTrack(filePath: string, flags: CommonFlags): Promise<void> {
  await verifyRequiredTools(["ffmpeg"]);
  const config = await setup(flags);
  const { pipeline, runner } = createServices(config);

  try {
    const verdict = await withInterrupt((signal) =>
      pipeline.verify(filePath, { requester: CLI_REQUESTER, signal })
    );
    presentVerdict(verdict, filePath);
  } finally {
    await runner.close();
  }
}

/**
 * Search, download the chosen candidate, verify it and ask whether to keep it.
 *
 * @returns Path of the kept file, or undefined when nothing was kept
 */
export async function fetchTrack(flags: FetchFlags): Promise<string | undefined> {
  await verifyRequiredTools(["ffmpeg"]);
  const config = await setup(flags);
  requireSlskdCredentials(config);
  const reference = buildReference(flags);
  const { pipeline, runner, registry } = createServices(config);
  const downloader = new SlskdDownloader(config.slskd);

  try {
    return await withInterrupt(async (signal) => {
      logger.info(`Searching for ${formatReference(reference)}`);
      const { candidates, search } = await pipeline.findCandidates(reference, {
        requester: CLI_REQUESTER,
        timeoutSecs: flags.timeout,
        signal,
      });
      presentCandidates(candidates, search.usedFallbackFormat);
      if (candidates.length === 0) return undefined;

      const chosen = await choose(candidates, flags.pick);
      if (!chosen) {
        logger.info("Nothing selected");
        return undefined;
      }

      const filePath = await download(chosen, config, downloader, registry, signal);
      if (!filePath) return undefined;

      const verdict = await pipeline.verify(filePath, { requester: CLI_REQUESTER, signal });
      presentVerdict(verdict, filePath);

      const keep = flags.yes || (await confirmKeep(verdict));
      if (!keep) {
        await fs.rm(filePath);
        logger.info(`Deleted ${filePath}`);
        return undefined;
      }

      logger.success(`Kept ${filePath}`);
      return filePath;
    });
  } finally {
    await runner.close();
  }
}

async function choose(candidates: ScoredCandidate[], pick: number | undefined): Promise<ScoredCandidate | undefined> {
  if (pick === undefined) return promptForPick(candidates);

  const chosen = candidates.find((c) => c.rank === pick);
  if (!chosen) {
    throw new Error(`--pick ${pick} is out of range (1-${candidates.length})`);
  }
  return chosen;
}

async function download(
  chosen: ScoredCandidate,
  config: Config,
  downloader: SlskdDownloader,
  registry: SessionRegistry,
  signal: AbortSignal
): Promise<string | undefined> {
  const { candidate } = chosen;
  const name = remoteBasename(candidate.filename);
  const lease = registry.acquire(CLI_REQUESTER, "download");

  try {
    await downloader.enqueue(candidate);
    const status = await downloader.waitForDownload(candidate, {
      timeoutSecs: config.download.timeoutSecs,
      pollIntervalMs: config.download.pollIntervalMs,
      signal,
    });

    if (!status) {
      logger.error(`Download of ${name} did not finish within ${config.download.timeoutSecs}s`);
      return undefined;
    }
    if (status.outcome === "failed") {
      logger.error(`Download of ${name} failed: ${status.state}`);
      return undefined;
    }
  } finally {
    lease.release();
  }

  const filePath = await locateDownloadedFile(config.slskd.downloadDir, candidate.username, candidate.filename);
  if (!filePath) {
    logger.error(`${name} finished downloading but was not found under ${config.slskd.downloadDir}`);
  }
  return filePath;
}
