#!/usr/bin/env node
import { buildApplication, buildCommand, buildRouteMap, numberParser, run } from "@stricli/core";
import type { CommandContext } from "@stricli/core";
import { fetchTrack, searchTrack, verifyTrack, type CommonFlags, type FetchFlags, type TrackFlags } from "./find-lossless.js";
import { errorMessage } from "./utils/errors.js";
import { logger } from "./utils/logger.js";

const commonFlags = {
  config: {
    kind: "parsed",
    brief: "Path to config JSON file",
    parse: String,
    optional: true,
  },
  debug: {
    kind: "boolean",
    brief: "Enable debug logging",
    default: false,
  },
} as const;

const trackFlags = {
  ...commonFlags,
  artist: {
    kind: "parsed",
    brief: "Artist name",
    parse: String,
  },
  title: {
    kind: "parsed",
    brief: "Track title",
    parse: String,
  },
  duration: {
    kind: "parsed",
    brief: "Track length (m:ss or seconds)",
    parse: String,
  },
  album: {
    kind: "parsed",
    brief: "Album name",
    parse: String,
    optional: true,
  },
  year: {
    kind: "parsed",
    brief: "Release year (YYYY)",
    parse: String,
    optional: true,
  },
  timeout: {
    kind: "parsed",
    brief: "Overall search timeout in seconds",
    parse: numberParser,
    optional: true,
  },
} as const;

function reportFailure(e: unknown): void {
  logger.error(errorMessage(e));
  process.exitCode = 1;
}

const searchCommand = buildCommand({
  docs: {
    brief: "Search for a lossless copy of a track and list ranked candidates",
  },
  parameters: {
    flags: trackFlags,
  },
  async func(this: CommandContext, flags: TrackFlags): Promise<void> {
    try {
      await searchTrack(flags);
    } catch (e) {
      reportFailure(e);
    }
  },
});

const verifyCommand = buildCommand({
  docs: {
    brief: "Check whether an audio file is genuinely lossless",
  },
  parameters: {
    positional: {
      kind: "tuple",
      parameters: [
        {
          brief: "Path to audio file",
          parse: String,
          placeholder: "file",
        },
      ],
    },
    flags: commonFlags,
  },
  async func(this: CommandContext, flags: CommonFlags, filePath: string): Promise<void> {
    try {
      await verifyTrack(filePath, flags);
    } catch (e) {
      reportFailure(e);
    }
  },
});

const fetchCommand = buildCommand({
  docs: {
    brief: "Search, download, and verify a track",
  },
  parameters: {
    flags: {
      ...trackFlags,
      pick: {
        kind: "parsed",
        brief: "Rank of the candidate to download (skips the prompt)",
        parse: numberParser,
        optional: true,
      },
      yes: {
        kind: "boolean",
        brief: "Keep the downloaded file without asking",
        default: false,
      },
    },
  },
  async func(this: CommandContext, flags: FetchFlags): Promise<void> {
    try {
      await fetchTrack(flags);
    } catch (e) {
      reportFailure(e);
    }
  },
});

const routes = buildRouteMap({
  routes: {
    search: searchCommand,
    verify: verifyCommand,
    fetch: fetchCommand,
  },
  docs: {
    brief: "Find lossless audio on Soulseek and check it is not a transcode",
  },
});

const app = buildApplication(routes, {
  name: "find-lossless",
  versionInfo: {
    currentVersion: "1.0.0",
  },
});

await run(app, process.argv.slice(2), { process });
