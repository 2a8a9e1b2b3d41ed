/**
 * Minimal slskd REST client shared by the search provider and the downloader.
 */

import type { SlskdConfig } from "../../config/types.js";
import { ProviderError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { extensionOf } from "../candidate.js";
import type { CandidateResult, ProviderStatus } from "../types.js";

const API_PREFIX = "/api/v0";

/** File entry inside a peer's search response */
export interface SlskdSearchFile {
  filename?: string;
  size?: number;
  bitRate?: number;
  bitDepth?: number;
  sampleRate?: number;
  /** Seconds */
  length?: number;
}

/** One peer's answer to a search */
export interface SlskdSearchResponse {
  username?: string;
  hasFreeUploadSlot?: boolean;
  uploadSpeed?: number;
  queueLength?: number;
  files?: SlskdSearchFile[];
}

/** GET /searches/{id} */
export interface SlskdSearchState {
  id?: string;
  isComplete?: boolean;
  fileCount?: number;
  responseCount?: number;
  state?: string;
  responses?: SlskdSearchResponse[];
}

export interface SlskdTransfer {
  filename?: string;
  state?: string;
  percentComplete?: number;
  bytesTransferred?: number;
  size?: number;
  averageSpeed?: number;
}

/** GET /transfers/downloads/{username} */
export interface SlskdUserTransfers {
  username?: string;
  directories?: { directory?: string; files?: SlskdTransfer[] }[];
}

export interface RequestOptions {
  body?: unknown;
  /** Statuses that count as success besides 2xx */
  allowStatus?: number[];
}

export class SlskdApi {
  private readonly baseUrl: string;

  constructor(private readonly config: Pick<SlskdConfig, "url" | "apiKey" | "requestTimeoutMs">) {
    this.baseUrl = config.url.replace(/\/+$/, "");
  }

  /**
   * Call an slskd endpoint. Every call is bounded by the configured request timeout.
   *
   * @returns The response body parsed as JSON, or undefined for an empty body
   * @throws ProviderError on network failure, timeout or an unexpected status
   */
  async request<T>(method: string, path: string, options: RequestOptions = {}): Promise<T | undefined> {
    const url = `${this.baseUrl}${API_PREFIX}${path}`;
    const headers: Record<string, string> = {
      "X-API-Key": this.config.apiKey,
      Accept: "application/json",
    };
    if (options.body !== undefined) {
      headers["Content-Type"] = "application/json";
    }

    logger.logCurl(method, url, headers, options.body);

    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: AbortSignal.timeout(this.config.requestTimeoutMs),
      });
    } catch (e) {
      if (e instanceof Error && e.name === "TimeoutError") {
        throw new ProviderError(`slskd ${method} ${path} timed out after ${this.config.requestTimeoutMs}ms`);
      }
      throw new ProviderError(`slskd ${method} ${path} failed: ${e instanceof Error ? e.message : String(e)}`);
    }

    if (!response.ok && !options.allowStatus?.includes(response.status)) {
      throw new ProviderError(
        `slskd API error: ${response.status} ${response.statusText} (${method} ${path})`,
        response.status
      );
    }

    const text = await response.text();
    if (!response.ok || text.trim() === "") return undefined;

    try {
      return JSON.parse(text) as T;
    } catch {
      throw new ProviderError(`slskd ${method} ${path} returned invalid JSON`, response.status);
    }
  }
}

function numberOr<T extends number | undefined>(value: unknown, fallback: T): number | T {
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

function positiveOrUndefined(value: unknown): number | undefined {
  const n = numberOr(value, undefined);
  return n !== undefined && n > 0 ? n : undefined;
}

/** Reduce a search state to the progress the orchestrator polls on */
export function parseSearchStatus(state: SlskdSearchState | undefined): ProviderStatus {
  return {
    isComplete: state?.isComplete === true,
    fileCount: numberOr(state?.fileCount, 0),
    responseCount: numberOr(state?.responseCount, 0),
    state: typeof state?.state === "string" ? state.state : "Unknown",
  };
}

/**
 * Flatten peer responses into one candidate per offered file.
 * Files without a name are skipped.
 */
export function parseSearchResponses(responses: SlskdSearchResponse[] | undefined): CandidateResult[] {
  const candidates: CandidateResult[] = [];

  for (const response of responses ?? []) {
    const username = typeof response.username === "string" ? response.username : "";
    for (const file of response.files ?? []) {
      if (typeof file.filename !== "string" || file.filename === "") continue;
      candidates.push({
        username,
        filename: file.filename,
        size: numberOr(file.size, 0),
        extension: extensionOf(file.filename),
        bitRate: positiveOrUndefined(file.bitRate),
        bitDepth: positiveOrUndefined(file.bitDepth),
        sampleRate: positiveOrUndefined(file.sampleRate),
        durationSecs: positiveOrUndefined(file.length),
        hasFreeSlot: response.hasFreeUploadSlot === true,
        uploadSpeed: numberOr(response.uploadSpeed, 0),
        queueLength: numberOr(response.queueLength, 0),
      });
    }
  }

  return candidates;
}

/** Find the transfer for one remote file in a user's download listing */
export function findTransfer(
  transfers: SlskdUserTransfers | undefined,
  remotePath: string
): SlskdTransfer | undefined {
  for (const directory of transfers?.directories ?? []) {
    const match = directory.files?.find((f) => f.filename === remotePath);
    if (match) return match;
  }
  return undefined;
}
