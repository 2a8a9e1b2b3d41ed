/**
 * Download collaborator: enqueues a chosen candidate on slskd and waits for
 * the transfer to finish.
 */

import type { SlskdConfig } from "../config/types.js";
import { remoteBasename } from "../search/candidate.js";
import { findTransfer, SlskdApi, type SlskdUserTransfers } from "../search/providers/slskd-api.js";
import type { CandidateResult } from "../search/types.js";
import { sleep } from "../utils/async.js";
import { errorMessage } from "../utils/errors.js";
import { logger } from "../utils/logger.js";
import type { DownloadStatus, TransferOutcome, WaitOptions } from "./types.js";

const FAILED_STATES = ["errored", "rejected", "timedout", "cancelled"];
const COMPLETED_STATES = ["completed", "succeeded"];

/**
 * Classify a raw slskd state. slskd reports compound states such as
 * "Completed, Errored", so failure markers are checked first.
 */
export function transferOutcome(state: string): TransferOutcome {
  const lower = state.toLowerCase();
  if (FAILED_STATES.some((s) => lower.includes(s))) return "failed";
  if (COMPLETED_STATES.some((s) => lower.includes(s))) return "completed";
  return "active";
}

type DownloadTarget = Pick<CandidateResult, "username" | "filename" | "size">;

export class SlskdDownloader {
  private api: SlskdApi;

  constructor(config: Pick<SlskdConfig, "url" | "apiKey" | "requestTimeoutMs">) {
    this.api = new SlskdApi(config);
  }

  /** @throws ProviderError when slskd refuses the request */
  async enqueue(target: DownloadTarget): Promise<void> {
    await this.api.request("POST", `/transfers/downloads/${encodeURIComponent(target.username)}`, {
      body: [{ filename: target.filename, size: target.size }],
    });
    logger.info(`Enqueued download: ${remoteBasename(target.filename)} from ${target.username}`);
  }

  /** Current transfer state, or undefined while slskd does not list it yet */
  async status(target: DownloadTarget): Promise<DownloadStatus | undefined> {
    const transfers = await this.api.request<SlskdUserTransfers>(
      "GET",
      `/transfers/downloads/${encodeURIComponent(target.username)}`,
      { allowStatus: [404] }
    );
    const transfer = findTransfer(transfers, target.filename);
    if (!transfer) return undefined;

    const state = typeof transfer.state === "string" ? transfer.state : "Unknown";
    return {
      username: target.username,
      filename: target.filename,
      state,
      outcome: transferOutcome(state),
      percentComplete: transfer.percentComplete ?? 0,
      bytesTransferred: transfer.bytesTransferred ?? 0,
      size: transfer.size ?? target.size,
      averageSpeed: transfer.averageSpeed ?? 0,
    };
  }

  /**
   * Poll until the transfer completes, fails or the deadline passes.
   * Status check failures are logged and polling continues.
   *
   * @returns The final status, or undefined on timeout
   */
  async waitForDownload(target: DownloadTarget, options: WaitOptions): Promise<DownloadStatus | undefined> {
    const name = remoteBasename(target.filename);
    const deadline = Date.now() + options.timeoutSecs * 1000;

    while (Date.now() < deadline) {
      await sleep(Math.min(options.pollIntervalMs, deadline - Date.now()), options.signal);

      let status: DownloadStatus | undefined;
      try {
        status = await this.status(target);
      } catch (e) {
        logger.warn(`Download status check failed for ${name}: ${errorMessage(e)}`);
        continue;
      }

      if (!status) {
        logger.debug(`No status yet for ${name}`);
        continue;
      }

      if (status.outcome === "completed") {
        logger.success(`Download complete: ${name}`);
        return status;
      }
      if (status.outcome === "failed") {
        logger.warn(`Download failed (${status.state}): ${name}`);
        return status;
      }

      logger.debug(`Download ${status.percentComplete.toFixed(0)}%: ${name}`);
    }

    logger.warn(`Download timed out after ${options.timeoutSecs}s: ${name}`);
    return undefined;
  }
}
