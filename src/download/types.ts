/** How a transfer ended, or that it is still running */
export type TransferOutcome = "completed" | "failed" | "active";

export interface DownloadStatus {
  username: string;
  /** Remote path as enqueued */
  filename: string;
  /** Raw slskd state, e.g. "Completed, Succeeded" or "InProgress" */
  state: string;
  outcome: TransferOutcome;
  percentComplete: number;
  bytesTransferred: number;
  size: number;
  /** Bytes per second */
  averageSpeed: number;
}

export interface WaitOptions {
  timeoutSecs: number;
  pollIntervalMs: number;
  signal?: AbortSignal;
}
