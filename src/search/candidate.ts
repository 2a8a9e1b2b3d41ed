import type { CandidateResult } from "./types.js";

/**
 * Last segment of a peer's remote path. Peers use backslashes; forward
 * slashes are accepted too.
 */
export function remoteBasename(remotePath: string): string {
  const segments = remotePath.split(/[\\/]/);
  return segments[segments.length - 1] ?? remotePath;
}

/** Lowercase extension without the dot, or "" */
export function extensionOf(remotePath: string): string {
  const base = remoteBasename(remotePath);
  const dot = base.lastIndexOf(".");
  return dot > 0 ? base.slice(dot + 1).toLowerCase() : "";
}

/** m:ss, or ??:?? when unknown */
export function formatDuration(secs: number | undefined): string {
  if (secs === undefined || secs <= 0) return "??:??";
  const whole = Math.round(secs);
  const mins = Math.floor(whole / 60);
  const rest = whole % 60;
  return `${mins}:${rest.toString().padStart(2, "0")}`;
}

/** e.g. "16bit/44.1kHz, 1411kbps"; the extension in upper case when nothing is declared */
export function formatQuality(candidate: CandidateResult): string {
  const parts: string[] = [];
  if (candidate.bitDepth && candidate.sampleRate) {
    parts.push(`${candidate.bitDepth}bit/${(candidate.sampleRate / 1000).toFixed(1)}kHz`);
  }
  if (candidate.bitRate) {
    parts.push(`${candidate.bitRate}kbps`);
  }
  return parts.length > 0 ? parts.join(", ") : candidate.extension.toUpperCase();
}

export function formatSizeMb(bytes: number): string {
  return `${(bytes / (1024 * 1024)).toFixed(1)}MB`;
}
