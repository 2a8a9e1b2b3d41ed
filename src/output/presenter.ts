/**
 * Terminal presentation of ranked candidates and verdicts, plus the
 * interactive pick and keep prompts.
 */

import * as readline from "node:readline/promises";
import { stdin, stdout } from "node:process";
import chalk from "chalk";
import type { AuthenticityVerdict, VerdictKind } from "../authenticity/types.js";
import type { ScoredCandidate } from "../matching/types.js";
import { formatDuration, formatQuality, formatSizeMb, remoteBasename } from "../search/candidate.js";
import type { TrackReference } from "../search/types.js";

const VERDICT_COLORS: Record<VerdictKind, (text: string) => string> = {
  AUTHENTIC: chalk.green,
  WARNING: chalk.yellow,
  SUSPICIOUS: chalk.hex("#ff8800"),
  FAKE: chalk.red,
  UNDETERMINED: chalk.gray,
};

export function formatReference(reference: TrackReference): string {
  const extras = [reference.album, reference.year].filter((v): v is string => Boolean(v));
  const suffix = extras.length > 0 ? ` [${extras.join(", ")}]` : "";
  return `${reference.artist} - ${reference.title} (${formatDuration(reference.durationSecs)})${suffix}`;
}

/**
 * e.g. "1. 01 - Song.flac (3:42, 16bit/44.1kHz, 25.3MB) from peer [score 91.5]"
 */
export function formatCandidateLine(scored: ScoredCandidate): string {
  const c = scored.candidate;
  return (
    `${scored.rank}. ${remoteBasename(c.filename)} ` +
    `(${formatDuration(c.durationSecs)}, ${formatQuality(c)}, ${formatSizeMb(c.size)}) ` +
    `from ${c.username} [score ${scored.scores.total.toFixed(1)}]`
  );
}

export function formatScoreBreakdown(scored: ScoredCandidate): string {
  const s = scored.scores;
  const slot = scored.candidate.hasFreeSlot ? "free slot" : "no free slot";
  return (
    `duration ${s.duration.toFixed(1)}/40 (${scored.durationMatch}), ` +
    `quality ${s.quality.toFixed(1)}/25, ` +
    `reliability ${s.reliability.toFixed(1)}/20 (${slot}, queue ${scored.candidate.queueLength}), ` +
    `filename ${s.filename.toFixed(1)}/15`
  );
}

export function presentCandidates(candidates: ScoredCandidate[], usedFallbackFormat: boolean): void {
  if (candidates.length === 0) {
    console.log("\nNo matching files found.");
    return;
  }

  console.log(`\n${"=".repeat(70)}`);
  console.log(`Top ${candidates.length} candidate(s)${usedFallbackFormat ? " (no lossless match, showing fallback format)" : ""}:`);
  console.log("=".repeat(70));
  for (const scored of candidates) {
    console.log(formatCandidateLine(scored));
    console.log(chalk.gray(`   ${formatScoreBreakdown(scored)}`));
  }
  console.log("");
}

export function formatVerdict(verdict: AuthenticityVerdict): string {
  return VERDICT_COLORS[verdict.verdict](`${verdict.verdict}: ${verdict.display}`);
}

export function presentVerdict(verdict: AuthenticityVerdict, filePath?: string): void {
  if (filePath) console.log(`\nFile: ${filePath}`);
  console.log(formatVerdict(verdict));
  console.log(`  ${verdict.rationale}`);
  if (verdict.verdict !== "UNDETERMINED") {
    console.log(
      chalk.gray(
        `  sample rate ${verdict.sampleRate} Hz, cutoff ${verdict.cutoffHz} Hz of ${verdict.nyquistHz} Hz, ` +
          `roll-off ${verdict.rolloffDbPerKhz} dB/kHz, ${verdict.aboveCutoffDb} dB above cutoff`
      )
    );
  }
}

/**
 * Parse a pick answer against the number of candidates.
 * @returns 1-based rank, null to cancel, undefined for an invalid answer
 */
export function parsePick(answer: string, count: number): number | null | undefined {
  const trimmed = answer.trim().toLowerCase();
  if (trimmed === "" || trimmed === "n" || trimmed === "q" || trimmed === "no") return null;
  if (!/^\d+$/.test(trimmed)) return undefined;
  const num = parseInt(trimmed, 10);
  return num >= 1 && num <= count ? num : undefined;
}

/** Ask which candidate to download; undefined when the user declines */
export async function promptForPick(candidates: ScoredCandidate[]): Promise<ScoredCandidate | undefined> {
  const rl = readline.createInterface({ input: stdin, output: stdout });
  try {
    while (true) {
      const answer = await rl.question(`Download which file? [1-${candidates.length}, n to cancel]: `);
      const pick = parsePick(answer, candidates.length);
      if (pick === null) return undefined;
      if (pick !== undefined) return candidates[pick - 1];
      console.log("Invalid selection.");
    }
  } finally {
    rl.close();
  }
}

/** Ask whether to keep a verified download */
export async function confirmKeep(verdict: AuthenticityVerdict): Promise<boolean> {
  const rl = readline.createInterface({ input: stdin, output: stdout });
  try {
    const defaultYes = verdict.verdict === "AUTHENTIC";
    const answer = await rl.question(`Keep this file? [${defaultYes ? "Y/n" : "y/N"}]: `);
    const trimmed = answer.trim().toLowerCase();
    if (trimmed === "") return defaultYes;
    return trimmed === "y" || trimmed === "yes";
  } finally {
    rl.close();
  }
}
