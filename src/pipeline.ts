/**
 * Sequences search, filtering and scoring into a ranked list, and hands an
 * acquired file to the authenticity verifier.
 */

import type { AuthenticityVerifier } from "./authenticity/verifier.js";
import type { AuthenticityVerdict, DecodedAudio } from "./authenticity/types.js";
import type { MatchingConfig } from "./config/types.js";
import { rankCandidates } from "./matching/scorer.js";
import type { ScoredCandidate } from "./matching/types.js";
import type { OrchestratorResult, SearchOrchestrator } from "./search/orchestrator.js";
import type { SessionRegistry } from "./search/session-registry.js";
import type { TrackReference } from "./search/types.js";

export interface FindOptions {
  requester: string;
  timeoutSecs?: number;
  signal?: AbortSignal;
}

export interface VerifyOptions {
  /** When set, the requester's download slot is held during verification */
  requester?: string;
  signal?: AbortSignal;
}

export interface CandidateList {
  /** Ranked, at most `matching.maxResults` entries; empty when nothing matched */
  candidates: ScoredCandidate[];
  search: OrchestratorResult;
}

export class MatchPipeline {
  constructor(
    private readonly orchestrator: SearchOrchestrator,
    private readonly verifier: AuthenticityVerifier,
    private readonly registry: SessionRegistry,
    private readonly matching: MatchingConfig
  ) {}

  /**
   * @throws RequesterBusyError if the requester already has a search running
   */
  async findCandidates(reference: TrackReference, options: FindOptions): Promise<CandidateList> {
    const lease = this.registry.acquire(options.requester, "search");
    try {
      const search = await this.orchestrator.run(reference, options);
      const candidates = rankCandidates(search.candidates, reference, this.matching);
      return { candidates, search };
    } finally {
      lease.release();
    }
  }

  /**
   * Decode and analyze an acquired file. Unreadable audio yields UNDETERMINED.
   *
   * @throws RequesterBusyError if the requester already has a download or verification running
   */
  async verify(audio: string | DecodedAudio, options: VerifyOptions = {}): Promise<AuthenticityVerdict> {
    const lease = options.requester ? this.registry.acquire(options.requester, "download") : undefined;
    try {
      return await this.verifier.verify(audio, options.signal);
    } finally {
      lease?.release();
    }
  }
}
