/**
 * Drives the tiered search strategy against a search provider.
 *
 * Each query runs as one provider session that is submitted, polled until it
 * completes or its share of the deadline runs out, stopped server-side when it
 * timed out, harvested, and always deleted. Tiers escalate only while the
 * filtered result set is empty.
 */

import type { MatchingConfig, SearchConfig } from "../config/types.js";
import { filterCandidates } from "../matching/filter.js";
import type { FilterOutcome } from "../matching/types.js";
import { sleep } from "../utils/async.js";
import { errorMessage } from "../utils/errors.js";
import { logger } from "../utils/logger.js";
import type { SearchProvider } from "./provider.js";
import { buildTierQueries } from "./queries.js";
import type { SessionRegistry } from "./session-registry.js";
import type { CandidateResult, ProviderStatus, SearchTier, SessionState, TierQuery, TrackReference } from "./types.js";

const STATE_ORDER: Record<SessionState, number> = {
  INIT: 0,
  SUBMITTED: 1,
  POLLING: 2,
  COMPLETED: 3,
  TIMED_OUT: 3,
  STOPPED: 4,
  COLLECTED: 5,
  CLEANED_UP: 6,
};

/**
 * State of one provider session. Transitions only move forward.
 */
export class SearchSession {
  private current: SessionState = "INIT";
  private readonly visited: SessionState[] = ["INIT"];
  id: string | undefined;

  constructor(
    readonly tier: SearchTier,
    readonly query: string,
    /** Epoch milliseconds */
    readonly deadline: number
  ) {}

  get state(): SessionState {
    return this.current;
  }

  get history(): readonly SessionState[] {
    return this.visited;
  }

  transition(next: SessionState): void {
    if (STATE_ORDER[next] <= STATE_ORDER[this.current]) {
      throw new Error(`Invalid search session transition ${this.current} -> ${next}`);
    }
    this.current = next;
    this.visited.push(next);
  }

  msRemaining(): number {
    return this.deadline - Date.now();
  }
}

/** What happened to one query */
export interface SearchAttempt {
  tier: SearchTier;
  query: string;
  sessionId?: string;
  states: readonly SessionState[];
  timedOut: boolean;
  rawCount: number;
  passingCount: number;
  error?: string;
}

export interface OrchestratorResult extends FilterOutcome {
  /** Tier and query of the last attempt made */
  tier?: SearchTier;
  query?: string;
  attempts: SearchAttempt[];
}

export interface OrchestratorOptions {
  search: SearchConfig;
  matching: MatchingConfig;
}

export interface RunOptions {
  /** Logical requester the provider sessions belong to */
  requester: string;
  /** Overrides the configured overall timeout */
  timeoutSecs?: number;
  signal?: AbortSignal;
}

interface PollOutcome {
  completed: boolean;
  error?: string;
}

export class SearchOrchestrator {
  constructor(
    private readonly provider: SearchProvider,
    private readonly registry: SessionRegistry,
    private readonly options: OrchestratorOptions
  ) {}

  /**
   * Search every tier in order until one yields a passing candidate or the
   * overall deadline is spent. No match is a normal outcome, not an error.
   *
   * @throws the signal's reason when cancelled, after the provider session was stopped and deleted
   */
  async run(reference: TrackReference, options: RunOptions): Promise<OrchestratorResult> {
    const queries = buildTierQueries(reference);
    const timeoutMs = (options.timeoutSecs ?? this.options.search.timeoutSecs) * 1000;
    const deadline = Date.now() + timeoutMs;

    const attempts: SearchAttempt[] = [];
    let outcome: FilterOutcome = { candidates: [], usedFallbackFormat: false, extensions: [] };
    let last: TierQuery | undefined;

    for (let i = 0; i < queries.length; i++) {
      options.signal?.throwIfAborted();

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        logger.warn(`Search deadline reached before ${queries[i].tier} query "${queries[i].query}"`);
        break;
      }

      // Time a fast tier leaves unused rolls over to the later ones
      const budget = Math.floor(remaining / (queries.length - i));
      last = queries[i];

      const { attempt, candidates } = await this.runAttempt(last, budget, options);
      outcome = this.filterForQuery(candidates, last, reference);
      attempt.passingCount = outcome.candidates.length;
      attempts.push(attempt);

      if (outcome.candidates.length > 0) {
        logger.info(
          `${last.tier} query "${last.query}": ${outcome.candidates.length} passing of ${candidates.length} result(s)`
        );
        break;
      }

      if (i < queries.length - 1) {
        logger.info(`No passing results for ${last.tier} query "${last.query}", trying ${queries[i + 1].tier}`);
      }
    }

    if (outcome.candidates.length === 0) {
      logger.info(`No match for ${reference.artist} - ${reference.title} after ${attempts.length} attempt(s)`);
    }

    return { ...outcome, tier: last?.tier, query: last?.query, attempts };
  }

  /**
   * One provider session from submission to cleanup. Provider failures are
   * reported as an empty result; cancellation is rethrown after cleanup.
   */
  private async runAttempt(
    tierQuery: TierQuery,
    budgetMs: number,
    options: RunOptions
  ): Promise<{ attempt: SearchAttempt; candidates: CandidateResult[] }> {
    const { requester, signal } = options;
    const session = new SearchSession(tierQuery.tier, tierQuery.query, Date.now() + budgetMs);
    const attempt: SearchAttempt = {
      tier: session.tier,
      query: session.query,
      states: session.history,
      timedOut: false,
      rawCount: 0,
      passingCount: 0,
    };

    await this.clearStaleSessions(requester);
    signal?.throwIfAborted();

    let sessionId: string;
    const submitted = this.registry.beginSubmission();
    try {
      sessionId = await this.provider.submit(session.query, budgetMs);
    } catch (e) {
      attempt.error = errorMessage(e);
      logger.warn(`${session.tier} search "${session.query}" could not be submitted: ${attempt.error}`);
      session.transition("CLEANED_UP");
      return { attempt, candidates: [] };
    } finally {
      submitted();
    }

    session.id = sessionId;
    attempt.sessionId = sessionId;
    this.registry.trackSession(requester, sessionId);
    session.transition("SUBMITTED");
    logger.info(`Search started: id=${sessionId}, ${session.tier} query "${session.query}"`);

    let candidates: CandidateResult[] = [];
    let cancelled = false;

    try {
      session.transition("POLLING");
      let poll: PollOutcome;
      try {
        poll = await this.pollUntilDone(sessionId, session, signal);
      } catch (e) {
        if (!signal?.aborted) throw e;
        cancelled = true;
        poll = { completed: false };
      }
      attempt.error = poll.error;

      if (poll.completed) {
        session.transition("COMPLETED");
      } else {
        session.transition("TIMED_OUT");
        attempt.timedOut = true;
        await this.stopSession(sessionId);
      }
      session.transition("STOPPED");

      if (!cancelled && poll.error === undefined) {
        candidates = await this.provider.results(sessionId);
        session.transition("COLLECTED");
        attempt.rawCount = candidates.length;
        logger.debug(`Collected ${candidates.length} result(s) from search ${sessionId}`);
      }
    } catch (e) {
      attempt.error = errorMessage(e);
      candidates = [];
      logger.warn(`Failed to collect results for search ${sessionId}: ${attempt.error}`);
    } finally {
      await this.deleteSession(requester, sessionId);
      session.transition("CLEANED_UP");
    }

    if (cancelled) {
      logger.info(`Search ${sessionId} cancelled`);
      throw signal?.reason;
    }

    return { attempt, candidates };
  }

  /**
   * Poll until the provider reports completion, the result count stops
   * changing, or the session's deadline passes.
   *
   * @returns completed=false on timeout; a provider failure ends polling with an error
   */
  private async pollUntilDone(
    sessionId: string,
    session: SearchSession,
    signal?: AbortSignal
  ): Promise<PollOutcome> {
    const { pollIntervalMs, stableAfterMs } = this.options.search;
    let lastCount = -1;
    let stableSince = Date.now();

    while (session.msRemaining() > 0) {
      await sleep(Math.min(pollIntervalMs, session.msRemaining()), signal);

      let status: ProviderStatus;
      try {
        status = await this.provider.status(sessionId);
      } catch (e) {
        const error = errorMessage(e);
        logger.warn(`Status check failed for search ${sessionId}: ${error}`);
        return { completed: false, error };
      }

      if (status.isComplete) {
        logger.info(`Search ${sessionId} completed with ${status.fileCount} file(s)`);
        return { completed: true };
      }

      if (status.fileCount !== lastCount) {
        lastCount = status.fileCount;
        stableSince = Date.now();
        logger.debug(`Search ${sessionId} progress: ${status.fileCount} file(s)`);
      } else if (status.fileCount > 0 && Date.now() - stableSince >= stableAfterMs) {
        logger.info(`Search ${sessionId} stabilized with ${status.fileCount} file(s)`);
        return { completed: true };
      }
    }

    logger.info(`Search ${sessionId} timed out, stopping and collecting partial results`);
    return { completed: false };
  }

  /**
   * Gate the results of one query. An artist-only query first narrows its
   * results to paths containing one of the title's keywords, and only falls
   * back to the whole catalog when none of those pass.
   */
  private filterForQuery(candidates: CandidateResult[], query: TierQuery, reference: TrackReference): FilterOutcome {
    const keywords = query.requiredKeywords?.map((k) => k.toLowerCase()) ?? [];
    if (keywords.length > 0) {
      const narrowed = candidates.filter((c) => {
        const path = c.filename.toLowerCase();
        return keywords.some((k) => path.includes(k));
      });
      const outcome = filterCandidates(narrowed, reference, this.options.matching);
      if (outcome.candidates.length > 0) return outcome;
      logger.debug(`None of ${narrowed.length} keyword match(es) passed, filtering all ${candidates.length} result(s)`);
    }
    return filterCandidates(candidates, reference, this.options.matching);
  }

  /**
   * Delete sessions a previous attempt or an earlier process left on the
   * provider. Sessions owned by another requester, or unknown ones while a
   * submission is in flight, are left alone.
   */
  private async clearStaleSessions(requester: string): Promise<void> {
    const stale = new Set(this.registry.staleSessions(requester));

    try {
      for (const sessionId of await this.provider.list()) {
        if (this.registry.isLeftover(sessionId)) stale.add(sessionId);
      }
    } catch (e) {
      logger.warn(`Could not list searches on ${this.provider.getName()}: ${errorMessage(e)}`);
    }

    if (stale.size === 0) return;

    logger.debug(`Clearing ${stale.size} stale search session(s) for ${requester}`);
    for (const sessionId of stale) {
      await this.deleteSession(requester, sessionId);
    }
  }

  /** Failures are logged; the caller still harvests what the provider has */
  private async stopSession(sessionId: string): Promise<void> {
    try {
      await this.provider.stop(sessionId);
      logger.debug(`Stopped search ${sessionId}`);
    } catch (e) {
      logger.warn(`Failed to stop search ${sessionId}: ${errorMessage(e)}`);
    }
  }

  /** Failures are logged and the session stays tracked for the next stale-session sweep */
  private async deleteSession(requester: string, sessionId: string): Promise<void> {
    try {
      await this.provider.delete(sessionId);
      this.registry.untrackSession(requester, sessionId);
      logger.debug(`Deleted search ${sessionId}`);
    } catch (e) {
      logger.warn(`Failed to delete search ${sessionId}: ${errorMessage(e)}`);
    }
  }
}
