/**
 * Search provider interface.
 * The orchestrator drives any keyword file-search backend through it.
 */

import type { CandidateResult, ProviderStatus } from "./types.js";

export interface SearchProvider {
  /**
   * Start a search.
   *
   * @param query Keywords to search for
   * @param timeoutMs Server-side search lifetime
   * @returns Provider session id
   */
  submit(query: string, timeoutMs: number): Promise<string>;

  /** Current progress of a session */
  status(sessionId: string): Promise<ProviderStatus>;

  /** Ask the provider to stop searching. Results gathered so far stay available. */
  stop(sessionId: string): Promise<void>;

  /** Release the session on the provider. Deleting an unknown session is not an error. */
  delete(sessionId: string): Promise<void>;

  /** Ids of every session the provider currently holds, whoever submitted it */
  list(): Promise<string[]>;

  /** Files found so far */
  results(sessionId: string): Promise<CandidateResult[]>;

  /**
   * Get the name of this provider (e.g., "slskd").
   */
  getName(): string;
}
