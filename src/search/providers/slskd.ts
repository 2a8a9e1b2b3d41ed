/**
 * slskd search provider implementation.
 */

import { randomUUID } from "node:crypto";
import type { SlskdConfig } from "../../config/types.js";
import { logger } from "../../utils/logger.js";
import type { SearchProvider } from "../provider.js";
import type { CandidateResult, ProviderStatus } from "../types.js";
import { parseSearchResponses, parseSearchStatus, SlskdApi, type SlskdSearchState } from "./slskd-api.js";

/**
 * Searches the Soulseek network through a local slskd daemon.
 */
export class SlskdSearchProvider implements SearchProvider {
  private api: SlskdApi;

  constructor(config: Pick<SlskdConfig, "url" | "apiKey" | "requestTimeoutMs">) {
    this.api = new SlskdApi(config);
  }

  async submit(query: string, timeoutMs: number): Promise<string> {
    const id = randomUUID();
    const state = await this.api.request<SlskdSearchState>("POST", "/searches", {
      body: { id, searchText: query, searchTimeout: Math.max(1000, Math.round(timeoutMs)) },
    });
    return typeof state?.id === "string" ? state.id : id;
  }

  async status(sessionId: string): Promise<ProviderStatus> {
    const state = await this.api.request<SlskdSearchState>("GET", `/searches/${encodeURIComponent(sessionId)}`);
    return parseSearchStatus(state);
  }

  async stop(sessionId: string): Promise<void> {
    await this.api.request("PUT", `/searches/${encodeURIComponent(sessionId)}`, { allowStatus: [404] });
  }

  async delete(sessionId: string): Promise<void> {
    await this.api.request("DELETE", `/searches/${encodeURIComponent(sessionId)}`, { allowStatus: [404] });
  }

  async list(): Promise<string[]> {
    const states = await this.api.request<SlskdSearchState[]>("GET", "/searches");
    if (!Array.isArray(states)) return [];
    return states.flatMap((state) => (typeof state?.id === "string" ? [state.id] : []));
  }

  /**
   * Responses are read from the search state rather than the separate
   * responses endpoint, which can answer empty while files exist.
   */
  async results(sessionId: string): Promise<CandidateResult[]> {
    const state = await this.api.request<SlskdSearchState>(
      "GET",
      `/searches/${encodeURIComponent(sessionId)}?includeResponses=true`
    );
    const candidates = parseSearchResponses(state?.responses);
    logger.debug(`Parsed ${candidates.length} file(s) from ${state?.responses?.length ?? 0} response(s)`);
    return candidates;
  }

  getName(): string {
    return "slskd";
  }
}
