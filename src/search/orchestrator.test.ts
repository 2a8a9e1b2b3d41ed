import { describe, it, expect } from "vitest";
import { SearchOrchestrator, SearchSession } from "./orchestrator.js";
import { SessionRegistry } from "./session-registry.js";
import type { SearchProvider } from "./provider.js";
import type { CandidateResult, ProviderStatus, TrackReference } from "./types.js";
import { defaultConfig } from "../config/defaults.js";
import type { SearchConfig } from "../config/types.js";

const reference: TrackReference = { artist: "Test Artist", title: "Night Drive", durationSecs: 200 };

function candidate(filename: string, durationSecs: number): CandidateResult {
  return {
    username: "peer",
    filename,
    size: 30_000_000,
    extension: "flac",
    bitDepth: 16,
    sampleRate: 44100,
    durationSecs,
    hasFreeSlot: true,
    uploadSpeed: 1_000_000,
    queueLength: 0,
  };
}

const passing = candidate("Music\\Test Artist\\Night Drive.flac", 200);
const tooLong = candidate("Music\\Test Artist\\Night Drive (Extended).flac", 400);

interface Script {
  /** "complete" finishes on the first poll; "running" keeps growing; "stable" stays at one count */
  progress?: "complete" | "running" | "stable";
  results?: CandidateResult[];
  submitError?: boolean;
  statusError?: boolean;
  resultsError?: boolean;
  /** Number of delete calls that fail before one succeeds */
  deleteFailures?: number;
}

class FakeProvider implements SearchProvider {
  calls: string[] = [];
  /** Sessions the provider still holds */
  live = new Set<string>();
  listError = false;
  onList: () => void = () => {};
  private sessions = new Map<string, Script>();
  private polls = new Map<string, number>();
  private deleteFailures = new Map<string, number>();
  private nextId = 1;

  constructor(private readonly scripts: Record<string, Script>) {}

  async submit(query: string): Promise<string> {
    this.calls.push(`submit:${query}`);
    const script = this.scripts[query] ?? {};
    if (script.submitError) throw new Error("submit refused");
    const id = `s${this.nextId++}`;
    this.sessions.set(id, script);
    this.live.add(id);
    this.deleteFailures.set(id, script.deleteFailures ?? 0);
    return id;
  }

  async status(id: string): Promise<ProviderStatus> {
    this.calls.push(`status:${id}`);
    const script = this.script(id);
    if (script.statusError) throw new Error("status unavailable");
    const poll = (this.polls.get(id) ?? 0) + 1;
    this.polls.set(id, poll);

    const progress = script.progress ?? "complete";
    return {
      isComplete: progress === "complete",
      fileCount: progress === "running" ? poll : 3,
      responseCount: 1,
      state: progress === "complete" ? "Completed" : "InProgress",
    };
  }

  async stop(id: string): Promise<void> {
    this.calls.push(`stop:${id}`);
  }

  async delete(id: string): Promise<void> {
    this.calls.push(`delete:${id}`);
    const remaining = this.deleteFailures.get(id) ?? 0;
    if (remaining > 0) {
      this.deleteFailures.set(id, remaining - 1);
      throw new Error("delete failed");
    }
    this.live.delete(id);
  }

  async list(): Promise<string[]> {
    this.calls.push("list");
    this.onList();
    if (this.listError) throw new Error("list unavailable");
    return [...this.live];
  }

  async results(id: string): Promise<CandidateResult[]> {
    this.calls.push(`results:${id}`);
    const script = this.script(id);
    if (script.resultsError) throw new Error("results unavailable");
    return script.results ?? [];
  }

  getName(): string {
    return "fake";
  }

  callsFor(id: string): string[] {
    return this.calls.filter((c) => c.endsWith(`:${id}`) && !c.startsWith("status:"));
  }

  private script(id: string): Script {
    const script = this.sessions.get(id);
    if (!script) throw new Error(`unknown session ${id}`);
    return script;
  }
}

const FULL = "Test Artist Night Drive";
const TITLE_ONLY = "Night Drive";

function setup(
  scripts: Record<string, Script>,
  search: Partial<SearchConfig> = {},
  provider = new FakeProvider(scripts)
) {
  const registry = new SessionRegistry();
  const orchestrator = new SearchOrchestrator(provider, registry, {
    search: { timeoutSecs: 2, pollIntervalMs: 5, stableAfterMs: 1000, ...search },
    matching: defaultConfig.matching,
  });
  return { provider, registry, orchestrator };
}

describe("SearchSession", () => {
  it("moves forward through the lifecycle", () => {
    const session = new SearchSession("FULL", "q", Date.now() + 1000);
    for (const state of ["SUBMITTED", "POLLING", "TIMED_OUT", "STOPPED", "COLLECTED", "CLEANED_UP"] as const) {
      session.transition(state);
    }
    expect(session.state).toBe("CLEANED_UP");
    expect(session.history).toEqual(["INIT", "SUBMITTED", "POLLING", "TIMED_OUT", "STOPPED", "COLLECTED", "CLEANED_UP"]);
  });

  it("rejects backward and sideways transitions", () => {
    const session = new SearchSession("FULL", "q", Date.now() + 1000);
    session.transition("SUBMITTED");
    session.transition("POLLING");
    session.transition("COMPLETED");

    expect(() => session.transition("POLLING")).toThrow("Invalid search session transition COMPLETED -> POLLING");
    expect(() => session.transition("TIMED_OUT")).toThrow("Invalid search session transition COMPLETED -> TIMED_OUT");
  });
});

describe("SearchOrchestrator", () => {
  it("stops at the first tier with passing candidates", async () => {
    const { provider, orchestrator } = setup({ [FULL]: { results: [passing] } });

    const result = await orchestrator.run(reference, { requester: "alice" });

    expect(result.tier).toBe("FULL");
    expect(result.candidates.map((c) => c.candidate)).toEqual([passing]);
    expect(provider.calls.filter((c) => c.startsWith("submit:"))).toEqual([`submit:${FULL}`]);
    expect(provider.callsFor("s1")).toEqual(["results:s1", "delete:s1"]);
  });

  it("escalates to the title-only tier when the first tier has no passing candidates", async () => {
    const { provider, orchestrator } = setup({
      [FULL]: { results: [tooLong] },
      [TITLE_ONLY]: { results: [passing] },
    });

    const result = await orchestrator.run(reference, { requester: "alice" });

    expect(result.tier).toBe("TITLE_ONLY");
    expect(result.query).toBe(TITLE_ONLY);
    expect(result.candidates).toHaveLength(1);
    expect(result.attempts.map((a) => [a.tier, a.rawCount, a.passingCount])).toEqual([
      ["FULL", 1, 0],
      ["TITLE_ONLY", 1, 1],
    ]);
    expect(provider.calls.filter((c) => c.startsWith("delete:"))).toEqual(["delete:s1", "delete:s2"]);
  });

  it("on timeout stops the search, harvests partial results and deletes the session", async () => {
    const { provider, registry, orchestrator } = setup({ [FULL]: { progress: "running", results: [passing] } });

    const result = await orchestrator.run(reference, { requester: "alice", timeoutSecs: 0.1 });

    expect(provider.callsFor("s1")).toEqual(["stop:s1", "results:s1", "delete:s1"]);
    expect(result.candidates).toHaveLength(1);
    expect(result.attempts).toHaveLength(1);
    expect(result.attempts[0].timedOut).toBe(true);
    expect(result.attempts[0].states).toEqual([
      "INIT",
      "SUBMITTED",
      "POLLING",
      "TIMED_OUT",
      "STOPPED",
      "COLLECTED",
      "CLEANED_UP",
    ]);
    expect(registry.size()).toBe(0);
  });

  it("does not stop a search that completed", async () => {
    const { provider, orchestrator } = setup({ [FULL]: { results: [passing] } });

    const result = await orchestrator.run(reference, { requester: "alice" });

    expect(provider.calls).not.toContain("stop:s1");
    expect(result.attempts[0].states).toEqual(["INIT", "SUBMITTED", "POLLING", "COMPLETED", "STOPPED", "COLLECTED", "CLEANED_UP"]);
  });

  it("treats a stable file count as completion", async () => {
    const { provider, orchestrator } = setup(
      { [FULL]: { progress: "stable", results: [passing] } },
      { stableAfterMs: 20 }
    );

    const result = await orchestrator.run(reference, { requester: "alice" });

    expect(result.attempts[0].timedOut).toBe(false);
    expect(provider.callsFor("s1")).toEqual(["results:s1", "delete:s1"]);
  });

  it("treats a failed submission as an empty tier", async () => {
    const { provider, orchestrator } = setup({
      [FULL]: { submitError: true },
      [TITLE_ONLY]: { results: [passing] },
    });

    const result = await orchestrator.run(reference, { requester: "alice" });

    expect(result.tier).toBe("TITLE_ONLY");
    expect(result.attempts[0].error).toBe("submit refused");
    expect(provider.calls).toContain(`submit:${TITLE_ONLY}`);
  });

  it("stops and deletes a session whose status checks fail, then escalates", async () => {
    const { provider, orchestrator } = setup({
      [FULL]: { statusError: true, results: [passing] },
      [TITLE_ONLY]: { results: [passing] },
    });

    const result = await orchestrator.run(reference, { requester: "alice" });

    expect(provider.callsFor("s1")).toEqual(["stop:s1", "delete:s1"]);
    expect(result.attempts[0].error).toBe("status unavailable");
    expect(result.tier).toBe("TITLE_ONLY");
  });

  it("deletes the session even when harvesting fails", async () => {
    const { provider, orchestrator } = setup({
      [FULL]: { resultsError: true },
      [TITLE_ONLY]: { results: [passing] },
    });

    const result = await orchestrator.run(reference, { requester: "alice" });

    expect(provider.callsFor("s1")).toEqual(["results:s1", "delete:s1"]);
    expect(result.attempts[0].error).toBe("results unavailable");
    expect(result.tier).toBe("TITLE_ONLY");
  });

  it("clears a session left undeleted before the next submission", async () => {
    const { provider, registry, orchestrator } = setup({
      [FULL]: { results: [tooLong], deleteFailures: 1 },
      [TITLE_ONLY]: { results: [passing] },
    });

    await orchestrator.run(reference, { requester: "alice" });

    const relevant = provider.calls.filter((c) => !c.startsWith("status:"));
    expect(relevant).toEqual([
      "list",
      `submit:${FULL}`,
      "results:s1",
      "delete:s1",
      "list",
      "delete:s1",
      `submit:${TITLE_ONLY}`,
      "results:s2",
      "delete:s2",
    ]);
    expect(registry.staleSessions("alice")).toEqual([]);
  });

  it("clears a session an earlier process left on the provider", async () => {
    const provider = new FakeProvider({ [FULL]: { results: [passing], deleteFailures: 1 } });
    const first = setup({}, {}, provider);
    await first.orchestrator.run(reference, { requester: "alice" });
    expect(provider.live).toEqual(new Set(["s1"]));

    const second = setup({}, {}, provider);
    const before = provider.calls.length;
    await second.orchestrator.run(reference, { requester: "alice" });

    expect(provider.calls.slice(before).filter((c) => !c.startsWith("status:"))).toEqual([
      "list",
      "delete:s1",
      `submit:${FULL}`,
      "results:s2",
      "delete:s2",
    ]);
    expect(provider.live.size).toBe(0);
  });

  it("leaves sessions tracked for another requester", async () => {
    const { provider, registry, orchestrator } = setup({ [FULL]: { results: [passing] } });
    provider.live.add("bob-1");
    registry.trackSession("bob", "bob-1");

    await orchestrator.run(reference, { requester: "alice" });

    expect(provider.calls).not.toContain("delete:bob-1");
    expect(registry.staleSessions("bob")).toEqual(["bob-1"]);
  });

  it("leaves unknown sessions alone while another submission is in flight", async () => {
    const { provider, registry, orchestrator } = setup({ [FULL]: { results: [passing] } });
    provider.live.add("pending");
    const settled = registry.beginSubmission();

    await orchestrator.run(reference, { requester: "alice" });
    expect(provider.calls).not.toContain("delete:pending");

    settled();
    await orchestrator.run(reference, { requester: "alice" });
    expect(provider.calls).toContain("delete:pending");
  });

  it("still searches when the provider cannot list its sessions", async () => {
    const { provider, orchestrator } = setup({ [FULL]: { results: [passing] } });
    provider.listError = true;

    const result = await orchestrator.run(reference, { requester: "alice" });

    expect(result.candidates).toHaveLength(1);
    expect(provider.calls.filter((c) => !c.startsWith("status:"))).toEqual([
      "list",
      `submit:${FULL}`,
      "results:s1",
      "delete:s1",
    ]);
  });

  it("does not submit when cancelled while clearing stale sessions", async () => {
    const { provider, registry, orchestrator } = setup({ [FULL]: { results: [passing] } });
    const controller = new AbortController();
    provider.onList = () => controller.abort(new Error("user cancelled"));

    await expect(orchestrator.run(reference, { requester: "alice", signal: controller.signal })).rejects.toThrow(
      "user cancelled"
    );
    expect(provider.calls).toEqual(["list"]);
    expect(registry.size()).toBe(0);
  });

  it("narrows an artist-only search to files carrying the title's keywords", async () => {
    const otherSong = candidate("Music\\Test Artist\\Other Song.flac", 200);
    const { orchestrator } = setup({ "Test Artist": { results: [otherSong, passing] } });

    const result = await orchestrator.run(reference, { requester: "alice" });

    expect(result.tier).toBe("KEYWORD_REDUCED");
    expect(result.query).toBe("Test Artist");
    expect(result.candidates.map((c) => c.candidate)).toEqual([passing]);
  });

  it("keeps the whole artist catalog when no file carries a title keyword", async () => {
    const otherSong = candidate("Music\\Test Artist\\Other Song.flac", 200);
    const { orchestrator } = setup({ "Test Artist": { results: [otherSong] } });

    const result = await orchestrator.run(reference, { requester: "alice" });

    expect(result.candidates.map((c) => c.candidate)).toEqual([otherSong]);
  });

  it("returns an empty result when every tier comes up empty", async () => {
    const { provider, orchestrator } = setup({});

    const result = await orchestrator.run(reference, { requester: "alice" });

    expect(result.candidates).toEqual([]);
    expect(result.tier).toBe("KEYWORD_REDUCED");
    expect(result.query).toBe("Test Artist");
    expect(result.attempts.map((a) => a.tier)).toEqual(["FULL", "TITLE_ONLY", "KEYWORD_REDUCED"]);
    expect(provider.calls.filter((c) => c.startsWith("delete:"))).toEqual(["delete:s1", "delete:s2", "delete:s3"]);
  });

  it("on cancellation stops and deletes the session before rejecting", async () => {
    const { provider, registry, orchestrator } = setup({ [FULL]: { progress: "running", results: [passing] } });
    const controller = new AbortController();
    setTimeout(() => controller.abort(new Error("user cancelled")), 30);

    await expect(orchestrator.run(reference, { requester: "alice", signal: controller.signal })).rejects.toThrow(
      "user cancelled"
    );

    expect(provider.callsFor("s1")).toEqual(["stop:s1", "delete:s1"]);
    expect(provider.calls.filter((c) => c.startsWith("submit:"))).toHaveLength(1);
    expect(registry.size()).toBe(0);
  });

  it("does not submit when already cancelled", async () => {
    const { provider, orchestrator } = setup({ [FULL]: { results: [passing] } });
    const controller = new AbortController();
    controller.abort(new Error("user cancelled"));

    await expect(orchestrator.run(reference, { requester: "alice", signal: controller.signal })).rejects.toThrow(
      "user cancelled"
    );
    expect(provider.calls).toEqual([]);
  });
});
