import { afterEach, describe, it, expect } from "vitest";
import { InlineAnalysisRunner, WorkerPoolAnalysisRunner, createAnalysisRunner } from "./runner.js";
import { defaultConfig } from "../config/defaults.js";

const audio = { samples: new Float32Array(2048), sampleRate: 48000 };

describe("createAnalysisRunner", () => {
  it("runs inline without workers", () => {
    expect(createAnalysisRunner(0)).toBeInstanceOf(InlineAnalysisRunner);
  });

  it("uses a worker pool otherwise", async () => {
    const runner = createAnalysisRunner(2);
    expect(runner).toBeInstanceOf(WorkerPoolAnalysisRunner);
    await runner.close();
  });
});

describe("InlineAnalysisRunner", () => {
  it("returns the analyzer's verdict", async () => {
    const verdict = await new InlineAnalysisRunner().run(audio, defaultConfig.analysis);

    expect(verdict.verdict).toBe("AUTHENTIC");
    expect(verdict.nyquistHz).toBe(24000);
  });

  it("rejects an already-cancelled job", async () => {
    const controller = new AbortController();
    controller.abort(new Error("cancelled"));

    await expect(new InlineAnalysisRunner().run(audio, defaultConfig.analysis, controller.signal)).rejects.toThrow(
      "cancelled"
    );
  });
});

const FAKE_WORKER = new URL("./test-fixtures/fake-analysis-worker.mjs", import.meta.url);

function pcm(length: number, sampleRate: number) {
  return { samples: new Float32Array(length), sampleRate };
}

/** "thread 3 job 2" -> { thread: "3", job: 2 } */
function origin(rationale: string): { thread: string; job: number } {
  const [, thread, , job] = rationale.split(" ");
  return { thread, job: Number(job) };
}

describe("WorkerPoolAnalysisRunner", () => {
  const runners: WorkerPoolAnalysisRunner[] = [];

  function pool(size: number): WorkerPoolAnalysisRunner {
    const runner = new WorkerPoolAnalysisRunner(size, FAKE_WORKER);
    runners.push(runner);
    return runner;
  }

  afterEach(async () => {
    await Promise.all(runners.splice(0).map((r) => r.close()));
  });

  it("returns the worker's verdict and leaves the caller's samples intact", async () => {
    const audio = pcm(1000, 44100);

    const verdict = await pool(2).run(audio, defaultConfig.analysis);

    expect(verdict.cutoffHz).toBe(1000);
    expect(verdict.nyquistHz).toBe(22050);
    expect(audio.samples.length).toBe(1000);
  });

  it("rejects with the error the worker reports", async () => {
    await expect(pool(1).run(pcm(10, 2), defaultConfig.analysis)).rejects.toThrow("bad input");
  });

  it("replaces a crashed worker for the next job", async () => {
    const runner = pool(1);

    await expect(runner.run(pcm(10, 1), defaultConfig.analysis)).rejects.toThrow("worker crashed");
    await expect(runner.run(pcm(10, 44100), defaultConfig.analysis)).resolves.toMatchObject({ cutoffHz: 10 });
  });

  it("queues jobs beyond the pool size on the same worker", async () => {
    const runner = pool(1);

    const verdicts = await Promise.all([1, 2, 3].map(() => runner.run(pcm(10, 3), defaultConfig.analysis)));

    const origins = verdicts.map((v) => origin(v.rationale));
    expect(origins.map((o) => o.job)).toEqual([1, 2, 3]);
    expect(new Set(origins.map((o) => o.thread)).size).toBe(1);
  });

  it("rejects a running job on abort and keeps serving", async () => {
    const runner = pool(1);
    const controller = new AbortController();
    setTimeout(() => controller.abort(new Error("cancelled")), 10);

    await expect(runner.run(pcm(10, 3), defaultConfig.analysis, controller.signal)).rejects.toThrow("cancelled");

    const next = await runner.run(pcm(20, 44100), defaultConfig.analysis);
    expect(next.cutoffHz).toBe(20);
    expect(origin(next.rationale).job).toBe(2);
  });

  it("never runs a job cancelled while queued", async () => {
    const runner = pool(1);
    const controller = new AbortController();

    const first = runner.run(pcm(10, 3), defaultConfig.analysis);
    const cancelled = runner.run(pcm(10, 44100), defaultConfig.analysis, controller.signal);
    const last = runner.run(pcm(30, 44100), defaultConfig.analysis);
    controller.abort(new Error("cancelled"));

    await expect(cancelled).rejects.toThrow("cancelled");
    await first;
    const verdict = await last;
    expect(verdict.cutoffHz).toBe(30);
    expect(origin(verdict.rationale).job).toBe(2);
  });

  it("refuses work once closed", async () => {
    const runner = new WorkerPoolAnalysisRunner(1);
    await runner.close();

    await expect(runner.run(audio, defaultConfig.analysis)).rejects.toThrow("Analysis runner is closed");
  });
});
