/**
 * Where spectral analysis runs: on the calling thread, or on a pool of
 * worker threads so a long PSD never stalls the event loop.
 */

import { Worker } from "node:worker_threads";
import PQueue from "p-queue";
import { abandonOnAbort } from "../utils/async.js";
import { logger } from "../utils/logger.js";
import { analyze } from "./analyzer.js";
import { isAnalysisReply, type AnalysisJob, type AnalysisOptions, type AuthenticityVerdict, type DecodedAudio } from "./types.js";

export interface AnalysisRunner {
  /**
   * Analyze decoded audio. Aborting rejects with the signal's reason and
   * discards the eventual result.
   */
  run(audio: DecodedAudio, options: AnalysisOptions, signal?: AbortSignal): Promise<AuthenticityVerdict>;

  /** Release threads; pending jobs are rejected */
  close(): Promise<void>;
}

export class InlineAnalysisRunner implements AnalysisRunner {
  run(audio: DecodedAudio, options: AnalysisOptions, signal?: AbortSignal): Promise<AuthenticityVerdict> {
    if (signal?.aborted) return Promise.reject(signal.reason);
    const work = Promise.resolve().then(() => analyze(audio.samples, audio.sampleRate, options));
    return abandonOnAbort(work, signal);
  }

  async close(): Promise<void> {}
}

interface RunningJob {
  id: number;
  resolve: (verdict: AuthenticityVerdict) => void;
  reject: (error: unknown) => void;
}

interface PoolSlot {
  worker: Worker;
  current?: RunningJob;
}

const WORKER_URL = new URL("./analysis-worker.js", import.meta.url);

/**
 * Fixed-size worker pool. Workers start on first use; the queue hands each
 * one a single job at a time.
 */
export class WorkerPoolAnalysisRunner implements AnalysisRunner {
  private readonly queue: PQueue;
  private slots: PoolSlot[] = [];
  private nextId = 1;
  private closed = false;

  constructor(
    private readonly size: number,
    private readonly workerUrl: URL = WORKER_URL
  ) {
    this.queue = new PQueue({ concurrency: size });
  }

  run(audio: DecodedAudio, options: AnalysisOptions, signal?: AbortSignal): Promise<AuthenticityVerdict> {
    if (this.closed) return Promise.reject(new Error("Analysis runner is closed"));
    if (signal?.aborted) return Promise.reject(signal.reason);

    // The copy is transferred, leaving the caller's buffer intact
    const buffer = new ArrayBuffer(audio.samples.length * Float32Array.BYTES_PER_ELEMENT);
    const samples = new Float32Array(buffer);
    samples.set(audio.samples);
    const job: AnalysisJob = { id: this.nextId++, samples, sampleRate: audio.sampleRate, options };

    // The slot stays taken until the worker answers, even for an abandoned job
    const work = this.queue.add(
      async () => {
        signal?.throwIfAborted();
        if (this.closed) throw new Error("Analysis runner closed");
        return this.runOnWorker(job, buffer);
      },
      { throwOnTimeout: true }
    );
    return abandonOnAbort(work, signal);
  }

  async close(): Promise<void> {
    this.closed = true;
    const error = new Error("Analysis runner closed");
    const slots = this.slots.splice(0);
    for (const slot of slots) slot.current?.reject(error);
    await Promise.all(slots.map((slot) => slot.worker.terminate()));
  }

  private runOnWorker(job: AnalysisJob, buffer: ArrayBuffer): Promise<AuthenticityVerdict> {
    const slot = this.slots.find((s) => s.current === undefined) ?? this.spawn();
    return new Promise<AuthenticityVerdict>((resolve, reject) => {
      slot.current = { id: job.id, resolve, reject };
      slot.worker.postMessage(job, [buffer]);
    });
  }

  private spawn(): PoolSlot {
    const slot: PoolSlot = { worker: new Worker(this.workerUrl) };

    slot.worker.on("message", (message: unknown) => {
      const running = slot.current;
      slot.current = undefined;
      if (!running) return;

      if (!isAnalysisReply(message) || message.id !== running.id) {
        running.reject(new Error("Malformed reply from analysis worker"));
      } else if (message.ok) {
        running.resolve(message.verdict);
      } else {
        running.reject(new Error(message.error));
      }
    });

    slot.worker.on("error", (error) => {
      logger.warn(`Analysis worker failed: ${error.message}`);
      slot.current?.reject(error);
      slot.current = undefined;
      this.slots = this.slots.filter((s) => s !== slot);
    });

    this.slots.push(slot);
    logger.debug(`Started analysis worker ${this.slots.length}/${this.size}`);
    return slot;
  }
}

/** Inline when `workers` is 0 */
export function createAnalysisRunner(workers: number): AnalysisRunner {
  return workers > 0 ? new WorkerPoolAnalysisRunner(workers) : new InlineAnalysisRunner();
}
