import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { parseFile } from "music-metadata";
import { DecodeError, errorMessage } from "../utils/errors.js";
import { logger } from "../utils/logger.js";
import type { DecodedAudio } from "./types.js";

const execFileAsync = promisify(execFile);

const BYTES_PER_SAMPLE = 4;

/**
 * Decode a mono float32 excerpt of `sampleSecs` seconds starting a third of
 * the way into the file, away from silent intros and fade-outs.
 *
 * @throws DecodeError if the file cannot be parsed or decoded
 * @throws the signal's reason when cancelled before ffmpeg starts
 */
export async function decodeExcerpt(filePath: string, sampleSecs: number, signal?: AbortSignal): Promise<DecodedAudio> {
  signal?.throwIfAborted();

  let sampleRate: number | undefined;
  let bitDepth: number | undefined;
  let durationSecs: number | undefined;
  try {
    const metadata = await parseFile(filePath);
    sampleRate = metadata.format.sampleRate;
    bitDepth = metadata.format.bitsPerSample;
    durationSecs = metadata.format.duration;
  } catch (e) {
    throw new DecodeError(`Cannot read ${filePath}: ${errorMessage(e)}`);
  }

  if (!sampleRate) {
    throw new DecodeError(`Cannot read ${filePath}: no sample rate in the stream info`);
  }

  const start = durationSecs ? durationSecs / 3 : 0;
  const secs = durationSecs ? Math.min(sampleSecs, durationSecs - start) : sampleSecs;

  const args = [
    "-v", "error",
    "-ss", start.toFixed(3),
    "-t", secs.toFixed(3),
    "-i", filePath,
    "-ac", "1",
    "-f", "f32le",
    "-acodec", "pcm_f32le",
    "pipe:1",
  ];
  logger.debug(`ffmpeg ${args.join(" ")}`);

  signal?.throwIfAborted();

  let stdout: Buffer;
  try {
    const result = await execFileAsync("ffmpeg", args, {
      encoding: "buffer",
      signal,
      maxBuffer: Math.ceil(sampleRate * secs * BYTES_PER_SAMPLE) + 1024 * 1024,
    });
    stdout = result.stdout;
  } catch (e) {
    throw new DecodeError(`ffmpeg could not decode ${filePath}: ${errorMessage(e)}`);
  }

  const count = Math.floor(stdout.length / BYTES_PER_SAMPLE);
  if (count === 0) {
    throw new DecodeError(`ffmpeg produced no audio for ${filePath}`);
  }

  const samples = new Float32Array(count);
  for (let i = 0; i < count; i++) {
    samples[i] = stdout.readFloatLE(i * BYTES_PER_SAMPLE);
  }

  return { samples, sampleRate, bitDepth, durationSecs };
}
