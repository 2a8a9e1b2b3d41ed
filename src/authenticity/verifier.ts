import type { AnalysisConfig } from "../config/types.js";
import { errorMessage } from "../utils/errors.js";
import { logger } from "../utils/logger.js";
import { undetermined } from "./analyzer.js";
import { decodeExcerpt } from "./decode.js";
import type { AnalysisRunner } from "./runner.js";
import type { AuthenticityVerdict, DecodedAudio } from "./types.js";

export type Decoder = (filePath: string, sampleSecs: number, signal?: AbortSignal) => Promise<DecodedAudio>;

/**
 * Decodes a downloaded file (or takes PCM directly) and runs the analysis.
 * Only cancellation rejects; every other failure becomes UNDETERMINED.
 */
export class AuthenticityVerifier {
  constructor(
    private readonly runner: AnalysisRunner,
    private readonly config: AnalysisConfig,
    private readonly decode: Decoder = decodeExcerpt
  ) {}

  async verify(audio: string | DecodedAudio, signal?: AbortSignal): Promise<AuthenticityVerdict> {
    let decoded: DecodedAudio;
    if (typeof audio === "string") {
      try {
        decoded = await this.decode(audio, this.config.sampleSecs, signal);
      } catch (e) {
        signal?.throwIfAborted();
        logger.warn(`Decode failed: ${errorMessage(e)}`);
        return undetermined(`Could not decode audio: ${errorMessage(e)}`);
      }
    } else {
      decoded = audio;
    }

    signal?.throwIfAborted();

    try {
      const verdict = await this.runner.run(decoded, this.config, signal);
      logger.debug(`Verdict ${verdict.verdict}: ${verdict.rationale}`);
      return verdict;
    } catch (e) {
      signal?.throwIfAborted();
      logger.warn(`Spectral analysis failed: ${errorMessage(e)}`);
      return undetermined(`Spectral analysis failed: ${errorMessage(e)}`, decoded.sampleRate);
    }
  }
}
