import { parentPort } from "node:worker_threads";
import { errorMessage } from "../utils/errors.js";
import { analyze } from "./analyzer.js";
import { isAnalysisJob, type AnalysisReply } from "./types.js";

if (!parentPort) {
  throw new Error("analysis-worker must run in a worker thread");
}

const port = parentPort;

port.on("message", (message: unknown) => {
  if (!isAnalysisJob(message)) {
    port.postMessage({ id: -1, ok: false, error: "Malformed analysis job" } satisfies AnalysisReply);
    return;
  }

  let reply: AnalysisReply;
  try {
    reply = { id: message.id, ok: true, verdict: analyze(message.samples, message.sampleRate, message.options) };
  } catch (e) {
    reply = { id: message.id, ok: false, error: errorMessage(e) };
  }
  port.postMessage(reply);
});
