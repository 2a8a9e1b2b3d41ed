import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

export type ToolName = "ffmpeg";

interface ToolInfo {
  versionFlag: string;
  purpose: string;
  installHint: string;
}

const TOOLS: Record<ToolName, ToolInfo> = {
  ffmpeg: {
    versionFlag: "-version",
    purpose: "decoding downloads for spectral analysis",
    installHint:
      "Ubuntu/Debian: sudo apt install ffmpeg\n" +
      "    macOS: brew install ffmpeg\n" +
      "    Windows: https://ffmpeg.org/download.html",
  },
};

/**
 * Verify the named external tools can be executed.
 * Throws with install instructions for every missing tool; silent on success.
 */
export async function verifyRequiredTools(names: ToolName[]): Promise<void> {
  const missing: ToolName[] = [];

  for (const name of names) {
    try {
      await execFileAsync(name, [TOOLS[name].versionFlag]);
    } catch {
      missing.push(name);
    }
  }

  if (missing.length === 0) return;

  const details = missing
    .map((name) => `  ${name} (${TOOLS[name].purpose}):\n    ${TOOLS[name].installHint}`)
    .join("\n\n");
  throw new Error(`Missing required tool(s):\n\n${details}`);
}
