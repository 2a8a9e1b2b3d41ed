import fs from "node:fs";
import path from "node:path";
import { remoteBasename } from "../search/candidate.js";
import { logger } from "../utils/logger.js";

/** Missing directories are expected: slskd creates them lazily */
function isMissingDir(e: unknown): boolean {
  return e instanceof Error && "code" in e && (e.code === "ENOENT" || e.code === "ENOTDIR");
}

async function findFile(dir: string, name: string): Promise<string | undefined> {
  let entries: fs.Dirent[];
  try {
    entries = await fs.promises.readdir(dir, { withFileTypes: true });
  } catch (e) {
    if (isMissingDir(e)) return undefined;
    throw e;
  }

  for (const entry of entries) {
    if (entry.isFile() && entry.name === name) {
      return path.join(dir, entry.name);
    }
  }
  for (const entry of entries) {
    if (entry.isDirectory()) {
      const found = await findFile(path.join(dir, entry.name), name);
      if (found) return found;
    }
  }
  return undefined;
}

/**
 * Find a completed download on disk.
 *
 * slskd writes files as <downloadDir>/<username>/<remote directory>/<name>;
 * the user's directory is searched first, then the whole download directory.
 */
export async function locateDownloadedFile(
  downloadDir: string,
  username: string,
  remotePath: string
): Promise<string | undefined> {
  const name = remoteBasename(remotePath);

  const inUserDir = await findFile(path.join(downloadDir, username), name);
  if (inUserDir) {
    logger.debug(`Found downloaded file: ${inUserDir}`);
    return inUserDir;
  }

  const anywhere = await findFile(downloadDir, name);
  if (anywhere) {
    logger.debug(`Found downloaded file outside the user directory: ${anywhere}`);
    return anywhere;
  }

  logger.warn(`Downloaded file not found: ${name} (user ${username})`);
  return undefined;
}
