import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { locateDownloadedFile } from "./locate.js";

describe("locateDownloadedFile", () => {
  let downloadDir: string;

  beforeEach(async () => {
    downloadDir = await fs.mkdtemp(path.join(os.tmpdir(), "find-lossless-downloads-"));
  });

  afterEach(async () => {
    await fs.rm(downloadDir, { recursive: true, force: true });
  });

  async function touch(...segments: string[]): Promise<string> {
    const filePath = path.join(downloadDir, ...segments);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, "");
    return filePath;
  }

  it("finds the file under the user's directory", async () => {
    const expected = await touch("peer", "Artist", "Album", "01 - Song.flac");

    await expect(locateDownloadedFile(downloadDir, "peer", "Music\\Artist\\Album\\01 - Song.flac")).resolves.toBe(
      expected
    );
  });

  it("prefers the user's copy over another one", async () => {
    await touch("aaa-other", "01 - Song.flac");
    const expected = await touch("peer", "Album", "01 - Song.flac");

    await expect(locateDownloadedFile(downloadDir, "peer", "Music\\Album\\01 - Song.flac")).resolves.toBe(expected);
  });

  it("falls back to the whole download directory", async () => {
    const expected = await touch("Album", "01 - Song.flac");

    await expect(locateDownloadedFile(downloadDir, "peer", "Music\\Album\\01 - Song.flac")).resolves.toBe(expected);
  });

  it("returns undefined when the file is missing", async () => {
    await touch("peer", "Album", "02 - Other.flac");

    await expect(locateDownloadedFile(downloadDir, "peer", "Music\\Album\\01 - Song.flac")).resolves.toBeUndefined();
  });

  it("returns undefined when the download directory does not exist", async () => {
    await expect(
      locateDownloadedFile(path.join(downloadDir, "missing"), "peer", "Music\\01 - Song.flac")
    ).resolves.toBeUndefined();
  });
});
