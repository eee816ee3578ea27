import { execa } from "execa";
import { resolveFfmpegPath } from "./FfmpegCommand.js";
import { tryParseVersion } from "./LogParser.js";

/**
 * Runs `ffmpeg -version` and returns the version token, e.g. `7.1` or
 * `N-118000-g1234abcd`.
 */
export async function ffmpegVersion(ffmpegPath?: string): Promise<string> {
  const path = resolveFfmpegPath(ffmpegPath);
  const result = await execa(path, ["-version"], { reject: false, stdin: "ignore" });
  if (result.failed && result.exitCode === undefined) {
    throw new Error(`Failed to run ${path}: ${result.shortMessage}`);
  }
  for (const line of result.stdout.split(/\r?\n/)) {
    const version = tryParseVersion(line);
    if (version !== undefined) return version;
  }
  throw new Error(`No version found in the output of ${path} -version`);
}

/** Whether the ffmpeg binary can be run at all. */
export async function ffmpegIsInstalled(ffmpegPath?: string): Promise<boolean> {
  const result = await execa(resolveFfmpegPath(ffmpegPath), ["-version"], {
    reject: false,
    stdin: "ignore",
    stdout: "ignore",
    stderr: "ignore",
  });
  return result.exitCode === 0;
}
