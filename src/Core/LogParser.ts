import type { Readable } from "node:stream";
import type {
  FfmpegEvent,
  FfmpegOutput,
  FfmpegProgress,
  LogLevel,
  Stream,
  StreamTypeSpecificData,
} from "../Types/index.js";
import { ByteReader } from "./ByteReader.js";
import { CommaIter } from "./CommaIter.js";
import { LogParseError } from "./Errors.js";

/** `\n`, `\r`; `\r\n` is covered by skipping delimiters at the start of a line. */
const LINE_DELIMITERS: readonly number[] = [0x0a, 0x0d];

const LEVEL_PREFIX = /^\[(?:info|warning|error|fatal|panic|verbose|debug|trace)\] ?/;

/** Which part of ffmpeg's preamble the previous lines belonged to. */
export type LogSection =
  | { kind: "other" }
  | { kind: "input"; index: number }
  | { kind: "output"; index: number }
  | { kind: "streamMapping" };

const utf8 = new TextDecoder("utf-8", { fatal: true });

/** Strict UTF-8 decoding; invalid bytes are an error rather than U+FFFD. */
export function decodeLine(bytes: Uint8Array): string {
  try {
    return utf8.decode(bytes);
  } catch (err) {
    throw new LogParseError(
      `Invalid UTF-8 in ffmpeg log output: ${err instanceof Error ? err.message : String(err)}`
    );
  }
}

/** Removes a leading `[info]`-style level tag added by `-loglevel level+...`. */
export function stripLevelPrefix(line: string): string {
  return line.replace(LEVEL_PREFIX, "");
}

export function parseLogLevel(line: string): LogLevel {
  if (line.includes("[info]")) return "info";
  if (line.includes("[warning]")) return "warning";
  if (line.includes("[error]")) return "error";
  if (line.includes("[fatal]")) return "fatal";
  return "unknown";
}

function parseIndex(text: string | undefined): number | undefined {
  if (text === undefined || !/^\d+$/.test(text)) return undefined;
  return Number(text);
}

/**
 * `HOURS:MM:SS.FRACTION`, `MM:SS.FRACTION` or plain seconds, as seconds.
 * `N/A` and anything else unparseable gives `undefined`.
 */
export function parseTimeString(text: string): number | undefined {
  const parts = text.trim().split(":");
  if (parts.length > 3) return undefined;
  let seconds = 0;
  let multiplier = 1;
  for (const part of parts.reverse()) {
    if (!/^-?\d+(?:\.\d*)?$/.test(part)) return undefined;
    seconds += Number(part) * multiplier;
    multiplier *= 60;
  }
  return seconds;
}

/**
 * `[info] ffmpeg version 7.1-full_build Copyright (c) ...` → `7.1-full_build`.
 */
export function tryParseVersion(line: string): string | undefined {
  const match = /^(?:ffmpeg|ffprobe|ffplay) version (\S+)/.exec(stripLevelPrefix(line).trim());
  return match?.[1];
}

/**
 * `[info]   configuration: --enable-gpl --enable-libx264` → the flag list.
 */
export function tryParseConfiguration(line: string): string[] | undefined {
  const body = stripLevelPrefix(line).trim();
  if (!body.startsWith("configuration:")) return undefined;
  return body
    .slice("configuration:".length)
    .split(/\s+/)
    .filter((flag) => flag.length > 0);
}

/** `[info] Input #0, lavfi, from 'testsrc=duration=5':` → `0`. */
export function tryParseInput(line: string): number | undefined {
  const match = /^Input #(\d+)(?:,|\s|$)/.exec(stripLevelPrefix(line).trim());
  return parseIndex(match?.[1]);
}

/** `[info] Output #0, mp4, to 'test.mp4':` → index and destination. */
export function tryParseOutput(line: string): FfmpegOutput | undefined {
  const body = stripLevelPrefix(line).trim();
  const match = /^Output #(\d+)(?:,|\s)/.exec(body);
  const index = parseIndex(match?.[1]);
  if (index === undefined) return undefined;

  const marker = body.indexOf(" to '");
  if (marker === -1) return undefined;
  const rest = body.slice(marker + " to '".length);
  const end = rest.indexOf("'");
  const to = end === -1 ? rest : rest.slice(0, end);

  return { index, to, rawLogMessage: line };
}

/**
 * `[info]   Duration: 00:00:05.00, start: 0.000000, bitrate: 16 kb/s` → `5`.
 * `Duration: N/A` gives `undefined`.
 */
export function tryParseDuration(line: string): number | undefined {
  const body = stripLevelPrefix(line).trim();
  if (!body.startsWith("Duration:")) return undefined;
  const [time = ""] = body.slice("Duration:".length).split(",");
  return parseTimeString(time);
}

function tryParseVideoData(parts: CommaIter): StreamTypeSpecificData | undefined {
  const pixFmt = parts.nextPart()?.trim().split(/[ (]/)[0];
  if (!pixFmt) return undefined;

  const dims = parts.nextPart()?.trim().split(/\s+/)[0];
  const [widthText, heightText] = dims?.split("x") ?? [];
  const width = parseIndex(widthText);
  const height = parseIndex(heightText);
  if (width === undefined || height === undefined) return undefined;

  // fps is not necessarily the next part: SAR/DAR, bitrate, q=... may come first.
  let fps = 0;
  for (const part of parts) {
    const trimmed = part.trim();
    if (trimmed.endsWith(" fps")) {
      const value = Number(trimmed.split(/\s+/)[0]);
      fps = Number.isFinite(value) ? value : 0;
      break;
    }
  }

  return { type: "video", pixFmt, width, height, fps };
}

function tryParseAudioData(parts: CommaIter): StreamTypeSpecificData | undefined {
  const match = /^(\d+)\s*Hz\b/.exec(parts.nextPart()?.trim() ?? "");
  const sampleRate = parseIndex(match?.[1]);
  if (sampleRate === undefined) return undefined;

  const channels = parts.nextPart()?.trim();
  if (!channels) return undefined;

  return { type: "audio", sampleRate, channels };
}

/**
 * Parses a stream descriptor such as
 * `[info]   Stream #0:0: Video: wrapped_avframe, rgb24, 320x240 [SAR 1:1 DAR 4:3], 25 fps, 25 tbr, 25 tbn`
 * or `[info]   Stream #0:2[0x3](eng): Data: bin_data (text / 0x74786574)`.
 */
export function tryParseStream(line: string): Stream | undefined {
  const body = stripLevelPrefix(line).trim();
  if (!body.startsWith("Stream #")) return undefined;

  const parts = new CommaIter(body.slice("Stream #".length));
  const head = parts.nextPart();
  if (head === undefined) return undefined;
  const [parentText, indexText, typeText, formatText] = head.split(":");
  if (typeText === undefined || formatText === undefined) return undefined;

  const parentIndex = parseIndex(parentText);
  if (parentIndex === undefined) return undefined;

  // `2[0x3](eng)`: drop the bracketed substream id, then split off the language.
  const [indexPart, languagePart] = (indexText ?? "").replace(/\[[^\]]*\]/g, "").split("(");
  const streamIndex = parseIndex(indexPart?.trim());
  if (streamIndex === undefined) return undefined;
  const language = languagePart?.replace(/\)$/, "") ?? "";

  // `av1 (Main)` → `av1`
  const format = formatText.trim().split(/[ (]/)[0];

  let typeSpecificData: StreamTypeSpecificData | undefined;
  switch (typeText.trim()) {
    case "Video":
      typeSpecificData = tryParseVideoData(parts);
      break;
    case "Audio":
      typeSpecificData = tryParseAudioData(parts);
      break;
    case "Subtitle":
      typeSpecificData = { type: "subtitle" };
      break;
    default:
      typeSpecificData = { type: "other" };
  }
  if (!typeSpecificData) return undefined;

  return {
    format,
    language,
    parentIndex,
    streamIndex,
    typeSpecificData,
    rawLogMessage: line,
  };
}

function progressValue(body: string, key: string): string | undefined {
  const at = body.indexOf(key);
  if (at === -1) return undefined;
  const token = body.slice(at + key.length).trimStart().split(/\s+/)[0];
  return token === "" ? undefined : token;
}

function progressNumber(token: string | undefined, suffixes: readonly string[] = []): number | undefined {
  if (token === undefined) return undefined;
  if (token === "N/A") return 0;
  let text = token;
  for (const suffix of suffixes) {
    if (text.endsWith(suffix)) {
      text = text.slice(0, -suffix.length);
      break;
    }
  }
  if (text === "") return undefined;
  const value = Number(text);
  return Number.isFinite(value) ? value : undefined;
}

/**
 * Parses a progress line such as
 * `[info] frame= 1996 fps=1984 q=-1.0 Lsize=     372kB time=00:01:19.72 bitrate=  38.2kbits/s speed=79.2x`.
 * Every field must be present; `N/A` values count as 0.
 */
export function tryParseProgress(line: string): FfmpegProgress | undefined {
  const body = stripLevelPrefix(line).trim();

  const frame = progressNumber(progressValue(body, "frame="));
  const fps = progressNumber(progressValue(body, "fps="));
  const q = progressNumber(progressValue(body, "q="));
  // matches `Lsize=` as well
  const sizeKb = progressNumber(progressValue(body, "size="), ["KiB", "kiB", "kB"]);
  const time = progressValue(body, "time=");
  const bitrateToken = progressValue(body, "bitrate=");
  const speedToken = progressValue(body, "speed=");

  if (
    frame === undefined ||
    fps === undefined ||
    q === undefined ||
    sizeKb === undefined ||
    time === undefined ||
    bitrateToken === undefined ||
    speedToken === undefined
  ) {
    return undefined;
  }

  return {
    frame,
    fps,
    q,
    sizeKb,
    time,
    bitrateKbps: progressNumber(bitrateToken, ["kbits/s"]) ?? 0,
    speed: progressNumber(speedToken, ["x"]) ?? 0,
    rawLogMessage: line,
  };
}

/**
 * Turns ffmpeg's stderr into events, one line per call.
 *
 * The parser tracks which preamble section it is in (`Input #n`, `Output #n`,
 * `Stream mapping:`) because stream descriptors and durations look the same
 * in every section and only the section says what they belong to.
 */
export class FfmpegLogParser {
  private readonly reader: ByteReader;
  private section: LogSection = { kind: "other" };
  private eofReached = false;

  constructor(source: Readable) {
    this.reader = new ByteReader(source);
  }

  public get currentSection(): LogSection {
    return { ...this.section };
  }

  /**
   * Consumes one line and returns its event. End of input yields `logEOF`
   * once; calling again afterwards rejects.
   */
  public async parseNextEvent(): Promise<FfmpegEvent> {
    if (this.eofReached) {
      throw new LogParseError("Log stream already ended");
    }
    const bytes = await this.reader.readUntilAny(LINE_DELIMITERS);
    if (bytes === null) {
      this.eofReached = true;
      return { type: "logEOF" };
    }
    return this.parseLine(decodeLine(bytes));
  }

  /** Parses one line (without its delimiter), updating the section state. */
  public parseLine(line: string): FfmpegEvent {
    const inputIndex = tryParseInput(line);
    if (inputIndex !== undefined) {
      this.section = { kind: "input", index: inputIndex };
      return { type: "parsedInput", input: { index: inputIndex, rawLogMessage: line } };
    }

    const output = tryParseOutput(line);
    if (output) {
      this.section = { kind: "output", index: output.index };
      return { type: "parsedOutput", output };
    }

    if (line.includes("Stream mapping:")) {
      this.section = { kind: "streamMapping" };
    }

    const version = tryParseVersion(line);
    if (version !== undefined) {
      return { type: "parsedVersion", version: { version, rawLogMessage: line } };
    }

    const configuration = tryParseConfiguration(line);
    if (configuration) {
      return { type: "parsedConfiguration", configuration: { configuration, rawLogMessage: line } };
    }

    const duration = tryParseDuration(line);
    if (duration !== undefined) {
      if (this.section.kind === "input") {
        return {
          type: "parsedDuration",
          duration: { inputIndex: this.section.index, duration, rawLogMessage: line },
        };
      }
      return { type: "log", level: "info", message: line };
    }

    if (this.section.kind === "streamMapping" && stripLevelPrefix(line).startsWith("  Stream #")) {
      return { type: "parsedStreamMapping", rawLogMessage: line };
    }

    const stream = tryParseStream(line);
    if (stream) {
      switch (this.section.kind) {
        case "input":
          return { type: "parsedInputStream", stream };
        case "output":
          return { type: "parsedOutputStream", stream };
        default:
          throw new LogParseError(`Unexpected stream specification: ${line}`, line);
      }
    }

    const progress = tryParseProgress(line);
    if (progress) {
      this.section = { kind: "other" };
      return { type: "progress", progress };
    }

    return { type: "log", level: parseLogLevel(line), message: line };
  }

  /** Releases the underlying stream. */
  public async close(): Promise<void> {
    this.eofReached = true;
    await this.reader.close();
  }
}
