import type { Readable } from "node:stream";

/** Unified logging interface used across the command, child and iterator. */
export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  log(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string | Error, meta?: LogMeta): void;
}

/** Metadata for logging operations */
export interface LogMeta {
  code?: string;
  detail?: unknown;
  err?: Error;
}

/** Options shared by everything that logs. */
export interface LoggingOptions {
  logger?: Logger;
  debug?: boolean;
  verbose?: boolean;
  loggerTag?: string;
}

/**
 * Options for building and spawning an ffmpeg command.
 * `ffmpegPath` falls back to the `FFMPEG_PATH` environment variable, then to `ffmpeg` on PATH.
 */
export interface FfmpegCommandOptions extends LoggingOptions {
  ffmpegPath?: string;
  abortSignal?: AbortSignal;
  onBeforeChildProcessSpawn?: (ffmpegPath: string, ffmpegArgs: string[]) => void;
}

export interface FfmpegIteratorOptions extends LoggingOptions {
  /** Scratch buffer size for chunked-mode reads of stdout. Defaults to 65536. */
  chunkSize?: number;
}

/** Handles the iterator takes ownership of. */
export interface FfmpegIteratorSource {
  stderr: Readable;
  stdout?: Readable | null;
  /** Force-terminates the child when metadata can never be completed. */
  terminate?: () => void;
}

export type LogLevel = "info" | "warning" | "error" | "fatal" | "unknown";

export interface FfmpegVersion {
  version: string;
  rawLogMessage: string;
}

export interface FfmpegConfiguration {
  configuration: string[];
  rawLogMessage: string;
}

export interface FfmpegInput {
  index: number;
  /** Seconds; absent until a `Duration:` line is parsed, or when it read `N/A`. */
  duration?: number;
  rawLogMessage: string;
}

export interface FfmpegDuration {
  inputIndex: number;
  duration: number;
  rawLogMessage: string;
}

export interface FfmpegOutput {
  index: number;
  /** File path, URL, or a pipe alias such as `pipe:`. */
  to: string;
  rawLogMessage: string;
}

export interface VideoStreamData {
  type: "video";
  pixFmt: string;
  width: number;
  height: number;
  fps: number;
}

export interface AudioStreamData {
  type: "audio";
  sampleRate: number;
  /** Channel layout label, e.g. `stereo`, `5.1`, `mono`. */
  channels: string;
}

export interface SubtitleStreamData {
  type: "subtitle";
}

export interface OtherStreamData {
  type: "other";
}

export type StreamTypeSpecificData =
  | VideoStreamData
  | AudioStreamData
  | SubtitleStreamData
  | OtherStreamData;

export interface Stream {
  /** Codec or format name, e.g. `rawvideo`, `h264`, `opus`. */
  format: string;
  /** Three-letter language code, empty when none was given. */
  language: string;
  /** Index of the owning input or output. */
  parentIndex: number;
  /** Index of the stream within its parent. */
  streamIndex: number;
  typeSpecificData: StreamTypeSpecificData;
  rawLogMessage: string;
}

export interface FfmpegProgress {
  frame: number;
  fps: number;
  q: number;
  sizeKb: number;
  time: string;
  bitrateKbps: number;
  speed: number;
  rawLogMessage: string;
}

export interface OutputVideoFrame {
  width: number;
  height: number;
  pixFmt: string;
  /** Position of the stream among the streams written to stdout. */
  outputIndex: number;
  /** Per-stream frame counter, starting at 0. */
  frameNum: number;
  /** Seconds, `frameNum / fps`. */
  timestamp: number;
  data: Buffer;
}

export type FfmpegEvent =
  | { type: "parsedVersion"; version: FfmpegVersion }
  | { type: "parsedConfiguration"; configuration: FfmpegConfiguration }
  | { type: "parsedInput"; input: FfmpegInput }
  | { type: "parsedDuration"; duration: FfmpegDuration }
  | { type: "parsedOutput"; output: FfmpegOutput }
  | { type: "parsedStreamMapping"; rawLogMessage: string }
  | { type: "parsedInputStream"; stream: Stream }
  | { type: "parsedOutputStream"; stream: Stream }
  | { type: "progress"; progress: FfmpegProgress }
  | { type: "log"; level: LogLevel; message: string }
  | { type: "logEOF" }
  | { type: "error"; message: string }
  | { type: "outputFrame"; frame: OutputVideoFrame }
  | { type: "outputChunk"; data: Buffer }
  | { type: "done" };

/** Immutable copy of the metadata handed to the demuxer once sealed. */
export interface FfmpegMetadataSnapshot {
  readonly expectedOutputStreams: number;
  readonly inputs: readonly Readonly<FfmpegInput>[];
  readonly outputs: readonly Readonly<FfmpegOutput>[];
  readonly inputStreams: readonly Readonly<Stream>[];
  readonly outputStreams: readonly Readonly<Stream>[];
}

/** Exit status reported by `FfmpegChild.wait()`. */
export interface FfmpegExitStatus {
  exitCode: number | null;
  signal: string | null;
}

/** Event map for the iterator's lifecycle notifications. */
export interface FfmpegIteratorEvents {
  metadata: (metadata: FfmpegMetadataSnapshot) => void;
  close: () => void;
}

/** Event map for the child's lifecycle notifications. */
export interface FfmpegChildEvents {
  exit: (status: FfmpegExitStatus) => void;
}
