/**
 * Public API: `FfmpegCommand` to spawn ffmpeg, `FfmpegChild` for the running
 * process, and `FfmpegIterator` for the events it reports.
 */
export * from "./Core/index.js";

export type {
  Logger,
  LogMeta,
  LoggingOptions,
  FfmpegCommandOptions,
  FfmpegIteratorOptions,
  FfmpegIteratorSource,
  LogLevel,
  FfmpegVersion,
  FfmpegConfiguration,
  FfmpegInput,
  FfmpegDuration,
  FfmpegOutput,
  VideoStreamData,
  AudioStreamData,
  SubtitleStreamData,
  OtherStreamData,
  StreamTypeSpecificData,
  Stream,
  FfmpegProgress,
  OutputVideoFrame,
  FfmpegEvent,
  FfmpegMetadataSnapshot,
  FfmpegExitStatus,
  FfmpegIteratorEvents,
  FfmpegChildEvents,
} from "./Types/index.js";
