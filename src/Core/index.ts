export { FfmpegCommand, resolveFfmpegPath } from "./FfmpegCommand.js";
export { FfmpegChild, FFMPEG_SPAWN_OPTIONS, type FfmpegSubprocess } from "./FfmpegChild.js";
export { FfmpegIterator, rawLogLine } from "./FfmpegIterator.js";
export { FfmpegMetadata, isStdoutDestination, type FfmpegMetadataView } from "./Metadata.js";
export {
  FfmpegLogParser,
  type LogSection,
  decodeLine,
  parseLogLevel,
  parseTimeString,
  stripLevelPrefix,
  tryParseConfiguration,
  tryParseDuration,
  tryParseInput,
  tryParseOutput,
  tryParseProgress,
  tryParseStream,
  tryParseVersion,
} from "./LogParser.js";
export {
  chooseDemuxStrategy,
  runDemuxer,
  DEFAULT_CHUNK_SIZE,
  type DemuxStrategy,
  type FramedStreamLayout,
} from "./Demuxer.js";
export { RendezvousChannel, type Sender } from "./RendezvousChannel.js";
export { ByteReader } from "./ByteReader.js";
export { CommaIter } from "./CommaIter.js";
export { getBitsPerPixel, getBytesPerFrame, getPixelFormatInfo, type PixelFormatInfo } from "./PixelFormats.js";
export { ffmpegIsInstalled, ffmpegVersion } from "./Version.js";
export {
  FfmpegCommandValidationError,
  HandleTakenError,
  LogParseError,
  MetadataIncompleteError,
  MetadataSealedError,
} from "./Errors.js";
export { defaultLogger } from "./Logging.js";
