import type { Readable } from "node:stream";
import type { FfmpegEvent, FfmpegOutput, Stream } from "../Types/index.js";
import { ByteReader, isPrematureClose } from "./ByteReader.js";
import { debugLog, formatLogMessage, type ResolvedLogging } from "./Logging.js";
import { isStdoutDestination } from "./Metadata.js";
import { getBytesPerFrame } from "./PixelFormats.js";
import type { Sender } from "./RendezvousChannel.js";

export const DEFAULT_CHUNK_SIZE = 65_536;

/** Layout of one raw video stream interleaved on stdout. */
export interface FramedStreamLayout {
  outputIndex: number;
  width: number;
  height: number;
  pixFmt: string;
  fps: number;
  frameSize: number;
}

/** How stdout is sliced, decided once from the completed metadata. */
export type DemuxStrategy =
  | { mode: "none" }
  | { mode: "framed"; streams: FramedStreamLayout[] }
  | { mode: "chunked"; chunkSize: number; reason: string; error?: string };

function describe(stream: Readonly<Stream>): string {
  return `#${stream.parentIndex}:${stream.streamIndex} (${stream.format})`;
}

/**
 * Picks framed mode only when every stream written to stdout is rawvideo with
 * a known frame size and they all share one known frame rate. Anything else is
 * read as opaque chunks.
 */
export function chooseDemuxStrategy(
  outputStreams: readonly Readonly<Stream>[],
  outputs: readonly Readonly<FfmpegOutput>[],
  chunkSize: number = DEFAULT_CHUNK_SIZE
): DemuxStrategy {
  const onStdout = outputStreams.filter((stream) => {
    const output = outputs.find((o) => o.index === stream.parentIndex);
    return output !== undefined && isStdoutDestination(output.to);
  });
  if (onStdout.length === 0) return { mode: "none" };

  const raw = onStdout.filter((s) => s.format === "rawvideo" && s.typeSpecificData.type === "video");
  const other = onStdout.filter((s) => !raw.includes(s));

  if (raw.length > 0 && other.length > 0) {
    return {
      mode: "chunked",
      chunkSize,
      reason: "mixed raw and encoded streams",
      error:
        `Mixing rawvideo and other streams on stdout is not supported ` +
        `(raw: ${raw.map(describe).join(", ")}; other: ${other.map(describe).join(", ")}). ` +
        `Falling back to chunked mode.`,
    };
  }
  if (other.length > 0) {
    return { mode: "chunked", chunkSize, reason: `non-raw stream ${describe(other[0])}` };
  }

  const streams: FramedStreamLayout[] = [];
  for (const [outputIndex, stream] of raw.entries()) {
    const data = stream.typeSpecificData;
    if (data.type !== "video") continue;
    const frameSize = getBytesPerFrame(data.pixFmt, data.width, data.height);
    if (frameSize === undefined) {
      return {
        mode: "chunked",
        chunkSize,
        reason: `unknown frame size for ${data.pixFmt} ${data.width}x${data.height}`,
      };
    }
    streams.push({
      outputIndex,
      width: data.width,
      height: data.height,
      pixFmt: data.pixFmt,
      fps: data.fps,
      frameSize,
    });
  }

  if (streams.some((s) => s.fps <= 0)) {
    return { mode: "chunked", chunkSize, reason: "unknown frame rate" };
  }
  const firstFps = streams[0]?.fps;
  if (streams.some((s) => s.fps !== firstFps)) {
    return {
      mode: "chunked",
      chunkSize,
      reason: "frame rates differ",
      error:
        "Multiple output streams with different framerates are not supported when outputting to stdout. " +
        "Falling back to chunked mode.",
    };
  }

  return { mode: "framed", streams };
}

/**
 * Reads stdout according to `strategy` and sends frame or chunk events,
 * followed by exactly one `done`. Stops without a word when the consumer is
 * gone (a send resolves `false`).
 */
export async function runDemuxer(
  stdout: Readable,
  strategy: DemuxStrategy,
  sender: Sender<FfmpegEvent>,
  logging: ResolvedLogging
): Promise<void> {
  const reader = new ByteReader(stdout);
  let frames = 0;
  let chunks = 0;

  try {
    if (strategy.mode === "chunked" && strategy.error !== undefined) {
      if (!(await sender.send({ type: "error", message: strategy.error }))) return;
    }

    debugLog(logging, `Demuxing stdout in ${strategy.mode} mode`);

    try {
      if (strategy.mode === "framed") {
        const counters = strategy.streams.map(() => 0);
        for (let i = 0; ; i = (i + 1) % strategy.streams.length) {
          const layout = strategy.streams[i];
          const data = await reader.readExact(layout.frameSize);
          if (data === null) break;
          const frameNum = counters[i];
          counters[i] = frameNum + 1;
          frames += 1;
          const delivered = await sender.send({
            type: "outputFrame",
            frame: {
              width: layout.width,
              height: layout.height,
              pixFmt: layout.pixFmt,
              outputIndex: layout.outputIndex,
              frameNum,
              timestamp: frameNum / layout.fps,
              data,
            },
          });
          if (!delivered) return;
        }
      } else if (strategy.mode === "chunked") {
        for (;;) {
          const data = await reader.readSome(strategy.chunkSize);
          if (data === null) break;
          chunks += 1;
          if (!(await sender.send({ type: "outputChunk", data }))) return;
        }
      }
    } catch (err) {
      if (!isPrematureClose(err)) {
        const message = err instanceof Error ? err.message : String(err);
        logging.logger.warn(formatLogMessage(logging, `stdout read failed: ${message}`), {
          code: "STDOUT_READ_ERROR",
          detail: err,
        });
        if (!(await sender.send({ type: "error", message }))) return;
      }
    }

    debugLog(logging, `Demuxer finished: ${frames} frame(s), ${chunks} chunk(s)`);
    await sender.send({ type: "done" });
  } finally {
    sender.release();
    await reader.close();
  }
}
