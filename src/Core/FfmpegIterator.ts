import { EventEmitter } from "eventemitter3";
import type { Readable } from "node:stream";
import type {
  FfmpegEvent,
  FfmpegIteratorEvents,
  FfmpegIteratorOptions,
  FfmpegIteratorSource,
  FfmpegMetadataSnapshot,
  FfmpegProgress,
  OutputVideoFrame,
} from "../Types/index.js";
import { isPrematureClose } from "./ByteReader.js";
import { chooseDemuxStrategy, DEFAULT_CHUNK_SIZE, runDemuxer } from "./Demuxer.js";
import { MetadataIncompleteError } from "./Errors.js";
import { FfmpegLogParser } from "./LogParser.js";
import { debugLog, formatLogMessage, resolveLogging, type ResolvedLogging } from "./Logging.js";
import { FfmpegMetadata, type FfmpegMetadataView } from "./Metadata.js";
import { RendezvousChannel, type Sender } from "./RendezvousChannel.js";

/** The stderr line behind an event, when it came from one. */
export function rawLogLine(event: FfmpegEvent): string | undefined {
  switch (event.type) {
    case "parsedVersion":
      return event.version.rawLogMessage;
    case "parsedConfiguration":
      return event.configuration.rawLogMessage;
    case "parsedInput":
      return event.input.rawLogMessage;
    case "parsedDuration":
      return event.duration.rawLogMessage;
    case "parsedOutput":
      return event.output.rawLogMessage;
    case "parsedStreamMapping":
      return event.rawLogMessage;
    case "parsedInputStream":
    case "parsedOutputStream":
      return event.stream.rawLogMessage;
    case "progress":
      return event.progress.rawLogMessage;
    case "log":
      return event.message;
    default:
      return undefined;
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Pull-based sequence of everything an ffmpeg run reports: parsed stderr
 * lines, then, once the output layout is known, frames or chunks read from
 * stdout.
 *
 * Both pipes are read by their own worker, and both hand events over a
 * zero-capacity channel, so nothing is read ahead of the consumer by more than
 * one event and a consumer that stops pulling eventually blocks ffmpeg itself.
 *
 * @example
 * ```ts
 * const iter = new FfmpegIterator({ stderr: child.stderr, stdout: child.stdout });
 * for await (const frame of iter.filterFrames()) {
 *   console.log(frame.frameNum, frame.data.length);
 * }
 * ```
 */
export class FfmpegIterator
  extends EventEmitter<FfmpegIteratorEvents>
  implements AsyncIterableIterator<FfmpegEvent>
{
  private readonly aggregate = new FfmpegMetadata();
  private readonly channel = new RendezvousChannel<FfmpegEvent>();
  private readonly parser: FfmpegLogParser;
  private readonly stderr: Readable;
  private stdout: Readable | null;
  /** stdout once handed to the demuxer; kept only so `close()` can end the read. */
  private demuxedStdout: Readable | null = null;
  private readonly terminate: (() => void) | undefined;
  private readonly logging: ResolvedLogging;
  private readonly chunkSize: number;
  private readonly workers: Promise<void>[] = [];
  private replay: FfmpegEvent[] = [];
  private ended = false;

  constructor(source: FfmpegIteratorSource, options: FfmpegIteratorOptions = {}) {
    super();
    this.stderr = source.stderr;
    this.stdout = source.stdout ?? null;
    this.terminate = source.terminate;
    this.logging = resolveLogging(options);
    this.chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    this.parser = new FfmpegLogParser(source.stderr);

    this.workers.push(
      this.runStderrWorker(this.channel.createSender()).catch((err: unknown) => {
        this.logging.logger.error(formatLogMessage(this.logging, "stderr worker failed"), {
          code: "STDERR_WORKER_ERROR",
          err: err instanceof Error ? err : undefined,
          detail: err,
        });
      })
    );
  }

  /** Live view of the preamble seen so far. */
  public get metadata(): FfmpegMetadataView {
    return this.aggregate;
  }

  public [Symbol.asyncIterator](): AsyncIterableIterator<FfmpegEvent> {
    return this;
  }

  public async next(): Promise<IteratorResult<FfmpegEvent, undefined>> {
    const replayed = this.replay.shift();
    if (replayed) return { done: false, value: replayed };

    const event = await this.channel.receive();
    if (event === undefined) {
      this.finish();
      return { done: true, value: undefined };
    }
    return { done: false, value: event };
  }

  public async return(): Promise<IteratorResult<FfmpegEvent, undefined>> {
    await this.close();
    return { done: true, value: undefined };
  }

  /**
   * Stops both workers and releases the pipes. The child keeps running; kill
   * or quit it through {@link FfmpegChild} if it should stop too.
   */
  public async close(): Promise<void> {
    this.replay = [];
    this.channel.closeReceiver();
    this.stderr.destroy();
    this.demuxedStdout?.destroy();
    this.stdout?.destroy();
    this.stdout = null;
    await Promise.all(this.workers);
    this.finish();
  }

  /**
   * Pulls events until the output layout is known. The pulled events are not
   * lost: later `next()` calls yield them first.
   *
   * If the sequence ends first, the child is terminated and the promise
   * rejects with a {@link MetadataIncompleteError} listing the errors seen.
   */
  public async collectMetadata(): Promise<FfmpegMetadataSnapshot> {
    const pulled: FfmpegEvent[] = [];
    while (!this.aggregate.isCompleted()) {
      const event = await this.channel.receive();
      if (event === undefined) {
        this.replay.push(...pulled);
        this.terminate?.();
        const errors = pulled.flatMap((e) => {
          if (e.type === "error") return [e.message];
          if (e.type === "log" && e.level === "error") return [e.message];
          return [];
        });
        this.logging.logger.error(
          formatLogMessage(this.logging, "Event sequence ended before metadata was complete"),
          { code: "METADATA_INCOMPLETE", detail: errors }
        );
        throw new MetadataIncompleteError(errors);
      }
      pulled.push(event);
    }
    this.replay.push(...pulled);
    return this.aggregate.snapshot();
  }

  /**
   * Moves stdout out of the iterator so the caller can read it directly; no
   * frame or chunk events will be produced. Returns `null` once the metadata
   * is complete (stdout then belongs to the demuxer, or was released) or when
   * it was taken before.
   */
  public takeStdout(): Readable | null {
    const stdout = this.stdout;
    this.stdout = null;
    return stdout;
  }

  /** `error` events and `[error]` log lines, as text. */
  public async *filterErrors(): AsyncGenerator<string, void, undefined> {
    for await (const event of this) {
      if (event.type === "error") yield event.message;
      else if (event.type === "log" && event.level === "error") yield event.message;
    }
  }

  public async *filterProgress(): AsyncGenerator<FfmpegProgress, void, undefined> {
    for await (const event of this) {
      if (event.type === "progress") yield event.progress;
    }
  }

  public async *filterFrames(): AsyncGenerator<OutputVideoFrame, void, undefined> {
    for await (const event of this) {
      if (event.type === "outputFrame") yield event.frame;
    }
  }

  public async *filterChunks(): AsyncGenerator<Buffer, void, undefined> {
    for await (const event of this) {
      if (event.type === "outputChunk") yield event.data;
    }
  }

  /** Every stderr line exactly as ffmpeg wrote it, minus the line ending. */
  public async *intoStderr(): AsyncGenerator<string, void, undefined> {
    for await (const event of this) {
      const line = rawLogLine(event);
      if (line !== undefined) yield line;
    }
  }

  private async runStderrWorker(sender: Sender<FfmpegEvent>): Promise<void> {
    try {
      for (;;) {
        let event: FfmpegEvent;
        try {
          event = await this.parser.parseNextEvent();
        } catch (err) {
          if (this.channel.isClosed) return;
          if (isPrematureClose(err)) {
            event = { type: "logEOF" };
          } else {
            debugLog(this.logging, `stderr worker stopped: ${errorMessage(err)}`);
            await sender.send({ type: "error", message: errorMessage(err) });
            return;
          }
        }

        if (!(await this.forward(event, sender))) return;
        if (event.type === "logEOF") return;
      }
    } finally {
      sender.release();
      await this.parser.close();
    }
  }

  /**
   * Folds `event` into the metadata and sends it on. When this event completes
   * the metadata, the demuxer is registered on the channel before the event
   * goes out, so the channel cannot run dry in between.
   */
  private async forward(event: FfmpegEvent, sender: Sender<FfmpegEvent>): Promise<boolean> {
    if (!this.aggregate.isCompleted()) {
      try {
        this.aggregate.handleEvent(event);
      } catch (err) {
        debugLog(this.logging, `stderr worker stopped: ${errorMessage(err)}`);
        await sender.send({ type: "error", message: errorMessage(err) });
        return false;
      }
      if (this.aggregate.isCompleted() && !(await this.onMetadataCompleted(sender))) {
        return false;
      }
    }
    return sender.send(event);
  }

  private async onMetadataCompleted(sender: Sender<FfmpegEvent>): Promise<boolean> {
    const snapshot = this.aggregate.snapshot();
    debugLog(
      this.logging,
      `Metadata complete: ${snapshot.outputs.length} output(s), ${snapshot.outputStreams.length} output stream(s)`
    );
    this.emit("metadata", snapshot);

    // From here on stdout belongs to the demuxer or to nobody.
    const stdout = this.stdout;
    this.stdout = null;

    if (snapshot.outputs.length === 0 || snapshot.outputStreams.length === 0) {
      stdout?.destroy();
      this.terminate?.();
      await sender.send({ type: "error", message: "No output streams found" });
      return false;
    }

    if (!stdout) return true;

    const strategy = chooseDemuxStrategy(snapshot.outputStreams, snapshot.outputs, this.chunkSize);
    if (strategy.mode === "none") {
      debugLog(this.logging, "Nothing is written to stdout, releasing it");
      stdout.destroy();
      return true;
    }
    if (strategy.mode === "chunked") {
      debugLog(this.logging, `Reading stdout in chunks: ${strategy.reason}`);
    }

    this.demuxedStdout = stdout;
    this.workers.push(
      runDemuxer(stdout, strategy, this.channel.createSender(), this.logging).catch((err: unknown) => {
        this.logging.logger.error(formatLogMessage(this.logging, "Demuxer failed"), {
          code: "DEMUXER_ERROR",
          err: err instanceof Error ? err : undefined,
          detail: err,
        });
      })
    );
    return true;
  }

  private finish(): void {
    if (this.ended) return;
    this.ended = true;
    debugLog(this.logging, "Event sequence ended");
    this.emit("close");
  }
}
