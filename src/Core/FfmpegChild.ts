import { EventEmitter } from "eventemitter3";
import type { Options, ResultPromise } from "execa";
import type { Readable, Writable } from "node:stream";
import type {
  FfmpegChildEvents,
  FfmpegExitStatus,
  FfmpegIteratorOptions,
  LoggingOptions,
} from "../Types/index.js";
import { HandleTakenError } from "./Errors.js";
import { FfmpegIterator } from "./FfmpegIterator.js";
import { debugLog, formatLogMessage, resolveLogging, type ResolvedLogging } from "./Logging.js";

/** stdio is always fully piped; output is streamed, never collected. */
export const FFMPEG_SPAWN_OPTIONS = {
  reject: false,
  buffer: false,
  stdin: "pipe",
  stdout: "pipe",
  stderr: "pipe",
} as const satisfies Options;

export type FfmpegSubprocess = ResultPromise<typeof FFMPEG_SPAWN_OPTIONS>;

/**
 * A running ffmpeg process with all three stdio channels piped.
 *
 * Each channel can be moved out exactly once, either by one of the `take*`
 * methods or by {@link FfmpegChild.iter}, which claims stderr and stdout.
 */
export class FfmpegChild extends EventEmitter<FfmpegChildEvents> {
  private stdin: Writable | null;
  private stdout: Readable | null;
  private stderr: Readable | null;
  private readonly exited: Promise<FfmpegExitStatus>;
  private readonly logging: ResolvedLogging;
  private readonly loggingOptions: LoggingOptions;

  constructor(private readonly inner: FfmpegSubprocess, options: LoggingOptions = {}) {
    super();
    this.loggingOptions = options;
    this.logging = resolveLogging(options);
    this.stdin = inner.stdin ?? null;
    this.stdout = inner.stdout ?? null;
    this.stderr = inner.stderr ?? null;

    this.exited = inner.then(
      (result) => this.onExit({ exitCode: result.exitCode ?? null, signal: result.signal ?? null }),
      (err: unknown) => {
        this.logging.logger.error(formatLogMessage(this.logging, "ffmpeg process failed"), {
          code: "PROCESS_ERROR",
          err: err instanceof Error ? err : undefined,
          detail: err,
        });
        return this.onExit({ exitCode: null, signal: null });
      }
    );
  }

  public get pid(): number | undefined {
    return this.inner.pid;
  }

  /**
   * Event iterator over this process. Claims stderr, and stdout unless it was
   * already taken, in which case no frame or chunk events are produced.
   */
  public iter(options: FfmpegIteratorOptions = {}): FfmpegIterator {
    const stderr = this.takeStderr();
    if (!stderr) throw new HandleTakenError("stderr");
    return new FfmpegIterator(
      { stderr, stdout: this.takeStdout(), terminate: () => this.kill() },
      { ...this.loggingOptions, ...options }
    );
  }

  public takeStdin(): Writable | null {
    const stdin = this.stdin;
    this.stdin = null;
    return stdin;
  }

  public takeStdout(): Readable | null {
    const stdout = this.stdout;
    this.stdout = null;
    return stdout;
  }

  public takeStderr(): Readable | null {
    const stderr = this.stderr;
    this.stderr = null;
    return stderr;
  }

  /**
   * Asks ffmpeg to finish gracefully by sending `q` on stdin. Outputs are
   * finalized, so a partially written file stays playable.
   */
  public quit(): Promise<void> {
    const stdin = this.stdin;
    if (!stdin) return Promise.reject(new HandleTakenError("stdin"));
    debugLog(this.logging, "Sending quit command");
    return new Promise((resolve, reject) => {
      stdin.write("q\n", (err) => (err ? reject(err) : resolve()));
    });
  }

  /** Terminates the process without letting it finalize outputs. */
  public kill(signal: NodeJS.Signals = "SIGKILL"): boolean {
    debugLog(this.logging, `Killing process with signal ${signal}`);
    return this.inner.kill(signal);
  }

  /** Resolves once the process has exited; never rejects. */
  public wait(): Promise<FfmpegExitStatus> {
    return this.exited;
  }

  /** The underlying execa subprocess. */
  public asInner(): FfmpegSubprocess {
    return this.inner;
  }

  private onExit(status: FfmpegExitStatus): FfmpegExitStatus {
    debugLog(
      this.logging,
      `ffmpeg exited with code ${status.exitCode ?? "none"}${status.signal ? ` (${status.signal})` : ""}`
    );
    this.emit("exit", status);
    return status;
  }
}
