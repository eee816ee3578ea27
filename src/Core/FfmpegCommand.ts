import { execa } from "execa";
import type { FfmpegCommandOptions } from "../Types/index.js";
import { FfmpegCommandValidationError } from "./Errors.js";
import { FFMPEG_SPAWN_OPTIONS, FfmpegChild } from "./FfmpegChild.js";
import { debugLog, formatLogMessage, resolveLogging, type ResolvedLogging } from "./Logging.js";

/** Explicit path, then `FFMPEG_PATH`, then `ffmpeg` on PATH. */
export function resolveFfmpegPath(explicit?: string): string {
  if (explicit) return explicit;
  const fromEnv = process.env.FFMPEG_PATH;
  return fromEnv && fromEnv.trim() ? fromEnv : "ffmpeg";
}

function requireText(method: string, value: string): string {
  if (typeof value !== "string" || !value.trim()) {
    throw new FfmpegCommandValidationError(`${method}(): requires a non-empty string`);
  }
  return value;
}

function requirePositive(method: string, value: number, integer = false): string {
  if (!Number.isFinite(value) || value <= 0 || (integer && !Number.isInteger(value))) {
    throw new FfmpegCommandValidationError(
      `${method}(): expected a positive ${integer ? "integer" : "number"}, got ${value}`
    );
  }
  return String(value);
}

/**
 * Builds an ffmpeg argument list and spawns it with every stdio channel piped.
 *
 * Every command starts with `-loglevel level+info`, which tags each log line
 * with its level so the event parser can tell warnings from errors.
 *
 * @example
 * ```ts
 * const child = new FfmpegCommand().testsrc().rawvideo().spawn();
 * for await (const frame of child.iter().filterFrames()) {
 *   console.log(frame.width, frame.height, frame.timestamp);
 * }
 * ```
 */
export class FfmpegCommand {
  private readonly tokens: string[] = ["-loglevel", "level+info"];
  private readonly ffmpegPath: string;
  private readonly logging: ResolvedLogging;

  constructor(private readonly options: FfmpegCommandOptions = {}) {
    this.ffmpegPath = resolveFfmpegPath(options.ffmpegPath);
    this.logging = resolveLogging(options);
  }

  /** `-hide_banner`: no copyright notice, build options or library versions. */
  public hideBanner(): this {
    return this.arg("-hide_banner");
  }

  /** `-f`: force the format of the next input or output. */
  public format(format: string): this {
    return this.args("-f", requireText("format", format));
  }

  /** `-i`: input path or URL; `-` or `pipe:0` reads stdin. */
  public input(pathOrUrl: string): this {
    return this.args("-i", requireText("input", pathOrUrl));
  }

  /** Output path or URL; `-` or `pipe:1` writes to stdout. */
  public output(pathOrUrl: string): this {
    return this.arg(requireText("output", pathOrUrl));
  }

  /** `-y`: overwrite output files without asking. */
  public overwrite(): this {
    return this.arg("-y");
  }

  /** `-n`: never overwrite; exit if an output file exists. */
  public noOverwrite(): this {
    return this.arg("-n");
  }

  /** `-c:v`; `copy` skips re-encoding. */
  public codecVideo(codec: string): this {
    return this.args("-c:v", requireText("codecVideo", codec));
  }

  /** `-c:a`; `copy` skips re-encoding. */
  public codecAudio(codec: string): this {
    return this.args("-c:a", requireText("codecAudio", codec));
  }

  /** `-t`: limit the duration read from an input or written to an output. */
  public duration(duration: string | number): this {
    return this.args("-t", String(duration));
  }

  /** `-to`: stop reading or writing at this position. */
  public to(position: string | number): this {
    return this.args("-to", String(position));
  }

  /** `-fs`: stop writing once the output reaches this many bytes. */
  public limitFileSize(sizeInBytes: number): this {
    return this.args("-fs", requirePositive("limitFileSize", sizeInBytes, true));
  }

  /** `-ss`: seek the next input, or discard output up to this position. */
  public seek(position: string | number): this {
    return this.args("-ss", String(position));
  }

  /** `-sseof`: like {@link seek} but relative to the end of the input. */
  public seekEof(position: string | number): this {
    return this.args("-sseof", String(position));
  }

  /** `-filter`: simple single-input, single-output filtergraph. */
  public filter(filtergraph: string): this {
    return this.args("-filter", requireText("filter", filtergraph));
  }

  /** `-frames:v`: stop after this many video frames. */
  public frames(count: number): this {
    return this.args("-frames:v", requirePositive("frames", count, true));
  }

  /** `-r`: frame rate. */
  public rate(fps: number): this {
    return this.args("-r", requirePositive("rate", fps));
  }

  /** `-s`: frame size. */
  public size(width: number, height: number): this {
    requirePositive("size", width, true);
    requirePositive("size", height, true);
    return this.args("-s", `${width}x${height}`);
  }

  /** `-vn` */
  public noVideo(): this {
    return this.arg("-vn");
  }

  /** `-an` */
  public noAudio(): this {
    return this.arg("-an");
  }

  /** `-pix_fmt`, e.g. `rgb24`, `yuv420p`. */
  public pixFmt(format: string): this {
    return this.args("-pix_fmt", requireText("pixFmt", format));
  }

  /** `-hwaccel`, e.g. `auto`, `cuda`, `videotoolbox`. */
  public hwaccel(hwaccel: string): this {
    return this.args("-hwaccel", requireText("hwaccel", hwaccel));
  }

  /** `-map`: select input streams for the next output. */
  public map(mapSpec: string): this {
    return this.args("-map", requireText("map", mapSpec));
  }

  /** `-readrate`: read inputs at this multiple of their native rate. */
  public readrate(speed: number): this {
    return this.args("-readrate", requirePositive("readrate", speed));
  }

  /** `-re`: read inputs at their native frame rate. */
  public realtime(): this {
    return this.arg("-re");
  }

  /** `-fps_mode`, e.g. `passthrough`, `cfr`, `vfr`. */
  public fpsMode(mode: string): this {
    return this.args("-fps_mode", requireText("fpsMode", mode));
  }

  /** `-bsf:v`: comma-separated bitstream filters. */
  public bitstreamFilterVideo(filters: string): this {
    return this.args("-bsf:v", requireText("bitstreamFilterVideo", filters));
  }

  /** `-filter_complex`: filtergraph with any number of inputs and outputs. */
  public filterComplex(filtergraph: string): this {
    return this.args("-filter_complex", requireText("filterComplex", filtergraph));
  }

  /** Ten seconds of the generated `testsrc` pattern as input. */
  public testsrc(): this {
    return this.args("-f", "lavfi", "-i", "testsrc=duration=10");
  }

  /** Decoded rgb24 frames on stdout. */
  public rawvideo(): this {
    return this.args("-f", "rawvideo", "-pix_fmt", "rgb24", "-");
  }

  /** Output to stdout. */
  public pipeStdout(): this {
    return this.arg("-");
  }

  public arg(arg: string): this {
    this.tokens.push(arg);
    return this;
  }

  public args(...args: string[]): this {
    this.tokens.push(...args);
    return this;
  }

  public getArgs(): string[] {
    return [...this.tokens];
  }

  public getFfmpegPath(): string {
    return this.ffmpegPath;
  }

  /** The command line, ready to paste into a shell for simple arguments. */
  public toString(): string {
    return [this.ffmpegPath, ...this.tokens].join(" ");
  }

  /** Starts ffmpeg. `abortSignal` from the options terminates it. */
  public spawn(): FfmpegChild {
    const args = this.getArgs();
    this.options.onBeforeChildProcessSpawn?.(this.ffmpegPath, args);
    debugLog(this.logging, `Starting ffmpeg process: ${this.toString()}`);

    const child = new FfmpegChild(execa(this.ffmpegPath, args, FFMPEG_SPAWN_OPTIONS), this.options);

    const { abortSignal } = this.options;
    if (abortSignal) {
      const onAbort = (): void => {
        this.logging.logger.warn(formatLogMessage(this.logging, "Aborted, terminating ffmpeg"), {
          code: "ABORTED",
        });
        child.kill("SIGTERM");
      };
      if (abortSignal.aborted) {
        onAbort();
      } else {
        abortSignal.addEventListener("abort", onAbort, { once: true });
        child.once("exit", () => abortSignal.removeEventListener("abort", onAbort));
      }
    }

    return child;
  }
}
