import type {
  FfmpegEvent,
  FfmpegInput,
  FfmpegMetadataSnapshot,
  FfmpegOutput,
  Stream,
} from "../Types/index.js";
import { MetadataSealedError } from "./Errors.js";

const STDOUT_ALIASES: ReadonlySet<string> = new Set(["-", "pipe", "pipe:", "pipe:1"]);

/** Whether an output destination is this process's standard output. */
export function isStdoutDestination(to: string): boolean {
  return STDOUT_ALIASES.has(to);
}

function freezeStream(stream: Readonly<Stream>): Readonly<Stream> {
  return Object.freeze({
    ...stream,
    typeSpecificData: Object.freeze({ ...stream.typeSpecificData }),
  });
}

/** What the iterator exposes of its aggregate: queries only, every list a frozen copy. */
export interface FfmpegMetadataView {
  readonly expectedOutputStreams: number;
  readonly inputs: readonly Readonly<FfmpegInput>[];
  readonly outputs: readonly Readonly<FfmpegOutput>[];
  readonly inputStreams: readonly Readonly<Stream>[];
  readonly outputStreams: readonly Readonly<Stream>[];
  isCompleted(): boolean;
  duration(): number | undefined;
  snapshot(): FfmpegMetadataSnapshot;
}

/**
 * Folds the preamble events of an ffmpeg run into a description of its inputs,
 * outputs and stream layouts.
 *
 * Completion is reached once as many output streams have been seen as there
 * were `Stream mapping` lines; from then on the aggregate is immutable.
 */
export class FfmpegMetadata implements FfmpegMetadataView {
  /** One per stream-mapping line seen. */
  private mappedStreams = 0;
  private readonly inputList: FfmpegInput[] = [];
  private readonly outputList: FfmpegOutput[] = [];
  private readonly inputStreamList: Readonly<Stream>[] = [];
  private readonly outputStreamList: Readonly<Stream>[] = [];

  private completed = false;

  public get expectedOutputStreams(): number {
    return this.mappedStreams;
  }

  public get inputs(): readonly Readonly<FfmpegInput>[] {
    return Object.freeze(this.inputList.map((i) => Object.freeze({ ...i })));
  }

  public get outputs(): readonly Readonly<FfmpegOutput>[] {
    return Object.freeze(this.outputList.map((o) => Object.freeze({ ...o })));
  }

  public get inputStreams(): readonly Readonly<Stream>[] {
    return Object.freeze(this.inputStreamList.map(freezeStream));
  }

  public get outputStreams(): readonly Readonly<Stream>[] {
    return Object.freeze(this.outputStreamList.map(freezeStream));
  }

  public isCompleted(): boolean {
    return this.completed;
  }

  /**
   * Duration of the first input in seconds, if one was reported.
   * Durations of further inputs are not reconciled.
   */
  public duration(): number | undefined {
    return this.inputList[0]?.duration;
  }

  public handleEvent(event: FfmpegEvent): void {
    if (this.completed) {
      throw new MetadataSealedError();
    }

    switch (event.type) {
      case "parsedInput":
        this.inputList.push({ ...event.input });
        break;
      case "parsedDuration": {
        const input = this.inputList.find((i) => i.index === event.duration.inputIndex);
        if (!input) {
          throw new Error(`Duration reported for undeclared input #${event.duration.inputIndex}`);
        }
        input.duration = event.duration.duration;
        break;
      }
      case "parsedOutput":
        this.outputList.push({ ...event.output });
        break;
      case "parsedStreamMapping":
        this.mappedStreams += 1;
        break;
      case "parsedInputStream":
        if (!this.inputList.some((i) => i.index === event.stream.parentIndex)) {
          throw new Error(`Stream #${event.stream.parentIndex}:${event.stream.streamIndex} belongs to an undeclared input`);
        }
        // the event goes on to the consumer; keep a copy it cannot reach
        this.inputStreamList.push(freezeStream(event.stream));
        break;
      case "parsedOutputStream":
        if (!this.outputList.some((o) => o.index === event.stream.parentIndex)) {
          throw new Error(`Stream #${event.stream.parentIndex}:${event.stream.streamIndex} belongs to an undeclared output`);
        }
        this.outputStreamList.push(freezeStream(event.stream));
        break;
      default:
        return;
    }

    this.completed = this.mappedStreams > 0 && this.outputStreamList.length === this.mappedStreams;
  }

  /** Frozen copy handed across the worker boundary once complete. */
  public snapshot(): FfmpegMetadataSnapshot {
    return Object.freeze({
      expectedOutputStreams: this.mappedStreams,
      inputs: this.inputs,
      outputs: this.outputs,
      inputStreams: this.inputStreams,
      outputStreams: this.outputStreams,
    });
  }
}
