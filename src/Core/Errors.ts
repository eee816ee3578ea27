/** Thrown by the command builder on arguments it cannot turn into tokens. */
export class FfmpegCommandValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FfmpegCommandValidationError";
  }
}

/** A line could not be interpreted, or was not valid UTF-8. */
export class LogParseError extends Error {
  constructor(message: string, public readonly line?: string) {
    super(message);
    this.name = "LogParseError";
  }
}

/** An event was folded into metadata that is already complete. */
export class MetadataSealedError extends Error {
  constructor() {
    super("Metadata is already completed");
    this.name = "MetadataSealedError";
  }
}

/** The event sequence ended before all output streams were described. */
export class MetadataIncompleteError extends Error {
  constructor(public readonly errors: string[]) {
    super(
      `Iterator ran out before metadata was gathered. The following errors occurred: ${errors.join("\n")}`
    );
    this.name = "MetadataIncompleteError";
  }
}

/** A stdio handle was already moved out through an escape hatch. */
export class HandleTakenError extends Error {
  constructor(handle: "stdin" | "stdout" | "stderr") {
    super(`No ${handle} channel: it was already taken, or the process was spawned without piping it`);
    this.name = "HandleTakenError";
  }
}
