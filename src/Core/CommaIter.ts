/**
 * Iterates comma-separated parts of a string, ignoring commas inside
 * parentheses (one level deep), e.g. `yuv444p(tv, progressive), 320x240`
 * yields `yuv444p(tv, progressive)` then ` 320x240`.
 *
 * Parts keep their surrounding whitespace; callers trim as needed.
 */
export class CommaIter implements IterableIterator<string> {
  private position = 0;

  constructor(private readonly source: string) {}

  public next(): IteratorResult<string> {
    const start = this.position;
    let i = start;
    while (i < this.source.length) {
      const char = this.source[i];
      if (char === "(") {
        const close = this.source.indexOf(")", i + 1);
        i = close === -1 ? this.source.length : close + 1;
        continue;
      }
      if (char === ",") break;
      i++;
    }

    if (i === start) {
      // Nothing left, or an empty part right at a comma: both end the iteration.
      this.position = this.source.length;
      return { done: true, value: undefined };
    }

    this.position = Math.min(i + 1, this.source.length);
    return { done: false, value: this.source.slice(start, i) };
  }

  /** Next part, or `undefined` when exhausted. */
  public nextPart(): string | undefined {
    const result = this.next();
    return result.done ? undefined : result.value;
  }

  /** Remaining text that has not been consumed yet. */
  public rest(): string {
    return this.source.slice(this.position);
  }

  [Symbol.iterator](): IterableIterator<string> {
    return this;
  }
}
