export const THINK_OPEN = '<think>';
export const THINK_CLOSE = '</think>';

/** Length of the longest strict prefix of any marker that `text` ends with. */
export function partialMarkerLength(text: string, markers: readonly string[]): number {
  let best = 0;
  for (const marker of markers) {
    for (let n = Math.min(marker.length - 1, text.length); n > best; n--) {
      if (text.endsWith(marker.slice(0, n))) {
        best = n;
        break;
      }
    }
  }
  return best;
}

/**
 * Splits streamed model text into visible output and private deliberation
 * delimited by <think>...</think>. Markers may arrive split across chunks,
 * and the inside/outside state carries over between model calls of the
 * same stream.
 */
export class ReasoningFilter {
  private buffer = '';
  private inside = false;
  private reasoning = '';

  constructor(private open = THINK_OPEN, private close = THINK_CLOSE) {}

  get isInside(): boolean {
    return this.inside;
  }

  /** Feeds one chunk and returns whatever became visible. */
  push(chunk: string): string {
    this.buffer += chunk;
    let visible = '';

    for (;;) {
      if (this.inside) {
        const end = this.buffer.indexOf(this.close);
        if (end !== -1) {
          this.reasoning += this.buffer.slice(0, end);
          this.buffer = this.buffer.slice(end + this.close.length);
          this.inside = false;
          continue;
        }
        const hold = partialMarkerLength(this.buffer, [this.close]);
        this.reasoning += this.buffer.slice(0, this.buffer.length - hold);
        this.buffer = this.buffer.slice(this.buffer.length - hold);
        return visible;
      }

      const start = this.buffer.indexOf(this.open);
      const end = this.buffer.indexOf(this.close);
      if (start !== -1 && (end === -1 || start < end)) {
        visible += this.buffer.slice(0, start);
        this.buffer = this.buffer.slice(start + this.open.length);
        this.inside = true;
        continue;
      }
      if (end !== -1) {
        // Closing marker without an opener: the text before it was deliberation.
        this.reasoning += this.buffer.slice(0, end);
        this.buffer = this.buffer.slice(end + this.close.length);
        continue;
      }
      const hold = partialMarkerLength(this.buffer, [this.open, this.close]);
      visible += this.buffer.slice(0, this.buffer.length - hold);
      this.buffer = this.buffer.slice(this.buffer.length - hold);
      return visible;
    }
  }

  /** Returns the deliberation collected since the last call and clears it. */
  takeReasoning(): string {
    const out = this.reasoning;
    this.reasoning = '';
    return out;
  }

  /**
   * End of stream. An unterminated deliberation span is kept as reasoning;
   * outside, a held marker prefix can no longer complete and is dropped.
   */
  flush(): string {
    let visible = '';
    if (this.inside) {
      this.reasoning += this.buffer;
    } else {
      const hold = partialMarkerLength(this.buffer, [this.open, this.close]);
      visible = this.buffer.slice(0, this.buffer.length - hold);
    }
    this.buffer = '';
    this.inside = false;
    return visible;
  }
}
