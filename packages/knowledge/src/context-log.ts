import type { Utterance } from "@worldtalk/schemas";

/**
 * Append-only utterance history shared by every dialogue of an engine.
 *
 * Offsets are absolute: flushing drops the stored utterances but keeps
 * counting, so a reader that already processed them only sees what came
 * after the flush.
 */
export class ContextLog {
  private items: Utterance[] = [];
  private base = 0;

  /** Absolute offset one past the newest utterance. */
  get end(): number {
    return this.base + this.items.length;
  }

  /** Absolute offset of the oldest utterance still stored. */
  get start(): number {
    return this.base;
  }

  get length(): number {
    return this.items.length;
  }

  add(utterance: Utterance): number {
    this.items.push(utterance);
    return this.end - 1;
  }

  at(offset: number): Utterance | undefined {
    return offset < this.base ? undefined : this.items[offset - this.base];
  }

  /** Utterances from an absolute offset on. An offset past the end reads from the oldest stored one. */
  since(offset: number): readonly Utterance[] {
    if (offset > this.end) return [...this.items];
    return this.items.slice(Math.max(offset, this.base) - this.base);
  }

  all(): readonly Utterance[] {
    return this.items;
  }

  /** Drop every stored utterance. */
  flush(): void {
    this.base += this.items.length;
    this.items = [];
  }

  /** Cut the history back to an absolute offset taken with `end`. */
  truncate(offset: number): void {
    if (offset < this.base) {
      this.items = [];
      this.base = offset;
      return;
    }
    this.items.length = Math.min(this.items.length, offset - this.base);
  }
}
