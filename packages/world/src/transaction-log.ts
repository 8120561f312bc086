import { InvariantError } from "@worldtalk/schemas";
import type { UndoRecord } from "./entity.js";

/** Anything that keeps its own view of the rollbacks pending against it. */
export interface UndoScope {
  readonly undoStack: UndoRecord[];
}

interface LogEntry {
  undo: UndoRecord;
  scopes: readonly UndoScope[];
}

/** Opaque position in a TransactionLog. Only the log that issued it accepts it back. */
export class Checkpoint {
  /** @internal */
  constructor(
    readonly owner: TransactionLog,
    readonly position: number,
  ) {}

  isBefore(other: Checkpoint): boolean {
    this.assertComparable(other);
    return this.position < other.position;
  }

  equals(other: Checkpoint): boolean {
    return this.owner === other.owner && this.position === other.position;
  }

  private assertComparable(other: Checkpoint): void {
    if (other.owner !== this.owner) {
      throw new InvariantError("FOREIGN_CHECKPOINT", "checkpoints from different logs are not comparable");
    }
  }
}

/**
 * Append-only list of rollbacks. `recover` runs everything after a checkpoint
 * newest first, then truncates.
 */
export class TransactionLog {
  private entries: LogEntry[] = [];

  get length(): number {
    return this.entries.length;
  }

  push(undo: UndoRecord, scopes: readonly UndoScope[] = []): void {
    this.entries.push({ undo, scopes });
    for (const scope of scopes) scope.undoStack.push(undo);
  }

  save(): Checkpoint {
    return new Checkpoint(this, this.entries.length);
  }

  recover(checkpoint: Checkpoint): void {
    if (checkpoint.owner !== this) {
      throw new InvariantError("FOREIGN_CHECKPOINT", "checkpoint was issued by another transaction log");
    }
    if (checkpoint.position > this.entries.length) {
      throw new InvariantError(
        "STALE_CHECKPOINT",
        `checkpoint at ${checkpoint.position} is past the log length ${this.entries.length}`,
      );
    }
    for (let i = this.entries.length - 1; i >= checkpoint.position; i--) {
      const entry = this.entries[i];
      for (const scope of entry.scopes) {
        if (scope.undoStack.pop() !== entry.undo) {
          throw new InvariantError("UNDO_OUT_OF_ORDER", "undo record is not on top of its entity's stack");
        }
      }
      entry.undo();
    }
    this.entries.length = checkpoint.position;
  }

  /** Forget every record without running it; the current state becomes the baseline. */
  clear(): void {
    for (const entry of this.entries) {
      for (const scope of entry.scopes) scope.undoStack.length = 0;
    }
    this.entries = [];
  }
}
