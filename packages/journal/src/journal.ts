import { createHash } from "node:crypto";
import { appendFile, readFile, mkdir, writeFile, rename, open, unlink } from "node:fs/promises";
import { existsSync } from "node:fs";
import { dirname } from "node:path";
import { v4 as uuid } from "uuid";
import type { Logger, TranscriptEvent, TranscriptEventType } from "@worldtalk/schemas";
import { createLogger, isTranscriptEvent, validateTranscriptEventData } from "@worldtalk/schemas";

export interface TranscriptJournalOptions {
  fsync?: boolean;
  /** If true, acquire an advisory lockfile to prevent multi-process corruption. Default: true */
  lock?: boolean;
  /** How to handle corruption on init. "truncate" (default) keeps the valid prefix; "strict" throws. */
  recovery?: "truncate" | "strict";
  logger?: Logger;
}

export interface IntegrityReport {
  valid: boolean;
  brokenAt?: number;
}

function errnoCode(err: unknown): string | undefined {
  return err instanceof Error && "code" in err && typeof err.code === "string" ? err.code : undefined;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function splitLines(content: string): string[] {
  return content.trim().split("\n").filter(Boolean);
}

function joinLines(lines: readonly string[]): string {
  return lines.length > 0 ? lines.join("\n") + "\n" : "";
}

/** Parses one stored line, or returns undefined when it is not a transcript event. */
function parseLine(line: string): TranscriptEvent | undefined {
  let data: unknown;
  try {
    data = JSON.parse(line);
  } catch {
    return undefined;
  }
  return isTranscriptEvent(data) ? data : undefined;
}

function parseOrThrow(line: string, index: number): TranscriptEvent {
  const event = parseLine(line);
  if (!event) throw new Error(`Journal line ${index + 1} is not a transcript event`);
  return event;
}

async function removeIfPresent(path: string): Promise<void> {
  try {
    await unlink(path);
  } catch (err) {
    if (errnoCode(err) !== "ENOENT") throw err;
  }
}

/**
 * Append-only JSONL log of dialogue transcripts. Every line carries the
 * SHA-256 of the line before it, so an edited or reordered file is caught
 * by `verifyIntegrity` and repaired (or refused) on `init`.
 */
export class TranscriptJournal {
  private filePath: string;
  private lastHash: string | undefined;
  private writeLock: Promise<void> = Promise.resolve();
  private nextSeq = 0;
  private fsync: boolean;
  private lockEnabled: boolean;
  private lockPath: string;
  private locked = false;
  private recovery: "truncate" | "strict";
  private logger: Logger;

  constructor(filePath: string, options?: TranscriptJournalOptions) {
    this.filePath = filePath;
    this.fsync = options?.fsync ?? true;
    this.lockEnabled = options?.lock ?? true;
    this.lockPath = `${filePath}.lock`;
    this.recovery = options?.recovery ?? "truncate";
    this.logger = options?.logger ?? createLogger("journal");
  }

  get path(): string {
    return this.filePath;
  }

  async init(): Promise<void> {
    const dir = dirname(this.filePath);
    if (!existsSync(dir)) {
      await mkdir(dir, { recursive: true });
    }
    if (this.lockEnabled) {
      await this.acquireLock();
    }
    if (!existsSync(this.filePath)) return;

    const lines = splitLines(await readFile(this.filePath, "utf-8"));

    // A crash mid-append leaves a partial last line.
    if (lines.length > 0 && parseLine(lines[lines.length - 1]) === undefined) {
      lines.pop();
      await writeFile(this.filePath, joinLines(lines), "utf-8");
      this.logger.warn("truncated incomplete last line", { path: this.filePath });
    }

    let maxSeq = -1;
    let prevHash: string | undefined;
    for (let i = 0; i < lines.length; i++) {
      const event = parseLine(lines[i]);
      if (!event || (i > 0 && event.hash_prev !== prevHash)) {
        if (this.recovery === "strict") {
          throw new Error(`Journal integrity violation at event ${i}: hash chain broken`);
        }
        this.logger.error("recovered from corruption", { at: i, truncated: lines.length - i });
        const tmpPath = `${this.filePath}.tmp`;
        await writeFile(tmpPath, joinLines(lines.slice(0, i)), "utf-8");
        await rename(tmpPath, this.filePath);
        break;
      }
      prevHash = this.hash(lines[i]);
      if (event.seq !== undefined && event.seq > maxSeq) maxSeq = event.seq;
    }
    this.nextSeq = maxSeq + 1;
    this.lastHash = prevHash;
  }

  async emit(dialogueId: string, type: TranscriptEventType, payload: Record<string, unknown>): Promise<TranscriptEvent> {
    return this.exclusive(async () => {
      const seq = this.nextSeq;
      const event: TranscriptEvent = {
        event_id: uuid(),
        timestamp: new Date().toISOString(),
        dialogue_id: dialogueId,
        type,
        payload,
        ...(this.lastHash !== undefined ? { hash_prev: this.lastHash } : {}),
        seq,
      };

      const validation = validateTranscriptEventData(event);
      if (!validation.valid) {
        throw new Error(`Invalid transcript event: ${validation.errors.join(", ")}`);
      }

      const line = JSON.stringify(event);
      const lineHash = this.hash(line);
      await this.append(line + "\n");

      // Only update in-memory state after a successful write
      this.nextSeq = seq + 1;
      this.lastHash = lineHash;
      return event;
    });
  }

  async readAll(): Promise<TranscriptEvent[]> {
    return (await this.readLines()).map(parseOrThrow);
  }

  /** Events of one dialogue, in file order. */
  async readDialogue(dialogueId: string): Promise<TranscriptEvent[]> {
    return (await this.readAll()).filter((event) => event.dialogue_id === dialogueId);
  }

  async verifyIntegrity(): Promise<IntegrityReport> {
    const lines = await this.readLines();
    let prevHash: string | undefined;
    for (let i = 0; i < lines.length; i++) {
      const event = parseLine(lines[i]);
      if (!event || (i > 0 && event.hash_prev !== prevHash)) {
        return { valid: false, brokenAt: i };
      }
      prevHash = this.hash(lines[i]);
    }
    return { valid: true };
  }

  /**
   * Wait for any pending writes to complete. Call this before process exit
   * to ensure no transcript events are lost.
   */
  async close(): Promise<void> {
    await this.writeLock;
    if (this.lockEnabled && this.locked) {
      await removeIfPresent(this.lockPath);
      this.locked = false;
    }
  }

  /**
   * Register SIGINT/SIGTERM handlers that flush pending writes before exit.
   * Returns a cleanup function to remove the handlers.
   */
  registerShutdownHandler(): () => void {
    const handler = () => {
      void this.close().then(
        () => process.exit(0),
        (err: unknown) => {
          this.logger.error("close failed", { error: errorMessage(err) });
          process.exit(1);
        },
      );
    };
    process.on("SIGINT", handler);
    process.on("SIGTERM", handler);
    return () => {
      process.off("SIGINT", handler);
      process.off("SIGTERM", handler);
    };
  }

  private async exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const prev = this.writeLock;
    let release = (): void => undefined;
    this.writeLock = new Promise<void>((resolve) => {
      release = resolve;
    });
    await prev;
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private async append(content: string): Promise<void> {
    if (this.fsync) {
      const fh = await open(this.filePath, "a");
      try {
        await fh.write(content, undefined, "utf-8");
        await fh.sync();
      } finally {
        await fh.close();
      }
    } else {
      await appendFile(this.filePath, content, "utf-8");
    }
  }

  private async readLines(): Promise<string[]> {
    if (!existsSync(this.filePath)) return [];
    return splitLines(await readFile(this.filePath, "utf-8"));
  }

  private hash(data: string): string {
    return createHash("sha256").update(data).digest("hex");
  }

  private async acquireLock(): Promise<void> {
    try {
      const fh = await open(this.lockPath, "wx");
      await fh.write(String(process.pid), undefined, "utf-8");
      await fh.close();
      this.locked = true;
      return;
    } catch (err) {
      if (errnoCode(err) !== "EEXIST") throw err;
    }

    // Lock file exists: it is stale unless its owner is still running
    const pid = Number.parseInt((await readFile(this.lockPath, "utf-8")).trim(), 10);
    if (!Number.isNaN(pid)) {
      try {
        process.kill(pid, 0);
      } catch (err) {
        if (errnoCode(err) !== "ESRCH") throw err;
        await removeIfPresent(this.lockPath);
        return this.acquireLock();
      }
      throw new Error(`Journal is locked by process ${pid} (lockfile: ${this.lockPath})`);
    }
    await removeIfPresent(this.lockPath);
    return this.acquireLock();
  }
}
