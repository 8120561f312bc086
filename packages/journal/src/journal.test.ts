import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { appendFile, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import type { Logger, TranscriptEvent } from "@worldtalk/schemas";
import { TranscriptJournal, type TranscriptJournalOptions } from "./journal.js";

const silent: Logger = { info: () => undefined, warn: () => undefined, error: () => undefined, debug: () => undefined };

let dir: string;
let file: string;

function journalAt(options: TranscriptJournalOptions = {}): TranscriptJournal {
  return new TranscriptJournal(file, { fsync: false, lock: false, logger: silent, ...options });
}

/** Rewrites one stored line through `edit`. */
async function tamper(index: number, edit: (event: Record<string, unknown>) => void): Promise<void> {
  const lines = (await readFile(file, "utf-8")).trim().split("\n");
  const parsed: Record<string, unknown> = JSON.parse(lines[index]);
  edit(parsed);
  lines[index] = JSON.stringify(parsed);
  await writeFile(file, lines.join("\n") + "\n", "utf-8");
}

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "worldtalk-journal-"));
  file = join(dir, "transcripts", "batch.jsonl");
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("TranscriptJournal", () => {
  it("creates the directory and appends events", async () => {
    const journal = journalAt();
    await journal.init();
    const event = await journal.emit("dia-1", "dialogue.started", { user: "player2" });

    expect(event.event_id).toBeTruthy();
    expect(event.dialogue_id).toBe("dia-1");
    expect(event.type).toBe("dialogue.started");
    expect(event.payload).toEqual({ user: "player2" });
    expect(event.seq).toBe(0);
    expect(event.hash_prev).toBeUndefined();
    expect(existsSync(file)).toBe(true);
    expect(journal.path).toBe(file);
  });

  it("reads events back in order", async () => {
    const journal = journalAt();
    await journal.init();
    await journal.emit("dia-1", "dialogue.started", {});
    await journal.emit("dia-1", "utterance.added", { index: 0 });
    await journal.emit("dia-2", "dialogue.started", {});

    const all = await journal.readAll();
    expect(all.map((e) => [e.dialogue_id, e.type, e.seq])).toEqual([
      ["dia-1", "dialogue.started", 0],
      ["dia-1", "utterance.added", 1],
      ["dia-2", "dialogue.started", 2],
    ]);
  });

  it("reads the events of one dialogue", async () => {
    const journal = journalAt();
    await journal.init();
    await journal.emit("dia-1", "dialogue.started", {});
    await journal.emit("dia-2", "dialogue.started", {});
    await journal.emit("dia-1", "utterance.added", { index: 0 });
    await journal.emit("dia-1", "dialogue.finished", { reward: 1 });

    const events = await journal.readDialogue("dia-1");
    expect(events.map((e) => e.type)).toEqual(["dialogue.started", "utterance.added", "dialogue.finished"]);
    expect(await journal.readDialogue("dia-2")).toHaveLength(1);
    expect(await journal.readDialogue("dia-3")).toEqual([]);
  });

  it("rejects events the schema does not allow", async () => {
    const journal = journalAt();
    await journal.init();
    await expect(journal.emit("", "dialogue.started", {})).rejects.toThrow("Invalid transcript event");
    expect(await journal.readAll()).toEqual([]);
  });

  it("returns an empty list before anything was written", async () => {
    const journal = journalAt();
    await journal.init();
    expect(await journal.readAll()).toEqual([]);
    expect(await journal.verifyIntegrity()).toEqual({ valid: true });
  });
});

describe("TranscriptJournal hash chain", () => {
  it("links every event to the one before", async () => {
    const journal = journalAt();
    await journal.init();
    const first = await journal.emit("dia-1", "dialogue.started", {});
    const second = await journal.emit("dia-1", "dialogue.finished", { reward: 1 });

    expect(first.hash_prev).toBeUndefined();
    expect(second.hash_prev).toMatch(/^[0-9a-f]{64}$/);
    expect(await journal.verifyIntegrity()).toEqual({ valid: true });
  });

  it("finds an edited event", async () => {
    const journal = journalAt();
    await journal.init();
    await journal.emit("dia-1", "dialogue.started", {});
    await journal.emit("dia-1", "utterance.added", { text: "the medium person tries to go south" });
    await journal.emit("dia-1", "dialogue.finished", { reward: 1 });

    await tamper(1, (event) => {
      event.payload = { text: "the medium person goes north" };
    });
    expect(await journal.verifyIntegrity()).toEqual({ valid: false, brokenAt: 2 });
  });

  it("keeps the chain intact under concurrent emits", async () => {
    const journal = journalAt();
    await journal.init();
    await Promise.all(
      Array.from({ length: 12 }, (_, i) => journal.emit(`dia-${i % 3}`, "utterance.added", { index: i })),
    );

    const events = await journal.readAll();
    expect(events.map((e) => e.seq)).toEqual(Array.from({ length: 12 }, (_, i) => i));
    expect(await journal.verifyIntegrity()).toEqual({ valid: true });
  });

  it("resumes the chain and the sequence when reopened", async () => {
    const first = journalAt();
    await first.init();
    await first.emit("dia-1", "dialogue.started", {});
    await first.emit("dia-1", "dialogue.finished", { reward: 1 });
    await first.close();

    const second = journalAt();
    await second.init();
    const event = await second.emit("dia-2", "dialogue.started", {});
    expect(event.seq).toBe(2);
    expect(await second.readDialogue("dia-1")).toHaveLength(2);
    expect(await second.verifyIntegrity()).toEqual({ valid: true });
  });
});

describe("TranscriptJournal recovery", () => {
  async function seed(count: number): Promise<void> {
    const journal = journalAt();
    await journal.init();
    for (let i = 0; i < count; i++) await journal.emit("dia-1", "utterance.added", { index: i });
    await journal.close();
  }

  it("drops a partial last line", async () => {
    await seed(2);
    await appendFile(file, '{"incomplete');

    const journal = journalAt();
    await journal.init();
    expect(await journal.readAll()).toHaveLength(2);

    await journal.emit("dia-1", "dialogue.finished", { reward: 1 });
    expect(await journal.verifyIntegrity()).toEqual({ valid: true });
    expect(await journal.readAll()).toHaveLength(3);
  });

  it("keeps the valid prefix of a broken chain", async () => {
    await seed(5);
    await tamper(3, (event) => {
      event.hash_prev = "0".repeat(64);
    });

    const journal = journalAt();
    await journal.init();
    const events = await journal.readAll();
    expect(events.map((e: TranscriptEvent) => e.payload.index)).toEqual([0, 1, 2]);
    expect(await journal.verifyIntegrity()).toEqual({ valid: true });
    expect(existsSync(`${file}.tmp`)).toBe(false);

    const next = await journal.emit("dia-1", "dialogue.finished", { reward: 1 });
    expect(next.seq).toBe(3);
  });

  it("refuses a broken chain in strict mode", async () => {
    await seed(3);
    await tamper(1, (event) => {
      event.hash_prev = "bad";
    });

    const journal = journalAt({ recovery: "strict" });
    await expect(journal.init()).rejects.toThrow("Journal integrity violation at event 1");
  });

  it("starts over when no line survives", async () => {
    await seed(0);
    await writeFile(file, '{"broken\n', "utf-8");

    const journal = journalAt();
    await journal.init();
    expect(await journal.readAll()).toEqual([]);
    const event = await journal.emit("dia-1", "dialogue.started", {});
    expect(event.seq).toBe(0);
    expect(event.hash_prev).toBeUndefined();
  });
});

describe("TranscriptJournal writes", () => {
  it("writes with fsync enabled", async () => {
    const journal = journalAt({ fsync: true });
    await journal.init();
    await journal.emit("dia-1", "dialogue.started", {});
    expect(await journal.readAll()).toHaveLength(1);
  });

  it("waits for pending writes on close", async () => {
    const journal = journalAt();
    await journal.init();
    const writes = Array.from({ length: 8 }, (_, i) => journal.emit(`dia-${i}`, "dialogue.started", {}));
    await journal.close();
    await Promise.all(writes);
    expect(await journal.readAll()).toHaveLength(8);
  });
});

describe("TranscriptJournal lockfile", () => {
  it("holds the lock with its own pid until closed", async () => {
    const journal = journalAt({ lock: true });
    await journal.init();
    expect(Number.parseInt(await readFile(`${file}.lock`, "utf-8"), 10)).toBe(process.pid);

    await journal.close();
    expect(existsSync(`${file}.lock`)).toBe(false);
  });

  it("refuses a second writer", async () => {
    const first = journalAt({ lock: true });
    await first.init();
    await expect(journalAt({ lock: true }).init()).rejects.toThrow(/Journal is locked by process/);
    await first.close();
  });

  it("takes over a stale lock", async () => {
    await journalAt().init();
    await writeFile(`${file}.lock`, "2147483647", "utf-8");

    const journal = journalAt({ lock: true });
    await journal.init();
    expect(Number.parseInt(await readFile(`${file}.lock`, "utf-8"), 10)).toBe(process.pid);
    await journal.close();
  });

  it("registers and removes shutdown handlers", async () => {
    const journal = journalAt();
    await journal.init();
    const before = process.listenerCount("SIGTERM");
    const cleanup = journal.registerShutdownHandler();
    expect(process.listenerCount("SIGTERM")).toBe(before + 1);
    cleanup();
    expect(process.listenerCount("SIGTERM")).toBe(before);
  });
});
