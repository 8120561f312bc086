import { Command } from "commander";
import type { Logger } from "@worldtalk/schemas";
import { createLogger } from "@worldtalk/schemas";
import { DialogueEngine, RequestSampler } from "@worldtalk/dialogue";
import { TranscriptJournal } from "@worldtalk/journal";
import { loadWorld } from "@worldtalk/world";
import { envDefaults, parseKinds, parsePositiveInt, resolveWorldPath } from "./config.js";
import { bold, formatEntities, formatEvent, formatReport } from "./format.js";

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

export interface ProgramOptions {
  io?: CliIO;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  /** Throw a CommanderError instead of exiting the process. */
  exitOverride?: boolean;
}

interface RunOptions {
  count: string;
  seed: string;
  world: string;
  journal?: string;
  maxTurns?: string;
  kinds?: string;
  flushAfter?: string;
}

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export function createProgram(options: ProgramOptions = {}): Command {
  const io = options.io ?? consoleIO;
  const defaults = envDefaults(options.env);
  const logger = options.logger ?? createLogger("worldtalk");

  const program = new Command();
  program
    .name("worldtalk")
    .description("Rule-based dialogues between players of a small object world")
    .version("0.1.0")
    .configureOutput({
      writeOut: (text) => io.out(text.replace(/\n$/, "")),
      writeErr: (text) => io.err(text.replace(/\n$/, "")),
    });
  if (options.exitOverride) program.exitOverride();

  program.command("run").description("Run sampled dialogues and report the ones that failed")
    .option("-n, --count <n>", "Number of dialogues", "10")
    .option("--seed <seed>", "Seed for the world and the request sampler", defaults.seed)
    .option("--world <file>", "Layout file, or the name of a bundled layout", defaults.world)
    .option("--journal <file>", "Append transcripts to this JSONL journal", defaults.journal)
    .option("--max-turns <n>", "Rounds after which a dialogue is over", defaults.maxTurns)
    .option("--kinds <list>", "Comma-separated request kinds to sample")
    .option("--flush-after <n>", "Flush the shared context once it holds this many utterances")
    .action(async (opts: RunOptions) => {
      const count = parsePositiveInt(opts.count, "count");
      const maxEpisodeLength = opts.maxTurns !== undefined ? parsePositiveInt(opts.maxTurns, "max turns") : undefined;
      const flushAfter = opts.flushAfter !== undefined ? parsePositiveInt(opts.flushAfter, "flush size") : undefined;
      const kinds = opts.kinds !== undefined ? parseKinds(opts.kinds) : undefined;

      const world = await loadWorld(resolveWorldPath(opts.world), { seed: opts.seed });
      const engine = new DialogueEngine(world, { seed: opts.seed, maxEpisodeLength, logger });
      const sampler = new RequestSampler(world, { seed: opts.seed, kinds });

      let journal: TranscriptJournal | undefined;
      let unregister: (() => void) | undefined;
      if (opts.journal) {
        journal = new TranscriptJournal(opts.journal, { logger });
        await journal.init();
        unregister = journal.registerShutdownHandler();
      }
      try {
        const report = await engine.runBatch(count, { sampler, journal, flushAfter });
        for (const line of formatReport(report)) io.out(line);
      } finally {
        unregister?.();
        await journal?.close();
      }
    });

  program.command("describe").description("List the entities of a world")
    .option("--world <file>", "Layout file, or the name of a bundled layout", defaults.world)
    .action(async (opts: { world: string }) => {
      const world = await loadWorld(resolveWorldPath(opts.world));
      io.out(bold(`${world.name}: ${world.objects.length} entities`));
      for (const line of formatEntities(world)) io.out(line);
    });

  program.command("verify").description("Check the hash chain of a transcript journal")
    .argument("<journal>", "Journal file")
    .action(async (path: string) => {
      // Not init(): that would repair the file instead of reporting on it.
      const journal = new TranscriptJournal(path, { lock: false, logger });
      const integrity = await journal.verifyIntegrity();
      if (!integrity.valid) {
        program.error(`${path}: hash chain broken at event ${integrity.brokenAt}`, { exitCode: 1 });
      }
      const events = await journal.readAll();
      io.out(`${path}: ${events.length} events, hash chain intact`);
    });

  program.command("show").description("Print the transcript of one dialogue")
    .argument("<journal>", "Journal file")
    .argument("<dialogue>", "Dialogue id")
    .action(async (path: string, dialogueId: string) => {
      const journal = new TranscriptJournal(path, { lock: false, logger });
      const events = await journal.readDialogue(dialogueId);
      if (events.length === 0) {
        io.out(`No events found for dialogue ${dialogueId}`);
        return;
      }
      for (const event of events) io.out(formatEvent(event));
    });

  return program;
}
