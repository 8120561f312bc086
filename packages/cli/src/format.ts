// Pure formatting for the worldtalk CLI. No I/O.

import type { TranscriptEvent } from "@worldtalk/schemas";
import type { BatchReport } from "@worldtalk/dialogue";
import { type World, nounPhrase } from "@worldtalk/world";

// ANSI color helpers
export const dim = (s: string): string => `\x1b[2m${s}\x1b[0m`;
export const green = (s: string): string => `\x1b[32m${s}\x1b[0m`;
export const red = (s: string): string => `\x1b[31m${s}\x1b[0m`;
export const yellow = (s: string): string => `\x1b[33m${s}\x1b[0m`;
export const cyan = (s: string): string => `\x1b[36m${s}\x1b[0m`;
export const bold = (s: string): string => `\x1b[1m${s}\x1b[0m`;

export const ID_COLUMN = 20;

export function colorForType(type: string): (s: string) => string {
  if (type === "dialogue.finished" || type === "batch.summary") return green;
  if (type.includes("failed")) return red;
  return cyan;
}

export function successRate(report: Pick<BatchReport, "total" | "succeeded">): string {
  return report.total > 0 ? ((report.succeeded / report.total) * 100).toFixed(1) : "0.0";
}

/** Summary line, then every failed dialogue with its transcript. */
export function formatReport(report: BatchReport): string[] {
  const summary = `${report.succeeded}/${report.total} dialogues succeeded (${successRate(report)}%)`;
  const lines = [report.failures.length === 0 ? green(summary) : yellow(summary)];
  for (const failure of report.failures) {
    lines.push("", `${red("failed")} ${failure.dialogueId} ${dim(`(reward ${failure.reward})`)}`);
    for (const line of failure.transcript) lines.push(`  ${line}`);
  }
  return lines;
}

/** One line per entity: id, how it is referred to, and where it is. */
export function formatEntities(world: World): string[] {
  return world.objects.map((entity) => {
    const { location } = entity;
    // Places hold themselves.
    const where = location && location.holder !== entity ? `  (${location.position} ${location.holder.id})` : "";
    return `${entity.id.padEnd(ID_COLUMN)} ${nounPhrase(world, entity)}${where}`;
  });
}

export function formatEvent(event: TranscriptEvent): string {
  const ts = event.timestamp.split("T")[1]?.slice(0, 8) ?? "";
  const prefix = `${dim(ts)} ${colorForType(event.type)(event.type)}`;
  const { payload } = event;
  switch (event.type) {
    case "utterance.added":
      return typeof payload.text === "string" ? `${prefix} ${payload.text}` : prefix;
    case "dialogue.finished":
      return `${prefix} reward ${String(payload.reward)} after ${String(payload.rounds)} rounds`;
    case "policy.failed":
      return `${prefix} ${String(payload.player)}: ${String(payload.error)}`;
    default:
      return prefix;
  }
}
