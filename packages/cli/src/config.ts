import { resolve } from "node:path";
import { REQUEST_KINDS, type RequestKind } from "@worldtalk/dialogue";
import { bundledLayoutPath } from "@worldtalk/world";

export interface EnvDefaults {
  seed: string;
  world: string;
  journal?: string;
  maxTurns?: string;
}

/** Defaults for command flags, read from WORLDTALK_* variables. */
export function envDefaults(env: NodeJS.ProcessEnv = process.env): EnvDefaults {
  return {
    seed: env.WORLDTALK_SEED ?? "0",
    world: env.WORLDTALK_WORLD ?? "easy",
    journal: env.WORLDTALK_JOURNAL || undefined,
    maxTurns: env.WORLDTALK_MAX_TURNS || undefined,
  };
}

export function parsePositiveInt(value: string, label: string, fallback?: number): number {
  const n = Number.parseInt(value, 10);
  if (Number.isNaN(n) || n < 1) {
    if (fallback !== undefined) return fallback;
    throw new Error(`Invalid ${label}: "${value}" (must be a positive integer)`);
  }
  return n;
}

/** A bare name ("easy") means a bundled layout; anything else is a file path. */
export function resolveWorldPath(value: string): string {
  return /[\\/]|\.ya?ml$/.test(value) ? resolve(value) : bundledLayoutPath(value);
}

function isRequestKind(value: string): value is RequestKind {
  return REQUEST_KINDS.some((kind) => kind === value);
}

export function parseKinds(value: string): RequestKind[] {
  return value
    .split(",")
    .map((kind) => kind.trim())
    .filter(Boolean)
    .map((kind) => {
      if (!isRequestKind(kind)) throw new Error(`Unknown request kind: "${kind}" (one of ${REQUEST_KINDS.join(", ")})`);
      return kind;
    });
}
