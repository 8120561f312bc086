/**
 * Shortest paths over the place graph.
 *
 * Edges are exits; an exit guarded by a door is still an edge, the door is
 * reported by the go action when it is walked.
 */

/** place id → direction → destination place id */
export type ExitGraph = ReadonlyMap<string, ReadonlyMap<string, string>>;

export interface PathStep {
  direction: string;
  destination: string;
}

/**
 * Breadth-first search from `start` to `target`.
 * @returns the steps, [] when start equals target, null when unreachable
 */
export function bfsPath(graph: ExitGraph, start: string, target: string): PathStep[] | null {
  if (start === target) return [];
  const queue: Array<{ place: string; path: PathStep[] }> = [{ place: start, path: [] }];
  const visited = new Set<string>([start]);
  for (let head = 0; head < queue.length; head++) {
    const { place, path } = queue[head];
    for (const [direction, destination] of graph.get(place) ?? []) {
      if (visited.has(destination)) continue;
      const next = [...path, { direction, destination }];
      if (destination === target) return next;
      visited.add(destination);
      queue.push({ place: destination, path: next });
    }
  }
  return null;
}

/** Every reachable (source, target) pair mapped to its list of directions. */
export class PathTable {
  private paths = new Map<string, string[]>();

  static compute(graph: ExitGraph, places: readonly string[]): PathTable {
    const table = new PathTable();
    for (const source of places) {
      for (const target of places) {
        const steps = bfsPath(graph, source, target);
        if (steps) table.paths.set(PathTable.key(source, target), steps.map((s) => s.direction));
      }
    }
    return table;
  }

  get(source: string, target: string): string[] | undefined {
    const path = this.paths.get(PathTable.key(source, target));
    return path ? [...path] : undefined;
  }

  has(source: string, target: string): boolean {
    return this.paths.has(PathTable.key(source, target));
  }

  private static key(source: string, target: string): string {
    return `${source}\u0000${target}`;
  }
}
