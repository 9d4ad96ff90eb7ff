import type { CoverageData, CoverageSample, ModuleHits } from "../types/coverage.js";

/**
 * Per-unit coverage recorder handed to units through their context.
 *
 * Lines and branches that a module can execute should be declared up front so
 * that unexecuted regions count towards the totals.
 */
export class CoverageRecorder {
  private readonly modules: CoverageData = {};

  private module(name: string): ModuleHits {
    let hits = this.modules[name];
    if (!hits) {
      hits = { lines: {}, branches: {} };
      this.modules[name] = hits;
    }
    return hits;
  }

  /** Register regions with zero hits. Existing counts are kept. */
  declare(
    module: string,
    regions: { lines?: Iterable<string | number>; branches?: Record<string, number> }
  ): void {
    const hits = this.module(module);
    for (const line of regions.lines ?? []) {
      const key = String(line);
      hits.lines[key] ??= 0;
    }
    for (const [id, arms] of Object.entries(regions.branches ?? {})) {
      const current = hits.branches[id] ?? [];
      while (current.length < arms) current.push(false);
      hits.branches[id] = current;
    }
  }

  line(module: string, line: string | number, count = 1): void {
    const hits = this.module(module);
    const key = String(line);
    hits.lines[key] = (hits.lines[key] ?? 0) + count;
  }

  branch(module: string, id: string, arm: number, arms = 2): void {
    const hits = this.module(module);
    const current = hits.branches[id] ?? [];
    const width = Math.max(arms, arm + 1);
    while (current.length < width) current.push(false);
    current[arm] = true;
    hits.branches[id] = current;
  }

  isEmpty(): boolean {
    return Object.keys(this.modules).length === 0;
  }

  /** Snapshot of everything recorded so far. */
  sample(unit: string, worker: number): CoverageSample {
    const modules: CoverageData = {};
    for (const [name, hits] of Object.entries(this.modules)) {
      const branches: Record<string, boolean[]> = {};
      for (const [id, arms] of Object.entries(hits.branches)) branches[id] = [...arms];
      modules[name] = { lines: { ...hits.lines }, branches };
    }
    return { unit, worker, modules };
  }
}
