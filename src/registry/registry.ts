import { RegistryFrozenError } from "../types/errors.js";
import { UNIT_PREFIX, type RegisteredUnit, type TopicModule } from "../types/unit.js";
import { matchesFilter, type UnitFilter } from "./filter.js";

export type ViolationCode = "TOPIC_MISMATCH" | "DUPLICATE_UNIT_NAME" | "UNIT_NAME_PREFIX" | "INVALID_MODULE";

export type StructuralViolation = {
  code: ViolationCode;
  topic: string;
  unit?: string;
  file?: string;
  message: string;
};

type TopicEntry = {
  module: TopicModule;
  seq: number;
  file?: string;
  fileTopic?: string;
};

type Catalog = {
  units: RegisteredUnit[];
  violations: StructuralViolation[];
};

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Catalog of test units, built once per Run.
 *
 * Ordering is lexicographic by topic, then by declaration order inside the
 * topic, so discovering the same input always yields the same sequence.
 */
export class TestRegistry {
  private readonly topics: TopicEntry[] = [];
  private readonly loadViolations: StructuralViolation[] = [];
  private frozen = false;
  private cache: Catalog | null = null;

  register(module: TopicModule, source?: { file: string; fileTopic: string }): void {
    if (this.frozen) throw new RegistryFrozenError(module.topic);
    this.topics.push({ module, seq: this.topics.length, file: source?.file, fileTopic: source?.fileTopic });
    this.cache = null;
  }

  /** Record a file that could not be turned into a topic. */
  reportInvalidModule(file: string, fileTopic: string, reason: string): void {
    if (this.frozen) throw new RegistryFrozenError(fileTopic);
    this.loadViolations.push({ code: "INVALID_MODULE", topic: fileTopic, file, message: `${file}: ${reason}` });
    this.cache = null;
  }

  /** Make the registry read-only for the rest of the Run. */
  freeze(): void {
    this.frozen = true;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  discover(filter: UnitFilter = {}): RegisteredUnit[] {
    return this.catalog().units.filter((u) => matchesFilter(u, filter));
  }

  get(name: string): RegisteredUnit | undefined {
    return this.catalog().units.find((u) => u.name === name);
  }

  has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  violations(): StructuralViolation[] {
    return [...this.catalog().violations];
  }

  private catalog(): Catalog {
    if (this.cache) return this.cache;

    const entries = [...this.topics].sort(
      (a, b) =>
        compareText(a.module.topic, b.module.topic) ||
        compareText(a.file ?? "", b.file ?? "") ||
        a.seq - b.seq
    );

    const units: RegisteredUnit[] = [];
    const violations: StructuralViolation[] = [...this.loadViolations];
    const seen = new Map<string, string>();

    for (const entry of entries) {
      const { topic } = entry.module;

      if (entry.fileTopic !== undefined && entry.fileTopic !== topic) {
        violations.push({
          code: "TOPIC_MISMATCH",
          topic,
          file: entry.file,
          message: `Topic "${topic}" is declared in ${entry.file ?? "an unnamed module"} whose canonical topic is "${entry.fileTopic}"`
        });
      }

      entry.module.units.forEach((unit, declarationIndex) => {
        if (!unit.name.startsWith(UNIT_PREFIX) || unit.name.length === UNIT_PREFIX.length) {
          violations.push({
            code: "UNIT_NAME_PREFIX",
            topic,
            unit: unit.name,
            file: entry.file,
            message: `Unit "${unit.name}" in topic "${topic}" does not start with "${UNIT_PREFIX}"`
          });
          return;
        }

        const firstTopic = seen.get(unit.name);
        if (firstTopic !== undefined) {
          violations.push({
            code: "DUPLICATE_UNIT_NAME",
            topic,
            unit: unit.name,
            file: entry.file,
            message: `Unit "${unit.name}" in topic "${topic}" duplicates a unit of topic "${firstTopic}"; keeping the first`
          });
          return;
        }
        seen.set(unit.name, topic);

        units.push({
          name: unit.name,
          tags: unit.tags,
          timeoutMs: unit.timeoutMs,
          skip: unit.skip,
          parameters: unit.parameters,
          run: (config, ctx) => unit.run(config, ctx),
          topic,
          declarationIndex,
          sourceFile: entry.file,
          fileTopic: entry.fileTopic
        });
      });
    }

    this.cache = { units, violations };
    return this.cache;
  }
}
