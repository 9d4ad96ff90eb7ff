import { describe, expect, it } from "vitest";
import path from "node:path";
import { defineTopic, defineUnit, isTopicModule } from "../src/registry/define.js";
import { fileTopicOf, findUnitFiles, loadUnitDirectory } from "../src/registry/loader.js";
import { TestRegistry } from "../src/registry/registry.js";
import { RegistryFrozenError } from "../src/types/errors.js";

const FIXTURES = path.resolve(import.meta.dirname, "fixtures");
const noop = (): undefined => undefined;

describe("defineUnit / defineTopic", () => {
  it("normalizes parameters given as an object into declaration order", () => {
    const unit = defineUnit({ name: "test_params", parameters: { seed: 7, do_plot: false }, run: noop });
    expect(unit.parameters).toEqual([
      { name: "seed", default: 7 },
      { name: "do_plot", default: false }
    ]);
    expect(unit.tags).toEqual([]);
    expect(Object.isFrozen(unit)).toBe(true);
  });

  it("accepts both specs and defined units", () => {
    const defined = defineUnit({ name: "test_one", tags: ["unit"], run: noop });
    const topic = defineTopic("mixed", [defined, { name: "test_two", run: noop }]);
    expect(topic.units.map((u) => u.name)).toEqual(["test_one", "test_two"]);
    expect(topic.units[0]).toBe(defined);
    expect(isTopicModule(topic)).toBe(true);
    expect(isTopicModule({ topic: "x", units: [] })).toBe(false);
  });
});

describe("TestRegistry", () => {
  it("orders units by topic, then by declaration order", () => {
    const reg = new TestRegistry();
    reg.register(defineTopic("zeta", [{ name: "test_z1", run: noop }, { name: "test_z0", run: noop }]));
    reg.register(defineTopic("alpha", [{ name: "test_a2", run: noop }, { name: "test_a1", run: noop }]));

    const units = reg.discover();
    expect(units.map((u) => u.name)).toEqual(["test_a2", "test_a1", "test_z1", "test_z0"]);
    expect(units.map((u) => u.declarationIndex)).toEqual([0, 1, 0, 1]);
    expect(units.map((u) => u.topic)).toEqual(["alpha", "alpha", "zeta", "zeta"]);
  });

  it("discovers the same sequence regardless of registration order", () => {
    const topics = [
      defineTopic("b", [{ name: "test_b1", run: noop }]),
      defineTopic("a", [{ name: "test_a1", run: noop }]),
      defineTopic("c", [{ name: "test_c1", run: noop }])
    ];
    const first = new TestRegistry();
    for (const t of topics) first.register(t);
    const second = new TestRegistry();
    for (const t of [...topics].reverse()) second.register(t);

    const names = first.discover().map((u) => u.name);
    expect(names).toEqual(["test_a1", "test_b1", "test_c1"]);
    expect(second.discover().map((u) => u.name)).toEqual(names);
    expect(first.discover().map((u) => u.name)).toEqual(names);
  });

  it("excludes names without the test_ prefix and reports them", () => {
    const reg = new TestRegistry();
    reg.register(
      defineTopic("misc", [
        { name: "helper", run: noop },
        { name: "test_", run: noop },
        { name: "test_real", run: noop }
      ])
    );
    expect(reg.discover().map((u) => u.name)).toEqual(["test_real"]);
    expect(reg.violations().map((v) => [v.code, v.unit])).toEqual([
      ["UNIT_NAME_PREFIX", "helper"],
      ["UNIT_NAME_PREFIX", "test_"]
    ]);
  });

  it("keeps the first of two units with the same name", () => {
    const reg = new TestRegistry();
    reg.register(defineTopic("beta", [{ name: "test_same", run: () => "beta" }]));
    reg.register(defineTopic("alpha", [{ name: "test_same", run: () => "alpha" }]));

    expect(reg.discover()).toHaveLength(1);
    expect(reg.get("test_same")?.topic).toBe("alpha");
    expect(reg.violations()).toEqual([
      {
        code: "DUPLICATE_UNIT_NAME",
        topic: "beta",
        unit: "test_same",
        file: undefined,
        message: 'Unit "test_same" in topic "beta" duplicates a unit of topic "alpha"; keeping the first'
      }
    ]);
  });

  it("flags a topic declared in a file with another canonical topic", () => {
    const reg = new TestRegistry();
    reg.register(defineTopic("gamma", [{ name: "test_g", run: noop }]), {
      file: "/suite/delta.units.ts",
      fileTopic: "delta"
    });
    const [violation] = reg.violations();
    expect(violation.code).toBe("TOPIC_MISMATCH");
    expect(violation.topic).toBe("gamma");
    expect(violation.file).toBe("/suite/delta.units.ts");
    expect(reg.get("test_g")?.sourceFile).toBe("/suite/delta.units.ts");
  });

  it("rejects registration once frozen", () => {
    const reg = new TestRegistry();
    reg.register(defineTopic("a", [{ name: "test_a", run: noop }]));
    reg.freeze();
    expect(reg.isFrozen).toBe(true);
    expect(() => reg.register(defineTopic("b", [{ name: "test_b", run: noop }]))).toThrow(RegistryFrozenError);
    expect(() => reg.reportInvalidModule("/x.units.ts", "x", "bad")).toThrow(RegistryFrozenError);
    expect(reg.discover().map((u) => u.name)).toEqual(["test_a"]);
  });

  it("filters by names, globs and tag expressions", () => {
    const reg = new TestRegistry();
    reg.register(
      defineTopic("t", [
        { name: "test_fast_one", tags: ["unit"], run: noop },
        { name: "test_fast_two", tags: ["unit", "slow"], run: noop },
        { name: "test_other", tags: ["integration"], run: noop }
      ])
    );
    expect(reg.discover({ names: ["test_other"] }).map((u) => u.name)).toEqual(["test_other"]);
    expect(reg.discover({ patterns: ["test_fast_*"] }).map((u) => u.name)).toEqual(["test_fast_one", "test_fast_two"]);
    expect(reg.discover({ tags: "@unit and not @slow" }).map((u) => u.name)).toEqual(["test_fast_one"]);
    expect(reg.discover({ names: ["test_other"], patterns: ["test_fast_t*"] }).map((u) => u.name)).toEqual([
      "test_fast_two",
      "test_other"
    ]);
    expect(reg.discover({ patterns: ["nothing_*"] })).toEqual([]);
  });
});

describe("unit file loader", () => {
  it("derives the canonical topic from the file name", () => {
    expect(fileTopicOf("/a/b/outbreak.units.ts")).toBe("outbreak");
    expect(fileTopicOf("outbreak.units.mjs")).toBe("outbreak");
  });

  it("finds unit files in sorted order", () => {
    const files = findUnitFiles(path.join(FIXTURES, "units"), "**/*.units.ts");
    expect(files.map((f) => path.basename(f))).toEqual(["arithmetic.units.ts", "geometry.units.ts"]);
    expect(findUnitFiles(path.join(FIXTURES, "missing"), "**/*.units.ts")).toEqual([]);
  });

  it("registers every topic exported by the unit files", async () => {
    const reg = new TestRegistry();
    await loadUnitDirectory(reg, path.join(FIXTURES, "units"), "**/*.units.ts");
    const units = reg.discover();
    expect(units.map((u) => u.name)).toEqual(["test_add", "test_halve", "test_mismatch", "test_area", "test_skip_me"]);
    expect(units[0].sourceFile).toBe(path.join(FIXTURES, "units", "arithmetic.units.ts"));
    expect(units[0].fileTopic).toBe("arithmetic");
    expect(reg.violations()).toEqual([]);
  });

  it("reports every kind of structural violation", async () => {
    const reg = new TestRegistry();
    await loadUnitDirectory(reg, path.join(FIXTURES, "broken"), "**/*.units.ts");

    expect(reg.violations().map((v) => v.code)).toEqual([
      "INVALID_MODULE",
      "UNIT_NAME_PREFIX",
      "DUPLICATE_UNIT_NAME",
      "TOPIC_MISMATCH"
    ]);
    expect(reg.discover().map((u) => u.name)).toEqual(["test_ok_prefix", "test_wrong_topic"]);
    expect(reg.get("test_ok_prefix")?.topic).toBe("dupe");
  });
});
