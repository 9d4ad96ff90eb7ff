import { defineTopic } from "../../../src/registry/define.js";
import { expectEqual } from "../../../src/types/errors.js";

export default defineTopic("arithmetic", [
  {
    name: "test_add",
    tags: ["unit"],
    parameters: { a: 2, b: 2, do_plot: false },
    run(config, ctx) {
      ctx.coverage.declare("calc", { lines: [1, 2, 3], branches: { sign: 2 } });
      ctx.coverage.line("calc", 1);
      ctx.coverage.line("calc", 2);
      ctx.coverage.branch("calc", "sign", 0);
      return Number(config.params.a) + Number(config.params.b);
    }
  },
  {
    name: "test_halve",
    tags: ["unit"],
    run(_config, ctx) {
      ctx.coverage.declare("calc", { lines: [1, 2, 3], branches: { sign: 2 } });
      ctx.coverage.line("calc", 3);
      ctx.coverage.branch("calc", "sign", 1);
      return 8 / 4;
    }
  },
  {
    name: "test_mismatch",
    tags: ["unit", "failing"],
    run() {
      expectEqual(1 + 1, 3, "one plus one", { operands: "1, 1" });
    }
  }
]);
