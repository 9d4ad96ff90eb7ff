import { defineTopic } from "../../../src/registry/define.js";
import { expectEqual } from "../../../src/types/errors.js";

export default defineTopic("worker", [
  {
    name: "test_child_pass",
    async run(_config, ctx) {
      await ctx.artifacts.write("child.txt", "from child");
      return "from child";
    }
  },
  {
    name: "test_child_fail",
    run() {
      expectEqual(2, 3, "child arithmetic");
    }
  },
  {
    name: "test_child_hang",
    timeoutMs: 300,
    run() {
      return new Promise<never>(() => undefined);
    }
  },
  {
    name: "test_child_exit",
    run() {
      process.exit(7);
    }
  },
  {
    name: "test_child_after",
    run: (config) => config.params.label,
    parameters: { label: "fresh" }
  }
]);
