import { diag, type Diagnostic } from "../output/diagnostics.js";
import { splitSelectors, tagExpressionError } from "../registry/filter.js";
import { loadSuite, type CommandError, type ConfigOptions } from "./context.js";

export type ListedUnit = {
  name: string;
  topic: string;
  tags: string[];
  file?: string;
  skip?: string;
};

export type ListResult =
  | { ok: true; units: ListedUnit[]; diagnostics: Diagnostic[] }
  | { ok: false; error: CommandError };

/** Units that a run with the same selectors would execute, in run order. */
export async function listUnits(opts: ConfigOptions & { selectors: string[]; tags?: string }): Promise<ListResult> {
  const suite = await loadSuite(opts);
  if (!suite.ok) return suite;

  const tagError = tagExpressionError(opts.tags);
  if (tagError !== null) return { ok: false, error: { code: "INVALID_TAG_EXPRESSION", message: tagError } };

  const { names, patterns } = splitSelectors(opts.selectors);
  const units = suite.registry.discover({ names, patterns, tags: opts.tags }).map((u) => ({
    name: u.name,
    topic: u.topic,
    tags: [...u.tags],
    file: u.sourceFile,
    skip: u.skip
  }));

  const diagnostics = suite.registry
    .violations()
    .map((v) => diag("warn", v.code, v.message, { path: v.file, details: { topic: v.topic, unit: v.unit } }));
  for (const name of names) {
    if (!suite.registry.has(name)) diagnostics.push(diag("error", "NO_SUCH_UNIT", `No such unit: ${name}`));
  }
  return { ok: true, units, diagnostics };
}
