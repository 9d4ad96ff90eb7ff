import fs from "node:fs";
import path from "node:path";
import { pathToFileURL } from "node:url";
import { minimatch } from "minimatch";
import { toError } from "../types/errors.js";
import type { TopicModule } from "../types/unit.js";
import { isTopicModule } from "./define.js";
import type { TestRegistry } from "./registry.js";
import { ensureTsLoader } from "./ts-loader.js";

const UNIT_FILE_SUFFIX = /\.units\.[cm]?[jt]s$/;

/** Canonical topic of a unit file: `outbreak.units.ts` → `outbreak`. */
export function fileTopicOf(filePath: string): string {
  return path.basename(filePath).replace(UNIT_FILE_SUFFIX, "");
}

function listFiles(root: string, current: string, out: string[]): void {
  for (const entry of fs.readdirSync(current, { withFileTypes: true })) {
    if (entry.name === "node_modules" || entry.name.startsWith(".")) continue;
    const full = path.join(current, entry.name);
    if (entry.isDirectory()) listFiles(root, full, out);
    else if (entry.isFile() && !entry.name.endsWith(".d.ts")) out.push(full);
  }
}

/** Files under `root` whose root-relative path matches `match`, sorted. */
export function findUnitFiles(root: string, match: string): string[] {
  if (!fs.existsSync(root)) return [];
  const files: string[] = [];
  listFiles(root, root, files);
  return files
    .filter((f) => minimatch(path.relative(root, f).split(path.sep).join("/"), match))
    .sort();
}

/** Import a unit file and return its default-exported topic, or a reason it has none. */
export async function importTopicModule(
  file: string
): Promise<{ ok: true; module: TopicModule } | { ok: false; reason: string }> {
  let mod: unknown;
  try {
    await ensureTsLoader(file);
    mod = await import(pathToFileURL(file).href);
  } catch (e) {
    return { ok: false, reason: `failed to load: ${toError(e).message}` };
  }
  const exported = typeof mod === "object" && mod !== null && "default" in mod ? mod.default : undefined;
  if (!isTopicModule(exported)) {
    return { ok: false, reason: "default export is not a topic (use defineTopic)" };
  }
  return { ok: true, module: exported };
}

/**
 * Scan `root` for unit files and register every topic they export.
 * Files that fail to load are recorded as structural violations.
 */
export async function loadUnitDirectory(registry: TestRegistry, root: string, match: string): Promise<string[]> {
  const files = findUnitFiles(root, match);
  for (const file of files) {
    const fileTopic = fileTopicOf(file);
    const res = await importTopicModule(file);
    if (res.ok) registry.register(res.module, { file, fileTopic });
    else registry.reportInvalidModule(file, fileTopic, res.reason);
  }
  return files;
}
