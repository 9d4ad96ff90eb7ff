import path from "node:path";
import { fileURLToPath } from "node:url";

const TS_EXTENSIONS = new Set([".ts", ".mts", ".cts"]);

/** Running from sources, or started with `--import tsx`, means a TypeScript loader is already in place. */
const LOADER_ACTIVE =
  TS_EXTENSIONS.has(path.extname(fileURLToPath(import.meta.url))) ||
  process.execArgv.some((arg, i) => arg === "--import=tsx" || (arg === "tsx" && process.execArgv[i - 1] === "--import"));

let registered = false;

export function needsTsLoader(file: string): boolean {
  return TS_EXTENSIONS.has(path.extname(file)) && !LOADER_ACTIVE && !registered;
}

/** Register tsx in this process before importing a TypeScript unit file. */
export async function ensureTsLoader(file: string): Promise<void> {
  if (!needsTsLoader(file)) return;
  const { register } = await import("tsx/esm/api");
  register();
  registered = true;
}

/** `execArgv` that lets a forked child import TypeScript unit files. */
export function tsxImportArgs(): string[] {
  return ["--import", "tsx"];
}
