import { createHash } from "node:crypto";
import { readFile } from "node:fs/promises";

/** SHA-256 of a file's contents, hex encoded. */
export async function sha256File(filePath: string): Promise<string> {
  return sha256Content(await readFile(filePath));
}

export function sha256Content(content: string | Uint8Array): string {
  return createHash("sha256").update(content).digest("hex");
}
