import crypto from "node:crypto";

/** `2026-10-19T08-30-00-000Z-1a2b3c4d5e6f`: sortable by start time. */
export function makeRunId(now: Date = new Date()): string {
  const ts = now.toISOString().replace(/[:.]/g, "-");
  return `${ts}-${crypto.randomBytes(6).toString("hex")}`;
}
