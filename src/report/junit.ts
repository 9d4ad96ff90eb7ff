import fs from "node:fs";
import path from "node:path";
import { XMLBuilder } from "fast-xml-parser";
import type { ReportedOutcome, RunReport } from "./builder.js";

type XmlNode = Record<string, unknown>;

function seconds(ms: number): string {
  return (ms / 1000).toFixed(3);
}

function failureBody(o: ReportedOutcome): string {
  const f = o.failure;
  if (!f) return "";
  const lines = [`expected: ${f.expected}`, `actual: ${f.actual}`];
  for (const key of Object.keys(f.context).sort()) lines.push(`${key}: ${f.context[key]}`);
  return lines.join("\n");
}

function testcase(o: ReportedOutcome): XmlNode {
  const node: XmlNode = { "@_name": o.unit, "@_classname": o.topic, "@_time": seconds(o.duration_ms) };
  const message = o.failure?.summary ?? o.status;
  switch (o.status) {
    case "failed":
      node.failure = { "@_message": message, "@_type": "failed", "#text": failureBody(o) };
      break;
    case "errored":
    case "timed_out":
      node.error = { "@_message": message, "@_type": o.status, "#text": failureBody(o) };
      break;
    case "skipped":
      node.skipped = { "@_message": o.skip_reason ?? "" };
      break;
    case "passed":
      break;
  }
  return node;
}

function suiteAttributes(outcomes: readonly ReportedOutcome[]): XmlNode {
  return {
    "@_tests": outcomes.length,
    "@_failures": outcomes.filter((o) => o.status === "failed").length,
    "@_errors": outcomes.filter((o) => o.status === "errored" || o.status === "timed_out").length,
    "@_skipped": outcomes.filter((o) => o.status === "skipped").length,
    "@_time": seconds(outcomes.reduce((sum, o) => sum + o.duration_ms, 0))
  };
}

/** JUnit XML with one `<testsuite>` per topic, in report order. */
export function renderJunit(report: RunReport): string {
  const byTopic = new Map<string, ReportedOutcome[]>();
  for (const o of report.outcomes) {
    const list = byTopic.get(o.topic) ?? [];
    list.push(o);
    byTopic.set(o.topic, list);
  }

  const builder = new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    format: true,
    suppressEmptyNode: true
  });

  const xml = builder.build({
    testsuites: {
      "@_name": report.run_id,
      ...suiteAttributes(report.outcomes),
      testsuite: [...byTopic].map(([topic, outcomes]) => ({
        "@_name": topic,
        ...suiteAttributes(outcomes),
        testcase: outcomes.map(testcase)
      }))
    }
  });
  return `<?xml version="1.0" encoding="UTF-8"?>\n${xml}`;
}

export function writeJunit(file: string, report: RunReport): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, renderJunit(report), "utf8");
}
