export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  path?: string;
  details?: Record<string, unknown>;
};

export type OutputFormat = "human" | "jsonl";

export function diag(
  level: Diagnostic["level"],
  code: string,
  message: string,
  extra?: Pick<Diagnostic, "path" | "details">
): Diagnostic {
  return { level, code, message, ...extra };
}

export interface DiagnosticSink {
  emit(d: Diagnostic): void;
  /** Free-form text; only shown in human format. */
  text(line: string): void;
}

/**
 * jsonl: one JSON object per line on stdout.
 * human: info on stdout, warnings and errors on stderr.
 */
export function createSink(
  format: OutputFormat,
  streams: { out: NodeJS.WritableStream; err: NodeJS.WritableStream } = { out: process.stdout, err: process.stderr }
): DiagnosticSink {
  if (format === "jsonl") {
    return {
      emit: (d) => {
        streams.out.write(JSON.stringify(d) + "\n");
      },
      text: () => {}
    };
  }
  return {
    emit: (d) => {
      if (d.level === "info") streams.out.write(d.message + "\n");
      else streams.err.write(`${d.level}: ${d.message}\n`);
    },
    text: (line) => {
      streams.out.write(line + "\n");
    }
  };
}

/** Collects diagnostics in memory; used by commands called programmatically and by tests. */
export class MemorySink implements DiagnosticSink {
  readonly diagnostics: Diagnostic[] = [];
  readonly lines: string[] = [];

  emit(d: Diagnostic): void {
    this.diagnostics.push(d);
  }

  text(line: string): void {
    this.lines.push(line);
  }

  codes(): string[] {
    return this.diagnostics.map((d) => d.code);
  }
}
