import type { BootstrapError } from "./errors.js";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  path?: string;
  details?: Record<string, unknown>;
};

export type OutputFormat = "human" | "jsonl";

export interface Reporter {
  report(d: Diagnostic): void;
}

export function diag(
  level: Diagnostic["level"],
  code: string,
  message: string,
  extra?: Pick<Diagnostic, "path" | "details">,
): Diagnostic {
  return { level, code, message, ...extra };
}

/**
 * jsonl: one JSON object per line on stdout.
 * human: plain lines on stderr, so application output on stdout stays clean.
 */
export function createReporter(format: OutputFormat): Reporter {
  return {
    report(d) {
      if (format === "jsonl") {
        process.stdout.write(JSON.stringify(d) + "\n");
        return;
      }
      const prefix = d.level === "info" ? "" : `${d.level}: `;
      process.stderr.write(`${prefix}${d.message}\n`);
    },
  };
}

export const silentReporter: Reporter = { report() {} };

/** Keeps every diagnostic in memory. */
export class CollectingReporter implements Reporter {
  readonly diagnostics: Diagnostic[] = [];

  report(d: Diagnostic): void {
    this.diagnostics.push(d);
  }

  codes(): string[] {
    return this.diagnostics.map((d) => d.code);
  }
}

/** Bootstrap failures are tagged so they never read as application output. */
export function bootstrapFailure(error: BootstrapError): Diagnostic {
  return diag("error", error.code, error.message, {
    details: { phase: "bootstrap", ...error.details },
  });
}
