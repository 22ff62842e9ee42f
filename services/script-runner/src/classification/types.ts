export type Severity = "normal" | "error";

export interface LogRecord {
  readonly severity: Severity;
  readonly text: string;
}

export type Outcome =
  | { readonly status: "success" }
  | { readonly status: "failure"; readonly exitCode: number; readonly cause: string };

export interface Classification {
  readonly records: readonly LogRecord[];
  readonly outcome: Outcome;
}
