export type RuleCategory = "Reconciliation" | "Validation" | "ProcessEvent";

export type RowStatus = "INVALID_USE_CASE" | "MATCH" | "MISMATCH" | "VALIDATION_REQUIRED" | "PROCESS_EVENT";

export type Severity = "NONE" | "MEDIUM" | "HIGH";

export interface InputRow {
  use_case: string;
  source?: string;
  target?: string;
  sent?: string | number;
  received?: string | number;
  metadata?: string;
}

export interface ClassifiedRow {
  use_case: string;
  source: string;
  target: string;
  sent: number;
  received: number;
  difference: number;
  status: RowStatus;
  severity: Severity;
  metadata: string;
}

export interface ResolvedRow extends ClassifiedRow {
  solution: string;
}

export interface ResultSet {
  total: number;
  results: ResolvedRow[];
}

export interface NarrativePrompt {
  use_case: string;
  source: string;
  target: string;
  status: RowStatus;
}

export type NarrativeFailureReason = "unavailable" | "rate_limited" | "timeout" | "malformed_response";

export type NarrativeResult =
  | { ok: true; text: string }
  | { ok: false; reason: NarrativeFailureReason; detail?: string };

export interface NarrativeGenerator {
  generate(prompt: NarrativePrompt): Promise<NarrativeResult>;
}
