import type { ClassifiedRow, InputRow } from "../types";
import { toInt } from "../utils";
import { defaultRegistry, UseCaseRegistry } from "./registry";

export function classifyRow(row: InputRow, registry: UseCaseRegistry = defaultRegistry): ClassifiedRow {
  const useCase = row.use_case;
  const category = registry.categoryOf(useCase);

  if (category === null) {
    return {
      use_case: useCase,
      source: "",
      target: "",
      sent: 0,
      received: 0,
      difference: 0,
      status: "INVALID_USE_CASE",
      severity: "HIGH",
      metadata: ""
    };
  }

  const carried = {
    use_case: useCase,
    source: row.source ?? "",
    target: row.target ?? ""
  };
  const metadata = row.metadata ?? "";

  switch (category) {
    case "Reconciliation": {
      const sent = toInt(row.sent);
      const received = toInt(row.received);
      const difference = sent - received;
      return {
        ...carried,
        sent,
        received,
        difference,
        status: difference === 0 ? "MATCH" : "MISMATCH",
        severity: difference === 0 ? "NONE" : "HIGH",
        metadata
      };
    }
    case "Validation":
      return { ...carried, sent: 0, received: 0, difference: 0, status: "VALIDATION_REQUIRED", severity: "MEDIUM", metadata };
    case "ProcessEvent":
      return { ...carried, sent: 0, received: 0, difference: 0, status: "PROCESS_EVENT", severity: "MEDIUM", metadata };
  }
}
