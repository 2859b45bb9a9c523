import { parse } from "csv-parse/sync";
import { z } from "zod";
import type { InputRow } from "../types";

export const INVALID_CSV_MESSAGE = "Invalid CSV format";
export const MISSING_USE_CASE_MESSAGE = "use_case column missing";

export class IngestionError extends Error {
  readonly status: number;

  constructor(message: string, status = 400) {
    super(message);
    this.name = "IngestionError";
    this.status = status;
  }
}

const optionalCell = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value === "" ? undefined : value));

const InputRowSchema = z.object({
  use_case: z.string(),
  source: optionalCell,
  target: optionalCell,
  sent: optionalCell,
  received: optionalCell,
  metadata: optionalCell
});

export function parseCsvRows(input: Buffer | string): InputRow[] {
  const text = (typeof input === "string" ? input : input.toString("utf-8")).replace(/^\uFEFF/, "");

  let records: string[][];
  try {
    records = parse(text, { skip_empty_lines: true, relax_column_count_less: true });
  } catch (_error) {
    throw new IngestionError(INVALID_CSV_MESSAGE);
  }

  const [header, ...body] = records;
  if (!header) {
    throw new IngestionError(INVALID_CSV_MESSAGE);
  }

  const columns = header.map((name) => name.trim());
  if (!columns.includes("use_case")) {
    throw new IngestionError(MISSING_USE_CASE_MESSAGE);
  }

  return body.map((cells) => {
    const record: Record<string, string> = {};
    columns.forEach((column, index) => {
      // first occurrence wins when a header repeats; short rows leave trailing cells absent
      if (!(column in record)) {
        record[column] = cells[index] ?? "";
      }
    });

    const parsed = InputRowSchema.parse(record);
    return {
      use_case: parsed.use_case,
      source: parsed.source ?? "",
      target: parsed.target ?? "",
      sent: parsed.sent,
      received: parsed.received,
      metadata: parsed.metadata ?? ""
    } satisfies InputRow;
  });
}
