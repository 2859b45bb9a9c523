import { describe, expect, it } from "vitest";
import { IngestionError, parseCsvRows } from "../../parsers/csv-rows";

function ingestionFailure(input: string): IngestionError {
  try {
    parseCsvRows(input);
  } catch (error) {
    if (error instanceof IngestionError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected parseCsvRows to fail");
}

describe("parseCsvRows", () => {
  it("maps each line to an input row with defaults for blank cells", () => {
    const csv = [
      "use_case,source,target,sent,received,metadata",
      "Donation Commitment vs Actual Reconciliation,Donor A,Partner B,10,7,batch-1",
      "CSV Upload Validation,,,,,"
    ].join("\n");

    expect(parseCsvRows(csv)).toEqual([
      {
        use_case: "Donation Commitment vs Actual Reconciliation",
        source: "Donor A",
        target: "Partner B",
        sent: "10",
        received: "7",
        metadata: "batch-1"
      },
      { use_case: "CSV Upload Validation", source: "", target: "", sent: undefined, received: undefined, metadata: "" }
    ]);
  });

  it("only requires the use_case column and ignores unknown ones", () => {
    const rows = parseCsvRows(Buffer.from("region,use_case\nnorth,Receipt Confirmation\n"));
    expect(rows).toEqual([
      { use_case: "Receipt Confirmation", source: "", target: "", sent: undefined, received: undefined, metadata: "" }
    ]);
  });

  it("handles quoted cells, a byte order mark and padded headers", () => {
    const csv = '\uFEFF use_case , metadata\n"Rescheduling & Location Mismatch","moved to ""Dock 4"", north gate"\n';
    expect(parseCsvRows(csv)).toEqual([
      {
        use_case: "Rescheduling & Location Mismatch",
        source: "",
        target: "",
        sent: undefined,
        received: undefined,
        metadata: 'moved to "Dock 4", north gate'
      }
    ]);
  });

  it("skips blank lines", () => {
    const rows = parseCsvRows("use_case\nReceipt Confirmation\n\nNot A Real Case\n");
    expect(rows.map((row) => row.use_case)).toEqual(["Receipt Confirmation", "Not A Real Case"]);
  });

  it("returns no rows for a header-only file", () => {
    expect(parseCsvRows("use_case,sent,received\n")).toEqual([]);
  });

  it("rejects a file without a use_case column", () => {
    const error = ingestionFailure("case,sent\nReceipt Confirmation,1\n");
    expect(error.message).toBe("use_case column missing");
    expect(error.status).toBe(400);
  });

  it("rejects an empty file as invalid CSV", () => {
    expect(ingestionFailure("").message).toBe("Invalid CSV format");
  });

  it("treats missing trailing cells of a short row as absent", () => {
    const rows = parseCsvRows("use_case,source,target,sent,received,metadata\nCSV Upload Validation\nExpense Tracking vs Asset Flow,Finance,Warehouse 3,4\n");
    expect(rows).toEqual([
      { use_case: "CSV Upload Validation", source: "", target: "", sent: undefined, received: undefined, metadata: "" },
      { use_case: "Expense Tracking vs Asset Flow", source: "Finance", target: "Warehouse 3", sent: "4", received: undefined, metadata: "" }
    ]);
  });

  it("rejects rows with more cells than the header", () => {
    expect(ingestionFailure("use_case,sent\nReceipt Confirmation,1,2\n").message).toBe("Invalid CSV format");
  });

  it("rejects an unterminated quoted cell", () => {
    expect(ingestionFailure('use_case\n"Receipt Confirmation\n').message).toBe("Invalid CSV format");
  });
});
