import { describe, it, expect } from "vitest";
import {
  contactType,
  formatContact,
  formatCurrency,
  formatDate,
  formatDocument,
  formatList,
  formatRecord,
  formatStatus,
  isContactActive,
} from "../../src/utils/formatters.js";

describe("value formatting", () => {
  it("should name known document statuses", () => {
    expect(formatStatus(2)).toBe("Draft");
    expect(formatStatus(160)).toBe("Posted");
    expect(formatStatus(99)).toBe("99");
    expect(formatStatus(undefined)).toBe("N/A");
  });

  it("should cut timestamps to the date", () => {
    expect(formatDate("2026-03-04T10:00:00")).toBe("2026-03-04");
    expect(formatDate("")).toBe("N/A");
  });

  it("should format amounts in pounds", () => {
    expect(formatCurrency(1234.5)).toBe("£1,234.50");
    expect(formatCurrency("-12")).toBe("£-12.00");
    expect(formatCurrency(null)).toBe("N/A");
    expect(formatCurrency("n/a")).toBe("n/a");
  });
});

describe("contact helpers", () => {
  it("should classify by the role block present", () => {
    expect(contactType({ supplier: { isActive: true } })).toBe("Supplier");
    expect(contactType({ customer: {} })).toBe("Customer");
    expect(contactType({})).toBe("Contact");
  });

  it("should read the active flag of the role", () => {
    expect(isContactActive({ supplier: { isActive: false } })).toBe(false);
    expect(isContactActive({ customer: {} })).toBe(true);
  });
});

describe("formatList", () => {
  it("should report an empty result", () => {
    expect(formatList("costCentres", [])).toBe("No cost centres found.");
  });

  it("should note when more records exist than are shown", () => {
    const output = formatList("departments", [{ code: "D1", description: "Ops | Admin", active: false }], 12);

    expect(output.split("\n")).toEqual([
      "## Departments",
      "",
      "Found **1** departments (showing first 1 of 12 total)",
      "",
      "| Code | Name | Active |",
      "|------|------|--------|",
      "| D1 | Ops \\| Admin | ✗ |",
    ]);
  });
});

describe("record formatting", () => {
  it("should add a line item table to documents with lines", () => {
    const output = formatDocument({
      id: "d1",
      docClass: "SaleInvoice",
      docNo: "SI-1",
      description: "March fees",
      details: [{ description: "Consulting", quantity: 2, unitPrice: 100, netAmount: 200 }],
    });

    expect(output.split("\n").slice(9)).toEqual([
      "- **Description:** March fees",
      "",
      "### Line Items (1 items)",
      "",
      "| Description | Quantity | Unit Price | Amount |",
      "|-------------|----------|------------|--------|",
      "| Consulting | 2 | £100.00 | £200.00 |",
    ]);
  });

  it("should show supplier settings of a contact", () => {
    const output = formatContact({
      id: "c1",
      code: "ACME",
      description: "Acme Ltd",
      countryCode: "GB",
      supplier: { isActive: true, currency: "GBP" },
    });

    expect(output).toBe(
      [
        "## Contact Account: Acme Ltd",
        "",
        "- **Code:** ACME",
        "- **Country:** GB",
        "- **ID:** c1",
        "",
        "### Supplier Information",
        "",
        "- **Active:** Yes",
        "- **Currency:** GBP",
      ].join("\n"),
    );
  });

  it("should list only scalar fields of a record", () => {
    expect(formatRecord("Project: P1", { code: "P1", isActive: true, tags: ["a"], notes: null })).toBe(
      ["## Project: P1", "", "- **code:** P1", "- **isActive:** true", "- **notes:** "].join("\n"),
    );
  });
});
