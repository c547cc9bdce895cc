import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { pickNameColumn, toRawRecords } from "@/lib/ingest/records";
import { ConfigurationError } from "@/lib/errors";

beforeEach(() => {
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("pickNameColumn", () => {
  it("prefers a known company-name header, ignoring case", () => {
    expect(pickNameColumn(["id", "Company"])).toBe("Company");
    expect(pickNameColumn(["city", "company_name", "name"])).toBe("name");
  });

  it("falls back to the first column", () => {
    expect(pickNameColumn(["org", "city"])).toBe("org");
  });

  it("uses the requested column when it exists", () => {
    expect(pickNameColumn(["org", "City"], "city")).toBe("City");
    expect(() => pickNameColumn(["org"], "city")).toThrow("Column 'city' not found in input");
  });

  it("rejects input without a header", () => {
    expect(() => pickNameColumn([])).toThrow(ConfigurationError);
  });
});

describe("toRawRecords", () => {
  const columns = ["id", "name", "city"];

  it("keeps valid rows and drops invalid ones with their row numbers", () => {
    const { records, dropped, nameColumn } = toRawRecords(
      [
        { id: "1", name: "Acme", city: "" },
        { id: "2", name: "   ", city: "" },
        { id: "", name: "Globex", city: "" },
        { id: "1", name: "Acme again", city: "" },
        { id: "3", name: "x".repeat(501), city: "" },
        { id: "4", name: " Initech ", city: "Austin" },
      ],
      columns,
    );

    expect(nameColumn).toBe("name");
    expect(records).toEqual([
      { id: "1", rawName: "Acme" },
      { id: "4", rawName: " Initech ", source: { city: "Austin" } },
    ]);
    expect(dropped.map((e) => [e.rowNumber, e.message])).toEqual([
      [2, "Row 2: empty company name"],
      [3, "Row 3: missing id"],
      [4, "Row 4: duplicate id '1'"],
      [5, "Row 5: company name longer than 500 characters"],
    ]);
    expect(console.warn).toHaveBeenCalledWith("[ingest] Dropping Row 2: empty company name");
  });

  it("numbers rows when there is no id column", () => {
    const { records } = toRawRecords(
      [{ company: "Acme" }, { company: "Globex" }],
      ["company"],
    );
    expect(records.map((r) => r.id)).toEqual(["row-1", "row-2"]);
  });

  it("reads only the first rows when limited", () => {
    const { records } = toRawRecords(
      [
        { id: "1", name: "Acme", city: "" },
        { id: "2", name: "Globex", city: "" },
      ],
      columns,
      { rowLimit: 1 },
    );
    expect(records).toEqual([{ id: "1", rawName: "Acme" }]);
  });

  it("takes ids from a named column", () => {
    const { records } = toRawRecords([{ ref: "A-1", org: "Acme" }], ["ref", "org"], {
      idColumn: "ref",
      nameColumn: "org",
    });
    expect(records).toEqual([{ id: "A-1", rawName: "Acme" }]);
    expect(() => toRawRecords([], ["org"], { idColumn: "ref" })).toThrow("Column 'ref' not found in input");
  });
});
