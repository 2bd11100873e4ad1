import fs from "node:fs";
import path from "node:path";
import { describe, it, expect, beforeEach } from "vitest";

import { appendCsvRows, listCsvFiles, readCsv, writeCsv } from "../src/csv_sync/csv_io.js";
import { makeTempDir } from "./helpers.js";

describe("csv_io", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  it("quotes embedded separators, quotes and newlines", () => {
    const filePath = path.join(dir, "quoted.csv");
    const rows = [{ Name: "Doe, Jane", Note: 'said "hi"\nthen left' }];
    writeCsv(filePath, ["Name", "Note"], rows);
    expect(fs.readFileSync(filePath, "utf8")).toBe('Name,Note\n"Doe, Jane","said ""hi""\nthen left"\n');
    expect(readCsv(filePath)).toEqual({ header: ["Name", "Note"], rows, skipped: 0 });
  });

  it("writes a header-only file when there are no rows", () => {
    const filePath = path.join(dir, "empty.csv");
    writeCsv(filePath, ["a", "b"], []);
    expect(fs.readFileSync(filePath, "utf8")).toBe("a,b\n");
    expect(readCsv(filePath)).toEqual({ header: ["a", "b"], rows: [], skipped: 0 });
  });

  it("appends on a fresh line when the file has no trailing newline", () => {
    const filePath = path.join(dir, "append.csv");
    fs.writeFileSync(filePath, "a,b\n1,2");
    appendCsvRows(filePath, ["a", "b"], [{ a: "3", b: "4" }]);
    expect(fs.readFileSync(filePath, "utf8")).toBe("a,b\n1,2\n3,4\n");
  });

  it("strips a byte order mark from the header", () => {
    const filePath = path.join(dir, "bom.csv");
    fs.writeFileSync(filePath, "\uFEFFa,b\n1,2\n");
    expect(readCsv(filePath).header).toEqual(["a", "b"]);
  });

  it("cuts a long row to the header and counts it", () => {
    const filePath = path.join(dir, "ragged.csv");
    fs.writeFileSync(filePath, "a,b\n1,2\n3,4,5\n6,7\n");
    expect(readCsv(filePath)).toEqual({
      header: ["a", "b"],
      rows: [
        { a: "1", b: "2" },
        { a: "3", b: "4" },
        { a: "6", b: "7" }
      ],
      skipped: 1
    });
  });

  it("pads a short row without counting it", () => {
    const filePath = path.join(dir, "short.csv");
    fs.writeFileSync(filePath, "a,b,c\n1\n");
    expect(readCsv(filePath)).toEqual({ header: ["a", "b", "c"], rows: [{ a: "1", b: "", c: "" }], skipped: 0 });
  });

  it("throws for a missing file", () => {
    expect(() => readCsv(path.join(dir, "missing.csv"))).toThrow();
  });

  it("lists only csv files, sorted", () => {
    fs.writeFileSync(path.join(dir, "b.csv"), "");
    fs.writeFileSync(path.join(dir, "a.csv"), "");
    fs.writeFileSync(path.join(dir, "meta.json"), "{}");
    expect(listCsvFiles(dir)).toEqual([path.join(dir, "a.csv"), path.join(dir, "b.csv")]);
    expect(listCsvFiles(path.join(dir, "nope"))).toEqual([]);
  });
});
