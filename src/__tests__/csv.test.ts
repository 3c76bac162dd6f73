import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { parseCsv, readCsvFile, writeCsvFile } from "../csv/csv.js";
import { FileError } from "../errors.js";

describe("parseCsv", () => {
  it("reads quoted commas, doubled quotes and embedded line breaks", () => {
    const text = 'name,raw,notes\r\nAcme,"{""name"":""Acme"",""x"":1}","line one\nline two"\r\n';
    expect(parseCsv(text)).toEqual({
      headers: ["name", "raw", "notes"],
      rows: [{ name: "Acme", raw: '{"name":"Acme","x":1}', notes: "line one\nline two" }],
    });
  });

  it("strips a byte-order mark and skips blank lines", () => {
    const { headers, rows } = parseCsv("\uFEFFa,b\n\n1,2\n");
    expect(headers).toEqual(["a", "b"]);
    expect(rows).toEqual([{ a: "1", b: "2" }]);
  });

  it("keeps surrounding spaces inside cells and fills missing cells", () => {
    expect(parseCsv("a,b,c\n x ,y\n").rows).toEqual([{ a: " x ", b: "y", c: "" }]);
  });

  it("returns an empty table for empty input", () => {
    expect(parseCsv("")).toEqual({ headers: [], rows: [] });
  });
});

describe("writeCsvFile / readCsvFile", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "csv-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("reads back exactly what it wrote", async () => {
    const file = path.join(dir, "nested", "out.csv");
    const rows = [
      { secteur: "Bio, Tech", name: 'Say "hi"', raw: '{"a":"b, c"}' },
      { secteur: "", name: "Plain", raw: "{}" },
      { secteur: "Energie", name: "Crlf", raw: "line1\rline2\r\nline3" },
    ];
    await writeCsvFile(file, ["secteur", "name", "raw"], rows);
    expect(await readCsvFile(file)).toEqual({ headers: ["secteur", "name", "raw"], rows });
  });

  it("writes the header line for an empty table", async () => {
    const file = path.join(dir, "empty.csv");
    await writeCsvFile(file, ["timestamp", "recipient"], []);
    expect(fs.readFileSync(file, "utf8")).toBe('"timestamp","recipient"\n');
  });

  it("raises FileError for a missing file", async () => {
    await expect(readCsvFile(path.join(dir, "missing.csv"))).rejects.toBeInstanceOf(FileError);
  });
});
