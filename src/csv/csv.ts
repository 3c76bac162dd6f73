import fs from "node:fs/promises";
import path from "node:path";
import { createObjectCsvWriter } from "csv-writer";
import { FileError, errorMessage } from "../errors.js";

export type CsvRow = Record<string, string>;

export type CsvTable = {
  headers: string[];
  rows: CsvRow[];
};

/**
 * RFC 4180 reader: quoted fields may hold commas, doubled quotes and
 * line breaks. Cells are kept verbatim (no trimming) so rows written by
 * writeCsvFile come back unchanged.
 */
export function parseCsv(text: string): CsvTable {
  const src = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;

  const records: string[][] = [];
  let record: string[] = [];
  let cell = "";
  let inQuotes = false;
  let sawAny = false;

  for (let i = 0; i < src.length; i++) {
    const ch = src[i];

    if (inQuotes) {
      if (ch === '"') {
        if (src[i + 1] === '"') {
          cell += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        cell += ch;
      }
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
      sawAny = true;
    } else if (ch === ",") {
      record.push(cell);
      cell = "";
      sawAny = true;
    } else if (ch === "\n" || ch === "\r") {
      if (ch === "\r" && src[i + 1] === "\n") i++;
      record.push(cell);
      records.push(record);
      record = [];
      cell = "";
      sawAny = false;
    } else {
      cell += ch;
      sawAny = true;
    }
  }
  if (sawAny || cell) {
    record.push(cell);
    records.push(record);
  }

  const isBlank = (r: string[]) => r.length === 1 && r[0] === "";
  const nonBlank = records.filter((r) => !isBlank(r));
  const [headerRecord, ...body] = nonBlank;
  if (!headerRecord) return { headers: [], rows: [] };

  const headers = headerRecord.map((h) => h.trim());
  const rows = body.map((cells) => {
    const row: CsvRow = {};
    headers.forEach((h, idx) => {
      row[h] = cells[idx] ?? "";
    });
    return row;
  });

  return { headers, rows };
}

export async function readCsvFile(filePath: string): Promise<CsvTable> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf8");
  } catch (e) {
    throw new FileError(`Cannot read CSV ${filePath}: ${errorMessage(e)}`, filePath, { cause: e });
  }
  return parseCsv(text);
}

/** Overwrites `filePath`; the header line is written even when `rows` is empty. */
export async function writeCsvFile(filePath: string, headers: string[], rows: CsvRow[]): Promise<void> {
  try {
    await fs.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });

    // csv-writer writes nothing at all for an empty batch
    if (rows.length === 0) {
      await fs.writeFile(filePath, headers.map(quoteCell).join(",") + "\n", "utf8");
      return;
    }

    const writer = createObjectCsvWriter({
      path: filePath,
      header: headers.map((h) => ({ id: h, title: h })),
      // csv-writer leaves a lone \r unquoted, which reads back as a row break
      alwaysQuote: true,
    });
    await writer.writeRecords(rows);
  } catch (e) {
    throw new FileError(`Cannot write CSV ${filePath}: ${errorMessage(e)}`, filePath, { cause: e });
  }
}

function quoteCell(s: string) {
  return `"${s.replace(/"/g, '""')}"`;
}
