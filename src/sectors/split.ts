import path from "node:path";
import { pickField } from "../config/fields.js";
import { readCsvFile, writeCsvFile, type CsvRow, type CsvTable } from "../csv/csv.js";
import { UNKNOWN_SECTOR, sectorFileName, slugifySector } from "./slug.js";

/** Columns appended to every sector file for the emailer. */
export const DERIVED_COLUMNS = ["sector_slug", "contact_name", "company", "email"] as const;

export type SectorBucket = {
  slug: string;
  headers: string[];
  rows: CsvRow[];
};

export type SplitOptions = {
  /** put a row listing "A; B" into both A and B */
  multiSector?: boolean;
};

export type SplitSummary = {
  input: string;
  rows: number;
  files: { path: string; slug: string; rows: number }[];
};

function parseRaw(raw: string): Record<string, unknown> {
  if (!raw) return {};
  for (const candidate of [raw, raw.replace(/^"|"$/g, "")]) {
    try {
      const v: unknown = JSON.parse(candidate);
      // double-encoded: a JSON string holding the object
      const obj: unknown = typeof v === "string" ? JSON.parse(v) : v;
      if (typeof obj === "object" && obj !== null && !Array.isArray(obj)) {
        return Object.fromEntries(Object.entries(obj));
      }
      return {};
    } catch {
      continue;
    }
  }
  return {};
}

/** Contact columns from the listing JSON, falling back to the row itself. */
export function contactColumns(row: CsvRow): { contact_name: string; company: string; email: string } {
  const listing = parseRaw(row.raw ?? "");
  const pick = (field: "contact_name" | "company" | "email") =>
    (row[field] ?? "").trim() || pickField(listing, field) || pickField(row, field);

  return {
    contact_name: pick("contact_name"),
    company: pick("company"),
    email: pick("email"),
  };
}

function sectorSlugsOf(row: CsvRow, multiSector: boolean): string[] {
  const secteur = row.secteur ?? "";
  if (!multiSector) return [slugifySector(secteur)];

  const parts = secteur
    .split(/[;,]/)
    .map((p) => p.trim())
    .filter(Boolean);
  if (parts.length === 0) return [slugifySector("")];
  return [...new Set(parts.map(slugifySector))];
}

/**
 * Groups rows by the slug of their `secteur` column; blank sectors land
 * in the "unknown" bucket. Buckets come back sorted by slug with rows in
 * input order, so the same table always yields the same files.
 */
export function splitSectors(table: CsvTable, opts: SplitOptions = {}): SectorBucket[] {
  const headers = [...table.headers, ...DERIVED_COLUMNS.filter((c) => !table.headers.includes(c))];
  const buckets = new Map<string, CsvRow[]>();

  for (const row of table.rows) {
    const contact = contactColumns(row);
    for (const slug of sectorSlugsOf(row, Boolean(opts.multiSector))) {
      const out: CsvRow = { ...row, ...contact, sector_slug: slug };
      const rows = buckets.get(slug);
      if (rows) rows.push(out);
      else buckets.set(slug, [out]);
    }
  }

  return [...buckets.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([slug, rows]) => ({ slug, headers, rows }));
}

export async function writeSectorFiles(outDir: string, buckets: SectorBucket[]): Promise<SplitSummary["files"]> {
  const files: SplitSummary["files"] = [];
  for (const b of buckets) {
    const outPath = path.join(outDir, sectorFileName(b.slug));
    await writeCsvFile(outPath, b.headers, b.rows);
    console.log(`[Splitter] Wrote ${b.rows.length} rows to ${outPath}`);
    files.push({ path: outPath, slug: b.slug, rows: b.rows.length });
  }
  return files;
}

export async function splitCompaniesFile(input: string, outDir: string, opts: SplitOptions = {}): Promise<SplitSummary> {
  const table = await readCsvFile(input);

  if (table.rows.length > 0 && !table.headers.includes("secteur")) {
    console.warn(`[Splitter] ${input} has no "secteur" column; every row goes to the unknown bucket`);
  }

  const buckets = splitSectors(table, opts);
  const unknown = buckets.find((b) => b.slug === UNKNOWN_SECTOR);
  if (unknown) {
    console.warn(`[Splitter] ${unknown.rows.length} rows without a sector`);
  }

  const files = await writeSectorFiles(outDir, buckets);
  return { input, rows: table.rows.length, files };
}
