import { looksLikeCompany, pickField } from "../config/fields.js";
import { writeCsvFile } from "../csv/csv.js";
import { fetchHtml } from "./fetch.js";
import { extractLoggedJson } from "./extractLoggedJson.js";

export type CompanyRecord = {
  secteur: string;
  name: string;
  description: string;
  website: string;
  /** JSON text of the listing object as found on the page */
  raw: string;
};

export const COMPANY_COLUMNS = ["secteur", "name", "description", "website", "raw"] as const;

export type ScrapeStats = {
  fragments: number;
  skippedFragments: number;
  skippedRecords: number;
};

export type ScrapeResult = {
  url: string;
  companies: CompanyRecord[];
  stats: ScrapeStats;
};

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/**
 * Listing objects anywhere inside a parsed value: arrays are flattened,
 * an object with a name-like key is a listing, other objects are searched
 * through their values.
 */
export function collectCompanyObjects(value: unknown): Record<string, unknown>[] {
  if (Array.isArray(value)) return value.flatMap((v) => collectCompanyObjects(v));
  if (!isPlainObject(value)) return [];
  if (looksLikeCompany(value)) return [value];
  return Object.values(value).flatMap((v) => collectCompanyObjects(v));
}

/** null when the object has no usable name. */
export function normalizeCompany(obj: Record<string, unknown>): CompanyRecord | null {
  const name = pickField(obj, "name");
  if (!name) return null;

  return {
    secteur: pickField(obj, "secteur"),
    name,
    description: pickField(obj, "description"),
    website: pickField(obj, "website"),
    raw: JSON.stringify(obj),
  };
}

export function companiesFromHtml(html: string): { companies: CompanyRecord[]; stats: ScrapeStats } {
  const { values, skipped } = extractLoggedJson(html);

  for (const err of skipped) {
    console.warn(`[Scraper] Skipped fragment: ${err.message}`);
  }

  const companies: CompanyRecord[] = [];
  let skippedRecords = 0;

  for (const obj of values.flatMap((v) => collectCompanyObjects(v))) {
    const rec = normalizeCompany(obj);
    if (!rec) {
      skippedRecords += 1;
      console.warn(`[Scraper] Skipped listing without a name: ${JSON.stringify(obj).slice(0, 80)}`);
      continue;
    }
    companies.push(rec);
  }

  return {
    companies,
    stats: {
      fragments: values.length + skipped.length,
      skippedFragments: skipped.length,
      skippedRecords,
    },
  };
}

export async function scrapeCompanies(url: string): Promise<ScrapeResult> {
  console.log(`[Scraper] Fetching ${url}`);
  const page = await fetchHtml(url);
  console.log(`[Scraper] ${page.status} ${page.finalUrl} (${page.html.length} bytes)`);

  const { companies, stats } = companiesFromHtml(page.html);
  return { url: page.finalUrl, companies, stats };
}

function byCodePoint(a: string, b: string) {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Rows sorted by sector then name, so each sector's rows sit together. */
export function sortCompanies(companies: CompanyRecord[]): CompanyRecord[] {
  return [...companies].sort((a, b) => byCodePoint(a.secteur, b.secteur) || byCodePoint(a.name, b.name));
}

export async function writeCompaniesCsv(outPath: string, companies: CompanyRecord[]): Promise<void> {
  await writeCsvFile(outPath, [...COMPANY_COLUMNS], sortCompanies(companies));
}
