import path from "node:path";

export const UNKNOWN_SECTOR = "unknown";
export const SECTOR_FILE_PREFIX = "sector_";

/**
 * Filesystem-safe sector id: lower-case ASCII, words joined by "_".
 * "Développement Informatique" -> "developpement_informatique".
 */
export function slugifySector(sector: string): string {
  const s = sector
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "")
    .trim()
    .toLowerCase()
    .replace(/\s+/g, "_")
    .replace(/[^a-z0-9_-]/g, "")
    .slice(0, 120);
  return s || UNKNOWN_SECTOR;
}

export function sectorFileName(slug: string): string {
  return `${SECTOR_FILE_PREFIX}${slug}.csv`;
}

/** by_sector/sector_bio_tech.csv -> { sectorSlug: "bio_tech", sector: "bio tech" } */
export function sectorFromFilename(filePath: string): { sector: string; sectorSlug: string } {
  const base = path.basename(filePath, path.extname(filePath));
  const sectorSlug = base.startsWith(SECTOR_FILE_PREFIX) ? base.slice(SECTOR_FILE_PREFIX.length) : base;
  return { sectorSlug, sector: sectorSlug.replace(/_/g, " ").trim() };
}
