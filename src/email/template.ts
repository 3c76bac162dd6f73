import type { CsvRow } from "../csv/csv.js";
import { TemplateError } from "../errors.js";

export type TemplateVars = Record<string, string>;

export type RenderOptions = {
  /** throw on an unknown placeholder instead of rendering it empty */
  strict?: boolean;
};

// {{ and }} are literal braces
const PLACEHOLDER = /\{\{|\}\}|\{([^{}]+)\}/g;

export function renderTemplate(tpl: string, vars: TemplateVars, opts: RenderOptions = {}): string {
  return tpl.replace(PLACEHOLDER, (match, keyRaw: string | undefined) => {
    if (match === "{{") return "{";
    if (match === "}}") return "}";

    const key = (keyRaw ?? "").trim();
    if (Object.prototype.hasOwnProperty.call(vars, key)) return vars[key] ?? "";
    if (opts.strict) throw new TemplateError(key);
    return "";
  });
}

/** Placeholders used by a template, in order of first use. */
export function templatePlaceholders(tpl: string): string[] {
  const seen = new Set<string>();
  for (const m of tpl.matchAll(PLACEHOLDER)) {
    if (m[1] !== undefined) seen.add(m[1].trim());
  }
  return [...seen];
}

export type RecipientContext = {
  yourName: string;
  sector: string;
  sectorSlug: string;
};

export const ALIAS_VARS = ["contact_name", "company", "your_name", "email", "contact", "sector", "sector_slug"] as const;

/**
 * Row columns plus the aliases every template can rely on. `sector` and
 * `sector_slug` come from the file name and win over same-named columns.
 */
export function buildTemplateVars(row: CsvRow, ctx: RecipientContext): TemplateVars {
  const company = row.company ?? "";
  const contact = row.contact_name || row.contact || company;

  return {
    ...row,
    contact_name: contact,
    contact: row.contact ?? contact,
    company,
    email: row.email ?? "",
    your_name: ctx.yourName,
    sector: ctx.sector,
    sector_slug: ctx.sectorSlug,
  };
}
