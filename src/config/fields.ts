import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import yaml from "yaml";
import { z } from "zod";
import { ConfigError, errorMessage } from "../errors.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

// resolves the same way from src/config and dist/config
const FIELDS_PATH = process.env.FIELDS_PATH || path.resolve(__dirname, "../../config/fields.yaml");

const aliasList = z.array(z.string().min(1)).default([]);

const FieldsFile = z.object({
  company_keys: aliasList,
  fields: z.object({
    name: aliasList,
    secteur: aliasList,
    website: aliasList,
    description: aliasList,
    contact_name: aliasList,
    email: aliasList,
    company: aliasList,
  }),
});

export type FieldName = keyof z.infer<typeof FieldsFile>["fields"];

export type FieldLexicon = {
  companyKeys: Set<string>;
  aliases: Record<FieldName, string[]>;
};

let cachedLexicon: FieldLexicon | null = null;

export function loadFieldLexicon(): FieldLexicon {
  if (cachedLexicon) return cachedLexicon;

  let raw: string;
  try {
    raw = fs.readFileSync(FIELDS_PATH, "utf8");
  } catch (e) {
    console.error("[Fields] Failed to load fields.yaml:", errorMessage(e));
    throw new ConfigError(`Failed to load field aliases from ${FIELDS_PATH}: ${errorMessage(e)}`);
  }

  const parsed = FieldsFile.safeParse(yaml.parse(raw));
  if (!parsed.success) {
    throw new ConfigError(`Invalid ${FIELDS_PATH}: ${parsed.error.issues[0]?.message ?? "bad shape"}`);
  }

  const lower = (xs: string[]) => xs.map((x) => x.toLowerCase());
  const f = parsed.data.fields;

  cachedLexicon = {
    companyKeys: new Set(lower(parsed.data.company_keys)),
    aliases: {
      name: lower(f.name),
      secteur: lower(f.secteur),
      website: lower(f.website),
      description: lower(f.description),
      contact_name: lower(f.contact_name),
      email: lower(f.email),
      company: lower(f.company),
    },
  };

  return cachedLexicon;
}

function asText(v: unknown): string {
  if (v === undefined || v === null) return "";
  if (typeof v === "string") return v.trim();
  if (typeof v === "number" || typeof v === "boolean") return String(v);
  return "";
}

/**
 * First non-empty value among the aliases of `field`, matching keys
 * case-insensitively. Non-scalar values are ignored.
 */
export function pickField(obj: Record<string, unknown>, field: FieldName, lex = loadFieldLexicon()): string {
  const byLowerKey = new Map<string, unknown>();
  for (const [k, v] of Object.entries(obj)) {
    const lk = k.toLowerCase();
    if (!byLowerKey.has(lk)) byLowerKey.set(lk, v);
  }

  for (const alias of lex.aliases[field]) {
    const value = asText(byLowerKey.get(alias));
    if (value) return value;
  }
  return "";
}

export function looksLikeCompany(obj: Record<string, unknown>, lex = loadFieldLexicon()): boolean {
  return Object.keys(obj).some((k) => lex.companyKeys.has(k.toLowerCase()));
}
