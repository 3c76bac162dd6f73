import { pickField } from "../config/fields.js";
import type { CsvRow, CsvTable } from "../csv/csv.js";

export type Recipient = {
  email: string;
  company: string;
  contactName: string;
  /** the CSV row with `email`, `company` and `contact_name` filled in */
  row: CsvRow;
};

function normalizeEmail(s: string) {
  return s.trim().toLowerCase();
}

/**
 * Rows with a contact address, first occurrence of each address only.
 * The address comes from the `email` column or one of its aliases
 * (e.g. EntrepriseContactEmail).
 */
export function loadRecipients(table: CsvTable): Recipient[] {
  const seen = new Set<string>();
  const out: Recipient[] = [];

  for (const r of table.rows) {
    const email = (r.email ?? "").trim() || pickField(r, "email");
    if (!email) continue;

    const key = normalizeEmail(email);
    if (seen.has(key)) {
      console.log(`[Emailer] Duplicate address skipped: ${email}`);
      continue;
    }
    seen.add(key);

    const company = (r.company ?? "").trim() || pickField(r, "company");
    const contactName = (r.contact_name ?? "").trim() || pickField(r, "contact_name");

    out.push({
      email,
      company,
      contactName,
      row: { ...r, email, company, contact_name: contactName },
    });
  }

  return out;
}
