import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

const { undiciFetch } = vi.hoisted(() => ({ undiciFetch: vi.fn() }));

vi.mock("undici", () => ({
  fetch: undiciFetch,
}));

import {
  collectCompanyObjects,
  companiesFromHtml,
  normalizeCompany,
  scrapeCompanies,
  writeCompaniesCsv,
} from "../scrape/companies.js";
import { readCsvFile } from "../csv/csv.js";
import { FetchError } from "../errors.js";

const PAGE = `<html><body><script>
console.log({"name":"Acme","secteur":"Fintech","website":"https://acme.test"});
console.log("list", [{"name":"Beta","secteur":"Agritech","description":"Soil sensors, drones"},{"name":"Gamma"}]);
console.log({"data":{"items":[{"Nom":"Delta","Secteur":"Energie"}]}});
console.log([{"title":"","secteur":"Orphan"}]);
console.log({"name":"Broken",});
</script></body></html>`;

describe("collectCompanyObjects", () => {
  it("flattens arrays and searches nested objects for listings", () => {
    const found = collectCompanyObjects({ data: { items: [{ nom: "Delta" }, { other: 1 }] }, meta: { count: 2 } });
    expect(found).toEqual([{ nom: "Delta" }]);
  });

  it("returns nothing for scalars", () => {
    expect(collectCompanyObjects("Acme")).toEqual([]);
    expect(collectCompanyObjects(null)).toEqual([]);
  });
});

describe("normalizeCompany", () => {
  it("maps aliased keys case-insensitively and keeps the raw JSON", () => {
    const obj = { EntrepriseName: " Zeta ", EntrepriseSecteurActivite: "Santé", EntrepriseContactSiteWeb: "zeta.ma", Id: 7 };
    expect(normalizeCompany(obj)).toEqual({
      secteur: "Santé",
      name: "Zeta",
      description: "",
      website: "zeta.ma",
      raw: JSON.stringify(obj),
    });
  });

  it("returns null when no name is present", () => {
    expect(normalizeCompany({ secteur: "Fintech", website: "x.test" })).toBeNull();
  });
});

describe("companiesFromHtml", () => {
  it("extracts every named listing and counts what was skipped", () => {
    const { companies, stats } = companiesFromHtml(PAGE);
    expect(companies.map((c) => [c.name, c.secteur])).toEqual([
      ["Acme", "Fintech"],
      ["Beta", "Agritech"],
      ["Gamma", ""],
      ["Delta", "Energie"],
    ]);
    expect(stats).toEqual({ fragments: 5, skippedFragments: 1, skippedRecords: 1 });
  });
});

describe("writeCompaniesCsv", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "companies-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("writes the fixed column order with rows grouped by sector", async () => {
    const out = path.join(dir, "companies.csv");
    await writeCompaniesCsv(out, companiesFromHtml(PAGE).companies);

    const text = fs.readFileSync(out, "utf8");
    expect(text.split("\n")[0]).toBe('"secteur","name","description","website","raw"');

    const table = await readCsvFile(out);
    expect(table.rows.map((r) => r.name)).toEqual(["Gamma", "Beta", "Delta", "Acme"]);
    expect(table.rows[1]).toEqual({
      secteur: "Agritech",
      name: "Beta",
      description: "Soil sensors, drones",
      website: "",
      raw: '{"name":"Beta","secteur":"Agritech","description":"Soil sensors, drones"}',
    });
  });
});

describe("scrapeCompanies", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("fetches the page and returns its listings", async () => {
    undiciFetch.mockResolvedValue({
      ok: true,
      status: 200,
      url: "https://startups.test/du-mois/",
      headers: new Headers({ "content-type": "text/html; charset=UTF-8" }),
      text: () => Promise.resolve(PAGE),
    });

    const result = await scrapeCompanies("https://startups.test/du-mois");
    expect(result.url).toBe("https://startups.test/du-mois/");
    expect(result.companies).toHaveLength(4);
  });

  it("aborts on an HTTP error", async () => {
    undiciFetch.mockResolvedValue({
      ok: false,
      status: 503,
      url: "https://startups.test/",
      headers: new Headers({ "content-type": "text/html" }),
      text: () => Promise.resolve(""),
    });

    await expect(scrapeCompanies("https://startups.test/")).rejects.toBeInstanceOf(FetchError);
  });
});
