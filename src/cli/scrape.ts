#!/usr/bin/env node
import "dotenv/config";
import { Command } from "commander";
import { scrapeCompanies, writeCompaniesCsv } from "../scrape/companies.js";
import { runCli } from "./run.js";

const DEFAULT_URL = "https://www.technopark.ma/start-ups-du-mois/";

const program = new Command();

program
  .name("outreach-scrape")
  .description("Extract startup listings logged as JSON by a page's inline scripts into a CSV grouped by sector")
  .option("-u, --url <url>", "Page to scrape", DEFAULT_URL)
  .option("-o, --output <path>", "CSV file to (over)write", "companies.csv")
  .action((options: { url: string; output: string }) =>
    runCli("Scraper", async () => {
      const { companies, stats } = await scrapeCompanies(options.url);

      console.log(
        `[Scraper] ${stats.fragments} JSON fragments, ${stats.skippedFragments} malformed, ` +
          `${stats.skippedRecords} listings without a name`
      );

      if (companies.length === 0) {
        console.warn("[Scraper] No company listings found; nothing written. The page may build them client-side.");
        return;
      }

      await writeCompaniesCsv(options.output, companies);
      const sectors = new Set(companies.map((c) => c.secteur)).size;
      console.log(`[Scraper] Wrote ${companies.length} companies in ${sectors} sectors to ${options.output}`);
    })
  );

await program.parseAsync();
