#!/usr/bin/env node
import "dotenv/config";
import { Command } from "commander";
import { splitCompaniesFile } from "../sectors/split.js";
import { runCli } from "./run.js";

const program = new Command();

program
  .name("outreach-split")
  .description("Write one sector_<slug>.csv per sector of the scraped companies CSV")
  .option("-i, --input <path>", "Combined CSV written by the scraper", "companies.csv")
  .option("-d, --out-dir <dir>", "Directory for the sector files", "by_sector")
  .option("-m, --multi-sector", "Split secteur values on ';' or ',' and file the row under each", false)
  .action((options: { input: string; outDir: string; multiSector: boolean }) =>
    runCli("Splitter", async () => {
      const summary = await splitCompaniesFile(options.input, options.outDir, {
        multiSector: options.multiSector,
      });
      console.log(`[Splitter] ${summary.rows} rows from ${summary.input} into ${summary.files.length} sector files`);
    })
  );

await program.parseAsync();
