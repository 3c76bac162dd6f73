#!/usr/bin/env node
import "dotenv/config";
import { Command } from "commander";
import { loadMailerEnv, resolveCsvPath, resolveSendSettings, type SendCliOptions } from "../config/env.js";
import { readCsvFile } from "../csv/csv.js";
import { listTemplateVars, sendApplications, unknownPlaceholders } from "../email/sendApplications.js";
import { runCli } from "./run.js";

const program = new Command();

program
  .name("outreach-send")
  .description("Send an application email with your CV to every contact of a sector CSV")
  .option("--csv <path>", "Sector CSV (default: SECTOR_CSV)")
  .option("--cv <path>", "CV to attach (default: CV_PATH)")
  .option("--your-name <name>", "Your full name for {your_name} (default: YOUR_NAME)")
  .option("--dry-run", "Print every rendered message instead of sending")
  .option("--list-vars", "List the placeholders the templates can use and exit")
  .option("--subject <template>", "Subject template (default: SUBJECT)")
  .option("--body-template <template>", "Body template (default: BODY_TEMPLATE)")
  .option("--from-email <address>", "From address (default: FROM_EMAIL, then SMTP_USER)")
  .option("--smtp-server <host>", "SMTP host (default: SMTP_SERVER)")
  .option("--smtp-port <port>", "SMTP port (default: SMTP_PORT or 587)")
  .option("--smtp-user <user>", "SMTP login (default: SMTP_USER)")
  .option("--smtp-pass <password>", "SMTP password (default: SMTP_PASS)")
  .option("--no-tls", "Use implicit TLS instead of STARTTLS")
  .option("--delay <seconds>", "Pause between two sends", "2")
  .option("--strict-templates", "Fail a recipient whose template names an unknown placeholder")
  .option("--log <path>", "Send log CSV (default: SENT_LOG or sent_log.csv)")
  .action((options: SendCliOptions) =>
    runCli("Emailer", async () => {
      const env = loadMailerEnv();

      if (options.listVars) {
        const csvPath = resolveCsvPath(options, env);
        const table = await readCsvFile(csvPath);
        const { columns, aliases } = listTemplateVars(table);
        console.log("Available variables (use in templates as {var_name}):");
        for (const c of columns) console.log(` - ${c}`);
        console.log("\nAlso always provided:");
        for (const a of aliases) console.log(` - ${a}`);
        console.log("\nDefaults for the subject and body come from SUBJECT and BODY_TEMPLATE.");

        const unknown = unknownPlaceholders(table, [options.subject ?? env.subject, options.bodyTemplate ?? env.bodyTemplate]);
        if (unknown.length > 0) {
          console.warn(`\nThe current templates use placeholders with no value: ${unknown.map((p) => `{${p}}`).join(", ")}`);
        }
        return;
      }

      const settings = resolveSendSettings(options, env);
      await sendApplications(settings);
    })
  );

await program.parseAsync();
