import fs from "node:fs/promises";
import type { SendSettings } from "../config/env.js";
import { readCsvFile, type CsvTable } from "../csv/csv.js";
import { ConfigError, FileError, SendError, TemplateError } from "../errors.js";
import { sectorFromFilename } from "../sectors/slug.js";
import { openSmtpSession, type SmtpSession } from "./mailer.js";
import { loadRecipients, type Recipient } from "./recipients.js";
import { openSendLog } from "./sendLog.js";
import {
  ALIAS_VARS,
  buildTemplateVars,
  renderTemplate,
  templatePlaceholders,
  type RecipientContext,
} from "./template.js";

/** Pending -> Rendered -> DryPreviewed | Sent | Failed; one attempt per run. */
export type RecipientState = "pending" | "rendered" | "dry-previewed" | "sent" | "failed";

export type RecipientOutcome = {
  email: string;
  company: string;
  subject?: string;
  state: RecipientState;
  messageId?: string;
  error?: string;
};

export type SendRunSummary = {
  csvPath: string;
  sector: string;
  dryRun: boolean;
  stats: {
    total: number;
    sent: number;
    dryRun: number;
    failed: number;
  };
  results: RecipientOutcome[];
};

export type RenderedMessage = {
  subject: string;
  body: string;
};

function sleep(ms: number) {
  return new Promise((r) => setTimeout(r, ms));
}

async function isReadable(p: string) {
  try {
    await fs.access(p, fs.constants.R_OK);
    return true;
  } catch {
    return false;
  }
}

export function renderMessage(
  recipient: Recipient,
  ctx: RecipientContext,
  templates: { subject: string; body: string; strict?: boolean }
): RenderedMessage {
  const vars = buildTemplateVars(recipient.row, ctx);
  const opts = { strict: templates.strict };
  return {
    subject: renderTemplate(templates.subject, vars, opts).replace(/\s*[\r\n]+\s*/g, " ").trim(),
    body: renderTemplate(templates.body, vars, opts),
  };
}

/** Column names of the CSV plus the aliases every template gets. */
export function listTemplateVars(table: CsvTable): { columns: string[]; aliases: string[] } {
  return {
    columns: [...new Set(table.headers)].filter(Boolean).sort(),
    aliases: [...ALIAS_VARS],
  };
}

/** Placeholders of the templates that neither a column nor an alias provides. */
export function unknownPlaceholders(table: CsvTable, templates: string[]): string[] {
  const known = new Set<string>([...table.headers, ...ALIAS_VARS]);
  const used = new Set(templates.flatMap((t) => templatePlaceholders(t)));
  return [...used].filter((p) => !known.has(p));
}

function printPreview(from: string | undefined, r: Recipient, msg: RenderedMessage, attachment?: string) {
  console.log("----------------------------------------");
  if (from) console.log(`From: ${from}`);
  console.log(`To: ${r.email}${r.company ? ` (${r.company})` : ""}`);
  console.log(`Subject: ${msg.subject}`);
  console.log(`Attachment: ${attachment ?? "(none)"}`);
  console.log("");
  console.log(msg.body);
}

/**
 * Renders and sends (or previews) one message per recipient of a sector
 * CSV, appending every attempt to the send log. A failed recipient is
 * logged and skipped; a session that cannot start aborts the run.
 */
export async function sendApplications(settings: SendSettings): Promise<SendRunSummary> {
  const table = await readCsvFile(settings.csvPath);
  const recipients = loadRecipients(table);
  const { sector, sectorSlug } = sectorFromFilename(settings.csvPath);
  const dryRun = settings.dryRun;

  const summary: SendRunSummary = {
    csvPath: settings.csvPath,
    sector,
    dryRun,
    stats: { total: recipients.length, sent: 0, dryRun: 0, failed: 0 },
    results: [],
  };

  console.log(`[Emailer] Found ${recipients.length} unique recipients in ${settings.csvPath}`);
  if (recipients.length === 0) return summary;

  const unknown = unknownPlaceholders(table, [settings.subject, settings.bodyTemplate]);
  if (unknown.length > 0 && !settings.strictTemplates) {
    console.warn(`[Emailer] No value for ${unknown.map((p) => `{${p}}`).join(", ")}; rendered empty`);
  }

  let attachment: string | undefined = settings.cvPath;
  if (!(await isReadable(settings.cvPath))) {
    if (!dryRun) throw new FileError(`CV not found or unreadable: ${settings.cvPath}`, settings.cvPath);
    console.warn(`[Emailer] CV not found at ${settings.cvPath}; previewing without attachment`);
    attachment = undefined;
  }

  const smtp = dryRun ? null : settings.smtp;
  if (!dryRun && (!smtp || !settings.fromEmail)) throw new ConfigError("SMTP settings are required to send");

  const ctx: RecipientContext = { yourName: settings.yourName, sector, sectorSlug };
  // the SMTP session is only opened inside the try below
  const log = await openSendLog(settings.sentLogPath);

  let sender: { session: SmtpSession; from: string } | null = null;
  try {
    if (smtp && settings.fromEmail) {
      sender = { session: await openSmtpSession(smtp), from: settings.fromEmail };
    }

    for (const [i, r] of recipients.entries()) {
      const outcome: RecipientOutcome = { email: r.email, company: r.company, state: "pending" };
      summary.results.push(outcome);

      let msg: RenderedMessage;
      try {
        msg = renderMessage(r, ctx, {
          subject: settings.subject,
          body: settings.bodyTemplate,
          strict: settings.strictTemplates,
        });
      } catch (e) {
        if (!(e instanceof TemplateError)) throw e;
        outcome.state = "failed";
        outcome.error = e.message;
        summary.stats.failed += 1;
        console.error(`[Emailer] Failed to render template for ${r.email}: ${e.message}`);
        await log.append({ recipient: r.email, sector, subject: settings.subject, status: "failed", error: e.message });
        continue;
      }
      outcome.state = "rendered";
      outcome.subject = msg.subject;

      if (!sender) {
        printPreview(settings.fromEmail, r, msg, attachment);
        outcome.state = "dry-previewed";
        summary.stats.dryRun += 1;
        await log.append({ recipient: r.email, sector, subject: msg.subject, status: "dry-run" });
        continue;
      }

      try {
        const info = await sender.session.send({
          from: sender.from,
          to: r.email,
          subject: msg.subject,
          text: msg.body,
          attachmentPath: attachment,
        });
        outcome.state = "sent";
        outcome.messageId = info.messageId;
        summary.stats.sent += 1;
        console.log(`[Emailer] Sent: ${r.email}`);
        await log.append({ recipient: r.email, sector, subject: msg.subject, status: "sent" });
      } catch (e) {
        if (!(e instanceof SendError)) throw e;
        outcome.state = "failed";
        outcome.error = e.message;
        summary.stats.failed += 1;
        console.error(`[Emailer] Failed to send to ${r.email}: ${e.message}`);
        await log.append({ recipient: r.email, sector, subject: msg.subject, status: "failed", error: e.message });
      }

      if (settings.delayMs > 0 && i < recipients.length - 1) await sleep(settings.delayMs);
    }
  } finally {
    sender?.session.close();
    await log.close();
  }

  const s = summary.stats;
  console.log(`[Emailer] Done: ${s.sent} sent, ${s.dryRun} previewed, ${s.failed} failed (log: ${log.path})`);
  return summary;
}
