import { z } from "zod";
import { ConfigError } from "../errors.js";

export const DEFAULT_SUBJECT = "Intérêt pour votre entreprise";

export const DEFAULT_BODY =
  "Bonjour {contact_name},\n\n" +
  "Je m'appelle {your_name} et je souhaite vous exprimer mon vif intérêt pour les activités de {company}. " +
  "Votre travail dans ce domaine m'inspire particulièrement et j'aimerais savoir si vous avez des opportunités " +
  "ou des besoins auxquels je pourrais contribuer.\n\n" +
  "Je joins mon CV en pièce jointe. Je suis disponible pour un échange (visio ou téléphone) afin de vous " +
  "présenter plus en détail mon expérience et la valeur que je peux apporter à votre équipe.\n\n" +
  "Merci beaucoup pour votre temps et votre considération.\n\n" +
  "Bien cordialement,\n" +
  "{your_name}\n";

// empty strings in .env mean "not set"
const optionalText = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const port = z.coerce.number().int().min(1).max(65535);

const MailerEnvSchema = z.object({
  SMTP_SERVER: optionalText,
  SMTP_PORT: optionalText.pipe(port.optional()).transform((v) => v ?? 587),
  SMTP_USER: optionalText,
  SMTP_PASS: z.string().optional().transform((v) => v || undefined),
  FROM_EMAIL: optionalText,
  CV_PATH: optionalText,
  SECTOR_CSV: optionalText,
  YOUR_NAME: optionalText,
  SUBJECT: optionalText,
  BODY_TEMPLATE: z.string().optional().transform((v) => (v ? unescapeNewlines(v) : undefined)),
  SENT_LOG: optionalText,
});

export type MailerEnv = {
  smtpServer?: string;
  smtpPort: number;
  smtpUser?: string;
  smtpPass?: string;
  fromEmail?: string;
  cvPath?: string;
  sectorCsv?: string;
  yourName?: string;
  subject: string;
  bodyTemplate: string;
  sentLogPath: string;
};

// single-line .env values carry "\n" literally
function unescapeNewlines(s: string) {
  return s.replace(/\\n/g, "\n");
}

export function loadMailerEnv(env: NodeJS.ProcessEnv = process.env): MailerEnv {
  const parsed = MailerEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue?.path.join(".") || "environment";
    throw new ConfigError(`Invalid ${key}: ${issue?.message ?? "bad value"}`);
  }

  const e = parsed.data;
  return {
    smtpServer: e.SMTP_SERVER,
    smtpPort: e.SMTP_PORT,
    smtpUser: e.SMTP_USER,
    smtpPass: e.SMTP_PASS,
    fromEmail: e.FROM_EMAIL ?? e.SMTP_USER,
    cvPath: e.CV_PATH,
    sectorCsv: e.SECTOR_CSV,
    yourName: e.YOUR_NAME,
    subject: e.SUBJECT ?? DEFAULT_SUBJECT,
    bodyTemplate: e.BODY_TEMPLATE ?? DEFAULT_BODY,
    sentLogPath: e.SENT_LOG ?? "sent_log.csv",
  };
}

export type SendCliOptions = {
  csv?: string;
  cv?: string;
  yourName?: string;
  dryRun?: boolean;
  listVars?: boolean;
  subject?: string;
  bodyTemplate?: string;
  fromEmail?: string;
  smtpServer?: string;
  smtpPort?: string;
  smtpUser?: string;
  smtpPass?: string;
  tls?: boolean;
  delay?: string;
  strictTemplates?: boolean;
  log?: string;
};

export type SmtpSettings = {
  host: string;
  port: number;
  user?: string;
  pass?: string;
  /** false = implicit TLS from the first byte instead of STARTTLS */
  startTls: boolean;
};

export type SendSettings = {
  csvPath: string;
  cvPath: string;
  yourName: string;
  dryRun: boolean;
  subject: string;
  bodyTemplate: string;
  strictTemplates: boolean;
  delayMs: number;
  sentLogPath: string;
  fromEmail?: string;
  smtp?: SmtpSettings;
};

function required(value: string | undefined, what: string): string {
  if (!value) throw new ConfigError(`Missing ${what}`);
  return value;
}

/** CSV path for --list-vars, which needs nothing else. */
export function resolveCsvPath(cli: SendCliOptions, env: MailerEnv): string {
  return required(cli.csv || env.sectorCsv, "sector CSV (--csv or SECTOR_CSV)");
}

/**
 * CLI options win over environment values. SMTP details are only
 * required when the run actually sends.
 */
export function resolveSendSettings(cli: SendCliOptions, env: MailerEnv): SendSettings {
  const dryRun = Boolean(cli.dryRun);

  const delay = cli.delay === undefined ? 2 : Number(cli.delay);
  if (!Number.isFinite(delay) || delay < 0) {
    throw new ConfigError(`Invalid --delay: ${cli.delay}`);
  }

  const settings: SendSettings = {
    csvPath: resolveCsvPath(cli, env),
    cvPath: required(cli.cv || env.cvPath, "CV path (--cv or CV_PATH)"),
    yourName: required(cli.yourName || env.yourName, "sender name (--your-name or YOUR_NAME)"),
    dryRun,
    subject: cli.subject ?? env.subject,
    bodyTemplate: cli.bodyTemplate ?? env.bodyTemplate,
    strictTemplates: Boolean(cli.strictTemplates),
    delayMs: Math.round(delay * 1000),
    sentLogPath: cli.log || env.sentLogPath,
  };

  if (dryRun) return settings;

  const rawPort = cli.smtpPort ?? env.smtpPort;
  const portParsed = port.safeParse(rawPort);
  if (!portParsed.success) throw new ConfigError(`Invalid SMTP port: ${rawPort}`);

  const user = cli.smtpUser || env.smtpUser;
  settings.smtp = {
    host: required(cli.smtpServer || env.smtpServer, "SMTP server (--smtp-server or SMTP_SERVER)"),
    port: portParsed.data,
    user,
    pass: cli.smtpPass || env.smtpPass,
    startTls: cli.tls !== false && portParsed.data !== 465,
  };
  settings.fromEmail = required(cli.fromEmail || env.fromEmail || user, "sender address (FROM_EMAIL or SMTP_USER)");

  return settings;
}
