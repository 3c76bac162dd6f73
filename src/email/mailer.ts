import path from "node:path";
import { createTransport, type SendMailOptions } from "nodemailer";
import type { SmtpSettings } from "../config/env.js";
import { SendError, SmtpSessionError, errorMessage } from "../errors.js";

export type SendMailInput = {
  from: string;
  to: string;
  subject: string;
  text: string;
  attachmentPath?: string;
};

/** The part of a nodemailer transporter the session uses. */
export type MailTransport = {
  verify(): Promise<true>;
  sendMail(mail: SendMailOptions): Promise<{ messageId?: string }>;
  close(): void;
};

export type SmtpSession = {
  send(input: SendMailInput): Promise<{ messageId?: string }>;
  close(): void;
};

/**
 * Connects and authenticates once. Any failure here is fatal for the
 * run: the transport is closed and SmtpSessionError thrown.
 */
export async function openSmtpSession(settings: SmtpSettings): Promise<SmtpSession> {
  const transport: MailTransport = createTransport({
    host: settings.host,
    port: settings.port,
    secure: !settings.startTls,
    requireTLS: settings.startTls,
    auth: settings.user && settings.pass ? { user: settings.user, pass: settings.pass } : undefined,
    connectionTimeout: 60000,
  });

  try {
    await transport.verify();
  } catch (e) {
    transport.close();
    throw new SmtpSessionError(`SMTP session to ${settings.host}:${settings.port} failed: ${errorMessage(e)}`, {
      cause: e,
    });
  }
  console.log(`[Mailer] Connected to ${settings.host}:${settings.port}${settings.startTls ? " (STARTTLS)" : " (TLS)"}`);

  let closed = false;

  return {
    async send(input) {
      const mail: SendMailOptions = {
        from: input.from,
        to: input.to,
        subject: input.subject,
        text: input.text,
        attachments: input.attachmentPath
          ? [{ filename: path.basename(input.attachmentPath), path: input.attachmentPath }]
          : undefined,
      };

      try {
        const info = await transport.sendMail(mail);
        return { messageId: info.messageId };
      } catch (e) {
        throw new SendError(input.to, errorMessage(e), { cause: e });
      }
    },

    close() {
      if (closed) return;
      closed = true;
      transport.close();
    },
  };
}
