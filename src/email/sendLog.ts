import fs from "node:fs/promises";
import path from "node:path";
import { createObjectCsvWriter } from "csv-writer";
import { FileError, errorMessage } from "../errors.js";

export type SendStatus = "sent" | "dry-run" | "failed";

export type SendLogEntry = {
  timestamp: string;
  recipient: string;
  sector: string;
  subject: string;
  status: SendStatus;
  error?: string;
};

export const SEND_LOG_COLUMNS = ["timestamp", "recipient", "sector", "subject", "status", "error"] as const;

export type SendLog = {
  readonly path: string;
  /** entries written by this run */
  readonly written: number;
  append(entry: Omit<SendLogEntry, "timestamp"> & { timestamp?: string }): Promise<void>;
  close(): Promise<void>;
};

async function isEmptyOrMissing(p: string) {
  try {
    const st = await fs.stat(p);
    return st.size === 0;
  } catch {
    return true;
  }
}

/**
 * Append-only CSV audit log. The header goes in only when the file is new
 * or empty; nothing is created until the first entry. Writes are queued so
 * entries land in call order.
 */
export async function openSendLog(logPath: string): Promise<SendLog> {
  try {
    await fs.mkdir(path.dirname(path.resolve(logPath)), { recursive: true });
  } catch (e) {
    throw new FileError(`Cannot create send log directory for ${logPath}: ${errorMessage(e)}`, logPath, { cause: e });
  }

  const writer = createObjectCsvWriter({
    path: logPath,
    header: SEND_LOG_COLUMNS.map((c) => ({ id: c, title: c })),
    append: !(await isEmptyOrMissing(logPath)),
    alwaysQuote: true,
  });

  let queue: Promise<void> = Promise.resolve();
  let written = 0;
  let closed = false;

  return {
    path: logPath,
    get written() {
      return written;
    },

    append(entry) {
      if (closed) return Promise.reject(new FileError("Send log already closed", logPath));

      const row = {
        timestamp: entry.timestamp ?? new Date().toISOString(),
        recipient: entry.recipient,
        sector: entry.sector,
        subject: entry.subject,
        status: entry.status,
        error: entry.error ?? "",
      };

      const next = queue.then(async () => {
        try {
          await writer.writeRecords([row]);
          written += 1;
        } catch (e) {
          throw new FileError(`Cannot append to send log ${logPath}: ${errorMessage(e)}`, logPath, { cause: e });
        }
      });
      // the failure is reported to this append's caller; later entries still get their turn
      queue = next.catch(() => undefined);
      return next;
    },

    async close() {
      closed = true;
      await queue;
    },
  };
}
