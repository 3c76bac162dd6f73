import { ToolkitError } from "../errors.js";

/**
 * Runs a CLI action; a thrown error is reported on stderr and turns into
 * exit code 1.
 */
export async function runCli(tag: string, action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (e) {
    if (e instanceof ToolkitError) console.error(`[${tag}] ${e.name}: ${e.message}`);
    else console.error(`[${tag}] Unexpected error:`, e);
    process.exitCode = 1;
  }
}
