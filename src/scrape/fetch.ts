import { fetch } from "undici";
import { FetchError, errorMessage } from "../errors.js";

const USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124 Safari/537.36";

export type FetchedPage = {
  status: number;
  html: string;
  finalUrl: string;
};

/**
 * GET a page as HTML. Network errors, timeouts, non-2xx statuses and
 * non-HTML content types all raise FetchError.
 */
export async function fetchHtml(url: string, timeoutMs = 20000): Promise<FetchedPage> {
  const ctrl = new AbortController();
  const t = setTimeout(() => ctrl.abort(), timeoutMs);

  try {
    const res = await fetch(url, {
      signal: ctrl.signal,
      redirect: "follow",
      headers: {
        "User-Agent": USER_AGENT,
        Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
        "Accept-Language": "fr-FR,fr;q=0.9,en;q=0.8",
      },
    });

    if (!res.ok) {
      throw new FetchError(`GET ${url} -> ${res.status}`, res.status);
    }

    const ct = res.headers.get("content-type") || "";
    if (!ct.includes("text/html") && !ct.includes("application/xhtml")) {
      throw new FetchError(`GET ${url}: not HTML (${ct || "no content-type"})`, res.status);
    }

    const html = await res.text();
    return { status: res.status, html, finalUrl: res.url || url };
  } catch (e) {
    if (e instanceof FetchError) throw e;
    const reason = ctrl.signal.aborted ? `timed out after ${timeoutMs}ms` : errorMessage(e);
    throw new FetchError(`GET ${url} failed: ${reason}`, undefined, { cause: e });
  } finally {
    clearTimeout(t);
  }
}
