import { load } from "cheerio";
import { ParseError } from "../errors.js";

export type ExtractedJson = {
  values: unknown[];
  /** object/array arguments that looked like JSON but did not parse */
  skipped: ParseError[];
};

const LOG_CALL = /\bconsole\s*\.\s*(?:log|info|debug|warn|dir|table)\s*\(/g;

const CLOSERS: Record<string, string> = { "{": "}", "[": "]", "(": ")" };

/**
 * Index of the last character of the `//` or `/* *\/` comment opening at
 * `start`, -1 for an unterminated block comment, null when no comment
 * opens there.
 */
function skipComment(src: string, start: number): number | null {
  if (src[start] !== "/") return null;
  if (src[start + 1] === "/") {
    const nl = src.indexOf("\n", start + 2);
    return nl < 0 ? src.length - 1 : nl;
  }
  if (src[start + 1] === "*") {
    const close = src.indexOf("*/", start + 2);
    return close < 0 ? -1 : close + 1;
  }
  return null;
}

/**
 * End index (exclusive) of the bracketed expression opening at `start`,
 * skipping over string literals and comments. -1 when it never closes or
 * a closing bracket does not match.
 */
function findBalancedEnd(src: string, start: number): number {
  const stack: string[] = [];

  for (let i = start; i < src.length; i++) {
    const ch = src[i];

    if (ch === '"' || ch === "'" || ch === "`") {
      i = skipString(src, i);
      if (i < 0) return -1;
      continue;
    }

    const commentEnd = skipComment(src, i);
    if (commentEnd !== null) {
      if (commentEnd < 0) return -1;
      i = commentEnd;
      continue;
    }

    const closer = CLOSERS[ch];
    if (closer) {
      stack.push(closer);
    } else if (ch === "}" || ch === "]" || ch === ")") {
      if (stack.pop() !== ch) return -1;
      if (stack.length === 0) return i + 1;
    }
  }
  return -1;
}

/** Index of the closing quote of the literal opening at `start`. */
function skipString(src: string, start: number): number {
  const quote = src[start];
  for (let i = start + 1; i < src.length; i++) {
    if (src[i] === "\\") {
      i++;
      continue;
    }
    if (src[i] === quote) return i;
    if (src[i] === "\n" && quote !== "`") return -1;
  }
  return -1;
}

type ScannedArguments = {
  candidates: string[];
  /** text from the point where scanning gave up, if it did */
  unscanned?: string;
  end: number;
};

/**
 * Top-level `{...}` / `[...]` arguments of the call whose argument list
 * starts at `argsStart`. Other arguments (labels, identifiers) are skipped.
 * When the list cannot be scanned, `end` stays at `argsStart` so the caller
 * resumes right after the call's opening parenthesis.
 */
function bracketArguments(src: string, argsStart: number): ScannedArguments {
  const candidates: string[] = [];
  const giveUp = (at: number): ScannedArguments => ({ candidates, unscanned: src.slice(at), end: argsStart });

  for (let i = argsStart; i < src.length; i++) {
    const ch = src[i];

    if (ch === ")") return { candidates, end: i + 1 };

    if (ch === '"' || ch === "'" || ch === "`") {
      const close = skipString(src, i);
      if (close < 0) return giveUp(i);
      i = close;
      continue;
    }

    const commentEnd = skipComment(src, i);
    if (commentEnd !== null) {
      if (commentEnd < 0) return giveUp(i);
      i = commentEnd;
      continue;
    }

    if (ch === "{" || ch === "[" || ch === "(") {
      const end = findBalancedEnd(src, i);
      if (end < 0) return giveUp(i);
      if (ch !== "(") candidates.push(src.slice(i, end));
      i = end - 1;
    }
  }
  return giveUp(argsStart);
}

function preview(fragment: string) {
  return fragment.length > 60 ? fragment.slice(0, 60) + "…" : fragment;
}

/** JSON fragments passed to logging calls in one script body. */
export function extractFromScript(script: string): ExtractedJson {
  const values: unknown[] = [];
  const skipped: ParseError[] = [];

  LOG_CALL.lastIndex = 0;
  let m: RegExpExecArray | null;
  while ((m = LOG_CALL.exec(script))) {
    const { candidates, unscanned, end } = bracketArguments(script, m.index + m[0].length);

    for (const fragment of candidates) {
      try {
        values.push(JSON.parse(fragment));
      } catch (e) {
        skipped.push(new ParseError(`Malformed JSON fragment: ${preview(fragment)}`, { cause: e }));
      }
    }
    if (unscanned !== undefined) {
      skipped.push(new ParseError(`Unbalanced logging call arguments: ${preview(unscanned)}`));
    }
    LOG_CALL.lastIndex = Math.max(end, LOG_CALL.lastIndex);
  }

  return { values, skipped };
}

/** Scans every inline `<script>` of the document. */
export function extractLoggedJson(html: string): ExtractedJson {
  const $ = load(html);
  const out: ExtractedJson = { values: [], skipped: [] };

  $("script").each((_, el) => {
    if ($(el).attr("src")) return;
    const body = $(el).html() || "";
    if (!body.trim()) return;

    const found = extractFromScript(body);
    out.values.push(...found.values);
    out.skipped.push(...found.skipped);
  });

  return out;
}
